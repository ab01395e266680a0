/**
 * @fileoverview Defines standardized error codes, a custom error class, and related schemas
 * for handling errors within the Nucleotide MCP server and its components.
 * @module src/types-global/errors
 */

import { z } from "zod";

/**
 * Defines a set of standardized error codes for common issues within the
 * server and the NCBI integration.
 */
export enum BaseErrorCode {
  /** Input parameters failed validation. */
  VALIDATION_ERROR = "VALIDATION_ERROR",
  /** The requested resource was not found. */
  NOT_FOUND = "NOT_FOUND",
  /** The server or an agent is misconfigured (e.g. an unknown entrypoint). */
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  /** A component failed during startup. */
  INITIALIZATION_FAILED = "INITIALIZATION_FAILED",
  /** A request took too long. */
  TIMEOUT = "TIMEOUT",
  /** An NCBI response was not well-formed or used forbidden XML constructs. */
  NCBI_PARSING_ERROR = "NCBI_PARSING_ERROR",
  /** An NCBI response was well-formed but lacked its expected root element. */
  NCBI_MALFORMED_RESPONSE = "NCBI_MALFORMED_RESPONSE",
  /** NCBI could not be reached. */
  NCBI_SERVICE_UNAVAILABLE = "NCBI_SERVICE_UNAVAILABLE",
  /** An unexpected internal error. */
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Custom error class for server-specific errors.
 * Carries a {@link BaseErrorCode} and optional structured details.
 */
export class McpError extends Error {
  public readonly code: BaseErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: BaseErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = "McpError";
    Object.setPrototypeOf(this, McpError.prototype);
  }
}

/**
 * Zod schema for the serialized form of an {@link McpError}, as returned in
 * failed tool results.
 */
export const ErrorSchema = z
  .object({
    code: z.nativeEnum(BaseErrorCode).describe("Standardized error code"),
    message: z.string().describe("Detailed error message"),
    details: z
      .record(z.unknown())
      .optional()
      .describe("Optional structured error details"),
  })
  .describe("Error response schema");

