/**
 * @fileoverview Centralized error handling: logs errors with context, maps
 * unknown errors onto {@link BaseErrorCode}s, and optionally rethrows them
 * as {@link McpError}s.
 * @module src/utils/internal/errorHandler
 */

import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import { sanitizeInputForLogging } from "../security/sanitization.js";
import { logger } from "./logger.js";
import { RequestContext } from "./requestContext.js";

export interface ErrorHandlerOptions {
  /** The operation being performed when the error occurred. */
  operation: string;
  context?: RequestContext | Record<string, unknown>;
  /** Input that caused the error; sanitized before it is logged. */
  input?: unknown;
  /** Rethrow the (possibly wrapped) error after handling. */
  rethrow?: boolean;
  /** Code to use when the error is not already an {@link McpError}. */
  errorCode?: BaseErrorCode;
  /** Logs at `crit` instead of `error`. */
  critical?: boolean;
}

const ERROR_TYPE_MAPPINGS: Record<string, BaseErrorCode> = {
  SyntaxError: BaseErrorCode.VALIDATION_ERROR,
  TypeError: BaseErrorCode.VALIDATION_ERROR,
  ZodError: BaseErrorCode.VALIDATION_ERROR,
  AxiosError: BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
};

const COMMON_ERROR_PATTERNS: ReadonlyArray<{
  pattern: RegExp;
  errorCode: BaseErrorCode;
}> = [
  { pattern: /not found|no such/i, errorCode: BaseErrorCode.NOT_FOUND },
  {
    pattern: /invalid|validation|malformed/i,
    errorCode: BaseErrorCode.VALIDATION_ERROR,
  },
  { pattern: /timed? ?out/i, errorCode: BaseErrorCode.TIMEOUT },
  {
    pattern: /ECONNREFUSED|ECONNRESET|ENOTFOUND|network/i,
    errorCode: BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
  },
];

export class ErrorHandler {
  /**
   * Determines an appropriate error code for an arbitrary thrown value.
   */
  public static determineErrorCode(error: unknown): BaseErrorCode {
    if (error instanceof McpError) {
      return error.code;
    }
    if (error instanceof Error) {
      const mapped = ERROR_TYPE_MAPPINGS[error.name];
      if (mapped) return mapped;
      for (const { pattern, errorCode } of COMMON_ERROR_PATTERNS) {
        if (pattern.test(error.message)) return errorCode;
      }
    }
    return BaseErrorCode.INTERNAL_ERROR;
  }

  /**
   * Logs an error and returns it as an `Error`, wrapping non-McpError values
   * when `errorCode` is given. Throws instead when `rethrow` is set.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): Error {
    const { operation, context, input, rethrow = false, critical = false } =
      options;
    const originalMessage =
      error instanceof Error ? error.message : String(error);
    const errorCode = options.errorCode ?? ErrorHandler.determineErrorCode(error);

    const logContext: Record<string, unknown> = {
      ...context,
      operation,
      errorCode,
      critical,
    };
    if (input !== undefined) {
      logContext.input = sanitizeInputForLogging(input);
    }
    if (error instanceof McpError && error.details) {
      logContext.errorDetails = error.details;
    }

    const log = critical ? logger.crit.bind(logger) : logger.error.bind(logger);
    log(
      `Error in ${operation}: ${originalMessage}`,
      error instanceof Error ? error : new Error(originalMessage),
      logContext,
    );

    let handled: Error;
    if (error instanceof McpError) {
      handled = error;
    } else if (options.errorCode) {
      handled = new McpError(options.errorCode, originalMessage, {
        operation,
        originalErrorName: error instanceof Error ? error.name : typeof error,
      });
    } else {
      handled = error instanceof Error ? error : new Error(originalMessage);
    }

    if (rethrow) {
      throw handled;
    }
    return handled;
  }

  /**
   * Runs `fn` and routes any failure through {@link ErrorHandler.handleError}
   * with `rethrow` forced on.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: Omit<ErrorHandlerOptions, "rethrow">,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw ErrorHandler.handleError(error, { ...options, rethrow: true });
    }
  }
}
