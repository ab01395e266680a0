/**
 * @fileoverview Normalizes NCBI ESearch XML into a {@link ESearchNormalizedResult}.
 * @module src/services/NCBI/parsing/eSearchResultParser
 */

import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  allOf,
  atPath,
  childOf,
  parseXmlDocument,
  textOf,
  XmlNode,
} from "./xmlNode.js";

/** Longest phrase reported verbatim in a "Phrase not found" error. */
export const MAX_REPORTED_PHRASE_LENGTH = 100;

export const MISSING_ESEARCH_ROOT_MESSAGE =
  "Invalid response from NCBI: missing eSearchResult element";

/**
 * Errors NCBI reports inside an ESearch `ErrorList`. Only `PhraseNotFound`
 * is extracted; `FieldNotFound` and the rest are ignored.
 */
export type ESearchError = {
  kind: "PhraseNotFound";
  /** The phrase, already cut to {@link MAX_REPORTED_PHRASE_LENGTH}. */
  phrase: string;
};

export interface ESearchNormalizedResult {
  count: number;
  page: number;
  pageSize: number;
  /** Never filled from the response's IdList. */
  sequenceIds: string[];
  errors: ESearchError[];
  warnings: string[];
}

/** Serialized form of a search result, as written to the JSON artifact. */
export interface SearchResultsPayload {
  count: number;
  page: number;
  page_size: number;
  sequence_ids: string[];
  errors: string[];
  warnings: string[];
}

/** Cuts by code point so a surrogate pair is never split. */
export function truncatePhrase(phrase: string): string {
  const chars = Array.from(phrase);
  return chars.length <= MAX_REPORTED_PHRASE_LENGTH
    ? phrase
    : `${chars.slice(0, MAX_REPORTED_PHRASE_LENGTH).join("")}...`;
}

export function formatESearchError(error: ESearchError): string {
  switch (error.kind) {
    case "PhraseNotFound":
      return `Phrase not found: ${error.phrase}`;
  }
}

function parseCount(node: XmlNode | undefined): number {
  const value = parseInt(textOf(node) ?? "", 10);
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function nonEmptyTexts(node: XmlNode | undefined): string[] {
  return allOf(node)
    .map(textOf)
    .filter((text): text is string => text !== undefined && text !== "");
}

/**
 * Parses the raw text of an ESearch response.
 * @throws {McpError} `NCBI_PARSING_ERROR` for malformed or unsafe XML;
 *   `NCBI_MALFORMED_RESPONSE` when there is no `eSearchResult` element.
 */
export function parseESearchResult(xml: string): ESearchNormalizedResult {
  // An empty <eSearchResult/> parses to empty text and counts as missing.
  const root = childOf(parseXmlDocument(xml), "eSearchResult");
  if (root === undefined || (root.kind === "text" && root.value === "")) {
    throw new McpError(
      BaseErrorCode.NCBI_MALFORMED_RESPONSE,
      MISSING_ESEARCH_ROOT_MESSAGE,
    );
  }

  const errors: ESearchError[] = nonEmptyTexts(
    atPath(root, "ErrorList", "PhraseNotFound"),
  ).map(
    (phrase): ESearchError => ({
      kind: "PhraseNotFound",
      phrase: truncatePhrase(phrase),
    }),
  );

  const warnings = nonEmptyTexts(atPath(root, "WarningList", "OutputMessage"));

  return {
    count: parseCount(childOf(root, "Count")),
    page: parseCount(childOf(root, "RetStart")),
    pageSize: parseCount(childOf(root, "RetMax")),
    sequenceIds: [],
    errors,
    warnings,
  };
}

export function toSearchResultsPayload(
  result: ESearchNormalizedResult,
): SearchResultsPayload {
  return {
    count: result.count,
    page: result.page,
    page_size: result.pageSize,
    sequence_ids: [...result.sequenceIds],
    errors: result.errors.map(formatESearchError),
    warnings: [...result.warnings],
  };
}
