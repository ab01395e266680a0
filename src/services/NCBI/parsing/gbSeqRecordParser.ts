/**
 * @fileoverview Field extraction from EFetch GenBank XML (`GBSet` → `GBSeq`).
 * @module src/services/NCBI/parsing/gbSeqRecordParser
 */

import { atPath, childOf, firstOf, textOf, XmlElement, XmlNode } from "./xmlNode.js";

/**
 * The descriptive fields of a GenBank record. Each is optional; an empty
 * element counts as absent.
 */
export interface GbSeqSummary {
  definition?: string;
  primaryAccession?: string;
  accessionVersion?: string;
}

function nonEmptyText(node: XmlNode | undefined): string | undefined {
  const text = textOf(node);
  return text === undefined || text === "" ? undefined : text;
}

/**
 * Reads the summary fields from the first `GBSeq` of a parsed document.
 * Never throws; a document without `GBSet` yields an empty summary.
 */
export function extractGbSeqSummary(document: XmlElement): GbSeqSummary {
  const gbSeq = firstOf(atPath(document, "GBSet", "GBSeq"));
  return {
    definition: nonEmptyText(childOf(gbSeq, "GBSeq_definition")),
    primaryAccession: nonEmptyText(childOf(gbSeq, "GBSeq_primary-accession")),
    accessionVersion: nonEmptyText(childOf(gbSeq, "GBSeq_accession-version")),
  };
}
