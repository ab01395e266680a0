/**
 * @fileoverview Barrel file for NCBI XML parsing.
 * @module src/services/NCBI/parsing/index
 */

export * from "./xmlNode.js";
export * from "./eSearchResultParser.js";
export * from "./gbSeqRecordParser.js";
