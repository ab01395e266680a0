/**
 * @fileoverview Barrel file for the find_sequence_records tool.
 * @module src/mcp-server/tools/findSequenceRecords/index
 */

export { registerFindSequenceRecordsTool } from "./registration.js";
