/**
 * @fileoverview Barrel file for the get_sequence_record tool.
 * @module src/mcp-server/tools/getSequenceRecord/index
 */

export { registerGetSequenceRecordTool } from "./registration.js";
