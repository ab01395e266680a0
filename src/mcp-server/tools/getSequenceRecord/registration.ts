/**
 * @fileoverview Registration for the get_sequence_record MCP tool.
 * @module src/mcp-server/tools/getSequenceRecord/registration
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { BaseErrorCode } from "../../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  requestContextService,
} from "../../../utils/index.js";
import { NucleotideAgent } from "../../agent/nucleotideAgent.js";
import { runAgentTool } from "../../agent/toolRunner.js";
import { GetSequenceRecordInputSchema, getSequenceRecordEntrypoint } from "./logic.js";

/**
 * Registers the get_sequence_record tool, backed by the agent's entrypoint of the
 * same name.
 */
export async function registerGetSequenceRecordTool(
  server: McpServer,
  agent: NucleotideAgent,
): Promise<void> {
  const operation = "registerGetSequenceRecordTool";
  const toolName = getSequenceRecordEntrypoint.id;
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: getSequenceRecordEntrypoint.title,
          description: getSequenceRecordEntrypoint.description,
          inputSchema: GetSequenceRecordInputSchema.shape,
        },
        async (input, mcpProvidedContext) =>
          runAgentTool(agent, toolName, input, context, mcpProvidedContext),
      );
      logger.notice(`Tool '${toolName}' registered.`, context);
    },
    {
      operation,
      context,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}
