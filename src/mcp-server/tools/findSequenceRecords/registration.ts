/**
 * @fileoverview Registration for the find_sequence_records MCP tool.
 * @module src/mcp-server/tools/findSequenceRecords/registration
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
import { FindSequenceRecordsInputSchema, findSequenceRecordsEntrypoint } from "./logic.js";

/**
 * Registers the find_sequence_records tool, backed by the agent's entrypoint of the
 * same name.
 */
export async function registerFindSequenceRecordsTool(
  server: McpServer,
  agent: NucleotideAgent,
): Promise<void> {
  const operation = "registerFindSequenceRecordsTool";
  const toolName = findSequenceRecordsEntrypoint.id;
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    async () => {
      server.registerTool(
        toolName,
        {
          title: findSequenceRecordsEntrypoint.title,
          description: findSequenceRecordsEntrypoint.description,
          inputSchema: FindSequenceRecordsInputSchema.shape,
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
