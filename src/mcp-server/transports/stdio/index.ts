/**
 * @fileoverview Connects an `McpServer` to the stdio transport.
 * @module src/mcp-server/transports/stdio/index
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BaseErrorCode } from "../../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";

/**
 * Connects `server` over stdin/stdout. Nothing else may write to stdout
 * afterwards.
 * @throws {McpError} `INITIALIZATION_FAILED` if the connection fails.
 */
export async function startStdioTransport(
  server: McpServer,
  parentContext: RequestContext,
): Promise<void> {
  const context = requestContextService.createRequestContext({
    ...parentContext,
    operation: "connectStdioTransport",
    transportType: "stdio",
  });
  logger.info("Attempting to connect stdio transport...", context);

  await ErrorHandler.tryCatch(
    async () => {
      const transport = new StdioServerTransport();
      await server.connect(transport);
      logger.info("MCP Server connected via stdio transport.", context);
    },
    {
      operation: "connectStdioTransport",
      context,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}
