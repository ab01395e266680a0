/**
 * @fileoverview Main entry point for the MCP server.
 * Creates the `McpServer`, registers one tool per Nucleotide agent entrypoint,
 * and connects the stdio transport.
 * @module src/mcp-server/server
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { config, environment } from "../config/index.js";
import { ErrorHandler, logger, requestContextService } from "../utils/index.js";
import { NucleotideAgent } from "./agent/nucleotideAgent.js";
import { registerFindSequenceRecordsTool } from "./tools/findSequenceRecords/index.js";
import { registerGetSequenceRecordTool } from "./tools/getSequenceRecord/index.js";
import { startStdioTransport } from "./transports/stdio/index.js";

/**
 * Creates and configures a new `McpServer` with the agent's tools.
 *
 * @param agent - Agent backing the tools; a default one is created when omitted.
 * @throws {McpError} If any tool registration fails.
 */
export async function createMcpServerInstance(
  agent: NucleotideAgent = new NucleotideAgent(),
): Promise<McpServer> {
  const context = requestContextService.createRequestContext({
    operation: "createMcpServerInstance",
    environment,
  });
  logger.info("Initializing MCP server instance", context);

  const card = agent.getAgentCard();
  const server = new McpServer(
    { name: config.mcpServerName, version: config.mcpServerVersion },
    {
      capabilities: {
        logging: {},
        tools: { listChanged: true },
      },
      instructions: card.description,
    },
  );

  try {
    logger.debug("Registering tools...", context);
    // Keep tool registrations in alphabetical order.
    await registerFindSequenceRecordsTool(server, agent);
    await registerGetSequenceRecordTool(server, agent);
    logger.info("Tools registered successfully", {
      ...context,
      agent: card.name,
      tools: card.entrypoints.map((entrypoint) => entrypoint.id),
    });
  } catch (err) {
    logger.error("Failed to register tools", {
      ...context,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    throw err;
  }

  return server;
}

/**
 * Initializes the server and connects it over stdio. Exits the process on a
 * startup failure.
 */
export async function initializeAndStartServer(): Promise<McpServer> {
  const context = requestContextService.createRequestContext({
    operation: "initializeAndStartServer",
  });
  logger.info("MCP Server initialization sequence started.", context);
  try {
    const server = await createMcpServerInstance();
    await startStdioTransport(server, context);
    logger.info(
      "MCP Server initialization sequence completed successfully.",
      context,
    );
    return server;
  } catch (err) {
    ErrorHandler.handleError(err, {
      operation: "initializeAndStartServer",
      context,
      critical: true,
    });
    logger.info(
      "Exiting process due to critical initialization error.",
      context,
    );
    process.exit(1);
  }
}
