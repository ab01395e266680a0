#!/usr/bin/env node
/**
 * @fileoverview Process entry point: initializes telemetry and logging, starts
 * the MCP server over stdio, and handles graceful shutdown.
 * @module src/index
 */

// OpenTelemetry must load before anything it instruments.
import { shutdownOpenTelemetry } from "./utils/telemetry/instrumentation.js";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { config, environment } from "./config/index.js";
import { initializeAndStartServer } from "./mcp-server/server.js";
import { logger, requestContextService } from "./utils/index.js";

let server: McpServer | undefined;

const shutdown = async (signal: string): Promise<void> => {
  const shutdownContext = requestContextService.createRequestContext({
    operation: "ServerShutdown",
    triggerEvent: signal,
  });
  logger.info(
    `Received ${signal}. Initiating graceful shutdown...`,
    shutdownContext,
  );

  let exitCode = 0;
  try {
    if (server) {
      await server.close();
      logger.info("MCP server closed.", shutdownContext);
    }
    await shutdownOpenTelemetry();
    logger.info("Graceful shutdown completed.", shutdownContext);
  } catch (error) {
    exitCode = 1;
    logger.error(
      "Critical error during shutdown process.",
      error instanceof Error ? error : new Error(String(error)),
      shutdownContext,
    );
  }
  process.exit(exitCode);
};

const start = async (): Promise<void> => {
  logger.initialize(config.logLevel);

  const startupContext = requestContextService.createRequestContext({
    operation: "ServerStartup",
    applicationName: config.mcpServerName,
    applicationVersion: config.mcpServerVersion,
    nodeEnvironment: environment,
  });
  logger.info(
    `Starting ${config.mcpServerName} (v${config.mcpServerVersion}) over stdio...`,
    startupContext,
  );

  server = await initializeAndStartServer();

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception detected.", error, startupContext);
    void shutdown("uncaughtException");
  });
  process.on("unhandledRejection", (reason: unknown) => {
    logger.error("Unhandled promise rejection detected.", {
      ...startupContext,
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("unhandledRejection");
  });
};

start().catch((error: unknown) => {
  logger.fatal(
    "Fatal error during startup.",
    error instanceof Error ? error : new Error(String(error)),
  );
  process.exit(1);
});
