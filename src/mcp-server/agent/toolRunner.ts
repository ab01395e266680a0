/**
 * @fileoverview Runs one agent entrypoint on behalf of an MCP tool call and
 * converts the outcome into a `CallToolResult`.
 * @module src/mcp-server/agent/toolRunner
 */

import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ErrorSchema, McpError } from "../../types-global/errors.js";
import {
  ErrorHandler,
  measureToolExecution,
  RequestContext,
  requestContextService,
} from "../../utils/index.js";
import { NucleotideAgent } from "./nucleotideAgent.js";
import {
  CollectingResponseContext,
  toCallToolResult,
} from "./responseContext.js";

/**
 * Runs `toolName` through the agent. Failures thrown by the agent become an
 * `isError` result carrying the error's code, message, and details.
 */
export async function runAgentTool(
  agent: NucleotideAgent,
  toolName: string,
  input: unknown,
  parentContext: RequestContext,
  mcpProvidedContext?: unknown,
): Promise<CallToolResult> {
  const handlerContext = requestContextService.createRequestContext({
    parentRequestId: parentContext.requestId,
    operation: `${toolName}ToolHandler`,
    mcpToolContext: mcpProvidedContext,
    input,
  });
  const responseContext = new CollectingResponseContext(handlerContext);

  try {
    await measureToolExecution(
      () => agent.run(responseContext, toolName, input, handlerContext),
      { ...handlerContext, toolName },
      input,
      () => ({
        artifacts: responseContext.artifacts.length,
        replies: responseContext.replies.length,
      }),
    );
    return toCallToolResult(responseContext.messages);
  } catch (error) {
    const handledError = ErrorHandler.handleError(error, {
      operation: `${toolName}ToolHandler`,
      context: handlerContext,
      input,
      rethrow: false,
    });

    const mcpError =
      handledError instanceof McpError
        ? handledError
        : new McpError(
            ErrorHandler.determineErrorCode(handledError),
            handledError.message,
            { originalErrorName: handledError.name },
          );

    const errorResponse = ErrorSchema.parse({
      code: mcpError.code,
      message: mcpError.message,
      details: mcpError.details,
    });
    return {
      content: [{ type: "text", text: JSON.stringify({ error: errorResponse }) }],
      isError: true,
    };
  }
}
