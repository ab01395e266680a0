/**
 * @fileoverview Measures agent tool execution: wraps a tool call in an
 * OpenTelemetry span and logs one structured metrics line when it finishes.
 * @module src/utils/internal/performance
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import { config } from "../../config/index.js";
import { McpError } from "../../types-global/errors.js";
import { logger } from "./logger.js";
import { RequestContext } from "./requestContext.js";

// Local copies of the code.* semantic conventions, which are still marked
// incubating in @opentelemetry/semantic-conventions.
const ATTR_CODE_FUNCTION = "code.function";
const ATTR_CODE_NAMESPACE = "code.namespace";

/**
 * Byte length of the JSON form of `payload`, or 0 when it has none.
 */
export function getPayloadSize(payload: unknown): number {
  if (payload === undefined || payload === null) return 0;
  try {
    return Buffer.byteLength(JSON.stringify(payload), "utf8");
  } catch {
    return 0;
  }
}

/**
 * Summary a tool reports about its output, recorded on the span.
 * Keys become `agent.tool.<key>` attributes.
 */
export type ToolOutputSummary = Record<string, number>;

/**
 * Runs `toolLogicFn` inside a `tool_execution:<toolName>` span.
 *
 * @param summarize - Derives span attributes from the result (e.g. how many
 *   artifacts were emitted).
 * @throws Re-throws whatever `toolLogicFn` throws, after recording it.
 */
export async function measureToolExecution<T>(
  toolLogicFn: () => Promise<T>,
  context: RequestContext & { toolName: string },
  inputPayload: unknown,
  summarize?: (result: T) => ToolOutputSummary,
): Promise<T> {
  const tracer = trace.getTracer(
    config.openTelemetry.serviceName,
    config.openTelemetry.serviceVersion,
  );
  const { toolName } = context;
  const inputBytes = getPayloadSize(inputPayload);

  return tracer.startActiveSpan(`tool_execution:${toolName}`, async (span) => {
    span.setAttributes({
      [ATTR_CODE_FUNCTION]: toolName,
      [ATTR_CODE_NAMESPACE]: "nucleotide-agent",
      "agent.tool.input_bytes": inputBytes,
    });

    const startTime = process.hrtime.bigint();
    let isSuccess = false;
    let errorCode: string | undefined;
    let outputSummary: ToolOutputSummary = {};

    try {
      const result = await toolLogicFn();
      isSuccess = true;
      outputSummary = summarize ? summarize(result) : {};
      for (const [key, value] of Object.entries(outputSummary)) {
        span.setAttribute(`agent.tool.${key}`, value);
      }
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof McpError) {
        errorCode = error.code;
      } else {
        errorCode = error instanceof Error ? "UNHANDLED_ERROR" : "UNKNOWN_ERROR";
      }
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      const durationMs = parseFloat(
        (Number(process.hrtime.bigint() - startTime) / 1_000_000).toFixed(2),
      );
      span.setAttributes({
        "agent.tool.duration_ms": durationMs,
        "agent.tool.success": isSuccess,
      });
      if (errorCode) {
        span.setAttribute("agent.tool.error_code", errorCode);
      }
      span.end();

      logger.info("Tool execution finished.", {
        ...context,
        metrics: {
          durationMs,
          isSuccess,
          errorCode,
          inputBytes,
          ...outputSummary,
        },
      });
    }
  });
}
