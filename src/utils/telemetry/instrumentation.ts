/**
 * @fileoverview OpenTelemetry SDK initialization and shutdown.
 * Import this module before anything else in `src/index.ts` so that the
 * auto-instrumentations (axios's underlying http client, winston) patch their
 * targets before those are loaded. Does nothing unless `OTEL_ENABLED=true`.
 * @module src/utils/telemetry/instrumentation
 */

import { diag, DiagLogger, DiagLogLevel } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { WinstonInstrumentation } from "@opentelemetry/instrumentation-winston";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { NodeSDK } from "@opentelemetry/sdk-node";
import {
  BatchSpanProcessor,
  ReadableSpan,
  SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import path from "path";
import winston from "winston";
import { config } from "../../config/index.js";

export let sdk: NodeSDK | null = null;

/**
 * Routes OpenTelemetry's own diagnostics to `opentelemetry.log`, or drops
 * them when there is no logs directory (stdout belongs to MCP).
 */
function createDiagnosticLogger(level: DiagLogLevel): DiagLogger {
  const winstonLevel = level >= DiagLogLevel.DEBUG ? "debug" : "info";
  const target = config.logsPath
    ? winston.createLogger({
        level: winstonLevel,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json(),
        ),
        transports: [
          new winston.transports.File({
            filename: path.join(config.logsPath, "opentelemetry.log"),
            maxsize: 5 * 1024 * 1024,
            maxFiles: 3,
          }),
        ],
      })
    : winston.createLogger({ silent: true });

  return {
    error: (message, ...args) => target.error(message, { args }),
    warn: (message, ...args) => target.warn(message, { args }),
    info: (message, ...args) => target.info(message, { args }),
    debug: (message, ...args) => target.debug(message, { args }),
    verbose: (message, ...args) => target.verbose(message, { args }),
  };
}

/**
 * Writes ended spans to `traces.log` when no OTLP endpoint is configured.
 */
class FileSpanProcessor implements SpanProcessor {
  private traceLogger: winston.Logger;

  constructor(logsPath: string | null) {
    this.traceLogger = logsPath
      ? winston.createLogger({
          format: winston.format.json(),
          transports: [
            new winston.transports.File({
              filename: path.join(logsPath, "traces.log"),
              maxsize: 10 * 1024 * 1024,
              maxFiles: 5,
            }),
          ],
        })
      : winston.createLogger({ silent: true });
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }

  onStart(): void {}

  onEnd(span: ReadableSpan): void {
    this.traceLogger.info({
      message: span.name,
      traceId: span.spanContext().traceId,
      spanId: span.spanContext().spanId,
      kind: span.kind,
      startTime: span.startTime,
      endTime: span.endTime,
      duration: span.duration,
      status: span.status,
      attributes: span.attributes,
      events: span.events,
    });
  }

  shutdown(): Promise<void> {
    return new Promise((resolve) => {
      this.traceLogger.on("finish", () => resolve()).end();
    });
  }
}

if (config.openTelemetry.enabled) {
  const otelLogLevel =
    DiagLogLevel[config.openTelemetry.logLevel] ?? DiagLogLevel.INFO;
  diag.setLogger(createDiagnosticLogger(otelLogLevel), otelLogLevel);

  try {
    const spanProcessor: SpanProcessor = config.openTelemetry.tracesEndpoint
      ? new BatchSpanProcessor(
          new OTLPTraceExporter({ url: config.openTelemetry.tracesEndpoint }),
        )
      : new FileSpanProcessor(config.logsPath);

    const metricReader = config.openTelemetry.metricsEndpoint
      ? new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({
            url: config.openTelemetry.metricsEndpoint,
          }),
          exportIntervalMillis: 15000,
        })
      : undefined;

    sdk = new NodeSDK({
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: config.openTelemetry.serviceName,
        [ATTR_SERVICE_VERSION]: config.openTelemetry.serviceVersion,
        "deployment.environment.name": config.environment,
      }),
      spanProcessors: [spanProcessor],
      metricReader,
      sampler: new TraceIdRatioBasedSampler(config.openTelemetry.samplingRatio),
      instrumentations: [
        getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-fs": { enabled: false },
        }),
        new WinstonInstrumentation({ enabled: true }),
      ],
    });

    sdk.start();
    diag.info(
      `OpenTelemetry initialized for ${config.openTelemetry.serviceName} v${config.openTelemetry.serviceVersion}`,
    );
  } catch (error) {
    diag.error("Error initializing OpenTelemetry", error);
    process.exit(1);
  }
}

/**
 * Flushes and stops the SDK, if it was started.
 */
export async function shutdownOpenTelemetry(): Promise<void> {
  if (!sdk) return;
  try {
    await sdk.shutdown();
    diag.info("OpenTelemetry terminated");
  } catch (error) {
    diag.error("Error terminating OpenTelemetry", error);
  }
}
