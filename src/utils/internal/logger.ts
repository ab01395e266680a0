/**
 * @fileoverview Provides a singleton Logger class that wraps Winston for file logging.
 * Uses syslog-style levels. Console output is only enabled for interactive
 * debugging, since stdout carries the MCP stdio protocol.
 * @module src/utils/internal/logger
 */

import path from "path";
import winston from "winston";
import { config } from "../../config/index.js";
import { RequestContext } from "./requestContext.js";

/**
 * Supported logging levels, most verbose first.
 */
export type McpLogLevel =
  | "debug"
  | "info"
  | "notice"
  | "warning"
  | "error"
  | "crit"
  | "alert"
  | "emerg";

const mcpLevels: Record<McpLogLevel, number> = {
  debug: 7,
  info: 6,
  notice: 5,
  warning: 4,
  error: 3,
  crit: 2,
  alert: 1,
  emerg: 0,
};

const isMcpLogLevel = (value: string): value is McpLogLevel =>
  Object.prototype.hasOwnProperty.call(mcpLevels, value);

const createWinstonConsoleFormat = () =>
  winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length
        ? `\n  Meta: ${JSON.stringify(meta, null, 2)}`
        : "";
      return `${String(timestamp)} ${level}: ${String(message)}${metaString}`;
    }),
  );

export class Logger {
  private static instance: Logger;
  private winstonLogger?: winston.Logger;
  private initialized = false;
  private currentLevel: McpLogLevel = "info";

  private constructor() {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Creates the Winston logger and its transports. Calls before this point
   * are dropped.
   * @param level - Initial minimum level; unknown values fall back to "info".
   */
  public initialize(level: string = config.logLevel): void {
    if (this.initialized) {
      this.warning("Logger already initialized.", {
        requestId: "logger-init",
        timestamp: new Date().toISOString(),
      });
      return;
    }
    this.currentLevel = isMcpLogLevel(level) ? level : "info";

    const fileFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    );

    const transports: winston.transport[] = [];
    if (config.logsPath) {
      const logsPath = config.logsPath;
      const fileTransport = (filename: string, fileLevel?: McpLogLevel) =>
        new winston.transports.File({
          filename: path.join(logsPath, filename),
          level: fileLevel,
          format: fileFormat,
        });
      transports.push(
        fileTransport("error.log", "error"),
        fileTransport("warn.log", "warning"),
        fileTransport("info.log", "info"),
        fileTransport("debug.log", "debug"),
        fileTransport("combined.log"),
      );
    } else if (process.stdout.isTTY) {
      console.warn(
        "File logging disabled: no valid logs directory configured.",
      );
    }

    this.winstonLogger = winston.createLogger({
      levels: mcpLevels,
      level: this.currentLevel,
      transports,
      exitOnError: false,
    });

    this.configureConsoleTransport();
    this.initialized = true;
    this.info(`Logger initialized. Level: ${this.currentLevel}.`, {
      requestId: "logger-init",
      timestamp: new Date().toISOString(),
    });
  }

  private configureConsoleTransport(): void {
    if (!this.winstonLogger) return;
    const existing = this.winstonLogger.transports.find(
      (t) => t instanceof winston.transports.Console,
    );
    const wantConsole = this.currentLevel === "debug" && process.stdout.isTTY;

    if (wantConsole && !existing) {
      this.winstonLogger.add(
        new winston.transports.Console({
          level: "debug",
          format: createWinstonConsoleFormat(),
        }),
      );
    } else if (!wantConsole && existing) {
      this.winstonLogger.remove(existing);
    }
  }

  private log(
    level: McpLogLevel,
    msg: string,
    context?: RequestContext | Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.initialized || !this.winstonLogger) return;
    const meta: Record<string, unknown> = { ...context };
    if (error) {
      meta.error = { message: error.message, stack: error.stack };
    }
    this.winstonLogger.log(level, msg, meta);
  }

  public debug(msg: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("debug", msg, context);
  }

  public info(msg: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("info", msg, context);
  }

  public notice(msg: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("notice", msg, context);
  }

  public warning(msg: string, context?: RequestContext | Record<string, unknown>): void {
    this.log("warning", msg, context);
  }

  /**
   * Logs an error. The second argument may be the error itself or, when
   * there is none, the context.
   */
  public error(
    msg: string,
    err?: Error | RequestContext | Record<string, unknown>,
    context?: RequestContext | Record<string, unknown>,
  ): void {
    if (err instanceof Error) {
      this.log("error", msg, context, err);
    } else {
      this.log("error", msg, err ?? context);
    }
  }

  public crit(
    msg: string,
    err?: Error | RequestContext | Record<string, unknown>,
    context?: RequestContext | Record<string, unknown>,
  ): void {
    if (err instanceof Error) {
      this.log("crit", msg, context, err);
    } else {
      this.log("crit", msg, err ?? context);
    }
  }

  public emerg(
    msg: string,
    err?: Error | RequestContext | Record<string, unknown>,
    context?: RequestContext | Record<string, unknown>,
  ): void {
    if (err instanceof Error) {
      this.log("emerg", msg, context, err);
    } else {
      this.log("emerg", msg, err ?? context);
    }
  }

  /**
   * Alias for `emerg`.
   */
  public fatal(
    msg: string,
    err?: Error | RequestContext | Record<string, unknown>,
    context?: RequestContext | Record<string, unknown>,
  ): void {
    this.emerg(msg, err, context);
  }
}

export const logger = Logger.getInstance();
