/**
 * @fileoverview Loads, validates, and exports application configuration from
 * environment variables (via dotenv) and `package.json`, validated with Zod.
 * @module src/config/index
 */

import dotenv from "dotenv";
import { existsSync, mkdirSync, readFileSync, statSync } from "fs";
import path, { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

dotenv.config();

/** Only print bootstrap diagnostics to an interactive terminal. */
const warnOnTty = (message: string): void => {
  if (process.stdout.isTTY) {
    console.warn(message);
  }
};

// --- Determine Project Root ---
const findProjectRoot = (startDir: string): string => {
  let currentDir =
    path.basename(startDir) === "dist" ? dirname(startDir) : startDir;
  while (!existsSync(join(currentDir, "package.json"))) {
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      throw new Error(
        `Could not find project root (package.json) starting from ${startDir}`,
      );
    }
    currentDir = parentDir;
  }
  return currentDir;
};

let projectRoot: string;
try {
  projectRoot = findProjectRoot(dirname(fileURLToPath(import.meta.url)));
} catch (error: unknown) {
  projectRoot = process.cwd();
  warnOnTty(
    `Warning: ${error instanceof Error ? error.message : String(error)}. Using ${projectRoot} as project root.`,
  );
}

const PackageJsonSchema = z.object({
  name: z.string().default("nucleotide-mcp-server"),
  version: z.string().default("0.0.0"),
  description: z.string().default("No description provided."),
});

type PackageInfo = z.infer<typeof PackageJsonSchema>;

/**
 * Reads name, version, and description from the project's package.json,
 * falling back to defaults when it is missing or unreadable.
 * @private
 */
const loadPackageJson = (): PackageInfo => {
  const pkgPath = join(projectRoot, "package.json");
  try {
    const raw: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    const parsed = PackageJsonSchema.safeParse(raw);
    if (parsed.success) {
      return parsed.data;
    }
    warnOnTty(`Warning: Unexpected package.json shape at ${pkgPath}.`);
  } catch (error: unknown) {
    warnOnTty(
      `Warning: Could not read package.json at ${pkgPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return PackageJsonSchema.parse({});
};

const pkg = loadPackageJson();

const EnvSchema = z.object({
  MCP_SERVER_NAME: z.string().optional(),
  MCP_SERVER_VERSION: z.string().optional(),
  NODE_ENV: z.string().default("development"),

  MCP_LOG_LEVEL: z.string().default("debug"),
  LOGS_DIR: z.string().default(path.join(projectRoot, "logs")),

  // NCBI E-utilities
  NCBI_EUTILS_BASE_URL: z
    .string()
    .url()
    .default("https://eutils.ncbi.nlm.nih.gov/entrez/eutils"),
  NCBI_PORTAL_BASE_URL: z
    .string()
    .url()
    .default("https://www.ncbi.nlm.nih.gov/nuccore"),
  NCBI_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  /** If 'true', OpenTelemetry will be initialized and enabled. Default: 'false'. */
  OTEL_ENABLED: z
    .string()
    .transform((v) => v.toLowerCase() === "true")
    .default("false"),
  OTEL_SERVICE_NAME: z.string().optional(),
  OTEL_SERVICE_VERSION: z.string().optional(),
  /** The OTLP endpoint for traces. If not set, traces are logged to a file. */
  OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: z.string().url().optional(),
  /** The OTLP endpoint for metrics. If not set, metrics are not exported. */
  OTEL_EXPORTER_OTLP_METRICS_ENDPOINT: z.string().url().optional(),
  OTEL_TRACES_SAMPLER_ARG: z.coerce.number().min(0).max(1).default(1.0),
  OTEL_LOG_LEVEL: z
    .enum(["NONE", "ERROR", "WARN", "INFO", "DEBUG", "VERBOSE", "ALL"])
    .default("INFO"),
});

const parsedEnv = EnvSchema.safeParse(process.env);

if (!parsedEnv.success && process.stdout.isTTY) {
  console.error(
    "Invalid environment variables, using defaults:",
    parsedEnv.error.flatten().fieldErrors,
  );
}

const env = parsedEnv.success ? parsedEnv.data : EnvSchema.parse({});

/**
 * Resolves `dirPath` against the project root and creates it if needed.
 * @returns The absolute directory path, or null when it lies outside the
 *   project or cannot be used as a directory.
 */
const ensureDirectory = (dirPath: string, rootDir: string): string | null => {
  const resolved = path.isAbsolute(dirPath)
    ? dirPath
    : path.resolve(rootDir, dirPath);

  if (resolved !== rootDir && !resolved.startsWith(rootDir + path.sep)) {
    warnOnTty(
      `Warning: "${dirPath}" resolves outside the project root "${rootDir}".`,
    );
    return null;
  }

  try {
    if (!existsSync(resolved)) {
      mkdirSync(resolved, { recursive: true });
    } else if (!statSync(resolved).isDirectory()) {
      warnOnTty(`Warning: ${resolved} exists but is not a directory.`);
      return null;
    }
  } catch (error: unknown) {
    warnOnTty(
      `Warning: Cannot use ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return null;
  }
  return resolved;
};

const defaultLogsDir = path.join(projectRoot, "logs");
const validatedLogsPath: string | null =
  ensureDirectory(env.LOGS_DIR, projectRoot) ??
  (env.LOGS_DIR !== defaultLogsDir
    ? ensureDirectory(defaultLogsDir, projectRoot)
    : null);

if (!validatedLogsPath) {
  warnOnTty("Warning: No usable logs directory. File logging is disabled.");
}

export const config = {
  pkg,
  mcpServerName: env.MCP_SERVER_NAME || pkg.name,
  mcpServerVersion: env.MCP_SERVER_VERSION || pkg.version,
  mcpServerDescription: pkg.description,
  logLevel: env.MCP_LOG_LEVEL,
  logsPath: validatedLogsPath,
  environment: env.NODE_ENV,
  ncbiEutilsBaseUrl: env.NCBI_EUTILS_BASE_URL.replace(/\/+$/, ""),
  ncbiPortalBaseUrl: env.NCBI_PORTAL_BASE_URL.replace(/\/+$/, ""),
  ncbiRequestTimeoutMs: env.NCBI_REQUEST_TIMEOUT_MS,
  openTelemetry: {
    enabled: env.OTEL_ENABLED,
    serviceName: env.OTEL_SERVICE_NAME || env.MCP_SERVER_NAME || pkg.name,
    serviceVersion:
      env.OTEL_SERVICE_VERSION || env.MCP_SERVER_VERSION || pkg.version,
    tracesEndpoint: env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
    metricsEndpoint: env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT,
    samplingRatio: env.OTEL_TRACES_SAMPLER_ARG,
    logLevel: env.OTEL_LOG_LEVEL,
  },
};

export const environment: string = config.environment;
