import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";

import { createLogger, isLogLevel, LOG_LEVELS, type LogLevel } from "./logging/configLogger.js";

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

interface UsageProxyConfig {
  server: {
    defaultHost: string;
    defaultPort: string;
    defaultDebugMode: boolean;
    logLevel: LogLevel;
  };
  upstream: {
    host: string;
    connectTimeout: number;
    headersTimeout: number;
    bodyTimeout: number;
  };
  metrics: {
    parserQueueBytes: number;
    maxUnitBytes: number;
    maxPromptChars: number;
  };
}

const DEFAULT_CONFIG: UsageProxyConfig = {
  server: {
    defaultHost: "127.0.0.1",
    defaultPort: "3000",
    defaultDebugMode: false,
    logLevel: "info",
  },
  upstream: {
    // Backends are addressed by port only; the host is fixed per deployment
    host: "127.0.0.1",
    connectTimeout: 10_000,
    headersTimeout: 300_000,
    bodyTimeout: 300_000,
  },
  metrics: {
    parserQueueBytes: 4 * 1024 * 1024, // 4 MB - bytes held for the metrics parser before it is cut off
    maxUnitBytes: 1024 * 1024, // 1 MB - largest single NDJSON line / SSE event / JSON document
    maxPromptChars: 0, // 0 = keep the whole prompt
  },
};

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function getEnvNumber(key: string): number | undefined {
  const value = getEnv(key);
  return value === undefined ? undefined : Number(value);
}

function getEnvBoolean(key: string): boolean | undefined {
  const value = getEnv(key);
  return value === undefined ? undefined : value.toLowerCase() === "true";
}

function loadConfigFromFile(): DeepPartial<UsageProxyConfig> {
  try {
    const configPath = join(process.cwd(), "config.json");
    const configFile = readFileSync(configPath, "utf8");
    return JSON.parse(configFile) as DeepPartial<UsageProxyConfig>;
  } catch (error: unknown) {
    // Can't use logger here as it's not created yet
    console.warn(`[CONFIG] Unable to load config.json (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`);
    return {};
  }
}

const fileConfig = loadConfigFromFile();

const fileLogLevel = fileConfig.server?.logLevel;

export const config: UsageProxyConfig = {
  server: {
    defaultHost: fileConfig.server?.defaultHost ?? DEFAULT_CONFIG.server.defaultHost,
    defaultPort: fileConfig.server?.defaultPort ?? DEFAULT_CONFIG.server.defaultPort,
    defaultDebugMode: fileConfig.server?.defaultDebugMode ?? DEFAULT_CONFIG.server.defaultDebugMode,
    logLevel: isLogLevel(fileLogLevel) ? fileLogLevel : DEFAULT_CONFIG.server.logLevel,
  },
  upstream: {
    host: fileConfig.upstream?.host ?? DEFAULT_CONFIG.upstream.host,
    connectTimeout: fileConfig.upstream?.connectTimeout ?? DEFAULT_CONFIG.upstream.connectTimeout,
    headersTimeout: fileConfig.upstream?.headersTimeout ?? DEFAULT_CONFIG.upstream.headersTimeout,
    bodyTimeout: fileConfig.upstream?.bodyTimeout ?? DEFAULT_CONFIG.upstream.bodyTimeout,
  },
  metrics: {
    parserQueueBytes: fileConfig.metrics?.parserQueueBytes ?? DEFAULT_CONFIG.metrics.parserQueueBytes,
    maxUnitBytes: fileConfig.metrics?.maxUnitBytes ?? DEFAULT_CONFIG.metrics.maxUnitBytes,
    maxPromptChars: fileConfig.metrics?.maxPromptChars ?? DEFAULT_CONFIG.metrics.maxPromptChars,
  },
};

// ============================================================================
// CONFIGURATION (SSOT: config.json, environment overrides for deployment)
// ============================================================================

// SERVER CONFIGURATION - where clients reach the proxy
export const PROXY_PORT = Number(getEnv("PROXY_PORT") ?? config.server.defaultPort);
export const PROXY_HOST = getEnv("PROXY_HOST") ?? config.server.defaultHost;

const RAW_LOG_LEVEL = getEnv("LOG_LEVEL")?.toLowerCase() ?? config.server.logLevel;
export const LOG_LEVEL: LogLevel = isLogLevel(RAW_LOG_LEVEL) ? RAW_LOG_LEVEL : DEFAULT_CONFIG.server.logLevel;
export const DEBUG_MODE = getEnvBoolean("DEBUG_MODE") ?? config.server.defaultDebugMode;

// UPSTREAM CONFIGURATION - /proxy/{port}/... resolves to http://UPSTREAM_HOST:{port}/...
export const UPSTREAM_HOST = getEnv("UPSTREAM_HOST") ?? config.upstream.host;
export const UPSTREAM_CONNECT_TIMEOUT = getEnvNumber("UPSTREAM_CONNECT_TIMEOUT_MS") ?? config.upstream.connectTimeout;
export const UPSTREAM_HEADERS_TIMEOUT = config.upstream.headersTimeout;
export const UPSTREAM_BODY_TIMEOUT = config.upstream.bodyTimeout;

// METRICS CONFIGURATION - bounds for the parser branch of each response
export const PARSER_QUEUE_BYTES = config.metrics.parserQueueBytes;
export const MAX_UNIT_BYTES = config.metrics.maxUnitBytes;
export const MAX_PROMPT_CHARS = config.metrics.maxPromptChars;

const logger = createLogger(DEBUG_MODE ? "debug" : LOG_LEVEL);

export interface ConfigValues {
  port: number;
  host: string;
  rawLogLevel: string;
  upstreamHost: string;
  connectTimeout: number;
  headersTimeout: number;
  bodyTimeout: number;
  parserQueueBytes: number;
  maxUnitBytes: number;
  maxPromptChars: number;
}

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * Returns every configuration problem found; an empty list means the values are usable.
 */
export function collectConfigErrors(values: ConfigValues): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(values.port) || values.port < 1 || values.port > 65_535) {
    errors.push("PROXY_PORT must be a valid port number between 1 and 65535");
  }

  if (values.host.trim() === "") {
    errors.push("PROXY_HOST must not be empty");
  }

  if (!isLogLevel(values.rawLogLevel)) {
    errors.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}. Got: ${values.rawLogLevel}`);
  }

  if (values.upstreamHost.trim() === "") {
    errors.push("upstream.host must not be empty");
  }

  const positiveIntegers: Array<[string, number]> = [
    ["upstream.connectTimeout", values.connectTimeout],
    ["upstream.headersTimeout", values.headersTimeout],
    ["upstream.bodyTimeout", values.bodyTimeout],
    ["metrics.parserQueueBytes", values.parserQueueBytes],
    ["metrics.maxUnitBytes", values.maxUnitBytes],
  ];
  for (const [name, value] of positiveIntegers) {
    if (!isPositiveInteger(value)) {
      errors.push(`${name} must be a positive integer. Got: ${value}`);
    }
  }

  if (!Number.isInteger(values.maxPromptChars) || values.maxPromptChars < 0) {
    errors.push(`metrics.maxPromptChars must be zero or a positive integer. Got: ${values.maxPromptChars}`);
  }

  return errors;
}

export function validateConfig(): void {
  const errors = collectConfigErrors({
    port: PROXY_PORT,
    host: PROXY_HOST,
    rawLogLevel: RAW_LOG_LEVEL,
    upstreamHost: UPSTREAM_HOST,
    connectTimeout: UPSTREAM_CONNECT_TIMEOUT,
    headersTimeout: UPSTREAM_HEADERS_TIMEOUT,
    bodyTimeout: UPSTREAM_BODY_TIMEOUT,
    parserQueueBytes: PARSER_QUEUE_BYTES,
    maxUnitBytes: MAX_UNIT_BYTES,
    maxPromptChars: MAX_PROMPT_CHARS,
  });

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed:\n${errors.map((error) => `- ${error}`).join("\n")}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.info("LLM Usage Proxy Configuration (SSOT: config.json):");
  logger.info(`  Proxy: ${PROXY_HOST}:${PROXY_PORT}`);
  logger.info(`  Upstream host: ${UPSTREAM_HOST}`);
  logger.info(`  Upstream timeouts: connect=${UPSTREAM_CONNECT_TIMEOUT}ms headers=${UPSTREAM_HEADERS_TIMEOUT}ms body=${UPSTREAM_BODY_TIMEOUT}ms`);
  logger.info(`  Parser limits: queue=${PARSER_QUEUE_BYTES}B unit=${MAX_UNIT_BYTES}B`);
  logger.info(`  Log level: ${DEBUG_MODE ? "debug" : LOG_LEVEL}`);
}
