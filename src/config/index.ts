import { pino } from "pino";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(`Configuration error for ${field}: ${message}`);
    this.name = "ConfigurationError";
  }
}

export type Environment = "development" | "staging" | "production";

export type LogLevel = pino.Level | "silent";

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  redactPaths: string[];
}

export interface TransportConfig {
  type: "stdio" | "http";
  http?: {
    host: string;
    port: number;
    corsOrigins: string[];
  };
}

export interface UnraidApiConfig {
  apiUrl: string | undefined;
  apiKey: string | undefined;
  wsUrl: string | undefined;
  verifySsl: boolean;
  timeout: number;
  diskTimeout: number;
  retryAttempts: number;
  retryDelay: number;
}

export interface SubscriptionConfig {
  connectTimeout: number;
  ackTimeout: number;
  keepAliveInterval: number;
  maxMissedKeepAlives: number;
  backoffBase: number;
  backoffMax: number;
  backoffJitter: number;
  maxRetries: number;
  autoResubscribe: boolean;
}

export interface StreamConfig {
  maxBufferedRecords: number;
  readWindow: number;
  readMaxRecords: number;
}

export interface DiagnosticsConfig {
  timeout: number;
}

export interface Config {
  environment: Environment;
  serviceName: string;
  version: string;

  logging: LoggingConfig;
  transport: TransportConfig;
  unraid: UnraidApiConfig;
  subscriptions: SubscriptionConfig;
  streams: StreamConfig;
  diagnostics: DiagnosticsConfig;
}

export function loadConfig(): Config {
  const env = process.env;
  const environment = validateEnvironment(env["NODE_ENV"] || "development");
  const apiUrl = env["UNRAID_API_URL"] || undefined;

  const config: Config = {
    environment,
    serviceName: env["SERVICE_NAME"] || "unraid-mcp-server",
    version: env["SERVICE_VERSION"] || process.env["npm_package_version"] || "0.2.0",

    logging: {
      level: validateLogLevel(
        env["UNRAID_MCP_LOG_LEVEL"] || (environment === "production" ? "info" : "debug")
      ),
      pretty: environment !== "production" && env["LOG_PRETTY"] !== "false",
      redactPaths: parseStringArray(
        env["LOG_REDACT_PATHS"] || "apiKey,*.apiKey,password,token,secret,authorization"
      ),
    },

    transport: {
      type: validateTransportType(env["UNRAID_MCP_TRANSPORT"] || "stdio"),
      ...(env["UNRAID_MCP_TRANSPORT"] === "http" && {
        http: {
          host: env["UNRAID_MCP_HOST"] || "0.0.0.0",
          port: validateNumber(env["UNRAID_MCP_PORT"], 6970, "UNRAID_MCP_PORT"),
          corsOrigins: parseStringArray(env["CORS_ORIGINS"] || "*"),
        },
      }),
    },

    unraid: {
      apiUrl,
      apiKey: env["UNRAID_API_KEY"] || undefined,
      wsUrl: env["UNRAID_WS_URL"] || deriveWebSocketUrl(apiUrl),
      verifySsl: validateBoolean(env["UNRAID_VERIFY_SSL"], true, "UNRAID_VERIFY_SSL"),
      timeout: validateNumber(env["UNRAID_HTTP_TIMEOUT_MS"], 30000, "UNRAID_HTTP_TIMEOUT_MS"),
      diskTimeout: validateNumber(env["UNRAID_DISK_TIMEOUT_MS"], 90000, "UNRAID_DISK_TIMEOUT_MS"),
      retryAttempts: validateNumber(
        env["UNRAID_HTTP_RETRY_ATTEMPTS"],
        3,
        "UNRAID_HTTP_RETRY_ATTEMPTS"
      ),
      retryDelay: validateNumber(env["UNRAID_HTTP_RETRY_DELAY_MS"], 1000, "UNRAID_HTTP_RETRY_DELAY_MS"),
    },

    subscriptions: {
      connectTimeout: validateNumber(
        env["UNRAID_WS_CONNECT_TIMEOUT_MS"],
        10000,
        "UNRAID_WS_CONNECT_TIMEOUT_MS"
      ),
      ackTimeout: validateNumber(env["UNRAID_WS_ACK_TIMEOUT_MS"], 10000, "UNRAID_WS_ACK_TIMEOUT_MS"),
      keepAliveInterval: validateNumber(
        env["UNRAID_WS_KEEPALIVE_MS"],
        30000,
        "UNRAID_WS_KEEPALIVE_MS"
      ),
      maxMissedKeepAlives: validateNumber(
        env["UNRAID_WS_MAX_MISSED_KEEPALIVES"],
        3,
        "UNRAID_WS_MAX_MISSED_KEEPALIVES"
      ),
      backoffBase: validateNumber(env["UNRAID_WS_BACKOFF_BASE_MS"], 1000, "UNRAID_WS_BACKOFF_BASE_MS"),
      backoffMax: validateNumber(env["UNRAID_WS_BACKOFF_MAX_MS"], 30000, "UNRAID_WS_BACKOFF_MAX_MS"),
      backoffJitter: validateRatio(env["UNRAID_WS_BACKOFF_JITTER"], 0.2, "UNRAID_WS_BACKOFF_JITTER"),
      maxRetries: validateNonNegative(env["UNRAID_WS_MAX_RETRIES"], 5, "UNRAID_WS_MAX_RETRIES"),
      autoResubscribe: validateBoolean(
        env["UNRAID_WS_AUTO_RESUBSCRIBE"],
        false,
        "UNRAID_WS_AUTO_RESUBSCRIBE"
      ),
    },

    streams: {
      maxBufferedRecords: validateNumber(
        env["UNRAID_STREAM_MAX_BUFFER"],
        500,
        "UNRAID_STREAM_MAX_BUFFER"
      ),
      readWindow: validateNumber(env["UNRAID_STREAM_WINDOW_MS"], 5000, "UNRAID_STREAM_WINDOW_MS"),
      readMaxRecords: validateNumber(
        env["UNRAID_STREAM_MAX_RECORDS"],
        100,
        "UNRAID_STREAM_MAX_RECORDS"
      ),
    },

    diagnostics: {
      timeout: validateNumber(
        env["UNRAID_DIAGNOSTIC_TIMEOUT_MS"],
        10000,
        "UNRAID_DIAGNOSTIC_TIMEOUT_MS"
      ),
    },
  };

  validateConfig(config);

  return config;
}

export function deriveWebSocketUrl(apiUrl: string | undefined): string | undefined {
  if (!apiUrl) return undefined;
  if (apiUrl.startsWith("https://")) return `wss://${apiUrl.slice("https://".length)}`;
  if (apiUrl.startsWith("http://")) return `ws://${apiUrl.slice("http://".length)}`;
  return undefined;
}

function validateEnvironment(value: string): Environment {
  if (value === "test") {
    return "development";
  }

  switch (value) {
    case "development":
    case "staging":
    case "production":
      return value;
    default:
      throw new ConfigurationError(
        `Invalid environment: ${value}. Must be one of: development, staging, production`,
        "NODE_ENV"
      );
  }
}

function validateTransportType(value: string): "stdio" | "http" {
  if (value !== "stdio" && value !== "http") {
    throw new ConfigurationError(
      `Invalid transport type: ${value}. Must be 'stdio' or 'http'`,
      "UNRAID_MCP_TRANSPORT"
    );
  }
  return value;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function validateLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((l) => l === normalized);
  if (!level) {
    throw new ConfigurationError(
      `Invalid log level: ${value}. Must be one of: ${LOG_LEVELS.join(", ")}`,
      "UNRAID_MCP_LOG_LEVEL"
    );
  }
  return level;
}

function validateNumber(value: string | undefined, defaultValue: number, field: string): number {
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Invalid number: ${value}`, field);
  }

  if (parsed <= 0) {
    throw new ConfigurationError(`Number must be positive: ${parsed}`, field);
  }

  return parsed;
}

function validateNonNegative(
  value: string | undefined,
  defaultValue: number,
  field: string
): number {
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new ConfigurationError(`Number must be zero or positive: ${value}`, field);
  }

  return parsed;
}

function validateRatio(value: string | undefined, defaultValue: number, field: string): number {
  if (!value) return defaultValue;

  const parsed = Number(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigurationError(`Ratio must be between 0 and 1: ${value}`, field);
  }

  return parsed;
}

function validateBoolean(value: string | undefined, defaultValue: boolean, field: string): boolean {
  if (!value) return defaultValue;

  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigurationError(`Invalid boolean: ${value}`, field);
  }
}

function parseStringArray(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function validateConfig(config: Config): void {
  if (config.subscriptions.backoffMax < config.subscriptions.backoffBase) {
    throw new ConfigurationError(
      "Backoff ceiling must be >= backoff base",
      "UNRAID_WS_BACKOFF_MAX_MS"
    );
  }

  if (config.transport.type === "http" && !config.transport.http) {
    throw new ConfigurationError(
      "HTTP configuration required when transport type is http",
      "UNRAID_MCP_TRANSPORT"
    );
  }

  const { wsUrl } = config.unraid;
  if (wsUrl && !wsUrl.startsWith("ws://") && !wsUrl.startsWith("wss://")) {
    throw new ConfigurationError(`WebSocket URL must use ws:// or wss://: ${wsUrl}`, "UNRAID_WS_URL");
  }
}

let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
