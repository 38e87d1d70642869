import pino from "pino";
import { getConfig } from "../config/index.js";
import type { Config } from "../config/index.js";

export interface LogContext {
  requestId?: string;
  correlationId?: string;
  subscriptionId?: string;
  method?: string;
  path?: string;
  statusCode?: number;
  duration?: number;
  error?: Error;
  [key: string]: unknown;
}

export interface PerformanceTimer {
  start: number;
  end(): number;
  log(logger: pino.Logger, message: string, context?: LogContext): void;
}

export function createTimer(): PerformanceTimer {
  const start = Date.now();

  return {
    start,
    end: () => Date.now() - start,
    log: (logger: pino.Logger, message: string, context?: LogContext): void => {
      const duration = Date.now() - start;
      logger.info({ duration, ...context }, message);
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function stringHeaders(value: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!isRecord(value)) return headers;
  for (const [key, header] of Object.entries(value)) {
    if (typeof header === "string") headers[key] = header;
  }
  return headers;
}

function createBaseConfig(config: Config): pino.LoggerOptions {
  return {
    name: config.serviceName,
    level: config.logging.level,

    base: {
      pid: process.pid,
      hostname: process.env["HOSTNAME"] ?? "unknown",
      environment: config.environment,
      version: config.version,
    },

    serializers: {
      error: pino.stdSerializers.err,
      request: (req: unknown) => {
        const request = isRecord(req) ? req : {};
        return {
          id: request["id"],
          method: request["method"],
          url: request["url"],
          headers: redactHeaders(stringHeaders(request["headers"])),
          remoteAddress: request["remoteAddress"],
        };
      },
    },

    redact: {
      paths: config.logging.redactPaths,
      censor: "[REDACTED]",
    },

    formatters: {
      level: (label: string) => ({ level: label }),
      log: (object: Record<string, unknown>) => {
        if (object["time"] === undefined && object["timestamp"] === undefined) {
          object["timestamp"] = new Date().toISOString();
        }
        return object;
      },
    },
  };
}

function createPrettyConfig(): pino.TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
      messageFormat: "{component} {msg}",
      errorLikeObjectKeys: ["error", "err"],
    },
  };
}

export function redactHeaders(headers: Record<string, string> = {}): Record<string, string> {
  const sensitiveHeaders = ["authorization", "cookie", "x-api-key", "x-auth-token"];

  const redacted = { ...headers };
  for (const key of Object.keys(redacted)) {
    if (sensitiveHeaders.includes(key.toLowerCase())) {
      redacted[key] = "[REDACTED]";
    }
  }

  return redacted;
}

export function createLogger(customConfig?: Partial<Config>): pino.Logger {
  const config = customConfig ? { ...getConfig(), ...customConfig } : getConfig();
  const baseConfig = createBaseConfig(config);

  // stdout carries the MCP stream on stdio
  const isStdioTransport = config.transport.type === "stdio";

  if (
    config.logging.pretty &&
    config.environment === "development" &&
    process.env["NODE_ENV"] !== "test" &&
    !isStdioTransport
  ) {
    return pino({
      ...baseConfig,
      transport: createPrettyConfig(),
    });
  }

  if (isStdioTransport) {
    return pino(baseConfig, pino.destination(2));
  }

  return pino(baseConfig);
}

let rootLogger: pino.Logger | null = null;
const componentLoggers: Map<string, pino.Logger> = new Map();

export function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function getLogger(component: string): pino.Logger {
  const existing = componentLoggers.get(component);
  if (existing) {
    return existing;
  }
  const logger = getRootLogger().child({ component });
  componentLoggers.set(component, logger);
  return logger;
}

export function createRequestLogger(requestId: string, correlationId?: string): pino.Logger {
  return getRootLogger().child({
    requestId,
    correlationId,
    type: "request",
  });
}

export function logError(
  logger: pino.Logger,
  error: unknown,
  message: string,
  context?: LogContext
): void {
  const errorObj = error instanceof Error ? error : new Error(String(error));

  logger.error(
    {
      error: {
        message: errorObj.message,
        name: errorObj.name,
        stack: errorObj.stack,
        ...("code" in errorObj && typeof errorObj.code !== "undefined" && { code: errorObj.code }),
      },
      ...context,
    },
    message
  );
}

export const serverLogger = getLogger("server");

export type { Logger } from "pino";
