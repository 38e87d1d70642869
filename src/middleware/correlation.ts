import { v4 as uuidv4 } from "uuid";
import type { IncomingMessage, ServerResponse } from "node:http";
import { createRequestLogger, type Logger } from "../logging/index.js";

export interface HttpRequestContext {
  correlationId: string;
  logger: Logger;
  startTime: number;
}

export const CORRELATION_HEADERS = {
  REQUEST_ID: "X-Request-ID",
  CORRELATION_ID: "X-Correlation-ID",
} as const;

export function generateCorrelationId(): string {
  return uuidv4();
}

export function extractOrGenerateCorrelationId(
  headers: Record<string, string | string[] | undefined>
): string {
  const correlationHeaders = ["x-correlation-id", "x-request-id", "correlation-id", "request-id"];

  for (const header of correlationHeaders) {
    const value = headers[header];
    if (typeof value === "string" && value !== "") {
      return value;
    }
  }

  return generateCorrelationId();
}

/**
 * Tags an HTTP exchange with a correlation id, echoes it in the response headers and
 * logs completion when the response finishes.
 */
export function httpCorrelationMiddleware(
  req: IncomingMessage,
  res: ServerResponse
): HttpRequestContext {
  const correlationId = extractOrGenerateCorrelationId(req.headers);
  const context: HttpRequestContext = {
    correlationId,
    logger: createRequestLogger(correlationId),
    startTime: Date.now(),
  };

  res.setHeader(CORRELATION_HEADERS.CORRELATION_ID, correlationId);
  res.setHeader(CORRELATION_HEADERS.REQUEST_ID, correlationId);

  context.logger.debug(
    {
      method: req.method,
      url: req.url,
      remoteAddress: req.socket.remoteAddress,
    },
    "Request started"
  );

  res.on("finish", () => {
    context.logger.info(
      {
        method: req.method,
        url: req.url,
        statusCode: res.statusCode,
        duration: Date.now() - context.startTime,
      },
      "Request completed"
    );
  });

  return context;
}
