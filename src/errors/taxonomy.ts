import { ClientError } from "graphql-request";

export class MCPError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

export class InvalidQueryError extends MCPError {
  constructor(message: string, details?: unknown) {
    super(1000, message, details);
  }
}

export class ResourceNotFoundError extends MCPError {
  constructor(resourceType: string, resourceId: string) {
    super(1001, `${resourceType} not found: ${resourceId}`, { resourceType, resourceId });
  }
}

export class InvalidResourceUriError extends MCPError {
  constructor(uri: string) {
    super(1002, `Invalid resource URI: ${uri}`, { uri });
  }
}

export class UnsupportedOperationError extends MCPError {
  constructor(operation: string, reason?: string) {
    super(1003, `Unsupported operation: ${operation}${reason ? ` - ${reason}` : ""}`, {
      operation,
      reason,
    });
  }
}

export class GraphQLConnectionError extends MCPError {
  constructor(endpoint: string, originalError?: unknown, status?: number) {
    super(
      1100,
      status !== undefined
        ? `GraphQL endpoint ${endpoint} responded with HTTP ${status}`
        : `Failed to connect to GraphQL endpoint: ${endpoint}`,
      { endpoint, status, originalError }
    );
  }

  get status(): number | undefined {
    const details = this.details;
    if (details && typeof details === "object" && "status" in details) {
      return typeof details.status === "number" ? details.status : undefined;
    }
    return undefined;
  }
}

export class GraphQLQueryError extends MCPError {
  constructor(message: string, query?: string, originalError?: unknown) {
    super(1101, `GraphQL query execution failed: ${message}`, { query, originalError });
  }
}

export class GraphQLTimeoutError extends MCPError {
  constructor(timeoutMs: number, query?: string) {
    super(1104, `GraphQL query timed out after ${timeoutMs}ms`, { timeoutMs, query });
  }
}

export class ConnectError extends MCPError {
  constructor(endpoint: string, reason: string, originalError?: unknown) {
    super(1110, `WebSocket connect to ${endpoint} failed: ${reason}`, {
      endpoint,
      reason,
      originalError,
    });
  }
}

export class SendError extends MCPError {
  constructor(reason: string) {
    super(1111, `Cannot send frame: ${reason}`, { reason });
  }
}

export class HandshakeTimeoutError extends MCPError {
  constructor(timeoutMs: number) {
    super(1112, `No connection_ack received within ${timeoutMs}ms`, { timeoutMs });
  }
}

export class HandshakeRejectedError extends MCPError {
  constructor(reason: string, closeCode?: number) {
    super(1113, `Handshake rejected: ${reason}`, { reason, closeCode });
  }
}

export interface SubscriptionErrorEntry {
  message: string;
  path?: ReadonlyArray<string | number>;
  extensions?: Record<string, unknown>;
}

export class SubscriptionError extends MCPError {
  constructor(
    public readonly subscriptionId: string,
    public readonly errors: ReadonlyArray<SubscriptionErrorEntry>
  ) {
    super(
      1114,
      `Subscription ${subscriptionId} failed: ${errors.map((e) => e.message).join("; ") || "unknown error"}`,
      { subscriptionId, errors }
    );
  }
}

export class DisconnectedError extends MCPError {
  constructor(generation: number, reason: string, closeCode?: number) {
    super(1115, `Connection lost (generation ${generation}): ${reason}`, {
      generation,
      reason,
      closeCode,
    });
  }
}

export class SubscriptionUnavailableError extends MCPError {
  constructor(reason: string, attempts?: number, lastError?: string) {
    super(1116, `Subscriptions unavailable: ${reason}`, { reason, attempts, lastError });
  }
}

export class InvalidParametersError extends MCPError {
  constructor(paramName: string, reason: string, value?: unknown) {
    super(1200, `Invalid parameter '${paramName}': ${reason}`, { paramName, reason, value });
  }
}

export class SchemaValidationError extends MCPError {
  constructor(errors: unknown[]) {
    super(1201, "Schema validation failed", { errors });
  }
}

export class MutationNotAllowedError extends MCPError {
  constructor(operation: string) {
    super(
      1202,
      "Mutations are not allowed through query_unraid_api; use a dedicated tool instead",
      { operation }
    );
  }
}

export class InternalServerError extends MCPError {
  constructor(message: string, originalError?: unknown) {
    super(1400, `Internal server error: ${message}`, { originalError });
  }
}

export class ConfigurationError extends MCPError {
  constructor(configKey: string, reason: string) {
    super(1401, `Configuration error for '${configKey}': ${reason}`, { configKey, reason });
  }
}

function isAbortError(error: Error): boolean {
  return error.name === "AbortError" || error.name === "TimeoutError";
}

export function mapGraphQLError(
  error: unknown,
  context: { endpoint: string; query?: string; timeoutMs?: number }
): MCPError {
  if (isMCPError(error)) {
    return error;
  }

  if (error instanceof ClientError) {
    const errors = error.response.errors ?? [];
    if (errors.length > 0) {
      const message = errors.map((e) => e.message).join("; ");
      return new GraphQLQueryError(message, context.query, errors);
    }
    return new GraphQLConnectionError(context.endpoint, error.message, error.response.status);
  }

  if (error instanceof Error) {
    if (isAbortError(error)) {
      return new GraphQLTimeoutError(context.timeoutMs ?? 0, context.query);
    }
    return new GraphQLConnectionError(context.endpoint, error.message);
  }

  return new InternalServerError("Unexpected GraphQL error", error);
}

export function isMCPError(error: unknown): error is MCPError {
  return error instanceof MCPError;
}
