import { ClientError, GraphQLClient } from "graphql-request";
import { Agent, setGlobalDispatcher } from "undici";
import { getConfig } from "../config/index.js";
import {
  ConfigurationError,
  GraphQLConnectionError,
  mapGraphQLError,
} from "../errors/index.js";
import type { MCPError } from "../errors/index.js";
import { createTimer, getLogger } from "../logging/index.js";
import { redactVariables, sanitizeQuery } from "../utils/index.js";

const logger = getLogger("graphql-client");

export type Variables = Record<string, unknown>;

export interface UnraidClientConfig {
  endpoint: string | undefined;
  apiKey: string | undefined;
  verifySsl: boolean;
  timeout: number;
  retryAttempts: number;
  retryDelay: number;
  userAgent: string;
  fetch: typeof fetch;
}

export interface QueryOptions {
  variables?: Variables;
  timeoutMs?: number;
  requestId?: string;
}

/** Anything that can run one GraphQL operation over HTTP. */
export interface GraphQLRequester {
  query<T = Record<string, unknown>>(document: string, options?: QueryOptions): Promise<T>;
}

let insecureDispatcherInstalled = false;

function installInsecureDispatcher(): void {
  if (insecureDispatcherInstalled) return;
  insecureDispatcherInstalled = true;
  setGlobalDispatcher(new Agent({ connect: { rejectUnauthorized: false } }));
  logger.warn("TLS certificate verification is disabled for the Unraid API");
}

function isRetryable(error: MCPError): boolean {
  if (!(error instanceof GraphQLConnectionError)) {
    return false;
  }
  const status = error.status;
  return status === undefined || status >= 500;
}

export class UnraidGraphQLClient implements GraphQLRequester {
  private config: UnraidClientConfig;
  private client: GraphQLClient | null = null;

  constructor(config?: Partial<UnraidClientConfig>) {
    const appConfig = getConfig();

    this.config = {
      endpoint: appConfig.unraid.apiUrl,
      apiKey: appConfig.unraid.apiKey,
      verifySsl: appConfig.unraid.verifySsl,
      timeout: appConfig.unraid.timeout,
      retryAttempts: appConfig.unraid.retryAttempts,
      retryDelay: appConfig.unraid.retryDelay,
      userAgent: `UnraidMCPServer/${appConfig.version}`,
      fetch,
      ...config,
    };
  }

  get endpoint(): string | undefined {
    return this.config.endpoint;
  }

  private getClient(): { client: GraphQLClient; endpoint: string } {
    const { endpoint, apiKey } = this.config;
    if (!endpoint) {
      throw new ConfigurationError("UNRAID_API_URL", "not set");
    }
    if (!apiKey) {
      throw new ConfigurationError("UNRAID_API_KEY", "not set");
    }

    if (this.client === null) {
      if (!this.config.verifySsl) {
        installInsecureDispatcher();
      }
      this.client = new GraphQLClient(endpoint, {
        fetch: this.config.fetch,
        headers: {
          "Content-Type": "application/json",
          "X-API-Key": apiKey,
          "User-Agent": this.config.userAgent,
        },
      });
    }

    return { client: this.client, endpoint };
  }

  async query<T = Record<string, unknown>>(document: string, options: QueryOptions = {}): Promise<T> {
    const { client, endpoint } = this.getClient();
    const timeoutMs = options.timeoutMs ?? this.config.timeout;
    const requestId = options.requestId ?? `req-${Date.now()}`;
    const timer = createTimer();

    logger.debug(
      {
        requestId,
        endpoint,
        query: sanitizeQuery(document),
        variables: redactVariables(options.variables),
        timeoutMs,
      },
      "GraphQL request"
    );

    let lastError: MCPError | null = null;

    for (let attempt = 0; attempt < this.config.retryAttempts; attempt++) {
      try {
        const result = await client.request<T>({
          document,
          ...(options.variables && { variables: options.variables }),
          requestHeaders: { "x-request-id": requestId },
          signal: AbortSignal.timeout(timeoutMs),
        });

        timer.log(logger, "GraphQL query executed", { requestId, attempt: attempt + 1 });
        return result;
      } catch (error) {
        lastError = mapGraphQLError(error, {
          endpoint,
          query: sanitizeQuery(document),
          timeoutMs,
        });

        const willRetry = isRetryable(lastError) && attempt < this.config.retryAttempts - 1;
        logger.warn(
          {
            requestId,
            attempt: attempt + 1,
            errorType: lastError.name,
            error: lastError.message,
            responseStatus: error instanceof ClientError ? error.response.status : undefined,
            willRetry,
          },
          "GraphQL query failed"
        );

        if (!willRetry) {
          break;
        }

        const delay = this.config.retryDelay * Math.pow(2, attempt);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    logger.error(
      { requestId, endpoint, error: lastError?.message, durationMs: timer.end() },
      "GraphQL query failed after retries"
    );
    throw lastError ?? new GraphQLConnectionError(endpoint, "no attempts made");
  }
}

let clientInstance: UnraidGraphQLClient | null = null;

export function getGraphQLClient(config?: Partial<UnraidClientConfig>): UnraidGraphQLClient {
  if (clientInstance === null) {
    clientInstance = new UnraidGraphQLClient(config);
  }
  return clientInstance;
}

export function resetGraphQLClient(): void {
  clientInstance = null;
}
