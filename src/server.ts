import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type {
  CallToolRequest,
  CallToolResult,
  ListResourcesResult,
  ListResourceTemplatesResult,
  ListToolsResult,
  ReadResourceRequest,
  ReadResourceResult,
} from "@modelcontextprotocol/sdk/types.js";
import http from "node:http";
import { URL } from "node:url";

import { ConfigurationError, getConfig, type Config } from "./config/index.js";
import {
  serverLogger as logger,
  createRequestLogger,
  createTimer,
  logError,
  type Logger,
} from "./logging/index.js";
import { generateCorrelationId, httpCorrelationMiddleware } from "./middleware/correlation.js";
import { getGraphQLClient, type GraphQLRequester } from "./graphql/index.js";
import { InternalServerError, isMCPError } from "./errors/index.js";
import {
  getResourceBridge,
  getSubscriptionDiagnostics,
  resetSubscriptionManager,
} from "./subscriptions/index.js";
import {
  readResource,
  resourceTemplates,
  staticResources,
  type ResourceContext,
} from "./resources/index.js";
import { getAvailableTools, toolDescriptions, toolSchemas } from "./schemas/index.js";
import { executeTool, type DiagnosticsService } from "./tools/index.js";
import type { UnraidResponse } from "./types/index.js";

export interface ServerDependencies {
  client: GraphQLRequester;
  diagnostics: DiagnosticsService;
  bridge: ResourceContext["bridge"];
  diskTimeout: number;
}

export function createDefaultDependencies(config: Config = getConfig()): ServerDependencies {
  return {
    client: getGraphQLClient(),
    diagnostics: getSubscriptionDiagnostics(),
    bridge: getResourceBridge(),
    diskTimeout: config.unraid.diskTimeout,
  };
}

export class UnraidMCPServer extends Server {
  private readonly deps: ServerDependencies;

  constructor(deps: ServerDependencies, config: Config = getConfig()) {
    super(
      {
        name: config.serviceName,
        version: config.version,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.deps = deps;
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.setRequestHandler(ListToolsRequestSchema, () => this.handleListTools());
    this.setRequestHandler(CallToolRequestSchema, (request) => this.handleCallTool(request));

    this.setRequestHandler(ListResourcesRequestSchema, () => this.handleListResources());
    this.setRequestHandler(ListResourceTemplatesRequestSchema, () =>
      this.handleListResourceTemplates()
    );
    this.setRequestHandler(ReadResourceRequestSchema, (request) =>
      this.handleReadResource(request)
    );
  }

  private async withCorrelation<R>(
    handlerName: string,
    handler: (requestLogger: Logger, requestId: string) => Promise<R>
  ): Promise<R> {
    const requestId = generateCorrelationId();
    const requestLogger = createRequestLogger(requestId);
    const timer = createTimer();

    try {
      requestLogger.debug({ handler: handlerName }, `Handling ${handlerName} request`);
      const result = await handler(requestLogger, requestId);
      requestLogger.debug(
        { handler: handlerName, duration: timer.end() },
        `${handlerName} completed`
      );
      return result;
    } catch (error) {
      logError(requestLogger, error, `Error in ${handlerName}`, { handler: handlerName });
      throw isMCPError(error)
        ? error
        : new InternalServerError(error instanceof Error ? error.message : String(error), error);
    }
  }

  handleListTools(): Promise<ListToolsResult> {
    return this.withCorrelation("listTools", (requestLogger) => {
      requestLogger.info("Listing tools");
      return Promise.resolve({
        tools: getAvailableTools().map((name) => ({
          name,
          description: toolDescriptions[name],
          inputSchema: toolSchemas[name],
        })),
      });
    });
  }

  handleCallTool(request: CallToolRequest): Promise<CallToolResult> {
    return this.withCorrelation("callTool", async (requestLogger, requestId) => {
      const toolName = request.params.name;
      requestLogger.info({ tool: toolName }, "Calling tool");
      const timer = createTimer();

      const result = await executeTool(toolName, request.params.arguments ?? {}, {
        client: this.deps.client,
        diagnostics: this.deps.diagnostics,
        diskTimeout: this.deps.diskTimeout,
        requestId,
      });

      const response: UnraidResponse<unknown> = {
        data: result,
        metadata: {
          timestamp: new Date().toISOString(),
          executionTime: timer.end(),
          totalCount: Array.isArray(result) ? result.length : 1,
        },
      };

      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(response, null, 2),
          },
        ],
      };
    });
  }

  handleListResources(): Promise<ListResourcesResult> {
    return this.withCorrelation("listResources", (requestLogger) => {
      requestLogger.info("Listing resources");
      return Promise.resolve({ resources: staticResources });
    });
  }

  handleListResourceTemplates(): Promise<ListResourceTemplatesResult> {
    return this.withCorrelation("listResourceTemplates", () =>
      Promise.resolve({ resourceTemplates })
    );
  }

  handleReadResource(request: ReadResourceRequest): Promise<ReadResourceResult> {
    return this.withCorrelation("readResource", async (requestLogger) => {
      requestLogger.info({ uri: request.params.uri }, "Reading resource");
      const contents = await readResource(request.params.uri, {
        bridge: this.deps.bridge,
        getConnectionHealth: () => this.deps.diagnostics.getConnectionHealth(),
      });
      return { contents: [contents] };
    });
  }
}

export interface RunningTransport {
  close(): Promise<void>;
}

type HttpTransportConfig = NonNullable<Config["transport"]["http"]>;

const DEFAULT_HTTP_CONFIG: HttpTransportConfig = {
  host: "0.0.0.0",
  port: 6970,
  corsOrigins: ["*"],
};

function allowedOrigin(corsOrigins: string[], origin: string | undefined): string | null {
  if (corsOrigins.includes("*")) return "*";
  if (origin !== undefined && corsOrigins.includes(origin)) return origin;
  return null;
}

export class TransportFactory {
  static async create(
    type: "stdio" | "http",
    deps: ServerDependencies,
    config: Config = getConfig()
  ): Promise<RunningTransport> {
    if (type === "http") {
      return this.createHttpTransport(deps, config);
    }
    return this.createStdioTransport(deps, config);
  }

  private static async createStdioTransport(
    deps: ServerDependencies,
    config: Config
  ): Promise<RunningTransport> {
    logger.info("Starting stdio transport");

    const server = new UnraidMCPServer(deps, config);
    await server.connect(new StdioServerTransport());

    logger.info("Stdio transport connected");
    return { close: () => server.close() };
  }

  private static createHttpTransport(
    deps: ServerDependencies,
    config: Config
  ): Promise<RunningTransport> {
    const { host, port, corsOrigins } = config.transport.http ?? DEFAULT_HTTP_CONFIG;
    const sessions = new Map<string, { transport: SSEServerTransport; server: UnraidMCPServer }>();

    logger.info({ port, host }, "Starting HTTP+SSE transport");

    const handleRequest = async (
      req: http.IncomingMessage,
      res: http.ServerResponse
    ): Promise<void> => {
      const { correlationId, logger: requestLogger } = httpCorrelationMiddleware(req, res);
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      const origin = allowedOrigin(corsOrigins, req.headers.origin);
      if (origin !== null) {
        res.setHeader("Access-Control-Allow-Origin", origin);
      }
      res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-Correlation-ID, X-Request-ID");
      res.setHeader("Access-Control-Expose-Headers", "X-Correlation-ID, X-Request-ID");

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      if (req.method === "GET" && url.pathname === "/health") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(
          JSON.stringify({
            status: "ok",
            version: config.version,
            sessions: sessions.size,
            subscriptions: deps.diagnostics.getConnectionHealth(),
            uptime: process.uptime(),
          })
        );
        return;
      }

      if (req.method === "GET" && url.pathname === "/sse") {
        const transport = new SSEServerTransport("/messages", res);
        const server = new UnraidMCPServer(deps, config);
        sessions.set(transport.sessionId, { transport, server });

        transport.onclose = () => {
          sessions.delete(transport.sessionId);
          requestLogger.info({ sessionId: transport.sessionId }, "SSE session closed");
        };

        requestLogger.info(
          {
            sessionId: transport.sessionId,
            clientIp: req.socket.remoteAddress,
            userAgent: req.headers["user-agent"],
          },
          "New SSE connection"
        );

        await server.connect(transport);
        return;
      }

      if (req.method === "POST" && url.pathname === "/messages") {
        const sessionId = url.searchParams.get("sessionId");
        const session = sessionId !== null ? sessions.get(sessionId) : undefined;

        if (session === undefined) {
          res.writeHead(404, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "Unknown session", correlationId }));
          return;
        }

        await session.transport.handlePostMessage(req, res);
        return;
      }

      res.writeHead(404, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Not found", correlationId }));
    };

    const httpServer = http.createServer((req, res) => {
      handleRequest(req, res).catch((error: unknown) => {
        logError(logger, error, "HTTP request failed", { url: req.url });
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "application/json" });
        }
        res.end();
      });
    });

    const close = async (): Promise<void> => {
      for (const { server } of Array.from(sessions.values())) {
        await server.close();
      }
      sessions.clear();
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
        httpServer.closeAllConnections();
      });
      logger.info("HTTP server closed");
    };

    return new Promise((resolve, reject) => {
      httpServer.once("error", (error) => {
        logError(logger, error, "HTTP server error");
        reject(error);
      });

      httpServer.listen(port, host, () => {
        logger.info({ port, host, corsOrigins }, "HTTP+SSE transport listening");
        resolve({ close });
      });
    });
  }
}

function installShutdownHandlers(running: RunningTransport): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, "Shutting down gracefully");

    try {
      await resetSubscriptionManager();
      await running.close();
      logger.info("Server closed successfully");
      process.exit(0);
    } catch (error) {
      logError(logger, error, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

export async function main(): Promise<void> {
  try {
    const config = getConfig();

    const transportType = process.argv.includes("--http") ? "http" : config.transport.type;

    logger.info(
      {
        transportType,
        environment: config.environment,
        serviceName: config.serviceName,
        version: config.version,
        logLevel: config.logging.level,
        apiConfigured: config.unraid.apiUrl !== undefined,
        subscriptionsEndpoint: config.unraid.wsUrl ?? null,
      },
      "Starting Unraid MCP Server"
    );

    const running = await TransportFactory.create(
      transportType,
      createDefaultDependencies(config),
      config
    );
    installShutdownHandlers(running);

    logger.info({ transport: transportType }, "Server started successfully");
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ error: error.message, field: error.field }, "Configuration error");
    } else {
      logError(logger, error, "Failed to start server");
    }
    process.exit(1);
  }
}
