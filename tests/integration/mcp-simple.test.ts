import { describe, test, expect, beforeEach } from "@jest/globals";
import type { CallToolRequest, ReadResourceRequest } from "@modelcontextprotocol/sdk/types.js";
import { MutationNotAllowedError, UnsupportedOperationError } from "../../src/errors/index.js";
import type { GraphQLRequester, QueryOptions } from "../../src/graphql/index.js";
import { UnraidMCPServer, type ServerDependencies } from "../../src/server.js";
import type {
  CollectResult,
  ConnectionStatus,
  StreamSource,
  SubscriptionTestReport,
} from "../../src/subscriptions/index.js";

const HEALTH: ConnectionStatus = {
  state: "ready",
  endpoint: "ws://tower.test/graphql",
  generation: 1,
  retryCount: 0,
  lastActivity: "2024-03-01T10:00:00.000Z",
  connectedSince: "2024-03-01T09:59:00.000Z",
  lastError: null,
  subscriptions: { pending: 0, active: 0 },
};

function callTool(name: string, args?: Record<string, unknown>): CallToolRequest {
  return {
    method: "tools/call",
    params: { name, ...(args && { arguments: args }) },
  };
}

function readRequest(uri: string): ReadResourceRequest {
  return { method: "resources/read", params: { uri } };
}

function textOf(content: unknown): string {
  if (
    typeof content === "object" &&
    content !== null &&
    "text" in content &&
    typeof content.text === "string"
  ) {
    return content.text;
  }
  throw new Error("expected text content");
}

function envelope(text: string): { data: unknown; totalCount: unknown } {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== "object" || parsed === null || !("data" in parsed) || !("metadata" in parsed)) {
    throw new Error("not a response envelope");
  }
  const metadata = parsed.metadata;
  const totalCount =
    typeof metadata === "object" && metadata !== null && "totalCount" in metadata
      ? metadata.totalCount
      : undefined;
  return { data: parsed.data, totalCount };
}

describe("MCP Integration Tests", () => {
  let queries: Array<{ document: string; options: QueryOptions | undefined }>;
  let server: UnraidMCPServer;

  beforeEach(() => {
    queries = [];

    const client: GraphQLRequester = {
      query<T>(document: string, options?: QueryOptions): Promise<T> {
        queries.push({ document, options });
        return Promise.resolve(
          JSON.parse(JSON.stringify({ shares: [{ id: "s1", name: "appdata" }, { id: "s2", name: "media" }] }))
        );
      },
    };

    const report: SubscriptionTestReport = {
      success: false,
      handshakeSucceeded: false,
      connectionState: "degraded",
      subscriptionId: null,
      timeToFirstEventMs: null,
      terminalReason: "unavailable",
      timedOut: false,
      error: "Subscriptions unavailable: connection failed after 5 attempts",
      firstPayload: null,
      durationMs: 3,
    };

    const deps: ServerDependencies = {
      client,
      diagnostics: {
        testSubscription: () => Promise.resolve(report),
        getConnectionHealth: () => HEALTH,
      },
      bridge: {
        read<R>(source: StreamSource<R>): Promise<CollectResult<R>> {
          return Promise.resolve({ source: source.name, records: [], end: null, droppedRecords: 0 });
        },
      },
      diskTimeout: 90000,
    };

    server = new UnraidMCPServer(deps);
  });

  describe("Tools", () => {
    test("should list every tool with an object input schema", async () => {
      const { tools } = await server.handleListTools();

      expect(tools).toHaveLength(15);
      expect(tools.map((t) => t.name)).toContain("test_subscription");
      for (const tool of tools) {
        expect(tool.inputSchema.type).toBe("object");
        expect(typeof tool.description).toBe("string");
      }
    });

    test("should wrap tool results in a response envelope", async () => {
      const result = await server.handleCallTool(callTool("get_shares_info"));

      expect(result.content).toHaveLength(1);
      expect(result.content[0]?.type).toBe("text");
      expect(envelope(textOf(result.content[0]))).toEqual({
        data: [
          { id: "s1", name: "appdata" },
          { id: "s2", name: "media" },
        ],
        totalCount: 2,
      });
    });

    test("should tag API calls with a request id", async () => {
      await server.handleCallTool(callTool("get_shares_info", {}));

      expect(queries).toHaveLength(1);
      expect(queries[0]?.options?.requestId).toMatch(/^[0-9a-f-]{36}$/);
    });

    test("should give each request its own id", async () => {
      await server.handleCallTool(callTool("get_shares_info"));
      await server.handleCallTool(callTool("get_shares_info"));

      expect(queries).toHaveLength(2);
      expect(queries[0]?.options?.requestId).not.toBe(queries[1]?.options?.requestId);
    });

    test("should surface domain errors unchanged", async () => {
      await expect(server.handleCallTool(callTool("reboot_server"))).rejects.toBeInstanceOf(
        UnsupportedOperationError
      );
      await expect(
        server.handleCallTool(callTool("query_unraid_api", { graphql_query: "mutation { x }" }))
      ).rejects.toBeInstanceOf(MutationNotAllowedError);
      expect(queries).toHaveLength(0);
    });

    test("should report subscription diagnostics", async () => {
      const result = await server.handleCallTool(callTool("test_subscription"));

      const { data, totalCount } = envelope(textOf(result.content[0]));
      expect(totalCount).toBe(1);
      expect(data).toMatchObject({ success: false, terminalReason: "unavailable" });
    });
  });

  describe("Resources", () => {
    test("should list resources and templates", async () => {
      const { resources } = await server.handleListResources();
      const { resourceTemplates } = await server.handleListResourceTemplates();

      expect(resources.map((r) => r.uri)).toEqual([
        "unraid://notifications/live",
        "unraid://subscriptions/status",
      ]);
      expect(resourceTemplates.map((t) => t.uriTemplate)).toEqual(["unraid://logs/{path}"]);
    });

    test("should read the subscription status", async () => {
      const { contents } = await server.handleReadResource(
        readRequest("unraid://subscriptions/status")
      );

      expect(contents).toHaveLength(1);
      expect(contents[0]?.uri).toBe("unraid://subscriptions/status");
      expect(envelope(textOf(contents[0])).data).toEqual(HEALTH);
    });

    test("should read a live log window", async () => {
      const { contents } = await server.handleReadResource(
        readRequest("unraid://logs/%2Fvar%2Flog%2Fsyslog")
      );

      expect(envelope(textOf(contents[0]))).toEqual({ data: [], totalCount: 0 });
    });

    test("should reject unknown resource URIs", async () => {
      await expect(
        server.handleReadResource(readRequest("nfs://tower/appdata"))
      ).rejects.toThrow("Invalid resource URI: nfs://tower/appdata");
    });
  });
});
