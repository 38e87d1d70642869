import { describe, it, expect, beforeEach } from "@jest/globals";
import {
  ConfigurationError,
  GraphQLConnectionError,
  GraphQLQueryError,
  GraphQLTimeoutError,
} from "../../errors/index.js";
import { UnraidGraphQLClient } from "../client.js";
import type { UnraidClientConfig } from "../client.js";

const ENDPOINT = "https://tower.test/graphql";

type Reply = { status: number; body: unknown } | { fail: Error };

interface RecordedCall {
  url: string;
  headers: Headers;
  body: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

describe("UnraidGraphQLClient", () => {
  let replies: Reply[];
  let calls: RecordedCall[];

  const fakeFetch: typeof fetch = (input, init) => {
    const parsed: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : {};
    calls.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: isRecord(parsed) ? parsed : {},
    });

    const reply = replies.shift();
    if (!reply) {
      return Promise.reject(new Error("no reply scripted"));
    }
    if ("fail" in reply) {
      return Promise.reject(reply.fail);
    }
    return Promise.resolve(
      new Response(JSON.stringify(reply.body), {
        status: reply.status,
        headers: { "content-type": "application/json" },
      })
    );
  };

  function createClient(overrides: Partial<UnraidClientConfig> = {}): UnraidGraphQLClient {
    return new UnraidGraphQLClient({
      endpoint: ENDPOINT,
      apiKey: "test-secret",
      verifySsl: true,
      timeout: 1000,
      retryAttempts: 3,
      retryDelay: 1,
      userAgent: "UnraidMCPServer/test",
      fetch: fakeFetch,
      ...overrides,
    });
  }

  beforeEach(() => {
    replies = [];
    calls = [];
  });

  it("should return data and send credentials", async () => {
    replies.push({ status: 200, body: { data: { shares: [{ name: "appdata" }] } } });

    const result = await createClient().query("query Shares { shares { name } }", {
      variables: { limit: 5 },
      requestId: "req-1",
    });

    expect(result).toEqual({ shares: [{ name: "appdata" }] });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(ENDPOINT);
    expect(calls[0]?.headers.get("x-api-key")).toBe("test-secret");
    expect(calls[0]?.headers.get("user-agent")).toBe("UnraidMCPServer/test");
    expect(calls[0]?.headers.get("x-request-id")).toBe("req-1");
    expect(calls[0]?.body["query"]).toBe("query Shares { shares { name } }");
    expect(calls[0]?.body["variables"]).toEqual({ limit: 5 });
  });

  it("should raise GraphQL errors without retrying", async () => {
    replies.push({
      status: 200,
      body: { data: null, errors: [{ message: "Field missing" }, { message: "Other" }] },
    });

    const failure = createClient().query("{ shares { name } }");

    await expect(failure).rejects.toBeInstanceOf(GraphQLQueryError);
    await expect(failure).rejects.toThrow("GraphQL query execution failed: Field missing; Other");
    expect(calls).toHaveLength(1);
  });

  it("should retry server errors and succeed", async () => {
    replies.push(
      { status: 500, body: { message: "busy" } },
      { status: 502, body: { message: "bad gateway" } },
      { status: 200, body: { data: { ok: true } } }
    );

    await expect(createClient().query("{ ok }")).resolves.toEqual({ ok: true });
    expect(calls).toHaveLength(3);
  });

  it("should not retry client errors", async () => {
    replies.push({ status: 401, body: { message: "unauthorized" } });

    const failure = createClient().query("{ ok }");

    await expect(failure).rejects.toBeInstanceOf(GraphQLConnectionError);
    await expect(failure).rejects.toThrow(`GraphQL endpoint ${ENDPOINT} responded with HTTP 401`);
    expect(calls).toHaveLength(1);
  });

  it("should retry network failures up to the attempt limit", async () => {
    const networkDown = new TypeError("fetch failed");
    replies.push({ fail: networkDown }, { fail: networkDown }, { fail: networkDown });

    await expect(createClient().query("{ ok }")).rejects.toThrow(
      `Failed to connect to GraphQL endpoint: ${ENDPOINT}`
    );
    expect(calls).toHaveLength(3);
  });

  it("should map aborted requests to a timeout", async () => {
    const aborted = new Error("The operation was aborted due to timeout");
    aborted.name = "TimeoutError";
    replies.push({ fail: aborted });

    const failure = createClient().query("{ ok }", { timeoutMs: 50 });

    await expect(failure).rejects.toBeInstanceOf(GraphQLTimeoutError);
    await expect(failure).rejects.toThrow("GraphQL query timed out after 50ms");
    expect(calls).toHaveLength(1);
  });

  it("should require an endpoint and an API key", async () => {
    await expect(createClient({ endpoint: undefined }).query("{ ok }")).rejects.toThrow(
      "Configuration error for 'UNRAID_API_URL': not set"
    );
    await expect(createClient({ apiKey: undefined }).query("{ ok }")).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(calls).toHaveLength(0);
  });
});
