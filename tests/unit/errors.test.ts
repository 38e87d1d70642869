import { describe, it, expect } from "@jest/globals";
import {
  DisconnectedError,
  GraphQLConnectionError,
  GraphQLTimeoutError,
  HandshakeRejectedError,
  InternalServerError,
  MCPError,
  ResourceNotFoundError,
  SubscriptionError,
  SubscriptionUnavailableError,
  isMCPError,
  mapGraphQLError,
} from "../../src/errors/index.js";

const ENDPOINT = "https://tower.test/graphql";

describe("Error taxonomy", () => {
  it("should name errors after their class", () => {
    const error = new SubscriptionUnavailableError("connection failed after 5 attempts", 5, "boom");

    expect(error).toBeInstanceOf(MCPError);
    expect(error.name).toBe("SubscriptionUnavailableError");
    expect(error.code).toBe(1116);
    expect(error.message).toBe("Subscriptions unavailable: connection failed after 5 attempts");
    expect(error.details).toEqual({
      reason: "connection failed after 5 attempts",
      attempts: 5,
      lastError: "boom",
    });
  });

  it("should join subscription error messages", () => {
    expect(
      new SubscriptionError("sub-2", [{ message: "Not authorized" }, { message: "Bad path" }]).message
    ).toBe("Subscription sub-2 failed: Not authorized; Bad path");
    expect(new SubscriptionError("sub-3", []).message).toBe("Subscription sub-3 failed: unknown error");
  });

  it("should describe connection failures", () => {
    expect(new DisconnectedError(4, "socket closed (1006)", 1006).message).toBe(
      "Connection lost (generation 4): socket closed (1006)"
    );
    expect(new HandshakeRejectedError("Forbidden", 4403).details).toEqual({
      reason: "Forbidden",
      closeCode: 4403,
    });
  });

  it("should expose the HTTP status of a connection error", () => {
    expect(new GraphQLConnectionError(ENDPOINT, "down", 503).status).toBe(503);
    expect(new GraphQLConnectionError(ENDPOINT, "down").status).toBeUndefined();
  });

  it("should serialize to JSON with code and details", () => {
    const json = new ResourceNotFoundError("Disk", "disk9").toJSON();

    expect(json["name"]).toBe("ResourceNotFoundError");
    expect(json["code"]).toBe(1001);
    expect(json["message"]).toBe("Disk not found: disk9");
    expect(json["details"]).toEqual({ resourceType: "Disk", resourceId: "disk9" });
  });

  describe("mapGraphQLError", () => {
    it("should keep errors that are already mapped", () => {
      const original = new GraphQLTimeoutError(10);

      expect(mapGraphQLError(original, { endpoint: ENDPOINT })).toBe(original);
    });

    it("should map aborts to timeouts", () => {
      const aborted = new Error("This operation was aborted");
      aborted.name = "AbortError";

      const mapped = mapGraphQLError(aborted, { endpoint: ENDPOINT, timeoutMs: 250 });

      expect(mapped).toBeInstanceOf(GraphQLTimeoutError);
      expect(mapped.message).toBe("GraphQL query timed out after 250ms");
    });

    it("should map other errors to connection failures", () => {
      const mapped = mapGraphQLError(new Error("ECONNRESET"), { endpoint: ENDPOINT });

      expect(mapped).toBeInstanceOf(GraphQLConnectionError);
      expect(mapped.message).toBe(`Failed to connect to GraphQL endpoint: ${ENDPOINT}`);
    });

    it("should wrap values that are not errors", () => {
      const mapped = mapGraphQLError("nope", { endpoint: ENDPOINT });

      expect(mapped).toBeInstanceOf(InternalServerError);
      expect(mapped.message).toBe("Internal server error: Unexpected GraphQL error");
    });
  });

  it("should only recognize MCPError instances", () => {
    expect(isMCPError(new DisconnectedError(1, "gone"))).toBe(true);
    expect(isMCPError(new Error("plain"))).toBe(false);
    expect(isMCPError({ code: 1115, message: "gone" })).toBe(false);
  });
});
