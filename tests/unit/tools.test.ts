import { describe, it, expect, beforeEach } from "@jest/globals";
import {
  GraphQLQueryError,
  InvalidParametersError,
  MutationNotAllowedError,
  ResourceNotFoundError,
  SchemaValidationError,
  UnsupportedOperationError,
} from "../../src/errors/index.js";
import type { GraphQLRequester, QueryOptions } from "../../src/graphql/index.js";
import type {
  ConnectionStatus,
  SubscriptionTestReport,
  TestSubscriptionOptions,
} from "../../src/subscriptions/index.js";
import { executeTool, summarizeDisk, cleanProviderType } from "../../src/tools/index.js";
import type { DiagnosticsService, ToolContext } from "../../src/tools/index.js";
import type { Disk } from "../../src/types/index.js";

interface RecordedQuery {
  document: string;
  options: QueryOptions | undefined;
}

class FakeRequester implements GraphQLRequester {
  readonly calls: RecordedQuery[] = [];
  private responses: unknown[] = [];

  respond(...responses: unknown[]): void {
    this.responses.push(...responses);
  }

  query<T = Record<string, unknown>>(document: string, options?: QueryOptions): Promise<T> {
    this.calls.push({ document, options });
    const response = this.responses.shift();
    if (response instanceof Error) {
      return Promise.reject(response);
    }
    // round-trip so callers cannot mutate the scripted response
    return Promise.resolve(JSON.parse(JSON.stringify(response ?? {})));
  }
}

const HEALTH: ConnectionStatus = {
  state: "ready",
  endpoint: "ws://tower.test/graphql",
  generation: 2,
  retryCount: 0,
  lastActivity: "2024-03-01T10:00:00.000Z",
  connectedSince: "2024-03-01T09:00:00.000Z",
  lastError: null,
  subscriptions: { pending: 0, active: 1 },
};

const REPORT: SubscriptionTestReport = {
  success: true,
  handshakeSucceeded: true,
  connectionState: "ready",
  subscriptionId: "sub-1",
  timeToFirstEventMs: 12,
  terminalReason: null,
  timedOut: false,
  error: null,
  firstPayload: { systemMetricsCpu: { percentTotal: 4 } },
  durationMs: 15,
};

class FakeDiagnostics implements DiagnosticsService {
  readonly calls: Array<{ query: string | undefined; options: TestSubscriptionOptions | undefined }> =
    [];

  testSubscription(query?: string, options?: TestSubscriptionOptions): Promise<SubscriptionTestReport> {
    this.calls.push({ query, options });
    return Promise.resolve(REPORT);
  }

  getConnectionHealth(): ConnectionStatus {
    return HEALTH;
  }
}

describe("Tool executors", () => {
  let client: FakeRequester;
  let diagnostics: FakeDiagnostics;
  let context: ToolContext;

  beforeEach(() => {
    client = new FakeRequester();
    diagnostics = new FakeDiagnostics();
    context = { client, diagnostics, diskTimeout: 90000, requestId: "req-7" };
  });

  it("should reject unknown tools", async () => {
    await expect(executeTool("format_array", {}, context)).rejects.toThrow(
      new UnsupportedOperationError("Unknown tool: format_array").message
    );
  });

  it("should validate arguments before calling the API", async () => {
    await expect(
      executeTool("list_notifications", { notification_type: "READ" }, context)
    ).rejects.toBeInstanceOf(SchemaValidationError);
    expect(client.calls).toHaveLength(0);
  });

  describe("introspect_schema", () => {
    it("should return only the non-empty root field lists", async () => {
      client.respond({
        __schema: {
          queryType: { fields: [{ name: "info", description: "System info" }] },
          mutationType: { fields: [] },
          subscriptionType: null,
        },
      });

      const result = await executeTool("introspect_schema", {}, context);

      expect(result).toEqual({ queries: [{ name: "info", description: "System info" }] });
      expect(client.calls[0]?.options).toEqual({ requestId: "req-7" });
    });

    it("should describe one type by name", async () => {
      client.respond({ __type: { name: "Disk", kind: "OBJECT", fields: [] } });

      const result = await executeTool("introspect_schema", { type_name: "Disk" }, context);

      expect(result).toEqual({ name: "Disk", kind: "OBJECT", fields: [] });
      expect(client.calls[0]?.options?.variables).toEqual({ name: "Disk" });
    });

    it("should report unknown types", async () => {
      client.respond({ __type: null });

      const failure = executeTool("introspect_schema", { type_name: "Nope" }, context);

      await expect(failure).rejects.toBeInstanceOf(ResourceNotFoundError);
      await expect(failure).rejects.toThrow("GraphQL type not found: Nope");
    });
  });

  describe("query_unraid_api", () => {
    it("should run read-only queries with variables", async () => {
      client.respond({ info: { os: { platform: "linux" } } });

      const result = await executeTool(
        "query_unraid_api",
        { graphql_query: "query ($id: ID!) { disk(id: $id) { name } }", variables: { id: "d1" } },
        context
      );

      expect(result).toEqual({ info: { os: { platform: "linux" } } });
      expect(client.calls[0]).toEqual({
        document: "query ($id: ID!) { disk(id: $id) { name } }",
        options: { variables: { id: "d1" }, requestId: "req-7" },
      });
    });

    it("should refuse mutations", async () => {
      await expect(
        executeTool(
          "query_unraid_api",
          { graphql_query: 'mutation { deleteRCloneRemote(input: { name: "x" }) }' },
          context
        )
      ).rejects.toBeInstanceOf(MutationNotAllowedError);
      expect(client.calls).toHaveLength(0);
    });

    it("should refuse deeply nested variables", async () => {
      let variables: Record<string, unknown> = {};
      for (let i = 0; i < 10; i++) {
        variables = { level: variables };
      }

      await expect(
        executeTool("query_unraid_api", { graphql_query: "{ info { id } }", variables }, context)
      ).rejects.toThrow(
        new InvalidParametersError("variables", "nesting depth exceeds maximum 10").message
      );
      expect(client.calls).toHaveLength(0);
    });

    it("should accept variables at the depth limit", async () => {
      client.respond({ ok: true });
      let variables: Record<string, unknown> = {};
      for (let i = 0; i < 9; i++) {
        variables = { level: variables };
      }

      await expect(
        executeTool("query_unraid_api", { graphql_query: "{ ok }", variables }, context)
      ).resolves.toEqual({ ok: true });
    });
  });

  describe("notifications and logs", () => {
    it("should upper-case the notification filter and apply defaults", async () => {
      client.respond({ notifications: { list: [{ id: "n1", title: "Array started" }] } });

      const result = await executeTool(
        "list_notifications",
        { notification_type: "unread", importance: "warning" },
        context
      );

      expect(result).toEqual([{ id: "n1", title: "Array started" }]);
      expect(client.calls[0]?.options).toEqual({
        variables: { filter: { type: "UNREAD", offset: 0, limit: 20, importance: "WARNING" } },
        requestId: "req-7",
      });
    });

    it("should return an empty list when the API has none", async () => {
      client.respond({ notifications: null });

      await expect(
        executeTool("list_notifications", { notification_type: "ARCHIVE", limit: 5 }, context)
      ).resolves.toEqual([]);
      expect(client.calls[0]?.options?.variables).toEqual({
        filter: { type: "ARCHIVE", offset: 0, limit: 5 },
      });
    });

    it("should return the notification overview or an empty object", async () => {
      const overview = {
        unread: { info: 1, warning: 2, alert: 0, total: 3 },
        archive: { info: 4, warning: 0, alert: 1, total: 5 },
      };
      client.respond({ notifications: { overview } }, { notifications: null });

      await expect(executeTool("get_notifications_overview", {}, context)).resolves.toEqual(overview);
      await expect(executeTool("get_notifications_overview", {}, context)).resolves.toEqual({});
    });

    it("should read the tail of a log file", async () => {
      const logFile = { path: "/var/log/syslog", content: "a\nb\n", totalLines: 2, startLine: 1 };
      client.respond({ logFile });

      const result = await executeTool("get_logs", { log_file_path: "/var/log/syslog" }, context);

      expect(result).toEqual(logFile);
      expect(client.calls[0]?.options?.variables).toEqual({ path: "/var/log/syslog", lines: 100 });
    });

    it("should list log files and shares", async () => {
      client.respond({ logFiles: [{ name: "syslog", path: "/var/log/syslog" }] }, { shares: null });

      await expect(executeTool("list_available_log_files", {}, context)).resolves.toEqual([
        { name: "syslog", path: "/var/log/syslog" },
      ]);
      await expect(executeTool("get_shares_info", {}, context)).resolves.toEqual([]);
    });
  });

  describe("disks", () => {
    const disk: Disk = {
      id: "disk1",
      device: "/dev/sda",
      name: "WDC WD40EFRX",
      serialNum: "WD-123",
      size: 4000787030016,
      temperature: 34,
      interfaceType: "SATA",
      smartStatus: "OK",
      isSpinning: true,
      partitions: [
        { name: "sda1", size: "1073741824", type: "primary", fsType: "xfs" },
        { name: "sda2", size: 1073741824, type: "primary", fsType: "xfs" },
      ],
    };

    it("should summarize a disk", () => {
      expect(summarizeDisk(disk)).toEqual({
        disk_id: "disk1",
        device: "/dev/sda",
        name: "WDC WD40EFRX",
        serial_number: "WD-123",
        size_formatted: "3.64 TB",
        temperature: "34°C",
        interface_type: "SATA",
        smart_status: "OK",
        is_spinning: true,
        partition_count: 2,
        total_partition_size: "2.00 GB",
      });
    });

    it("should fill gaps in a sparse disk summary", () => {
      expect(summarizeDisk({ id: "disk2", device: null, name: null })).toEqual({
        disk_id: "disk2",
        device: null,
        name: null,
        serial_number: null,
        size_formatted: "N/A",
        temperature: "N/A",
        interface_type: null,
        smart_status: null,
        is_spinning: null,
        partition_count: 0,
        total_partition_size: "0.00 B",
      });
    });

    it("should fetch disk details with the disk timeout", async () => {
      client.respond({ disk });

      const result = await executeTool("get_disk_details", { disk_id: "disk1" }, context);

      expect(result).toEqual({ summary: summarizeDisk(disk), partitions: disk.partitions, details: disk });
      expect(client.calls[0]?.options).toEqual({
        variables: { id: "disk1" },
        timeoutMs: 90000,
        requestId: "req-7",
      });
    });

    it("should report a missing disk", async () => {
      client.respond({ disk: null });

      await expect(executeTool("get_disk_details", { disk_id: "disk9" }, context)).rejects.toThrow(
        "Disk not found: disk9"
      );
    });

    it("should list disks with the disk timeout", async () => {
      client.respond({ disks: [{ id: "disk1", device: "/dev/sda", name: "a" }] });

      await expect(executeTool("list_physical_disks", {}, context)).resolves.toHaveLength(1);
      expect(client.calls[0]?.options?.timeoutMs).toBe(90000);
    });
  });

  describe("rclone", () => {
    it("should strip slashes from the provider type", () => {
      expect(cleanProviderType("/s3/")).toBe("s3");
      expect(cleanProviderType("drive")).toBe("drive");
    });

    it("should request the provider form", async () => {
      const form = { id: "form-s3", dataSchema: {}, uiSchema: {} };
      client.respond({ rclone: { configForm: form } });

      await expect(
        executeTool("get_rclone_config_form", { provider_type: "/s3/" }, context)
      ).resolves.toEqual(form);
      expect(client.calls[0]?.options).toEqual({ variables: { formOptions: { providerType: "s3" } } });
    });

    it("should request the general form without variables", async () => {
      client.respond({ rclone: { configForm: { id: "general", dataSchema: {}, uiSchema: {} } } });

      await executeTool("get_rclone_config_form", {}, context);
      expect(client.calls[0]?.options).toEqual({});
    });

    it("should fail when the API returns no form", async () => {
      client.respond({ rclone: null }, { rclone: { configForm: null } });

      await expect(executeTool("get_rclone_config_form", {}, context)).rejects.toThrow(
        "GraphQL query execution failed: No RClone data received from API"
      );
      await expect(executeTool("get_rclone_config_form", {}, context)).rejects.toThrow(
        "GraphQL query execution failed: No RClone config form data received"
      );
    });

    it("should create a remote", async () => {
      const remote = { name: "backup", type: "s3", parameters: { region: "eu-west-1" } };
      client.respond({ rclone: { createRCloneRemote: remote } });

      const result = await executeTool(
        "create_rclone_remote",
        { name: "backup", provider_type: "s3", config_data: { region: "eu-west-1" } },
        context
      );

      expect(result).toEqual({
        success: true,
        message: "RClone remote 'backup' created successfully",
        remote,
      });
      expect(client.calls[0]?.options?.variables).toEqual({
        input: { name: "backup", type: "s3", config: { region: "eu-west-1" } },
      });
    });

    it("should report a failed delete", async () => {
      client.respond({ rclone: { deleteRCloneRemote: false } });

      const failure = executeTool("delete_rclone_remote", { name: "old" }, context);

      await expect(failure).rejects.toBeInstanceOf(GraphQLQueryError);
      await expect(failure).rejects.toThrow(
        "GraphQL query execution failed: Failed to delete RClone remote 'old'"
      );
    });

    it("should list remotes", async () => {
      client.respond({ rclone: { remotes: [{ name: "backup", type: "s3", parameters: {} }] } });

      await expect(executeTool("list_rclone_remotes", {}, context)).resolves.toEqual([
        { name: "backup", type: "s3", parameters: {} },
      ]);
    });
  });

  describe("subscription diagnostics", () => {
    it("should run the default test subscription", async () => {
      await expect(executeTool("test_subscription", undefined, context)).resolves.toEqual(REPORT);
      expect(diagnostics.calls).toEqual([{ query: undefined, options: {} }]);
    });

    it("should pass the query, variables and timeout through", async () => {
      await executeTool(
        "test_subscription",
        {
          query: "subscription ($path: String!) { logFile(path: $path) { content } }",
          variables: { path: "/var/log/syslog" },
          timeout_ms: 500,
        },
        context
      );

      expect(diagnostics.calls).toEqual([
        {
          query: "subscription ($path: String!) { logFile(path: $path) { content } }",
          options: { variables: { path: "/var/log/syslog" }, timeoutMs: 500 },
        },
      ]);
    });

    it("should report connection status", async () => {
      await expect(executeTool("get_subscription_status", {}, context)).resolves.toEqual(HEALTH);
    });
  });
});
