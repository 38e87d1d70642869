export const RESOURCE_URI_PATTERNS = {
  LOGS: "unraid://logs/{path}",
  NOTIFICATIONS: "unraid://notifications/live",
  SUBSCRIPTION_STATUS: "unraid://subscriptions/status",
} as const;

export enum ToolName {
  INTROSPECT_SCHEMA = "introspect_schema",
  QUERY_UNRAID_API = "query_unraid_api",
  GET_SHARES_INFO = "get_shares_info",
  GET_NOTIFICATIONS_OVERVIEW = "get_notifications_overview",
  LIST_NOTIFICATIONS = "list_notifications",
  LIST_AVAILABLE_LOG_FILES = "list_available_log_files",
  GET_LOGS = "get_logs",
  LIST_PHYSICAL_DISKS = "list_physical_disks",
  GET_DISK_DETAILS = "get_disk_details",
  LIST_RCLONE_REMOTES = "list_rclone_remotes",
  GET_RCLONE_CONFIG_FORM = "get_rclone_config_form",
  CREATE_RCLONE_REMOTE = "create_rclone_remote",
  DELETE_RCLONE_REMOTE = "delete_rclone_remote",
  TEST_SUBSCRIPTION = "test_subscription",
  GET_SUBSCRIPTION_STATUS = "get_subscription_status",
}

export interface IntrospectSchemaParams {
  type_name?: string;
}

export interface QueryUnraidApiParams {
  graphql_query: string;
  variables?: Record<string, unknown>;
}

export interface ListNotificationsParams {
  notification_type: string;
  offset: number;
  limit: number;
  importance?: string;
}

export interface GetLogsParams {
  log_file_path: string;
  tail_lines: number;
}

export interface GetDiskDetailsParams {
  disk_id: string;
}

export interface GetRCloneConfigFormParams {
  provider_type?: string;
}

export interface CreateRCloneRemoteParams {
  name: string;
  provider_type: string;
  config_data: Record<string, unknown>;
}

export interface DeleteRCloneRemoteParams {
  name: string;
}

export interface TestSubscriptionParams {
  query?: string;
  variables?: Record<string, unknown>;
  timeout_ms?: number;
}

export interface UnraidResponse<T> {
  data: T;
  metadata: {
    timestamp: string;
    executionTime?: number;
    totalCount?: number;
    [key: string]: unknown;
  };
}

export type ParsedResourceUri =
  | { type: "logs"; path: string }
  | { type: "notifications" }
  | { type: "subscription-status" };

export const buildResourceUri = {
  logs: (path: string): string =>
    RESOURCE_URI_PATTERNS.LOGS.replace("{path}", encodeURIComponent(path)),
  notifications: (): string => RESOURCE_URI_PATTERNS.NOTIFICATIONS,
  subscriptionStatus: (): string => RESOURCE_URI_PATTERNS.SUBSCRIPTION_STATUS,
};

export const parseResourceUri = (uri: string): ParsedResourceUri | null => {
  if (uri === RESOURCE_URI_PATTERNS.NOTIFICATIONS) {
    return { type: "notifications" };
  }
  if (uri === RESOURCE_URI_PATTERNS.SUBSCRIPTION_STATUS) {
    return { type: "subscription-status" };
  }

  const match = uri.match(/^unraid:\/\/logs\/(.+)$/);
  const encoded = match?.[1];
  if (encoded === undefined || encoded === "") {
    return null;
  }

  try {
    return { type: "logs", path: decodeURIComponent(encoded) };
  } catch {
    return null;
  }
};
