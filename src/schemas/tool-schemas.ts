import type { JSONSchema7 } from "json-schema";
import { ToolName } from "../types/index.js";

/** JSON schema of a tool's arguments; MCP requires an object at the root. */
export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JSONSchema7>;
  required?: string[];
  additionalProperties?: boolean;
  title?: string;
  description?: string;
};

const commonSchemas: Record<"nonEmptyString" | "variables", JSONSchema7> = {
  nonEmptyString: {
    type: "string",
    minLength: 1,
  },

  variables: {
    type: "object",
    description: "GraphQL variables as a JSON object",
  },
};

const noParams = (title: string, description: string): ToolInputSchema => ({
  type: "object",
  properties: {},
  additionalProperties: false,
  title,
  description,
});

export const introspectSchemaSchema: ToolInputSchema = {
  type: "object",
  properties: {
    type_name: {
      ...commonSchemas.nonEmptyString,
      description: "GraphQL type to describe; omit for the root query, mutation and subscription fields",
    },
  },
  additionalProperties: false,
  title: "IntrospectSchemaParams",
  description: "Parameters for schema introspection",
};

export const queryUnraidApiSchema: ToolInputSchema = {
  type: "object",
  properties: {
    graphql_query: {
      ...commonSchemas.nonEmptyString,
      description: "GraphQL query document; mutations are refused",
    },
    variables: commonSchemas.variables,
  },
  required: ["graphql_query"],
  additionalProperties: false,
  title: "QueryUnraidApiParams",
  description: "Parameters for a raw read-only GraphQL query",
};

export const listNotificationsSchema: ToolInputSchema = {
  type: "object",
  properties: {
    notification_type: {
      type: "string",
      pattern: "^(?:[Uu][Nn][Rr][Ee][Aa][Dd]|[Aa][Rr][Cc][Hh][Ii][Vv][Ee])$",
      description: "UNREAD or ARCHIVE (case-insensitive)",
    },
    offset: {
      type: "integer",
      minimum: 0,
      default: 0,
      description: "Number of notifications to skip",
    },
    limit: {
      type: "integer",
      minimum: 1,
      maximum: 500,
      default: 20,
      description: "Number of notifications to return (max 500)",
    },
    importance: {
      type: "string",
      pattern: "^(?:[Ii][Nn][Ff][Oo]|[Ww][Aa][Rr][Nn][Ii][Nn][Gg]|[Aa][Ll][Ee][Rr][Tt])$",
      description: "INFO, WARNING or ALERT (case-insensitive)",
    },
  },
  required: ["notification_type"],
  additionalProperties: false,
  title: "ListNotificationsParams",
  description: "Parameters for listing notifications",
};

export const getLogsSchema: ToolInputSchema = {
  type: "object",
  properties: {
    log_file_path: {
      ...commonSchemas.nonEmptyString,
      description: "Absolute path of the log file, as returned by list_available_log_files",
    },
    tail_lines: {
      type: "integer",
      minimum: 1,
      maximum: 10000,
      default: 100,
      description: "Number of trailing lines to return",
    },
  },
  required: ["log_file_path"],
  additionalProperties: false,
  title: "GetLogsParams",
  description: "Parameters for reading a log file",
};

export const getDiskDetailsSchema: ToolInputSchema = {
  type: "object",
  properties: {
    disk_id: {
      ...commonSchemas.nonEmptyString,
      description: "Disk identifier from list_physical_disks",
    },
  },
  required: ["disk_id"],
  additionalProperties: false,
  title: "GetDiskDetailsParams",
  description: "Parameters for disk details",
};

export const getRCloneConfigFormSchema: ToolInputSchema = {
  type: "object",
  properties: {
    provider_type: {
      type: "string",
      description: "Provider such as s3, drive or dropbox; omit for the general form",
    },
  },
  additionalProperties: false,
  title: "GetRCloneConfigFormParams",
  description: "Parameters for the RClone configuration form",
};

export const createRCloneRemoteSchema: ToolInputSchema = {
  type: "object",
  properties: {
    name: { ...commonSchemas.nonEmptyString, description: "Name for the new remote" },
    provider_type: {
      ...commonSchemas.nonEmptyString,
      description: "Provider type, e.g. s3, drive, dropbox or ftp",
    },
    config_data: {
      type: "object",
      description: "Provider specific configuration parameters",
    },
  },
  required: ["name", "provider_type", "config_data"],
  additionalProperties: false,
  title: "CreateRCloneRemoteParams",
  description: "Parameters for creating an RClone remote",
};

export const deleteRCloneRemoteSchema: ToolInputSchema = {
  type: "object",
  properties: {
    name: { ...commonSchemas.nonEmptyString, description: "Name of the remote to delete" },
  },
  required: ["name"],
  additionalProperties: false,
  title: "DeleteRCloneRemoteParams",
  description: "Parameters for deleting an RClone remote",
};

export const testSubscriptionSchema: ToolInputSchema = {
  type: "object",
  properties: {
    query: {
      ...commonSchemas.nonEmptyString,
      description: "Subscription document to try; defaults to a CPU metrics subscription",
    },
    variables: commonSchemas.variables,
    timeout_ms: {
      type: "integer",
      minimum: 100,
      maximum: 120000,
      description: "How long to wait for the first event",
    },
  },
  additionalProperties: false,
  title: "TestSubscriptionParams",
  description: "Parameters for a diagnostic subscription",
};

export const toolSchemas: Record<ToolName, ToolInputSchema> = {
  [ToolName.INTROSPECT_SCHEMA]: introspectSchemaSchema,
  [ToolName.QUERY_UNRAID_API]: queryUnraidApiSchema,
  [ToolName.GET_SHARES_INFO]: noParams("GetSharesInfoParams", "No parameters"),
  [ToolName.GET_NOTIFICATIONS_OVERVIEW]: noParams("GetNotificationsOverviewParams", "No parameters"),
  [ToolName.LIST_NOTIFICATIONS]: listNotificationsSchema,
  [ToolName.LIST_AVAILABLE_LOG_FILES]: noParams("ListLogFilesParams", "No parameters"),
  [ToolName.GET_LOGS]: getLogsSchema,
  [ToolName.LIST_PHYSICAL_DISKS]: noParams("ListPhysicalDisksParams", "No parameters"),
  [ToolName.GET_DISK_DETAILS]: getDiskDetailsSchema,
  [ToolName.LIST_RCLONE_REMOTES]: noParams("ListRCloneRemotesParams", "No parameters"),
  [ToolName.GET_RCLONE_CONFIG_FORM]: getRCloneConfigFormSchema,
  [ToolName.CREATE_RCLONE_REMOTE]: createRCloneRemoteSchema,
  [ToolName.DELETE_RCLONE_REMOTE]: deleteRCloneRemoteSchema,
  [ToolName.TEST_SUBSCRIPTION]: testSubscriptionSchema,
  [ToolName.GET_SUBSCRIPTION_STATUS]: noParams("GetSubscriptionStatusParams", "No parameters"),
};

export const toolDescriptions: Record<ToolName, string> = {
  [ToolName.INTROSPECT_SCHEMA]:
    "Introspect the Unraid GraphQL schema. Without arguments, returns root query, mutation and subscription fields. With type_name, returns that type's fields and arguments.",
  [ToolName.QUERY_UNRAID_API]:
    "Execute a read-only GraphQL query against the Unraid API. Mutations are refused.",
  [ToolName.GET_SHARES_INFO]: "Retrieves information about user shares.",
  [ToolName.GET_NOTIFICATIONS_OVERVIEW]:
    "Retrieves counts of unread and archived notifications by importance.",
  [ToolName.LIST_NOTIFICATIONS]:
    "Lists notifications with filtering. Type: UNREAD/ARCHIVE. Importance: INFO/WARNING/ALERT.",
  [ToolName.LIST_AVAILABLE_LOG_FILES]: "Lists all available log files that can be queried.",
  [ToolName.GET_LOGS]: "Retrieves content from a specific log file, defaulting to the last 100 lines.",
  [ToolName.LIST_PHYSICAL_DISKS]: "Lists all physical disks recognized by the Unraid system.",
  [ToolName.GET_DISK_DETAILS]:
    "Retrieves SMART information and partition data for a specific physical disk.",
  [ToolName.LIST_RCLONE_REMOTES]: "Retrieves all configured RClone remotes.",
  [ToolName.GET_RCLONE_CONFIG_FORM]:
    "Get the RClone configuration form schema for setting up new remotes.",
  [ToolName.CREATE_RCLONE_REMOTE]: "Create a new RClone remote with the specified configuration.",
  [ToolName.DELETE_RCLONE_REMOTE]: "Delete an existing RClone remote by name.",
  [ToolName.TEST_SUBSCRIPTION]:
    "Open a short-lived GraphQL subscription and report whether the handshake and first event succeed.",
  [ToolName.GET_SUBSCRIPTION_STATUS]:
    "Report the state of the WebSocket subscription connection and its subscriptions.",
};

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolSchemas, name);
}

export function getToolSchema(toolName: string): ToolInputSchema | null {
  return isToolName(toolName) ? toolSchemas[toolName] : null;
}

export function getAvailableTools(): ToolName[] {
  return Object.values(ToolName);
}
