import { UnsupportedOperationError } from "../errors/index.js";
import { serverLogger as logger, createTimer } from "../logging/index.js";
import { isToolName } from "../schemas/index.js";
import { parseToolParameters } from "../validation/index.js";
import {
  ToolName,
  type CreateRCloneRemoteParams,
  type DeleteRCloneRemoteParams,
  type GetDiskDetailsParams,
  type GetLogsParams,
  type GetRCloneConfigFormParams,
  type IntrospectSchemaParams,
  type ListNotificationsParams,
  type QueryUnraidApiParams,
  type TestSubscriptionParams,
} from "../types/index.js";
import type { ToolContext } from "./context.js";
import { executeIntrospectSchema, executeQueryUnraidApi } from "./api.js";
import {
  executeGetDiskDetails,
  executeGetLogs,
  executeGetNotificationsOverview,
  executeGetSharesInfo,
  executeListLogFiles,
  executeListNotifications,
  executeListPhysicalDisks,
} from "./storage.js";
import {
  executeCreateRCloneRemote,
  executeDeleteRCloneRemote,
  executeGetRCloneConfigForm,
  executeListRCloneRemotes,
} from "./rclone.js";
import { executeGetSubscriptionStatus, executeTestSubscription } from "./diagnostics.js";

export type ToolExecutor = (rawParams: unknown, context: ToolContext) => Promise<unknown>;

/** Binds an executor to its schema so it only ever sees validated arguments. */
function withParams<P>(
  toolName: ToolName,
  execute: (params: P, context: ToolContext) => Promise<unknown>
): ToolExecutor {
  return (rawParams, context) => execute(parseToolParameters<P>(toolName, rawParams), context);
}

function withoutParams(
  toolName: ToolName,
  execute: (context: ToolContext) => Promise<unknown>
): ToolExecutor {
  return (rawParams, context) => {
    parseToolParameters<Record<string, never>>(toolName, rawParams);
    return execute(context);
  };
}

export const toolExecutors: Record<ToolName, ToolExecutor> = {
  [ToolName.INTROSPECT_SCHEMA]: withParams<IntrospectSchemaParams>(
    ToolName.INTROSPECT_SCHEMA,
    executeIntrospectSchema
  ),
  [ToolName.QUERY_UNRAID_API]: withParams<QueryUnraidApiParams>(
    ToolName.QUERY_UNRAID_API,
    executeQueryUnraidApi
  ),
  [ToolName.GET_SHARES_INFO]: withoutParams(ToolName.GET_SHARES_INFO, executeGetSharesInfo),
  [ToolName.GET_NOTIFICATIONS_OVERVIEW]: withoutParams(
    ToolName.GET_NOTIFICATIONS_OVERVIEW,
    executeGetNotificationsOverview
  ),
  [ToolName.LIST_NOTIFICATIONS]: withParams<ListNotificationsParams>(
    ToolName.LIST_NOTIFICATIONS,
    executeListNotifications
  ),
  [ToolName.LIST_AVAILABLE_LOG_FILES]: withoutParams(
    ToolName.LIST_AVAILABLE_LOG_FILES,
    executeListLogFiles
  ),
  [ToolName.GET_LOGS]: withParams<GetLogsParams>(ToolName.GET_LOGS, executeGetLogs),
  [ToolName.LIST_PHYSICAL_DISKS]: withoutParams(
    ToolName.LIST_PHYSICAL_DISKS,
    executeListPhysicalDisks
  ),
  [ToolName.GET_DISK_DETAILS]: withParams<GetDiskDetailsParams>(
    ToolName.GET_DISK_DETAILS,
    executeGetDiskDetails
  ),
  [ToolName.LIST_RCLONE_REMOTES]: withoutParams(
    ToolName.LIST_RCLONE_REMOTES,
    executeListRCloneRemotes
  ),
  [ToolName.GET_RCLONE_CONFIG_FORM]: withParams<GetRCloneConfigFormParams>(
    ToolName.GET_RCLONE_CONFIG_FORM,
    executeGetRCloneConfigForm
  ),
  [ToolName.CREATE_RCLONE_REMOTE]: withParams<CreateRCloneRemoteParams>(
    ToolName.CREATE_RCLONE_REMOTE,
    executeCreateRCloneRemote
  ),
  [ToolName.DELETE_RCLONE_REMOTE]: withParams<DeleteRCloneRemoteParams>(
    ToolName.DELETE_RCLONE_REMOTE,
    executeDeleteRCloneRemote
  ),
  [ToolName.TEST_SUBSCRIPTION]: withParams<TestSubscriptionParams>(
    ToolName.TEST_SUBSCRIPTION,
    executeTestSubscription
  ),
  [ToolName.GET_SUBSCRIPTION_STATUS]: withoutParams(
    ToolName.GET_SUBSCRIPTION_STATUS,
    executeGetSubscriptionStatus
  ),
};

export async function executeTool(
  toolName: string,
  rawParams: unknown,
  context: ToolContext
): Promise<unknown> {
  if (!isToolName(toolName)) {
    logger.error(
      { toolName, availableTools: Object.keys(toolExecutors) },
      "Unknown tool requested"
    );
    throw new UnsupportedOperationError(`Unknown tool: ${toolName}`);
  }

  const timer = createTimer();

  try {
    const result = await toolExecutors[toolName](rawParams, context);
    logger.debug({ toolName, durationMs: timer.end() }, "Tool execution completed");
    return result;
  } catch (error) {
    logger.error(
      {
        toolName,
        errorMessage: error instanceof Error ? error.message : String(error),
        errorType: error instanceof Error ? error.name : typeof error,
        durationMs: timer.end(),
      },
      "Tool execution failed"
    );
    throw error;
  }
}
