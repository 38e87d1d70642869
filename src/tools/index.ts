export { toolExecutors, executeTool, type ToolExecutor } from "./execution.js";

export type { ToolContext, DiagnosticsService } from "./context.js";

export { executeIntrospectSchema, executeQueryUnraidApi, validateVariables } from "./api.js";

export {
  executeGetSharesInfo,
  executeGetNotificationsOverview,
  executeListNotifications,
  executeListLogFiles,
  executeGetLogs,
  executeListPhysicalDisks,
  executeGetDiskDetails,
  buildNotificationFilter,
  summarizeDisk,
} from "./storage.js";

export {
  executeListRCloneRemotes,
  executeGetRCloneConfigForm,
  executeCreateRCloneRemote,
  executeDeleteRCloneRemote,
  cleanProviderType,
} from "./rclone.js";

export { executeTestSubscription, executeGetSubscriptionStatus } from "./diagnostics.js";
