export {
  introspectSchemaSchema,
  queryUnraidApiSchema,
  listNotificationsSchema,
  getLogsSchema,
  getDiskDetailsSchema,
  getRCloneConfigFormSchema,
  createRCloneRemoteSchema,
  deleteRCloneRemoteSchema,
  testSubscriptionSchema,
  toolSchemas,
  toolDescriptions,
  isToolName,
  getToolSchema,
  getAvailableTools,
  type ToolInputSchema,
} from "./tool-schemas.js";
