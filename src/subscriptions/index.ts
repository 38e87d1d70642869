export {
  SubscriptionManager,
  getSubscriptionManager,
  resetSubscriptionManager,
  type SubscriptionManagerConfig,
  type SubscriptionManagerDeps,
} from "./manager.js";

export { SubscriptionRegistry, type SubscriptionEntry } from "./registry.js";

export { MessageDispatcher, type DispatcherHooks, type DispatchResult } from "./dispatcher.js";

export {
  WebSocketTransport,
  openWebSocketTransport,
  type InboundFrame,
  type TransportConnection,
  type TransportOpener,
  type TransportOptions,
} from "./transport.js";

export {
  ResourceBridge,
  LiveStream,
  getResourceBridge,
  resetResourceBridge,
  type StreamRecord,
  type StreamItem,
  type StreamEnd,
  type StreamEndReason,
  type StreamOptions,
  type CollectOptions,
  type CollectResult,
} from "./resource-bridge.js";

export {
  SubscriptionDiagnostics,
  getSubscriptionDiagnostics,
  resetSubscriptionDiagnostics,
  DEFAULT_TEST_QUERY,
  type SubscriptionTestReport,
  type TestSubscriptionOptions,
} from "./diagnostics.js";

export {
  logFileSource,
  notificationSource,
  type StreamSource,
  type LogChunk,
  type NotificationRecord,
} from "./sources.js";

export { computeBackoff, type BackoffPolicy } from "./backoff.js";

export type * from "./types.js";
