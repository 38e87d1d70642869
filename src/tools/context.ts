import type { GraphQLRequester } from "../graphql/index.js";
import type { SubscriptionDiagnostics } from "../subscriptions/index.js";

export type DiagnosticsService = Pick<
  SubscriptionDiagnostics,
  "testSubscription" | "getConnectionHealth"
>;

export interface ToolContext {
  client: GraphQLRequester;
  diagnostics: DiagnosticsService;
  /** Timeout for disk queries, which can take a long time on spun-down arrays. */
  diskTimeout: number;
  requestId?: string;
}
