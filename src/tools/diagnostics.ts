import { getLogger } from "../logging/index.js";
import type { ConnectionStatus, SubscriptionTestReport } from "../subscriptions/index.js";
import type { TestSubscriptionParams } from "../types/index.js";
import type { ToolContext } from "./context.js";

const logger = getLogger("tools:diagnostics");

export async function executeTestSubscription(
  params: TestSubscriptionParams,
  context: ToolContext
): Promise<SubscriptionTestReport> {
  const report = await context.diagnostics.testSubscription(params.query, {
    ...(params.variables && { variables: params.variables }),
    ...(params.timeout_ms !== undefined && { timeoutMs: params.timeout_ms }),
  });

  logger.info(
    { success: report.success, timedOut: report.timedOut, durationMs: report.durationMs },
    "Test subscription completed"
  );
  return report;
}

export function executeGetSubscriptionStatus(context: ToolContext): Promise<ConnectionStatus> {
  return Promise.resolve(context.diagnostics.getConnectionHealth());
}
