import { getConfig } from "../config/index.js";
import { CPU_METRICS } from "../graphql/subscriptions.js";
import { createTimer, getLogger } from "../logging/index.js";
import { getSubscriptionManager } from "./manager.js";
import type { SubscriptionManager } from "./manager.js";
import type {
  ConnectionState,
  ConnectionStatus,
  SubscriptionEvent,
  TerminalReason,
  TerminalSignal,
  Variables,
} from "./types.js";

const logger = getLogger("subscription-diagnostics");

export const DEFAULT_TEST_QUERY = CPU_METRICS;

export interface TestSubscriptionOptions {
  variables?: Variables;
  timeoutMs?: number;
}

export interface SubscriptionTestReport {
  success: boolean;
  handshakeSucceeded: boolean;
  connectionState: ConnectionState;
  subscriptionId: string | null;
  timeToFirstEventMs: number | null;
  terminalReason: TerminalReason | null;
  timedOut: boolean;
  error: string | null;
  firstPayload: Record<string, unknown> | null;
  durationMs: number;
}

type Outcome =
  | { kind: "event"; event: SubscriptionEvent }
  | { kind: "terminal"; signal: TerminalSignal }
  | { kind: "timeout" };

/**
 * Runs throwaway subscriptions through the shared manager to check the
 * socket end to end. Never throws; every path unsubscribes.
 */
export class SubscriptionDiagnostics {
  private defaultTimeout: number;

  constructor(
    private readonly manager: SubscriptionManager = getSubscriptionManager(),
    defaultTimeout?: number
  ) {
    this.defaultTimeout = defaultTimeout ?? getConfig().diagnostics.timeout;
  }

  async testSubscription(
    query: string = DEFAULT_TEST_QUERY,
    options: TestSubscriptionOptions = {}
  ): Promise<SubscriptionTestReport> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeout;
    const timer = createTimer();

    const startedReady = this.manager.getState() === "ready";
    const startGeneration = this.manager.getGeneration();
    // Generation only moves on entry to ready.
    const handshakeSucceeded = (): boolean =>
      startedReady || this.manager.getGeneration() > startGeneration;

    const handle: { id: string | null; timer: NodeJS.Timeout | null } = { id: null, timer: null };

    const report = (fields: Partial<SubscriptionTestReport>): SubscriptionTestReport => ({
      success: false,
      handshakeSucceeded: handshakeSucceeded(),
      connectionState: this.manager.getState(),
      subscriptionId: handle.id,
      timeToFirstEventMs: null,
      terminalReason: null,
      timedOut: false,
      error: null,
      firstPayload: null,
      durationMs: timer.end(),
      ...fields,
    });

    try {
      const outcome = await new Promise<Outcome>((resolve) => {
        handle.timer = setTimeout(() => resolve({ kind: "timeout" }), timeoutMs);
        handle.id = this.manager.subscribe(
          { query, ...(options.variables && { variables: options.variables }) },
          {
            onEvent: (event) => resolve({ kind: "event", event }),
            onTerminal: (signal) => resolve({ kind: "terminal", signal }),
          }
        );
      });

      switch (outcome.kind) {
        case "event":
          return report({
            success: true,
            timeToFirstEventMs: timer.end(),
            firstPayload: outcome.event.data,
            ...(outcome.event.errors && {
              error: outcome.event.errors.map((e) => e.message).join("; "),
            }),
          });
        case "terminal":
          return report({
            success: false,
            terminalReason: outcome.signal.kind,
            error:
              outcome.signal.kind === "complete"
                ? "subscription completed before emitting an event"
                : outcome.signal.error.message,
          });
        case "timeout":
          return report({
            timedOut: true,
            error: `no event received within ${timeoutMs}ms`,
          });
      }
    } catch (error) {
      return report({ error: error instanceof Error ? error.message : String(error) });
    } finally {
      if (handle.timer !== null) {
        clearTimeout(handle.timer);
      }
      if (handle.id !== null) {
        this.manager.unsubscribe(handle.id);
      }
      logger.info(
        {
          subscriptionId: handle.id,
          durationMs: timer.end(),
          handshakeSucceeded: handshakeSucceeded(),
        },
        "Test subscription finished"
      );
    }
  }

  getConnectionHealth(): ConnectionStatus {
    return this.manager.getStatus();
  }
}

let diagnosticsInstance: SubscriptionDiagnostics | null = null;

export function getSubscriptionDiagnostics(): SubscriptionDiagnostics {
  if (diagnosticsInstance === null) {
    diagnosticsInstance = new SubscriptionDiagnostics();
  }
  return diagnosticsInstance;
}

export function resetSubscriptionDiagnostics(): void {
  diagnosticsInstance = null;
}
