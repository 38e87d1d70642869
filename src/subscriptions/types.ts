import type {
  DisconnectedError,
  SubscriptionError,
  SubscriptionErrorEntry,
  SubscriptionUnavailableError,
} from "../errors/index.js";

export type ConnectionState = "disconnected" | "connecting" | "handshaking" | "ready" | "degraded";

export type SubscriptionStatus = "pending" | "active" | "erroring" | "completed";

export type Variables = Record<string, unknown>;

export interface SubscriptionRequest {
  query: string;
  variables?: Variables;
  operationName?: string;
}

/**
 * One `next` payload routed to a subscription. Sequence numbers start at 1
 * and increase by one per event for the lifetime of the subscription.
 */
export interface SubscriptionEvent {
  subscriptionId: string;
  sequence: number;
  data: Record<string, unknown> | null;
  errors?: SubscriptionErrorEntry[];
  receivedAt: Date;
}

export type TerminalSignal =
  | { kind: "complete" }
  | { kind: "error"; error: SubscriptionError }
  | { kind: "disconnected"; error: DisconnectedError }
  | { kind: "unavailable"; error: SubscriptionUnavailableError };

export type TerminalReason = TerminalSignal["kind"];

/**
 * Receives the output of exactly one subscription. After `onTerminal` the
 * consumer gets nothing more for that subscription id.
 */
export interface SubscriptionConsumer {
  onEvent(event: SubscriptionEvent): void;
  onTerminal(signal: TerminalSignal): void;
}

export interface SubscribeOptions {
  /**
   * Queue the subscription until the connection is ready (default). When
   * false, subscribing while not ready throws SubscriptionUnavailableError.
   */
  waitForReady?: boolean;
}

export interface ConnectionStatus {
  state: ConnectionState;
  endpoint: string | undefined;
  generation: number;
  retryCount: number;
  lastActivity: string | null;
  connectedSince: string | null;
  lastError: string | null;
  subscriptions: {
    pending: number;
    active: number;
  };
}

export interface StateChange {
  from: ConnectionState;
  to: ConnectionState;
  generation: number;
}

export interface SubscriptionManagerEvents {
  stateChange: (change: StateChange) => void;

  disconnected: (error: DisconnectedError, invalidated: number) => void;

  unavailable: (error: SubscriptionUnavailableError) => void;
}
