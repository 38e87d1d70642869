import { v4 as uuidv4 } from "uuid";
import type { SubscriptionErrorEntry } from "../errors/index.js";
import { getLogger, logError } from "../logging/index.js";
import type {
  SubscriptionConsumer,
  SubscriptionRequest,
  SubscriptionStatus,
  TerminalSignal,
} from "./types.js";

const logger = getLogger("subscription-registry");

export interface SubscriptionEntry {
  readonly id: string;
  readonly request: SubscriptionRequest;
  readonly consumer: SubscriptionConsumer;
  readonly createdAt: Date;
  status: SubscriptionStatus;
  /** Connection generation the subscribe frame went out on; null while pending. */
  generation: number | null;
  nextSequence: number;
}

export interface EventPayload {
  data: Record<string, unknown> | null;
  errors?: SubscriptionErrorEntry[];
}

/**
 * Id-keyed table of live subscriptions. Callers mutate it only from the
 * subscription manager, so every operation runs to completion on the event
 * loop without interleaving.
 */
export class SubscriptionRegistry {
  private entries: Map<string, SubscriptionEntry> = new Map();

  constructor(private readonly generateId: () => string = uuidv4) {}

  add(request: SubscriptionRequest, consumer: SubscriptionConsumer): SubscriptionEntry {
    let id = this.generateId();
    while (this.entries.has(id)) {
      id = this.generateId();
    }

    const entry: SubscriptionEntry = {
      id,
      request,
      consumer,
      createdAt: new Date(),
      status: "pending",
      generation: null,
      nextSequence: 1,
    };
    this.entries.set(id, entry);

    logger.debug({ subscriptionId: id }, "Subscription registered");
    return entry;
  }

  get(id: string): SubscriptionEntry | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  markActive(id: string, generation: number): void {
    const entry = this.entries.get(id);
    if (!entry) return;
    entry.status = "active";
    entry.generation = generation;
  }

  remove(id: string): SubscriptionEntry | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;

    this.entries.delete(id);
    entry.status = "completed";
    return entry;
  }

  deliverEvent(id: string, payload: EventPayload): boolean {
    const entry = this.entries.get(id);
    if (!entry || entry.status !== "active") {
      logger.debug({ subscriptionId: id }, "Dropping event for unknown subscription");
      return false;
    }

    const sequence = entry.nextSequence;
    entry.nextSequence += 1;

    try {
      entry.consumer.onEvent({
        subscriptionId: id,
        sequence,
        data: payload.data,
        ...(payload.errors && payload.errors.length > 0 && { errors: payload.errors }),
        receivedAt: new Date(),
      });
    } catch (error) {
      logError(logger, error, "Subscription consumer threw on event", { subscriptionId: id });
    }
    return true;
  }

  /** Removes the entry before notifying, so nothing reaches the consumer afterwards. */
  deliverTerminal(id: string, signal: TerminalSignal): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      logger.debug(
        { subscriptionId: id, signal: signal.kind },
        "Dropping terminal signal for unknown subscription"
      );
      return false;
    }

    if (signal.kind === "error") {
      entry.status = "erroring";
    }
    this.remove(id);
    this.notifyTerminal(entry, signal);
    return true;
  }

  /** Ends every active entry sent on `generation` or earlier. Pending entries stay queued. */
  invalidateGeneration(generation: number, signal: TerminalSignal): SubscriptionEntry[] {
    const invalidated = [...this.entries.values()].filter(
      (entry) =>
        entry.status === "active" && entry.generation !== null && entry.generation <= generation
    );

    for (const entry of invalidated) {
      this.remove(entry.id);
    }
    for (const entry of invalidated) {
      this.notifyTerminal(entry, signal);
    }
    return invalidated;
  }

  terminatePending(signal: TerminalSignal): SubscriptionEntry[] {
    return this.terminateWhere((entry) => entry.status === "pending", signal);
  }

  terminateAll(signal: TerminalSignal): SubscriptionEntry[] {
    return this.terminateWhere(() => true, signal);
  }

  pendingEntries(): SubscriptionEntry[] {
    return [...this.entries.values()].filter((entry) => entry.status === "pending");
  }

  activeEntries(): SubscriptionEntry[] {
    return [...this.entries.values()].filter((entry) => entry.status === "active");
  }

  counts(): { pending: number; active: number } {
    let pending = 0;
    let active = 0;
    for (const entry of this.entries.values()) {
      if (entry.status === "pending") pending += 1;
      else if (entry.status === "active") active += 1;
    }
    return { pending, active };
  }

  private terminateWhere(
    predicate: (entry: SubscriptionEntry) => boolean,
    signal: TerminalSignal
  ): SubscriptionEntry[] {
    const matched = [...this.entries.values()].filter(predicate);
    for (const entry of matched) {
      this.remove(entry.id);
    }
    for (const entry of matched) {
      this.notifyTerminal(entry, signal);
    }
    return matched;
  }

  private notifyTerminal(entry: SubscriptionEntry, signal: TerminalSignal): void {
    try {
      entry.consumer.onTerminal(signal);
    } catch (error) {
      logError(logger, error, "Subscription consumer threw on terminal signal", {
        subscriptionId: entry.id,
        signal: signal.kind,
      });
    }
  }
}
