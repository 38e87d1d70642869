import { describe, it, expect, beforeEach } from "@jest/globals";
import { DisconnectedError, SubscriptionError } from "../../errors/index.js";
import { SubscriptionRegistry } from "../registry.js";
import type { SubscriptionConsumer, SubscriptionEvent, TerminalSignal } from "../types.js";

interface RecordingConsumer extends SubscriptionConsumer {
  events: SubscriptionEvent[];
  terminals: TerminalSignal[];
}

function recordingConsumer(): RecordingConsumer {
  const events: SubscriptionEvent[] = [];
  const terminals: TerminalSignal[] = [];
  return {
    events,
    terminals,
    onEvent: (event) => events.push(event),
    onTerminal: (signal) => terminals.push(signal),
  };
}

const request = { query: "subscription { ping }" };

describe("SubscriptionRegistry", () => {
  let counter: number;
  let registry: SubscriptionRegistry;

  beforeEach(() => {
    counter = 0;
    registry = new SubscriptionRegistry(() => `sub-${++counter}`);
  });

  it("should register entries as pending with no generation", () => {
    const entry = registry.add(request, recordingConsumer());

    expect(entry.id).toBe("sub-1");
    expect(entry.status).toBe("pending");
    expect(entry.generation).toBeNull();
    expect(registry.counts()).toEqual({ pending: 1, active: 0 });
  });

  it("should skip ids that are already taken", () => {
    const ids = ["dup", "dup", "fresh"];
    const reg = new SubscriptionRegistry(() => ids.shift() ?? "none");

    expect(reg.add(request, recordingConsumer()).id).toBe("dup");
    expect(reg.add(request, recordingConsumer()).id).toBe("fresh");
  });

  it("should not deliver events to pending entries", () => {
    const consumer = recordingConsumer();
    const entry = registry.add(request, consumer);

    expect(registry.deliverEvent(entry.id, { data: { a: 1 } })).toBe(false);
    expect(consumer.events).toHaveLength(0);
  });

  it("should number events from 1 in arrival order", () => {
    const consumer = recordingConsumer();
    const entry = registry.add(request, consumer);
    registry.markActive(entry.id, 1);

    registry.deliverEvent(entry.id, { data: { n: "a" } });
    registry.deliverEvent(entry.id, { data: { n: "b" } });

    expect(consumer.events.map((e) => [e.sequence, e.data])).toEqual([
      [1, { n: "a" }],
      [2, { n: "b" }],
    ]);
    expect(consumer.events[0]?.subscriptionId).toBe("sub-1");
  });

  it("should attach errors only when there are some", () => {
    const consumer = recordingConsumer();
    const entry = registry.add(request, consumer);
    registry.markActive(entry.id, 1);

    registry.deliverEvent(entry.id, { data: null, errors: [] });
    registry.deliverEvent(entry.id, { data: null, errors: [{ message: "partial" }] });

    expect("errors" in (consumer.events[0] ?? {})).toBe(false);
    expect(consumer.events[1]?.errors).toEqual([{ message: "partial" }]);
  });

  it("should remove the entry before the terminal signal reaches the consumer", () => {
    const seen: boolean[] = [];
    const entry = registry.add(request, {
      onEvent: () => undefined,
      onTerminal: () => seen.push(registry.has(entry.id)),
    });
    registry.markActive(entry.id, 1);

    expect(registry.deliverTerminal(entry.id, { kind: "complete" })).toBe(true);
    expect(seen).toEqual([false]);
    expect(entry.status).toBe("completed");
  });

  it("should ignore frames for ids it does not know", () => {
    expect(registry.deliverEvent("ghost", { data: {} })).toBe(false);
    expect(registry.deliverTerminal("ghost", { kind: "complete" })).toBe(false);
  });

  it("should deliver exactly one terminal signal", () => {
    const consumer = recordingConsumer();
    const entry = registry.add(request, consumer);
    registry.markActive(entry.id, 1);

    const error = new SubscriptionError(entry.id, [{ message: "boom" }]);
    registry.deliverTerminal(entry.id, { kind: "error", error });
    registry.deliverTerminal(entry.id, { kind: "complete" });
    registry.deliverEvent(entry.id, { data: {} });

    expect(consumer.terminals).toEqual([{ kind: "error", error }]);
    expect(consumer.events).toHaveLength(0);
  });

  it("should invalidate only active entries from the lost generation or earlier", () => {
    const old = recordingConsumer();
    const current = recordingConsumer();
    const queued = recordingConsumer();

    const a = registry.add(request, old);
    const b = registry.add(request, current);
    registry.add(request, queued);
    registry.markActive(a.id, 1);
    registry.markActive(b.id, 2);

    const error = new DisconnectedError(1, "socket closed");
    const invalidated = registry.invalidateGeneration(1, { kind: "disconnected", error });

    expect(invalidated.map((e) => e.id)).toEqual(["sub-1"]);
    expect(old.terminals).toEqual([{ kind: "disconnected", error }]);
    expect(current.terminals).toHaveLength(0);
    expect(queued.terminals).toHaveLength(0);
    expect(registry.counts()).toEqual({ pending: 1, active: 1 });
  });

  it("should terminate pending entries and leave active ones", () => {
    const queued = recordingConsumer();
    const live = recordingConsumer();
    registry.add(request, queued);
    const b = registry.add(request, live);
    registry.markActive(b.id, 1);

    const removed = registry.terminatePending({ kind: "complete" });

    expect(removed.map((e) => e.id)).toEqual(["sub-1"]);
    expect(queued.terminals).toEqual([{ kind: "complete" }]);
    expect(live.terminals).toHaveLength(0);
    expect(registry.size).toBe(1);
  });

  it("should keep delivering when a consumer throws", () => {
    const entry = registry.add(request, {
      onEvent: () => {
        throw new Error("consumer bug");
      },
      onTerminal: () => undefined,
    });
    registry.markActive(entry.id, 1);

    expect(registry.deliverEvent(entry.id, { data: {} })).toBe(true);
    expect(registry.get(entry.id)?.nextSequence).toBe(2);
  });

  it("should report counts and empty after terminateAll", () => {
    const a = registry.add(request, recordingConsumer());
    registry.add(request, recordingConsumer());
    registry.markActive(a.id, 3);

    expect(registry.counts()).toEqual({ pending: 1, active: 1 });
    expect(registry.terminateAll({ kind: "complete" })).toHaveLength(2);
    expect(registry.size).toBe(0);
  });
});
