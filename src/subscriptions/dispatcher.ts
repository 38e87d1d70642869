import { MessageType } from "graphql-ws";
import { SubscriptionError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";
import { decodeFrame, toErrorEntries } from "./protocol.js";
import type { ProtocolMessage } from "./protocol.js";
import type { SubscriptionRegistry } from "./registry.js";

const logger = getLogger("subscription-dispatcher");

export interface DispatcherHooks {
  onConnectionAck(payload: Record<string, unknown> | undefined): void;
  onPing(payload: Record<string, unknown> | undefined): void;
  onPong(payload: Record<string, unknown> | undefined): void;
}

export type DispatchResult =
  | { handled: true; type: MessageType }
  | { handled: false; reason: "malformed" | "unexpected" };

function toRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return { ...value };
}

/**
 * Routes decoded server frames to registry entries. A bad frame is logged
 * and dropped without affecting any other subscription.
 */
export class MessageDispatcher {
  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly hooks: DispatcherHooks
  ) {}

  dispatch(raw: string): DispatchResult {
    let message: ProtocolMessage;
    try {
      message = decodeFrame(raw);
    } catch (error) {
      logger.warn(
        {
          error: error instanceof Error ? error.message : String(error),
          frame: raw.slice(0, 200),
        },
        "Dropping malformed frame"
      );
      return { handled: false, reason: "malformed" };
    }

    switch (message.type) {
      case MessageType.Next:
        this.registry.deliverEvent(message.id, {
          data: toRecord(message.payload.data),
          ...(message.payload.errors && { errors: toErrorEntries(message.payload.errors) }),
        });
        break;

      case MessageType.Error:
        this.registry.deliverTerminal(message.id, {
          kind: "error",
          error: new SubscriptionError(message.id, toErrorEntries(message.payload)),
        });
        break;

      case MessageType.Complete:
        this.registry.deliverTerminal(message.id, { kind: "complete" });
        break;

      case MessageType.Ping:
        this.hooks.onPing(message.payload);
        break;

      case MessageType.Pong:
        this.hooks.onPong(message.payload);
        break;

      case MessageType.ConnectionAck:
        this.hooks.onConnectionAck(message.payload ?? undefined);
        break;

      default:
        logger.warn({ type: message.type }, "Dropping client-only frame sent by server");
        return { handled: false, reason: "unexpected" };
    }

    return { handled: true, type: message.type };
  }
}
