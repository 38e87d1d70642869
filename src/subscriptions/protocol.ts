import { MessageType, parseMessage, stringifyMessage } from "graphql-ws";
import type { Message } from "graphql-ws";
import type { SubscriptionErrorEntry } from "../errors/index.js";
import type { SubscriptionRequest } from "./types.js";

export type ProtocolMessage = Message;

/** Throws when the text is not a valid graphql-transport-ws message. */
export function decodeFrame(raw: string): ProtocolMessage {
  return parseMessage(raw);
}

export function encodeConnectionInit(apiKey: string | undefined): string {
  return stringifyMessage<MessageType.ConnectionInit>({
    type: MessageType.ConnectionInit,
    payload: apiKey ? { "x-api-key": apiKey } : {},
  });
}

export function encodeSubscribe(id: string, request: SubscriptionRequest): string {
  return stringifyMessage<MessageType.Subscribe>({
    id,
    type: MessageType.Subscribe,
    payload: {
      query: request.query,
      ...(request.variables && { variables: request.variables }),
      ...(request.operationName ? { operationName: request.operationName } : {}),
    },
  });
}

export function encodeComplete(id: string): string {
  return stringifyMessage<MessageType.Complete>({ id, type: MessageType.Complete });
}

export function encodePing(payload?: Record<string, unknown>): string {
  return stringifyMessage<MessageType.Ping>(
    payload ? { type: MessageType.Ping, payload } : { type: MessageType.Ping }
  );
}

export function encodePong(payload?: Record<string, unknown>): string {
  return stringifyMessage<MessageType.Pong>(
    payload ? { type: MessageType.Pong, payload } : { type: MessageType.Pong }
  );
}

interface ErrorLike {
  message: string;
  path?: ReadonlyArray<string | number>;
  extensions?: Record<string, unknown>;
}

export function toErrorEntries(errors: ReadonlyArray<ErrorLike>): SubscriptionErrorEntry[] {
  return errors.map((error) => ({
    message: error.message,
    ...(error.path && { path: [...error.path] }),
    ...(error.extensions && { extensions: { ...error.extensions } }),
  }));
}
