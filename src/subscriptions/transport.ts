import WebSocket from "ws";
import type { RawData } from "ws";
import { GRAPHQL_TRANSPORT_WS_PROTOCOL } from "graphql-ws";
import { ConnectError, SendError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";

const logger = getLogger("transport");

const TERMINATE_AFTER_MS = 1000;

export type InboundFrame =
  | { kind: "frame"; data: string }
  | { kind: "closed"; code: number; reason: string };

export interface TransportOptions {
  headers: Record<string, string>;
  verifySsl: boolean;
  connectTimeout: number;
}

/**
 * A single socket carrying text frames. `receive` never rejects: once the
 * socket is gone every call resolves with the same `closed` frame.
 */
export interface TransportConnection {
  readonly endpoint: string;
  send(frame: string): void;
  receive(): Promise<InboundFrame>;
  close(code?: number, reason?: string): void;
}

export type TransportOpener = (
  endpoint: string,
  options: TransportOptions
) => Promise<TransportConnection>;

function decodeRawData(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

export class WebSocketTransport implements TransportConnection {
  private inbox: string[] = [];
  private waiters: Array<(frame: InboundFrame) => void> = [];
  private closedFrame: InboundFrame | null = null;
  private terminateTimer: NodeJS.Timeout | null = null;

  private constructor(
    public readonly endpoint: string,
    private readonly socket: WebSocket
  ) {
    socket.on("message", (data: RawData) => {
      this.push({ kind: "frame", data: decodeRawData(data) });
    });

    socket.on("close", (code: number, reason: Buffer) => {
      this.markClosed(code, reason.toString("utf8"));
    });

    socket.on("error", (error: Error) => {
      logger.warn({ endpoint, error: error.message }, "WebSocket error");
    });
  }

  static open(endpoint: string, options: TransportOptions): Promise<WebSocketTransport> {
    return new Promise((resolve, reject) => {
      let socket: WebSocket;
      try {
        socket = new WebSocket(endpoint, GRAPHQL_TRANSPORT_WS_PROTOCOL, {
          headers: options.headers,
          rejectUnauthorized: options.verifySsl,
          handshakeTimeout: options.connectTimeout,
        });
      } catch (error) {
        reject(
          new ConnectError(endpoint, error instanceof Error ? error.message : String(error), error)
        );
        return;
      }

      const onOpen = (): void => {
        cleanup();
        if (socket.protocol !== GRAPHQL_TRANSPORT_WS_PROTOCOL) {
          socket.terminate();
          reject(
            new ConnectError(endpoint, `server selected sub-protocol '${socket.protocol}'`)
          );
          return;
        }
        logger.debug({ endpoint }, "WebSocket opened");
        resolve(new WebSocketTransport(endpoint, socket));
      };

      const onError = (error: Error): void => {
        cleanup();
        socket.terminate();
        reject(new ConnectError(endpoint, error.message, error));
      };

      const onClose = (code: number): void => {
        cleanup();
        reject(new ConnectError(endpoint, `socket closed before opening (code ${code})`));
      };

      const cleanup = (): void => {
        socket.off("open", onOpen);
        socket.off("error", onError);
        socket.off("close", onClose);
      };

      socket.on("open", onOpen);
      socket.on("error", onError);
      socket.on("close", onClose);
    });
  }

  send(frame: string): void {
    if (this.closedFrame || this.socket.readyState !== WebSocket.OPEN) {
      throw new SendError("socket is not open");
    }

    this.socket.send(frame, (error?: Error) => {
      if (error) {
        logger.warn({ endpoint: this.endpoint, error: error.message }, "Frame write failed");
      }
    });
  }

  receive(): Promise<InboundFrame> {
    const queued = this.inbox.shift();
    if (queued !== undefined) {
      return Promise.resolve({ kind: "frame", data: queued });
    }
    if (this.closedFrame) {
      return Promise.resolve(this.closedFrame);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(code = 1000, reason = "Normal Closure"): void {
    if (this.closedFrame) {
      return;
    }

    this.markClosed(code, reason);

    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(code, reason);
      this.terminateTimer = setTimeout(() => {
        this.socket.terminate();
      }, TERMINATE_AFTER_MS);
      this.terminateTimer.unref();
      this.socket.once("close", () => {
        if (this.terminateTimer) {
          clearTimeout(this.terminateTimer);
          this.terminateTimer = null;
        }
      });
    }
  }

  private push(frame: InboundFrame): void {
    if (this.closedFrame) {
      return;
    }
    if (frame.kind === "frame") {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(frame);
      } else {
        this.inbox.push(frame.data);
      }
    }
  }

  private markClosed(code: number, reason: string): void {
    if (this.closedFrame) {
      return;
    }
    this.closedFrame = { kind: "closed", code, reason };
    logger.debug({ endpoint: this.endpoint, code, reason }, "WebSocket closed");

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(this.closedFrame);
    }
  }
}

export const openWebSocketTransport: TransportOpener = (endpoint, options) =>
  WebSocketTransport.open(endpoint, options);
