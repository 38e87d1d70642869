import { EventEmitter } from "node:events";
import { CloseCode, MessageType } from "graphql-ws";
import { getConfig } from "../config/index.js";
import {
  DisconnectedError,
  HandshakeRejectedError,
  HandshakeTimeoutError,
  SendError,
  SubscriptionUnavailableError,
  isMCPError,
} from "../errors/index.js";
import { assertSubscriptionDocument } from "../graphql/documents.js";
import { getLogger, logError } from "../logging/index.js";
import { computeBackoff, sleep as defaultSleep } from "./backoff.js";
import { MessageDispatcher } from "./dispatcher.js";
import {
  decodeFrame,
  encodeComplete,
  encodeConnectionInit,
  encodePing,
  encodePong,
  encodeSubscribe,
} from "./protocol.js";
import type { ProtocolMessage } from "./protocol.js";
import { SubscriptionRegistry } from "./registry.js";
import type { SubscriptionEntry } from "./registry.js";
import { openWebSocketTransport } from "./transport.js";
import type { TransportConnection, TransportOpener } from "./transport.js";
import type {
  ConnectionState,
  ConnectionStatus,
  SubscribeOptions,
  SubscriptionConsumer,
  SubscriptionRequest,
} from "./types.js";

const logger = getLogger("subscription-manager");

export interface SubscriptionManagerConfig {
  endpoint: string | undefined;
  apiKey: string | undefined;
  verifySsl: boolean;
  userAgent: string;
  connectTimeout: number;
  ackTimeout: number;
  keepAliveInterval: number;
  maxMissedKeepAlives: number;
  backoffBase: number;
  backoffMax: number;
  backoffJitter: number;
  maxRetries: number;
}

export interface SubscriptionManagerDeps {
  opener: TransportOpener;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
  generateId?: () => string;
}

/**
 * Owns the single subscription socket: connection state machine, handshake,
 * keep-alive, reconnect with backoff, and every registry mutation.
 *
 * Subscriptions never survive a change of connection generation. When the
 * socket is lost each active subscription receives one `disconnected`
 * signal and its owner decides whether to subscribe again.
 */
export class SubscriptionManager extends EventEmitter {
  private config: SubscriptionManagerConfig;
  private deps: SubscriptionManagerDeps;
  private registry: SubscriptionRegistry;
  private dispatcher: MessageDispatcher;

  private state: ConnectionState = "disconnected";
  private transport: TransportConnection | null = null;
  private generation = 0;
  private retryCount = 0;
  private lastActivity: number | null = null;
  private connectedSince: Date | null = null;
  private lastError: string | null = null;
  private connectCycleRunning = false;
  private keepAliveTimer: NodeJS.Timeout | null = null;
  private missedKeepAlives = 0;
  private shuttingDown = false;

  constructor(
    config?: Partial<SubscriptionManagerConfig>,
    deps?: Partial<SubscriptionManagerDeps>
  ) {
    super();
    const appConfig = getConfig();

    this.config = {
      endpoint: appConfig.unraid.wsUrl,
      apiKey: appConfig.unraid.apiKey,
      verifySsl: appConfig.unraid.verifySsl,
      userAgent: `UnraidMCPServer/${appConfig.version}`,
      connectTimeout: appConfig.subscriptions.connectTimeout,
      ackTimeout: appConfig.subscriptions.ackTimeout,
      keepAliveInterval: appConfig.subscriptions.keepAliveInterval,
      maxMissedKeepAlives: appConfig.subscriptions.maxMissedKeepAlives,
      backoffBase: appConfig.subscriptions.backoffBase,
      backoffMax: appConfig.subscriptions.backoffMax,
      backoffJitter: appConfig.subscriptions.backoffJitter,
      maxRetries: appConfig.subscriptions.maxRetries,
      ...config,
    };

    this.deps = {
      opener: openWebSocketTransport,
      sleep: defaultSleep,
      random: Math.random,
      ...deps,
    };

    this.registry = new SubscriptionRegistry(this.deps.generateId);
    this.dispatcher = new MessageDispatcher(this.registry, {
      onConnectionAck: () => {
        logger.debug({ generation: this.generation }, "Ignoring connection_ack outside handshake");
      },
      onPing: (payload) => {
        this.sendQuietly(encodePong(payload));
      },
      onPong: () => {
        logger.trace({ generation: this.generation }, "Pong received");
      },
    });
  }

  getState(): ConnectionState {
    return this.state;
  }

  getGeneration(): number {
    return this.generation;
  }

  /**
   * Registers a subscription and returns its id. The subscribe frame goes
   * out at once when the connection is ready; otherwise the entry is queued
   * and a connect cycle is started.
   */
  subscribe(
    request: SubscriptionRequest,
    consumer: SubscriptionConsumer,
    options: SubscribeOptions = {}
  ): string {
    if (this.shuttingDown) {
      throw new SubscriptionUnavailableError("subscription client has been shut down");
    }

    assertSubscriptionDocument(request.query);

    const waitForReady = options.waitForReady ?? true;
    if (!waitForReady && this.state !== "ready") {
      throw new SubscriptionUnavailableError(
        `connection is ${this.state}`,
        this.retryCount,
        this.lastError ?? undefined
      );
    }

    const entry = this.registry.add(request, consumer);

    if (this.state === "ready") {
      this.sendSubscribe(entry);
    } else {
      logger.debug(
        { subscriptionId: entry.id, state: this.state },
        "Subscription queued until connection is ready"
      );
      this.ensureConnected();
    }

    return entry.id;
  }

  /** Idempotent. The consumer receives no signal for its own unsubscribe. */
  unsubscribe(id: string): void {
    const entry = this.registry.get(id);
    if (!entry) {
      return;
    }

    if (entry.status === "active" && entry.generation === this.generation) {
      this.sendQuietly(encodeComplete(id));
    }
    this.registry.remove(id);

    logger.debug({ subscriptionId: id }, "Subscription removed");
  }

  hasSubscription(id: string): boolean {
    return this.registry.has(id);
  }

  getStatus(): ConnectionStatus {
    return {
      state: this.state,
      endpoint: this.config.endpoint,
      generation: this.generation,
      retryCount: this.retryCount,
      lastActivity: this.lastActivity !== null ? new Date(this.lastActivity).toISOString() : null,
      connectedSince: this.connectedSince?.toISOString() ?? null,
      lastError: this.lastError,
      subscriptions: this.registry.counts(),
    };
  }

  /** Starts a connect cycle unless one is running or the link is up. */
  ensureConnected(): void {
    if (this.shuttingDown || this.connectCycleRunning || this.state === "ready") {
      return;
    }

    this.connectCycleRunning = true;
    void this.runConnectCycle().catch((error: unknown) => {
      this.connectCycleRunning = false;
      logError(logger, error, "Connect cycle failed unexpectedly");
    });
  }

  async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    logger.info({ generation: this.generation }, "Shutting down subscription manager");

    this.stopKeepAlive();

    const transport = this.transport;
    this.transport = null;

    if (transport) {
      for (const entry of this.registry.activeEntries()) {
        try {
          transport.send(encodeComplete(entry.id));
        } catch (error) {
          logger.debug(
            { subscriptionId: entry.id, error: error instanceof Error ? error.message : String(error) },
            "Could not send complete during shutdown"
          );
        }
      }
    }

    const error = new DisconnectedError(this.generation, "subscription client shut down");
    this.registry.terminateAll({ kind: "disconnected", error });

    transport?.close(1000, "Normal Closure");
    this.connectedSince = null;
    this.setState("disconnected");
    this.removeAllListeners();
  }

  private async runConnectCycle(): Promise<void> {
    const { endpoint, maxRetries } = this.config;

    try {
      if (!endpoint) {
        this.failCycle(
          new SubscriptionUnavailableError(
            "no WebSocket endpoint configured (set UNRAID_API_URL or UNRAID_WS_URL)"
          )
        );
        return;
      }

      const totalAttempts = maxRetries + 1;
      for (let attempt = 1; attempt <= totalAttempts; attempt++) {
        if (this.shuttingDown) return;

        this.retryCount = attempt - 1;
        this.setState("connecting");

        let transport: TransportConnection | null = null;
        try {
          transport = await this.deps.opener(endpoint, {
            headers: {
              "X-API-Key": this.config.apiKey ?? "",
              "User-Agent": this.config.userAgent,
            },
            verifySsl: this.config.verifySsl,
            connectTimeout: this.config.connectTimeout,
          });

          if (this.shuttingDown) {
            transport.close(1000, "Normal Closure");
            return;
          }

          this.setState("handshaking");
          await this.handshake(transport);

          if (this.shuttingDown) {
            transport.close(1000, "Normal Closure");
            return;
          }

          this.connectCycleRunning = false;
          this.becomeReady(transport);
          return;
        } catch (error) {
          transport?.close(1000, "Handshake failed");
          this.lastError = error instanceof Error ? error.message : String(error);

          logger.warn(
            {
              attempt,
              maxAttempts: totalAttempts,
              endpoint,
              errorType: isMCPError(error) ? error.name : "Error",
              error: this.lastError,
            },
            "Subscription connection attempt failed"
          );

          if (attempt < totalAttempts) {
            const delay = computeBackoff(
              attempt,
              {
                base: this.config.backoffBase,
                max: this.config.backoffMax,
                jitter: this.config.backoffJitter,
              },
              this.deps.random
            );
            logger.info({ attempt, delay }, "Waiting before reconnect");
            await this.deps.sleep(delay);
          }
        }
      }

      this.retryCount = totalAttempts;
      this.failCycle(
        new SubscriptionUnavailableError(
          `connection failed after ${totalAttempts} attempts`,
          totalAttempts,
          this.lastError ?? undefined
        )
      );
    } finally {
      this.connectCycleRunning = false;
    }
  }

  private failCycle(error: SubscriptionUnavailableError): void {
    if (this.shuttingDown) return;

    this.lastError = error.message;
    this.setState("disconnected");

    const failed = this.registry.terminatePending({ kind: "unavailable", error });
    logger.error(
      { endpoint: this.config.endpoint, failedSubscriptions: failed.length, error: error.message },
      "Subscription connection unavailable"
    );
    this.emit("unavailable", error);
  }

  private async handshake(transport: TransportConnection): Promise<void> {
    transport.send(encodeConnectionInit(this.config.apiKey));

    const { ackTimeout } = this.config;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), ackTimeout);
    });

    try {
      for (;;) {
        const inbound = await Promise.race([transport.receive(), timeout]);

        if (inbound === "timeout") {
          transport.close(CloseCode.ConnectionAcknowledgementTimeout, "Connection acknowledgement timeout");
          throw new HandshakeTimeoutError(ackTimeout);
        }

        if (inbound.kind === "closed") {
          throw new HandshakeRejectedError(
            inbound.reason || `socket closed with code ${inbound.code}`,
            inbound.code
          );
        }

        let message: ProtocolMessage;
        try {
          message = decodeFrame(inbound.data);
        } catch (error) {
          throw new HandshakeRejectedError(
            `malformed frame: ${error instanceof Error ? error.message : String(error)}`
          );
        }

        this.lastActivity = Date.now();

        if (message.type === MessageType.ConnectionAck) {
          return;
        }
        if (message.type === MessageType.Ping) {
          transport.send(encodePong(message.payload));
          continue;
        }
        if (message.type === MessageType.Pong) {
          continue;
        }

        transport.close(CloseCode.BadResponse, "Unexpected frame before connection_ack");
        throw new HandshakeRejectedError(`unexpected '${message.type}' before connection_ack`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private becomeReady(transport: TransportConnection): void {
    this.generation += 1;
    const generation = this.generation;

    this.transport = transport;
    this.connectedSince = new Date();
    this.lastActivity = Date.now();
    this.lastError = null;
    this.retryCount = 0;
    this.missedKeepAlives = 0;

    this.setState("ready");
    logger.info({ endpoint: this.config.endpoint, generation }, "Subscription connection ready");

    this.startKeepAlive(generation);
    void this.receiveLoop(generation, transport).catch((error: unknown) => {
      logError(logger, error, "Receive loop failed", { generation });
      this.handleConnectionLost(generation, "receive loop failed");
    });

    this.flushPending();
  }

  private async receiveLoop(generation: number, transport: TransportConnection): Promise<void> {
    for (;;) {
      const inbound = await transport.receive();

      if (this.isStale(generation, transport)) {
        return;
      }

      if (inbound.kind === "closed") {
        this.handleConnectionLost(
          generation,
          inbound.reason || `socket closed with code ${inbound.code}`,
          inbound.code
        );
        return;
      }

      this.lastActivity = Date.now();
      this.missedKeepAlives = 0;
      this.dispatcher.dispatch(inbound.data);
    }
  }

  private isStale(generation: number, transport: TransportConnection): boolean {
    return this.generation !== generation || this.transport !== transport;
  }

  /**
   * Degraded transition: ends every subscription sent on the lost
   * generation, then reconnects. Queued subscriptions stay queued.
   */
  private handleConnectionLost(generation: number, reason: string, closeCode?: number): void {
    const transport = this.transport;
    if (generation !== this.generation || transport === null || this.shuttingDown) {
      return;
    }

    this.transport = null;
    this.stopKeepAlive();
    this.connectedSince = null;
    this.lastError = reason;
    this.setState("degraded");

    transport.close(1000, "Connection lost");

    const error = new DisconnectedError(generation, reason, closeCode);
    const invalidated = this.registry.invalidateGeneration(generation, {
      kind: "disconnected",
      error,
    });

    logger.warn(
      { generation, reason, closeCode, invalidatedSubscriptions: invalidated.length },
      "Subscription connection lost"
    );
    this.emit("disconnected", error, invalidated.length);

    this.ensureConnected();
  }

  private startKeepAlive(generation: number): void {
    this.stopKeepAlive();
    this.keepAliveTimer = setInterval(() => {
      this.checkKeepAlive(generation);
    }, this.config.keepAliveInterval);
    this.keepAliveTimer.unref();
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer !== null) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  private checkKeepAlive(generation: number): void {
    if (generation !== this.generation || this.transport === null) {
      return;
    }

    const idle = Date.now() - (this.lastActivity ?? 0);
    if (idle < this.config.keepAliveInterval) {
      return;
    }

    this.missedKeepAlives += 1;
    if (this.missedKeepAlives >= this.config.maxMissedKeepAlives) {
      logger.warn(
        { generation, missedKeepAlives: this.missedKeepAlives, idleMs: idle },
        "Keep-alive window missed"
      );
      this.handleConnectionLost(
        generation,
        `no activity for ${this.missedKeepAlives} keep-alive intervals`
      );
      return;
    }

    this.sendQuietly(encodePing());
  }

  private flushPending(): void {
    const pending = this.registry.pendingEntries();
    if (pending.length > 0) {
      logger.info({ count: pending.length }, "Flushing queued subscriptions");
    }
    for (const entry of pending) {
      if (this.state !== "ready" || !this.sendSubscribe(entry)) {
        break;
      }
    }
  }

  /** Leaves the entry pending when the write fails; loss is detected by the receive loop. */
  private sendSubscribe(entry: SubscriptionEntry): boolean {
    const transport = this.transport;
    if (!transport) {
      return false;
    }

    try {
      transport.send(encodeSubscribe(entry.id, entry.request));
    } catch (error) {
      if (error instanceof SendError) {
        logger.warn({ subscriptionId: entry.id }, "Subscribe frame not sent; keeping it queued");
        return false;
      }
      throw error;
    }

    this.registry.markActive(entry.id, this.generation);
    logger.debug({ subscriptionId: entry.id, generation: this.generation }, "Subscription sent");
    return true;
  }

  private sendQuietly(frame: string): void {
    const transport = this.transport;
    if (!transport) {
      return;
    }
    try {
      transport.send(frame);
    } catch (error) {
      if (!(error instanceof SendError)) {
        throw error;
      }
      logger.debug({ error: error.message }, "Frame dropped; socket not open");
    }
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) {
      return;
    }
    const from = this.state;
    this.state = next;
    logger.debug({ from, to: next, generation: this.generation }, "Connection state changed");
    this.emit("stateChange", { from, to: next, generation: this.generation });
  }
}

let managerInstance: SubscriptionManager | null = null;

export function getSubscriptionManager(): SubscriptionManager {
  if (managerInstance === null) {
    managerInstance = new SubscriptionManager();
  }
  return managerInstance;
}

export async function resetSubscriptionManager(): Promise<void> {
  if (managerInstance !== null) {
    await managerInstance.shutdown();
    managerInstance = null;
  }
}
