import { getConfig } from "../config/index.js";
import { UnsupportedOperationError, isMCPError } from "../errors/index.js";
import type { MCPError, SubscriptionErrorEntry } from "../errors/index.js";
import { getLogger, logError } from "../logging/index.js";
import { getSubscriptionManager } from "./manager.js";
import type { SubscriptionManager } from "./manager.js";
import type { StreamSource } from "./sources.js";
import type { SubscriptionEvent, TerminalReason, TerminalSignal } from "./types.js";

const logger = getLogger("resource-bridge");

export type StreamEndReason = "closed" | TerminalReason;

export interface StreamRecord<R> {
  /** Position within the stream; keeps counting across restarts. */
  sequence: number;
  eventSequence: number;
  receivedAt: string;
  data: R;
  errors?: SubscriptionErrorEntry[];
}

export interface StreamEnd {
  kind: "end";
  reason: StreamEndReason;
  error?: MCPError;
}

export type StreamItem<R> = { kind: "record"; record: StreamRecord<R> } | StreamEnd;

export interface StreamOptions {
  /** Resubscribe on `disconnected` instead of ending the stream. */
  autoRestart?: boolean;
  maxBufferedRecords?: number;
}

export interface CollectOptions {
  maxRecords?: number;
  windowMs?: number;
}

export interface CollectResult<R> {
  source: string;
  records: StreamRecord<R>[];
  end: StreamEnd | null;
  droppedRecords: number;
}

/**
 * Consumer-facing handle over one logical live source. Items arrive in
 * order; the stream finishes with exactly one end item, which `next()`
 * keeps returning afterwards.
 */
export class LiveStream<R> implements AsyncIterable<StreamRecord<R>> {
  private queue: StreamRecord<R>[] = [];
  private waiters: Array<(item: StreamItem<R>) => void> = [];
  private ended: StreamEnd | null = null;
  private subscriptionId: string | null = null;
  private subscriptionToken = 0;
  private sequence = 0;
  private dropped = 0;
  private restarts = 0;

  constructor(
    private readonly manager: SubscriptionManager,
    readonly source: StreamSource<R>,
    private readonly options: Required<StreamOptions>
  ) {}

  get isOpen(): boolean {
    return this.ended === null;
  }

  get endReason(): StreamEndReason | null {
    return this.ended?.reason ?? null;
  }

  get droppedRecords(): number {
    return this.dropped;
  }

  get restartCount(): number {
    return this.restarts;
  }

  get currentSubscriptionId(): string | null {
    return this.subscriptionId;
  }

  /** Throws when the subscription is refused outright (bad document, client shut down). */
  start(): void {
    if (this.subscriptionId !== null || this.ended !== null) {
      return;
    }
    this.subscribe();
  }

  next(): Promise<StreamItem<R>> {
    const record = this.queue.shift();
    if (record) {
      return Promise.resolve({ kind: "record", record });
    }
    if (this.ended) {
      return Promise.resolve(this.ended);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Idempotent. Unsubscribes and ends the stream with reason `closed`. */
  close(): void {
    if (this.ended) {
      return;
    }
    this.cancelSubscription();
    this.finish({ kind: "end", reason: "closed" });
    logger.debug({ source: this.source.name }, "Stream closed");
  }

  /**
   * Opens a fresh subscription after the stream ended for any reason but
   * `closed`. If the manager refuses, the stream ends with `unavailable` and
   * the error is rethrown.
   */
  restart(): void {
    if (!this.ended) {
      return;
    }
    if (this.ended.reason === "closed") {
      throw new UnsupportedOperationError("restart", "stream was closed by its reader");
    }

    this.ended = null;
    this.restarts += 1;
    logger.info({ source: this.source.name, restarts: this.restarts }, "Restarting stream");
    try {
      this.subscribe();
    } catch (error) {
      logError(logger, error, "Stream restart refused", { source: this.source.name });
      this.finish({
        kind: "end",
        reason: "unavailable",
        ...(isMCPError(error) && { error }),
      });
      throw error;
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<StreamRecord<R>, void, undefined> {
    try {
      for (;;) {
        const item = await this.next();
        if (item.kind === "end") {
          return;
        }
        yield item.record;
      }
    } finally {
      this.close();
    }
  }

  private subscribe(): void {
    this.subscriptionToken += 1;
    const token = this.subscriptionToken;

    this.subscriptionId = this.manager.subscribe(this.source.request, {
      onEvent: (event) => {
        if (token === this.subscriptionToken) this.handleEvent(event);
      },
      onTerminal: (signal) => {
        if (token === this.subscriptionToken) this.handleTerminal(signal);
      },
    });
  }

  private cancelSubscription(): void {
    this.subscriptionToken += 1;
    if (this.subscriptionId !== null) {
      this.manager.unsubscribe(this.subscriptionId);
      this.subscriptionId = null;
    }
  }

  private handleEvent(event: SubscriptionEvent): void {
    if (event.data === null) {
      logger.debug({ source: this.source.name, errors: event.errors }, "Event without data");
      return;
    }

    const data = this.source.decode(event.data);
    if (data === null) {
      logger.warn({ source: this.source.name }, "Skipping event with unexpected shape");
      return;
    }

    this.sequence += 1;
    const record: StreamRecord<R> = {
      sequence: this.sequence,
      eventSequence: event.sequence,
      receivedAt: event.receivedAt.toISOString(),
      data,
      ...(event.errors && { errors: event.errors }),
    };

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ kind: "record", record });
      return;
    }

    this.queue.push(record);
    if (this.queue.length > this.options.maxBufferedRecords) {
      this.queue.shift();
      this.dropped += 1;
      if (this.dropped === 1 || this.dropped % 100 === 0) {
        logger.warn(
          {
            source: this.source.name,
            dropped: this.dropped,
            maxBufferedRecords: this.options.maxBufferedRecords,
          },
          "Stream buffer full; dropping oldest records"
        );
      }
    }
  }

  private handleTerminal(signal: TerminalSignal): void {
    this.subscriptionId = null;

    if (signal.kind === "disconnected" && this.options.autoRestart) {
      logger.info({ source: this.source.name }, "Connection lost; resubscribing stream");
      this.restarts += 1;
      try {
        this.subscribe();
        return;
      } catch (error) {
        logError(logger, error, "Stream resubscribe refused", { source: this.source.name });
        this.finish({
          kind: "end",
          reason: "unavailable",
          ...(isMCPError(error) && { error }),
        });
        return;
      }
    }

    this.finish(
      signal.kind === "complete"
        ? { kind: "end", reason: "complete" }
        : { kind: "end", reason: signal.kind, error: signal.error }
    );
  }

  private finish(end: StreamEnd): void {
    if (this.ended) {
      return;
    }
    this.ended = end;

    logger.debug({ source: this.source.name, reason: end.reason }, "Stream ended");

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(end);
    }
  }
}

export interface ResourceBridgeConfig {
  maxBufferedRecords: number;
  autoRestart: boolean;
  readWindow: number;
  readMaxRecords: number;
}

/** Turns live sources into streams for resource readers. */
export class ResourceBridge {
  private config: ResourceBridgeConfig;

  constructor(
    private readonly manager: SubscriptionManager = getSubscriptionManager(),
    config?: Partial<ResourceBridgeConfig>
  ) {
    const appConfig = getConfig();
    this.config = {
      maxBufferedRecords: appConfig.streams.maxBufferedRecords,
      autoRestart: appConfig.subscriptions.autoResubscribe,
      readWindow: appConfig.streams.readWindow,
      readMaxRecords: appConfig.streams.readMaxRecords,
      ...config,
    };
  }

  open<R>(source: StreamSource<R>, options: StreamOptions = {}): LiveStream<R> {
    const stream = new LiveStream(this.manager, source, {
      autoRestart: options.autoRestart ?? this.config.autoRestart,
      maxBufferedRecords: options.maxBufferedRecords ?? this.config.maxBufferedRecords,
    });
    stream.start();
    logger.debug({ source: source.name }, "Stream opened");
    return stream;
  }

  close<R>(stream: LiveStream<R>): void {
    stream.close();
  }

  /** Reads until the record cap, the time window or the end of the stream, then closes it. */
  async collect<R>(stream: LiveStream<R>, options: CollectOptions = {}): Promise<CollectResult<R>> {
    const maxRecords = options.maxRecords ?? this.config.readMaxRecords;
    const windowMs = options.windowMs ?? this.config.readWindow;
    const deadline = Date.now() + windowMs;

    const records: StreamRecord<R>[] = [];
    let end: StreamEnd | null = null;

    try {
      while (records.length < maxRecords) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) break;

        const item = await nextWithin(stream, remaining);
        if (item === null) break;
        if (item.kind === "end") {
          end = item;
          break;
        }
        records.push(item.record);
      }
    } finally {
      stream.close();
    }

    return {
      source: stream.source.name,
      records,
      end,
      droppedRecords: stream.droppedRecords,
    };
  }

  async read<R>(source: StreamSource<R>, options: CollectOptions = {}): Promise<CollectResult<R>> {
    return this.collect(this.open(source, { autoRestart: false }), options);
  }
}

async function nextWithin<R>(stream: LiveStream<R>, ms: number): Promise<StreamItem<R> | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms);
  });

  try {
    return await Promise.race([stream.next(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

let bridgeInstance: ResourceBridge | null = null;

export function getResourceBridge(): ResourceBridge {
  if (bridgeInstance === null) {
    bridgeInstance = new ResourceBridge();
  }
  return bridgeInstance;
}

export function resetResourceBridge(): void {
  bridgeInstance = null;
}
