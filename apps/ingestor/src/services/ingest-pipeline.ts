/**
 * Ingest Pipeline
 *
 * - Classifies feed messages and assigns event_time at arrival
 * - One bounded queue and one drain loop per symbol (drop-oldest on overflow)
 * - Raw append first, then the level upsert for that message
 * - Transient store errors retried with capped exponential backoff, permanent ones dropped
 *
 * `ingest()` never blocks and never throws; store failures stay inside the pipeline.
 */

import type { Result, ResultAsync } from "neverthrow";
import { classifyFeedMessage, DEFAULT_BOOK_CHANNELS, EventTimeAssigner, toBookLevelRecords } from "@book-replay/core";
import type { ClassifiedMessage, FeedMessage, StoreError } from "@book-replay/core";
import type { EventStore } from "@book-replay/repositories";
import { BoundedQueue, createLogger, getRetryDelayMs, sleep } from "@book-replay/utils";

import { emptyCounters } from "../types";
import type { IngestCounterName, IngestCounters, IngestMetrics, SymbolIngestMetrics } from "../types";

const log = createLogger("ingest");

export interface IngestPipelineOptions {
  /** Pending messages per symbol before the oldest is dropped */
  maxQueueSize: number;
  /** Attempts per store call on transient errors (1 = no retry) */
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  bookChannels?: readonly string[];
  /** Ingest wall clock */
  now?: () => Date;
  /** Jitter source */
  random?: () => number;
}

interface PendingWrite {
  classified: ClassifiedMessage;
  eventTime: Date;
  receivedTime: Date;
}

interface Lane {
  symbol: string;
  queue: BoundedQueue<PendingWrite>;
  draining: Promise<void> | null;
}

export class IngestPipeline {
  private readonly lanes = new Map<string, Lane>();
  private readonly eventTimes = new EventTimeAssigner();
  private readonly totals: IngestCounters = emptyCounters();
  private readonly bySymbol = new Map<string, IngestCounters>();
  private readonly bookChannels: readonly string[];
  private readonly now: () => Date;
  private readonly random: () => number;
  private accepting = true;

  constructor(
    private readonly store: EventStore,
    private readonly options: IngestPipelineOptions,
  ) {
    this.bookChannels = options.bookChannels ?? DEFAULT_BOOK_CHANNELS;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  /**
   * Accept one feed message. Returns immediately; persistence happens on the symbol's drain loop.
   *
   * @param receivedAt - arrival time when the feed recorded it, defaults to now
   */
  ingest(message: FeedMessage, receivedAt?: Date): void {
    if (!this.accepting) {
      log.debug("Pipeline stopped; message ignored", { symbol: message.symbol });
      return;
    }

    const receivedTime = receivedAt ?? this.now();
    const rawSymbol = message.symbol.trim();
    this.count(rawSymbol, "received");

    const classified = classifyFeedMessage(message, this.bookChannels);
    if (classified.isErr()) {
      this.count(rawSymbol, "malformed");
      log.warn("Malformed feed message skipped", {
        reason: classified.error.reason,
        error: classified.error.message,
        channel: message.channel,
        symbol: rawSymbol,
      });
      return;
    }

    const { symbol } = classified.value;
    const assigned = this.eventTimes.assign(symbol, classified.value.embeddedTime, receivedTime);
    if (assigned.clamped) {
      this.count(symbol, "clockClamped");
    }

    const lane = this.laneFor(symbol);
    const pushed = lane.queue.push({ classified: classified.value, eventTime: assigned.eventTime, receivedTime });
    if (pushed.dropped) {
      this.count(symbol, "overflowDropped");
      log.warn("Ingest queue full; dropped oldest message", {
        symbol,
        capacity: lane.queue.maxSize,
        droppedEventTime: pushed.evicted.eventTime,
      });
    }

    this.scheduleDrain(lane);
  }

  /**
   * Resolves once every queue is empty and no write is in flight
   */
  async drain(): Promise<void> {
    for (;;) {
      const pending = [...this.lanes.values()]
        .map(lane => lane.draining)
        .filter((draining): draining is Promise<void> => draining !== null);
      if (pending.length === 0) return;
      await Promise.all(pending);
    }
  }

  /**
   * Stop accepting messages and wait for the queued ones to be written
   */
  async stop(): Promise<void> {
    this.accepting = false;
    await this.drain();
    log.info("Ingest pipeline stopped", { ...this.totals });
  }

  getMetrics(): IngestMetrics {
    const bySymbol: Record<string, SymbolIngestMetrics> = {};
    let queued = 0;

    for (const [symbol, counters] of this.bySymbol) {
      const symbolQueued = this.lanes.get(symbol)?.queue.size ?? 0;
      queued += symbolQueued;
      bySymbol[symbol] = { ...counters, queued: symbolQueued };
    }

    return { ...this.totals, queued, bySymbol };
  }

  // ============================================================================
  // Drain Loop
  // ============================================================================

  private laneFor(symbol: string): Lane {
    let lane = this.lanes.get(symbol);
    if (!lane) {
      lane = { symbol, queue: new BoundedQueue<PendingWrite>(this.options.maxQueueSize), draining: null };
      this.lanes.set(symbol, lane);
    }
    return lane;
  }

  private scheduleDrain(lane: Lane): void {
    if (lane.draining) return;
    lane.draining = this.drainLane(lane);
  }

  private async drainLane(lane: Lane): Promise<void> {
    try {
      for (let item = lane.queue.shift(); item !== undefined; item = lane.queue.shift()) {
        await this.write(lane.symbol, item);
      }
    } catch (error) {
      log.error("Drain loop failed", { symbol: lane.symbol, error });
    } finally {
      lane.draining = null;
    }
  }

  private async write(symbol: string, item: PendingWrite): Promise<void> {
    const { classified } = item;

    const ack = await this.withRetry(symbol, "append", () =>
      this.store.append({
        eventTime: item.eventTime,
        receivedTime: item.receivedTime,
        channel: classified.channel,
        symbol,
        messageKind: classified.kind,
        checksum: classified.checksum,
        payload: classified.payloadText,
      }),
    );
    if (ack.isErr()) return;

    this.count(symbol, "written");
    if (classified.levels.length === 0) return;

    const levels = toBookLevelRecords(
      { eventTime: ack.value.eventTime, symbol, messageKind: classified.kind, checksum: classified.checksum },
      classified.levels,
    );
    const upserted = await this.withRetry(symbol, "upsertLevels", () => this.store.upsertLevels(levels));
    if (upserted.isOk()) {
      this.count(symbol, "levelsWritten", levels.length);
    }
  }

  private async withRetry<T>(
    symbol: string,
    operation: string,
    task: () => ResultAsync<T, StoreError>,
  ): Promise<Result<T, StoreError>> {
    for (let attempt = 1; ; attempt++) {
      const result = await task();
      if (result.isOk()) return result;

      const error = result.error;
      if (error.type === "PERMANENT_STORE_ERROR") {
        this.count(symbol, "permanentFailures");
        log.error("Store write failed permanently; message dropped", { symbol, operation, error: error.message });
        return result;
      }

      if (attempt >= this.options.maxAttempts) {
        this.count(symbol, "retriesExhausted");
        log.error("Store write retries exhausted; message dropped", {
          symbol,
          operation,
          attempts: attempt,
          error: error.message,
        });
        return result;
      }

      this.count(symbol, "transientRetries");
      const delayMs = getRetryDelayMs(
        attempt,
        { baseDelayMs: this.options.retryBaseDelayMs, maxDelayMs: this.options.retryMaxDelayMs },
        this.random,
      );
      log.warn("Store write failed; retrying", { symbol, operation, attempt, delayMs, error: error.message });
      await sleep(delayMs);
    }
  }

  private count(symbol: string, name: IngestCounterName, amount = 1): void {
    this.totals[name] += amount;
    if (symbol === "") return;

    let counters = this.bySymbol.get(symbol);
    if (!counters) {
      counters = emptyCounters();
      this.bySymbol.set(symbol, counters);
    }
    counters[name] += amount;
  }
}
