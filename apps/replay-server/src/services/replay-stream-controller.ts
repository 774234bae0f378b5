/**
 * Replay Stream Controller
 *
 * One per session: idle -> streaming -> stopped.
 * Emits stored payloads verbatim from the start snapshot up to and including the
 * next snapshot of the same symbol, awaiting the sink for every message.
 */

import { formatPosition, isSamePosition } from "@book-replay/core";
import type { RawMessageRecord, StaleReferenceError, StartPoint } from "@book-replay/core";
import type { EventStore } from "@book-replay/repositories";
import { createLogger, sleep } from "@book-replay/utils";

import type { ReplayOutcome, ReplayPacing, ReplaySink, ReplayState, ReplayStreamOptions } from "../types";

const log = createLogger("replay-stream");

export const DEFAULT_MAX_PACING_DELAY_MS = 60_000;

type Delivery = { type: "sent" } | { type: "failed"; error: unknown } | { type: "cancelled" };

export class ReplayStreamController {
  private currentState: ReplayState = "idle";
  private running: Promise<ReplayOutcome> | null = null;
  private readonly abort = new AbortController();
  private readonly pacing: ReplayPacing;
  private readonly maxDelayMs: number;

  constructor(
    private readonly store: EventStore,
    readonly startPoint: StartPoint,
    private readonly sink: ReplaySink,
    private readonly options: ReplayStreamOptions = {},
  ) {
    this.pacing = options.pacing ?? "asap";
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_PACING_DELAY_MS;
  }

  get state(): ReplayState {
    return this.currentState;
  }

  run(): Promise<ReplayOutcome> {
    this.running ??= this.stream();
    return this.running;
  }

  /**
   * Stop at the next suspension point. A pending pacing delay or send ends immediately.
   */
  cancel(): void {
    this.abort.abort();
    if (this.currentState === "idle") {
      this.currentState = "stopped";
    }
  }

  private async stream(): Promise<ReplayOutcome> {
    const { signal } = this.abort;
    if (signal.aborted) return this.finish({ reason: "cancelled", emitted: 0 });

    this.currentState = "streaming";
    log.debug("Replay started", { symbol: this.startPoint.symbol, from: formatPosition(this.startPoint) });

    let emitted = 0;
    let previous: RawMessageRecord | null = null;

    const scan = this.store.scanRaw(this.startPoint.symbol, this.startPoint, { type: "open" }, {
      pageSize: this.options.pageSize,
    });

    for await (const item of scan) {
      if (signal.aborted) return this.finish({ reason: "cancelled", emitted });
      if (item.isErr()) return this.finish({ reason: "store_error", emitted, error: item.error });

      const record = item.value;
      if (previous === null) {
        if (record.messageKind !== "snapshot" || !isSamePosition(record, this.startPoint)) {
          return this.finish({ reason: "stale_reference", emitted, error: this.staleReference() });
        }
      } else if (this.pacing === "realtime") {
        await this.pace(previous, record, signal);
        if (signal.aborted) return this.finish({ reason: "cancelled", emitted });
      }

      if (!this.sink.isOpen()) return this.finish({ reason: "sink_closed", emitted });
      const delivery = await this.deliver(record.payload, signal);
      if (delivery.type === "cancelled") return this.finish({ reason: "cancelled", emitted });
      if (delivery.type === "failed") {
        log.debug("Sink rejected message", { symbol: record.symbol, error: delivery.error });
        return this.finish({ reason: "sink_closed", emitted });
      }
      emitted++;

      if (previous !== null && record.messageKind === "snapshot") {
        return this.finish({ reason: "snapshot_boundary", emitted });
      }
      previous = record;
    }

    if (signal.aborted) return this.finish({ reason: "cancelled", emitted });
    if (previous === null) {
      return this.finish({ reason: "stale_reference", emitted, error: this.staleReference() });
    }
    return this.finish({ reason: "exhausted", emitted });
  }

  private async pace(previous: RawMessageRecord, next: RawMessageRecord, signal: AbortSignal): Promise<void> {
    const gapMs = next.eventTime.getTime() - previous.eventTime.getTime();
    await sleep(Math.min(gapMs, this.maxDelayMs), signal);
  }

  /**
   * Send one payload, giving up as soon as the session is cancelled.
   * A send left pending by a cancel settles into nothing.
   */
  private async deliver(payload: string, signal: AbortSignal): Promise<Delivery> {
    if (signal.aborted) return { type: "cancelled" };

    const sending = this.sink.send(payload).then(
      (): Delivery => ({ type: "sent" }),
      (error: unknown): Delivery => ({ type: "failed", error }),
    );
    let onAbort = (): void => undefined;
    const cancelled = new Promise<Delivery>(resolve => {
      onAbort = () => resolve({ type: "cancelled" });
      signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      return await Promise.race([sending, cancelled]);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private staleReference(): StaleReferenceError {
    return {
      type: "STALE_REFERENCE",
      message: `Snapshot ${this.startPoint.symbol}@${formatPosition(this.startPoint)} no longer exists`,
      symbol: this.startPoint.symbol,
      position: { eventTime: this.startPoint.eventTime, sequenceId: this.startPoint.sequenceId },
    };
  }

  private finish(outcome: ReplayOutcome): ReplayOutcome {
    this.currentState = "stopped";
    const fields = {
      symbol: this.startPoint.symbol,
      from: formatPosition(this.startPoint),
      reason: outcome.reason,
      emitted: outcome.emitted,
    };
    if (outcome.error) {
      log.warn("Replay stopped", { ...fields, error: outcome.error.message });
    } else {
      log.debug("Replay stopped", fields);
    }
    return outcome;
  }
}
