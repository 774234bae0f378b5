/**
 * Replay Session Endpoint
 *
 * - prepare: resolve a requested time to a start point, no state kept
 * - attach: verify a start point (or resolve one by symbol and time) and bind an
 *   independent controller to a sink
 * - tracks active sessions so shutdown can cancel them
 */

import { v4 as uuidv4 } from "uuid";
import type { ResultAsync } from "neverthrow";
import { formatPosition } from "@book-replay/core";
import type { NotFoundError, StartPoint, StoreError } from "@book-replay/core";
import type { EventStore } from "@book-replay/repositories";
import { createLogger } from "@book-replay/utils";

import type {
  AttachError,
  PreparedReplay,
  ReplayOutcome,
  ReplaySession,
  ReplaySink,
  ReplayStreamOptions,
  StartPointReference,
} from "../types";
import type { ReplayIndex } from "./replay-index";
import { ReplayStreamController } from "./replay-stream-controller";

const log = createLogger("replay-session");

export const PREPARED_MESSAGE = "Replay prepared. Connect via WebSocket to start.";

interface TrackedSession {
  session: ReplaySession;
  running: Promise<ReplayOutcome> | null;
}

export class ReplaySessionEndpoint {
  private readonly sessions = new Map<string, TrackedSession>();

  constructor(
    private readonly store: EventStore,
    private readonly index: ReplayIndex,
    private readonly defaults: ReplayStreamOptions = {},
    private readonly createId: () => string = () => uuidv4(),
  ) {}

  prepare(requestedTime: Date, symbol?: string): ResultAsync<PreparedReplay, NotFoundError | StoreError> {
    return this.index.findStartPoint(symbol ?? null, requestedTime).map((startPoint): PreparedReplay => {
      log.info("Replay prepared", {
        symbol: startPoint.symbol,
        requestedDate: requestedTime.toISOString(),
        start: formatPosition(startPoint),
      });
      return {
        status: "ready",
        replayStartTimestamp: startPoint.eventTime.toISOString(),
        requestedDate: requestedTime.toISOString(),
        message: PREPARED_MESSAGE,
        symbol: startPoint.symbol,
        sequenceId: startPoint.sequenceId,
        startPoint,
      };
    });
  }

  attach(
    reference: StartPointReference,
    sink: ReplaySink,
    options: ReplayStreamOptions = {},
  ): ResultAsync<ReplaySession, AttachError> {
    const resolved =
      reference.sequenceId === null
        ? this.index.findStartPoint(reference.symbol, reference.eventTime)
        : this.index.verifyStartPoint({
            symbol: reference.symbol,
            eventTime: reference.eventTime,
            sequenceId: reference.sequenceId,
          });

    return resolved.map(startPoint => this.open(startPoint, sink, options));
  }

  activeSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Cancel every session and wait for the running ones to stop
   */
  async closeAll(): Promise<void> {
    const pending: Promise<ReplayOutcome>[] = [];
    for (const tracked of [...this.sessions.values()]) {
      tracked.session.cancel();
      if (tracked.running) pending.push(tracked.running);
    }
    await Promise.all(pending);
    log.info("All replay sessions closed", { count: pending.length });
  }

  private open(startPoint: StartPoint, sink: ReplaySink, options: ReplayStreamOptions): ReplaySession {
    const id = this.createId();
    const controller = new ReplayStreamController(this.store, startPoint, sink, { ...this.defaults, ...options });

    const tracked: TrackedSession = {
      running: null,
      session: {
        id,
        startPoint,
        run: () => {
          tracked.running ??= controller.run().finally(() => this.release(id));
          return tracked.running;
        },
        cancel: () => {
          controller.cancel();
          if (!tracked.running) this.release(id);
        },
        state: () => controller.state,
      },
    };

    this.sessions.set(id, tracked);
    log.info("Replay session attached", { id, symbol: startPoint.symbol, start: formatPosition(startPoint) });
    return tracked.session;
  }

  private release(id: string): void {
    if (this.sessions.delete(id)) {
      log.debug("Replay session released", { id, active: this.sessions.size });
    }
  }
}
