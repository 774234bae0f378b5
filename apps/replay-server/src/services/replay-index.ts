/**
 * Replay Index
 *
 * Resolves a requested time to the first snapshot at or after it, and re-checks
 * start points handed back by clients before a session streams from them.
 */

import { err, ok, ResultAsync } from "neverthrow";
import type { Result } from "neverthrow";
import { formatPosition, isSamePosition, positionAt } from "@book-replay/core";
import type {
  NotFoundError,
  RawMessageRecord,
  StaleReferenceError,
  StartPoint,
  StoreError,
  StreamPosition,
} from "@book-replay/core";
import type { EventStore, ScanMode } from "@book-replay/repositories";
import { createLogger } from "@book-replay/utils";

const log = createLogger("replay-index");

export class ReplayIndex {
  constructor(private readonly store: EventStore) {}

  /**
   * First snapshot with event_time >= requestedTime, lowest sequence id on ties.
   * `symbol = null` searches every symbol.
   */
  findStartPoint(symbol: string | null, requestedTime: Date): ResultAsync<StartPoint, NotFoundError | StoreError> {
    return new ResultAsync(this.firstSnapshot(symbol, positionAt(requestedTime), { type: "open" })).andThen(
      (record): Result<StartPoint, NotFoundError | StoreError> => {
        if (!record) {
          log.debug("No snapshot at or after requested time", { symbol, requestedTime });
          return err({
            type: "NOT_FOUND",
            message: `No snapshot found at or after ${requestedTime.toISOString()}`,
            symbol,
            requestedTime,
          });
        }
        return ok(toStartPoint(record));
      },
    );
  }

  /**
   * Confirm the snapshot at this exact position still exists
   */
  verifyStartPoint(startPoint: StartPoint): ResultAsync<StartPoint, StaleReferenceError | StoreError> {
    const mode: ScanMode = { type: "bounded", until: startPoint.eventTime };
    return new ResultAsync(this.firstSnapshot(startPoint.symbol, startPoint, mode)).andThen(
      (record): Result<StartPoint, StaleReferenceError | StoreError> => {
        if (!record || !isSamePosition(record, startPoint)) {
          return err({
            type: "STALE_REFERENCE",
            message: `Snapshot ${startPoint.symbol}@${formatPosition(startPoint)} no longer exists`,
            symbol: startPoint.symbol,
            position: { eventTime: startPoint.eventTime, sequenceId: startPoint.sequenceId },
          });
        }
        return ok(startPoint);
      },
    );
  }

  private async firstSnapshot(
    symbol: string | null,
    from: StreamPosition,
    mode: ScanMode,
  ): Promise<Result<RawMessageRecord | null, StoreError>> {
    const scan = this.store.scanRaw(symbol, from, mode, { kinds: ["snapshot"], pageSize: 1 });
    for await (const item of scan) {
      if (item.isErr()) return err(item.error);
      return ok(item.value);
    }
    return ok(null);
  }
}

function toStartPoint(record: RawMessageRecord): StartPoint {
  return { symbol: record.symbol, eventTime: record.eventTime, sequenceId: record.sequenceId };
}
