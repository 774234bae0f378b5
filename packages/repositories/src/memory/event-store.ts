/**
 * In-memory Event Store
 *
 * Same ordering and upsert semantics as the Postgres store, kept in process memory.
 * Used by tests.
 */

import { errAsync, okAsync } from "neverthrow";
import type { ResultAsync } from "neverthrow";
import { comparePositions, levelKey } from "@book-replay/core";
import type {
  AppendAck,
  BookLevelRecord,
  NewRawMessage,
  RawMessageRecord,
  StoreError,
  StreamPosition,
} from "@book-replay/core";

import { DEFAULT_SCAN_PAGE_SIZE } from "../interfaces/event-store";
import type { EventStore, ScanMode, ScanOptions } from "../interfaces/event-store";
import { prepareLevels } from "../levels";
import { paginateScan } from "../scan";
import type { PageCursor } from "../scan";

export interface InMemoryEventStore extends EventStore {
  /** Stored raw records in (event_time, sequence_id) order, optionally for one symbol */
  rawRecords(symbol?: string): RawMessageRecord[];
  /** Stored levels in insertion order of their keys */
  levelRecords(symbol?: string): BookLevelRecord[];
  /** Administrative reset: truncate both tables */
  clear(): void;
}

export function createInMemoryEventStore(): InMemoryEventStore {
  const raw: RawMessageRecord[] = [];
  const levels = new Map<string, BookLevelRecord>();
  let nextSequenceId = 1;

  /** First index whose position is >= (or > when exclusive) the cursor */
  const lowerBound = (position: StreamPosition, inclusive: boolean): number => {
    let lo = 0;
    let hi = raw.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const record = raw[mid];
      const cmp = record ? comparePositions(record, position) : 1;
      if (cmp < 0 || (!inclusive && cmp === 0)) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  };

  const fetchPage = (
    symbol: string | null,
    cursor: PageCursor,
    mode: ScanMode,
    options: ScanOptions,
    limit: number,
  ): ResultAsync<RawMessageRecord[], StoreError> => {
    const page: RawMessageRecord[] = [];

    for (let i = lowerBound(cursor.position, cursor.inclusive); i < raw.length && page.length < limit; i++) {
      const record = raw[i];
      if (!record) break;
      if (mode.type === "bounded" && record.eventTime.getTime() > mode.until.getTime()) break;
      if (symbol !== null && record.symbol !== symbol) continue;
      if (options.kinds && options.kinds.length > 0 && !options.kinds.includes(record.messageKind)) continue;
      page.push({ ...record });
    }

    return okAsync(page);
  };

  return {
    append(record: NewRawMessage): ResultAsync<AppendAck, StoreError> {
      const stored: RawMessageRecord = { ...record, sequenceId: nextSequenceId++ };
      raw.splice(lowerBound(stored, false), 0, stored);

      return okAsync({ symbol: stored.symbol, eventTime: stored.eventTime, sequenceId: stored.sequenceId });
    },

    scanRaw(symbol, from, mode, options = {}) {
      return paginateScan(
        (cursor, limit) => fetchPage(symbol, cursor, mode, options, limit),
        from,
        options.pageSize ?? DEFAULT_SCAN_PAGE_SIZE,
      );
    },

    upsertLevels(records: readonly BookLevelRecord[]): ResultAsync<void, StoreError> {
      const prepared = prepareLevels(records);
      if (prepared.isErr()) return errAsync(prepared.error);

      for (const record of prepared.value) {
        levels.set(levelKey(record), { ...record });
      }
      return okAsync(undefined);
    },

    rawRecords(symbol?: string): RawMessageRecord[] {
      return raw.filter(r => symbol === undefined || r.symbol === symbol).map(r => ({ ...r }));
    },

    levelRecords(symbol?: string): BookLevelRecord[] {
      return [...levels.values()].filter(l => symbol === undefined || l.symbol === symbol).map(l => ({ ...l }));
    },

    clear(): void {
      raw.length = 0;
      levels.clear();
    },
  };
}
