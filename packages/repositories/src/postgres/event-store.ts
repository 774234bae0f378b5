/**
 * Postgres Event Store
 *
 * - Raw append with bigserial sequence ids, serialized per symbol
 * - Keyset-paginated scans over (event_time, sequence_id)
 * - Level upsert with ON CONFLICT DO UPDATE
 */

import { and, asc, eq, inArray, lte, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import { err, errAsync, ok, okAsync, ResultAsync } from "neverthrow";
import type { Result } from "neverthrow";
import { permanentStoreError } from "@book-replay/core";
import type { AppendAck, BookLevelRecord, NewRawMessage, RawMessageRecord, StoreError } from "@book-replay/core";
import { obLevels, obMessages } from "@book-replay/db";
import type { Db } from "@book-replay/db";
import { KeyedLock } from "@book-replay/utils";

import { DEFAULT_SCAN_PAGE_SIZE } from "../interfaces/event-store";
import type { EventStore, ScanMode, ScanOptions } from "../interfaces/event-store";
import { prepareLevels } from "../levels";
import { paginateScan } from "../scan";
import type { PageCursor } from "../scan";
import { toStoreError } from "./pg-errors";

/**
 * Create a Postgres event store on the process-scoped db handle
 */
export function createPostgresEventStore(db: Db): EventStore {
  const appendLock = new KeyedLock();

  return {
    // ─────────────────────────────────────────────────────────────────────────────
    // Raw Append
    // ─────────────────────────────────────────────────────────────────────────────

    append(record: NewRawMessage): ResultAsync<AppendAck, StoreError> {
      const insert = appendLock.run(record.symbol, () =>
        db
          .insert(obMessages)
          .values({
            eventTime: record.eventTime,
            receivedTime: record.receivedTime,
            channel: record.channel,
            symbol: record.symbol,
            messageKind: record.messageKind,
            checksum: record.checksum,
            payload: record.payload,
          })
          .returning({ sequenceId: obMessages.sequenceId }),
      );

      return ResultAsync.fromPromise(insert, toStoreError).andThen((rows): Result<AppendAck, StoreError> => {
        const row = rows[0];
        if (!row) return err(permanentStoreError("Insert into ob_messages returned no row"));
        return ok({ symbol: record.symbol, eventTime: record.eventTime, sequenceId: row.sequenceId });
      });
    },

    // ─────────────────────────────────────────────────────────────────────────────
    // Scan
    // ─────────────────────────────────────────────────────────────────────────────

    scanRaw(symbol, from, mode, options = {}) {
      return paginateScan(
        (cursor, limit) => fetchPage(db, symbol, cursor, mode, options, limit),
        from,
        options.pageSize ?? DEFAULT_SCAN_PAGE_SIZE,
      );
    },

    // ─────────────────────────────────────────────────────────────────────────────
    // Levels
    // ─────────────────────────────────────────────────────────────────────────────

    upsertLevels(records: readonly BookLevelRecord[]): ResultAsync<void, StoreError> {
      const prepared = prepareLevels(records);
      if (prepared.isErr()) return errAsync(prepared.error);
      if (prepared.value.length === 0) return okAsync(undefined);

      return ResultAsync.fromPromise(
        db
          .insert(obLevels)
          .values(prepared.value)
          .onConflictDoUpdate({
            target: [obLevels.eventTime, obLevels.symbol, obLevels.side, obLevels.price],
            set: {
              quantity: sql`excluded.quantity`,
              messageKind: sql`excluded.message_kind`,
              checksum: sql`excluded.checksum`,
            },
          }),
        toStoreError,
      ).map(() => undefined);
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Query Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * WHERE clause for one scan page
 */
export function buildScanConditions(
  symbol: string | null,
  cursor: PageCursor,
  mode: ScanMode,
  options: ScanOptions,
): SQL | undefined {
  const position = sql`(${cursor.position.eventTime.toISOString()}::timestamptz, ${cursor.position.sequenceId}::bigint)`;
  const columns = sql`(${obMessages.eventTime}, ${obMessages.sequenceId})`;

  return and(
    symbol === null ? undefined : eq(obMessages.symbol, symbol),
    cursor.inclusive ? sql`${columns} >= ${position}` : sql`${columns} > ${position}`,
    mode.type === "bounded" ? lte(obMessages.eventTime, mode.until) : undefined,
    options.kinds && options.kinds.length > 0 ? inArray(obMessages.messageKind, [...options.kinds]) : undefined,
  );
}

function fetchPage(
  db: Db,
  symbol: string | null,
  cursor: PageCursor,
  mode: ScanMode,
  options: ScanOptions,
  limit: number,
): ResultAsync<RawMessageRecord[], StoreError> {
  return ResultAsync.fromPromise(
    db
      .select({
        eventTime: obMessages.eventTime,
        receivedTime: obMessages.receivedTime,
        sequenceId: obMessages.sequenceId,
        channel: obMessages.channel,
        symbol: obMessages.symbol,
        messageKind: obMessages.messageKind,
        checksum: obMessages.checksum,
        payload: sql<string>`${obMessages.payload}::text`,
      })
      .from(obMessages)
      .where(buildScanConditions(symbol, cursor, mode, options))
      .orderBy(asc(obMessages.eventTime), asc(obMessages.sequenceId))
      .limit(limit),
    toStoreError,
  );
}
