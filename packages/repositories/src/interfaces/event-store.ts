/**
 * Event Store Interface
 *
 * - Append-only raw message log, ordered by (event_time, sequence_id)
 * - Lazy, restartable scans (open-ended or bounded)
 * - Idempotent upsert of the normalized level projection
 */

import type { Result, ResultAsync } from "neverthrow";
import type {
  AppendAck,
  BookLevelRecord,
  MessageKind,
  NewRawMessage,
  RawMessageRecord,
  StoreError,
  StreamPosition,
} from "@book-replay/core";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * open: no upper bound, the scan ends when the log is exhausted
 * bounded: stops after the last record with event_time <= until
 */
export type ScanMode = { type: "open" } | { type: "bounded"; until: Date };

export interface ScanOptions {
  /** Records fetched per round trip (default 500) */
  pageSize?: number;
  /** Restrict the scan to these message kinds */
  kinds?: readonly MessageKind[];
}

/**
 * One scan step. An error is yielded once and ends the scan.
 */
export type ScanItem = Result<RawMessageRecord, StoreError>;

export const DEFAULT_SCAN_PAGE_SIZE = 500;

// ─────────────────────────────────────────────────────────────────────────────
// Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface EventStore {
  /**
   * Append one raw message and assign its sequence id.
   * Appends for one symbol are serialized; different symbols may append concurrently.
   */
  append(record: NewRawMessage): ResultAsync<AppendAck, StoreError>;

  /**
   * Scan raw messages from `from` (inclusive) in (event_time, sequence_id) order.
   * `symbol = null` scans every symbol. Breaking out of the iteration releases the scan.
   */
  scanRaw(symbol: string | null, from: StreamPosition, mode: ScanMode, options?: ScanOptions): AsyncIterable<ScanItem>;

  /**
   * Upsert levels keyed by (event_time, symbol, side, price); the last write for a key wins
   */
  upsertLevels(records: readonly BookLevelRecord[]): ResultAsync<void, StoreError>;
}
