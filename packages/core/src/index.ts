/**
 * packages/core - Pure Capture/Replay Logic
 *
 * Domain types, error taxonomy and the pure parts of ingest and replay.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  DecimalStr,
  MessageKind,
  BookSide,
  FeedMessage,
  PriceLevel,
  ClassifiedMessage,
  RawMessageRecord,
  NewRawMessage,
  BookLevelRecord,
  StreamPosition,
  StartPoint,
  AppendAck,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────
export type {
  TransientStoreError,
  PermanentStoreError,
  StoreError,
  NotFoundError,
  StaleReferenceError,
  InvalidRequestError,
  MalformedReason,
  MalformedFeedMessage,
} from "./errors";
export { transientStoreError, permanentStoreError, malformed } from "./errors";

// ─────────────────────────────────────────────────────────────────────────────
// Ingest
// ─────────────────────────────────────────────────────────────────────────────
export { DEFAULT_BOOK_CHANNELS, classifyFeedMessage, classifyMessageKind } from "./message-classifier";
export { EventTimeAssigner } from "./event-time";
export type { AssignedEventTime, EventTimeSource } from "./event-time";
export { LEVEL_SCALE, normalizeDecimal, toBookLevelRecords, levelKey, dedupeLevels } from "./book-levels";
export type { LevelOwner } from "./book-levels";

// ─────────────────────────────────────────────────────────────────────────────
// Time & Ordering
// ─────────────────────────────────────────────────────────────────────────────
export { parseIsoTimestamp, parseEmbeddedTimestamp, parseRequestedTime, fromEpoch } from "./timestamps";
export { comparePositions, isSamePosition, positionAt, formatPosition } from "./stream-position";
