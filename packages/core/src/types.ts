/**
 * Core Domain Types
 *
 * Pure type definitions shared by the ingestor and the replay server.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Decimal as string to avoid floating point issues */
export type DecimalStr = string;

/** Full-book message vs incremental message */
export type MessageKind = "snapshot" | "update";

/** Side of a book level */
export type BookSide = "bid" | "ask";

// ─────────────────────────────────────────────────────────────────────────────
// Feed (ingest collaborator)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A parsed message as delivered by a feed connection.
 *
 * `kind` is the venue's kind indicator (Kraken: "snapshot" | "update"), not yet validated.
 * `rawText` is the frame exactly as received; when absent the payload is serialized instead.
 */
export interface FeedMessage {
  channel: string;
  symbol: string;
  kind: string | undefined;
  timestamp?: string | number | null;
  checksum?: number | null;
  payload: unknown;
  rawText?: string;
}

/**
 * One price level extracted from a book payload
 */
export interface PriceLevel {
  side: BookSide;
  price: DecimalStr;
  quantity: DecimalStr;
}

/**
 * Feed message after classification and validation
 */
export interface ClassifiedMessage {
  channel: string;
  symbol: string;
  kind: MessageKind;
  /** Exchange-provided time, null when absent or unparseable */
  embeddedTime: Date | null;
  checksum: number | null;
  levels: PriceLevel[];
  payloadText: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Event Log Records
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One stored feed message (ob_messages)
 */
export interface RawMessageRecord {
  eventTime: Date;
  receivedTime: Date;
  sequenceId: number;
  channel: string;
  symbol: string;
  messageKind: MessageKind;
  checksum: number | null;
  /** Original message text, replayed verbatim */
  payload: string;
}

/** Raw record before the store assigns its sequence id */
export type NewRawMessage = Omit<RawMessageRecord, "sequenceId">;

/**
 * Normalized bid/ask projection of a raw message (ob_levels)
 */
export interface BookLevelRecord {
  eventTime: Date;
  symbol: string;
  side: BookSide;
  price: DecimalStr;
  quantity: DecimalStr;
  messageKind: MessageKind;
  checksum: number | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Positions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A point in the (event_time, sequence_id) total order
 */
export interface StreamPosition {
  eventTime: Date;
  sequenceId: number;
}

/**
 * The snapshot record a replay session begins at
 */
export interface StartPoint extends StreamPosition {
  symbol: string;
}

/** Acknowledgement of a durable append */
export type AppendAck = StartPoint;
