/**
 * Error taxonomy
 *
 * Errors are plain discriminated unions carried by neverthrow Results.
 * - Store errors are split by whether a retry can help
 * - Replay errors are surfaced to the requesting client
 * - Malformed feed messages are skipped by ingest
 */

import type { StreamPosition } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

/** Connection loss, timeouts, lock conflicts: retry with backoff */
export type TransientStoreError = { type: "TRANSIENT_STORE_ERROR"; message: string };

/** Schema mismatch, corrupted payload: never retried */
export type PermanentStoreError = { type: "PERMANENT_STORE_ERROR"; message: string };

export type StoreError = TransientStoreError | PermanentStoreError;

export const transientStoreError = (message: string): TransientStoreError => ({
  type: "TRANSIENT_STORE_ERROR",
  message,
});

export const permanentStoreError = (message: string): PermanentStoreError => ({
  type: "PERMANENT_STORE_ERROR",
  message,
});

// ─────────────────────────────────────────────────────────────────────────────
// Replay
// ─────────────────────────────────────────────────────────────────────────────

/** No snapshot at or after the requested time */
export type NotFoundError = {
  type: "NOT_FOUND";
  message: string;
  symbol: string | null;
  requestedTime: Date;
};

/** Start point whose snapshot no longer exists */
export type StaleReferenceError = {
  type: "STALE_REFERENCE";
  message: string;
  symbol: string;
  position: StreamPosition | { eventTime: Date; sequenceId: null };
};

/** Unparsable client input */
export type InvalidRequestError = { type: "INVALID_REQUEST"; message: string };

// ─────────────────────────────────────────────────────────────────────────────
// Ingest
// ─────────────────────────────────────────────────────────────────────────────

export type MalformedReason =
  | "UNSUPPORTED_CHANNEL"
  | "MISSING_SYMBOL"
  | "UNKNOWN_KIND"
  | "INVALID_PAYLOAD"
  | "INVALID_LEVEL";

export type MalformedFeedMessage = {
  type: "MALFORMED_FEED_MESSAGE";
  reason: MalformedReason;
  message: string;
};

export const malformed = (reason: MalformedReason, message: string): MalformedFeedMessage => ({
  type: "MALFORMED_FEED_MESSAGE",
  reason,
  message,
});
