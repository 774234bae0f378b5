/**
 * Replay Server Types
 */

import type { NotFoundError, StaleReferenceError, StartPoint, StoreError } from "@book-replay/core";

// ============================================================================
// Streaming
// ============================================================================

export type ReplayPacing = "asap" | "realtime";

export interface ReplayStreamOptions {
  /** default asap */
  pacing?: ReplayPacing;
  /** Longest pause between two records under realtime pacing (default 60s) */
  maxDelayMs?: number;
  /** Records per store round trip */
  pageSize?: number;
}

/**
 * Output channel of one session. `send` resolves once the transport has taken the message.
 */
export interface ReplaySink {
  send(text: string): Promise<void>;
  isOpen(): boolean;
}

export type ReplayState = "idle" | "streaming" | "stopped";

export type ReplayStopReason =
  | "snapshot_boundary"
  | "exhausted"
  | "cancelled"
  | "sink_closed"
  | "store_error"
  | "stale_reference";

export interface ReplayOutcome {
  reason: ReplayStopReason;
  /** Messages handed to the sink */
  emitted: number;
  error?: StoreError | StaleReferenceError;
}

// ============================================================================
// Sessions
// ============================================================================

export interface PreparedReplay {
  status: "ready";
  /** ISO-8601 event_time of the start snapshot */
  replayStartTimestamp: string;
  requestedDate: string;
  message: string;
  symbol: string;
  sequenceId: number;
  startPoint: StartPoint;
}

/**
 * What a client hands back to attach. Without a sequence id the first snapshot
 * of the symbol at exactly `eventTime` is used.
 */
export interface StartPointReference {
  symbol: string;
  eventTime: Date;
  sequenceId: number | null;
}

export type AttachError = NotFoundError | StaleReferenceError | StoreError;

export interface ReplaySession {
  readonly id: string;
  readonly startPoint: StartPoint;
  /** Stream until a stop condition. Calling it again returns the same outcome. */
  run(): Promise<ReplayOutcome>;
  cancel(): void;
  state(): ReplayState;
}
