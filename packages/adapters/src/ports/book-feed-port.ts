/**
 * Book Feed Port - Interface for order-book feed subscriptions
 *
 * The ingest pipeline depends on this port only; venue adapters implement it.
 */

import type { Result } from "neverthrow";
import type { FeedMessage } from "@book-replay/core";

/**
 * A book message as delivered by the venue
 */
export interface BookEvent {
  type: "book";
  /** wall clock at frame arrival */
  receivedAt: Date;
  message: FeedMessage;
}

/**
 * Connection event
 */
export interface FeedConnectionEvent {
  type: "connected" | "disconnected";
  ts: Date;
  venue: string;
  reason?: string;
}

export type BookFeedEvent = BookEvent | FeedConnectionEvent;

export interface BookFeedSubscription {
  symbols: string[];
  depth: number;
}

/**
 * Book feed adapter errors
 */
export type BookFeedError =
  | { type: "connection_failed"; message: string }
  | { type: "subscription_failed"; message: string };

export interface BookFeedPort {
  connect(): Promise<Result<void, BookFeedError>>;

  /**
   * Register a subscription; sent immediately when connected, otherwise on connect
   */
  subscribe(subscription: BookFeedSubscription): Result<void, BookFeedError>;

  disconnect(): Promise<Result<void, BookFeedError>>;

  onEvent(handler: (event: BookFeedEvent) => void): void;

  isConnected(): boolean;
}
