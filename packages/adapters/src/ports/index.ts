/**
 * Port interfaces for adapters
 */

export type {
  BookEvent,
  BookFeedError,
  BookFeedEvent,
  BookFeedPort,
  BookFeedSubscription,
  FeedConnectionEvent,
} from "./book-feed-port";
