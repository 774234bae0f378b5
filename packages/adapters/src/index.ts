/**
 * packages/adapters - Feed Adapters
 *
 * - Port interface for venue-agnostic book feeds
 * - Venue-specific adapter implementations
 */

// Port interfaces
export * from "./ports";

// Kraken adapter
export * from "./kraken";
