/**
 * Book level normalization
 *
 * - Prices and quantities are normalized to 8 decimal places (numeric(20,8) in the store)
 * - A level key is (event_time, symbol, side, price); the last write for a key wins
 */

import Decimal from "decimal.js";

import type { BookLevelRecord, DecimalStr, MessageKind, PriceLevel } from "./types";

export const LEVEL_SCALE = 8;

/**
 * Normalize a decimal value. Returns null for anything decimal.js cannot read.
 */
export function normalizeDecimal(value: string | number): DecimalStr | null {
  try {
    const decimal = new Decimal(value);
    if (!decimal.isFinite()) return null;
    return decimal.toDecimalPlaces(LEVEL_SCALE).toFixed();
  } catch {
    return null;
  }
}

export interface LevelOwner {
  eventTime: Date;
  symbol: string;
  messageKind: MessageKind;
  checksum: number | null;
}

/**
 * Project the levels of one message onto BookLevelRecords (bids first, then asks)
 */
export function toBookLevelRecords(owner: LevelOwner, levels: readonly PriceLevel[]): BookLevelRecord[] {
  const bids = levels.filter(level => level.side === "bid");
  const asks = levels.filter(level => level.side === "ask");

  return [...bids, ...asks].map(level => ({
    eventTime: owner.eventTime,
    symbol: owner.symbol,
    side: level.side,
    price: level.price,
    quantity: level.quantity,
    messageKind: owner.messageKind,
    checksum: owner.checksum,
  }));
}

export function levelKey(record: Pick<BookLevelRecord, "eventTime" | "symbol" | "side" | "price">): string {
  return `${record.eventTime.getTime()}|${record.symbol}|${record.side}|${record.price}`;
}

/**
 * Collapse duplicate keys within one batch; the last record for a key wins,
 * first-seen order is kept.
 */
export function dedupeLevels(records: readonly BookLevelRecord[]): BookLevelRecord[] {
  const byKey = new Map<string, BookLevelRecord>();
  for (const record of records) {
    byKey.set(levelKey(record), record);
  }
  return [...byKey.values()];
}
