/**
 * Level batch preparation shared by the store implementations
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { dedupeLevels, normalizeDecimal, permanentStoreError } from "@book-replay/core";
import type { BookLevelRecord, StoreError } from "@book-replay/core";

/**
 * Normalize prices/quantities and collapse duplicate keys (a single upsert statement
 * cannot touch the same row twice)
 */
export function prepareLevels(records: readonly BookLevelRecord[]): Result<BookLevelRecord[], StoreError> {
  const normalized: BookLevelRecord[] = [];

  for (const record of records) {
    const price = normalizeDecimal(record.price);
    const quantity = normalizeDecimal(record.quantity);
    if (price === null || quantity === null) {
      return err(permanentStoreError(`Invalid level ${record.side} ${record.price}@${record.quantity} for ${record.symbol}`));
    }
    normalized.push({ ...record, price, quantity });
  }

  return ok(dedupeLevels(normalized));
}
