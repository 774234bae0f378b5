/**
 * Shared column types
 */

import { customType } from "drizzle-orm/pg-core";

/**
 * Postgres `json` column holding the exact message text.
 *
 * `json` (unlike `jsonb`) keeps the input text as-is, so a stored feed frame can be sent back
 * byte-for-byte. Read it with a `::text` cast; node-postgres would otherwise parse it.
 */
export const jsonText = customType<{ data: string; driverData: unknown }>({
  dataType() {
    return "json";
  },
  toDriver(value: string): unknown {
    return value;
  },
  fromDriver(value: unknown): string {
    return typeof value === "string" ? value : JSON.stringify(value);
  },
});
