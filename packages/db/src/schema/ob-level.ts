/**
 * ob_levels - Normalized bid/ask levels (derived view of ob_messages)
 *
 * - One row per (event_time, symbol, side, price); re-writes upsert
 * - Written only after the owning ob_messages row
 */

import { bigint, index, numeric, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";

export const obLevels = pgTable(
  "ob_levels",
  {
    eventTime: timestamp("event_time", { withTimezone: true, mode: "date" }).notNull(),
    symbol: text("symbol").notNull(),
    side: text("side").$type<"bid" | "ask">().notNull(),
    price: numeric("price", { precision: 20, scale: 8 }).notNull(),
    quantity: numeric("quantity", { precision: 20, scale: 8 }).notNull(),
    messageKind: text("message_kind").$type<"snapshot" | "update">().notNull(),
    checksum: bigint("checksum", { mode: "number" }),
  },
  table => [
    primaryKey({ columns: [table.eventTime, table.symbol, table.side, table.price] }),
    index("ob_levels_symbol_event_time_idx").on(table.symbol, table.eventTime.desc()),
  ],
);

export type ObLevel = typeof obLevels.$inferSelect;
export type NewObLevel = typeof obLevels.$inferInsert;
