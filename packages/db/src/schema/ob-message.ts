/**
 * ob_messages - Raw order-book feed messages (時系列 append)
 *
 * - One row per received feed message, payload stored verbatim
 * - Ordered by (event_time, sequence_id); sequence_id breaks event_time ties
 * - PK includes event_time so the table can become a hypertable (sql/hypertables.sql)
 */

import { bigint, bigserial, index, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";

import { jsonText } from "./columns";

export const obMessages = pgTable(
  "ob_messages",
  {
    eventTime: timestamp("event_time", { withTimezone: true, mode: "date" }).notNull(),
    receivedTime: timestamp("received_time", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
    sequenceId: bigserial("sequence_id", { mode: "number" }).notNull(),
    channel: text("channel").notNull(),
    symbol: text("symbol").notNull(),
    messageKind: text("message_kind").$type<"snapshot" | "update">().notNull(),
    checksum: bigint("checksum", { mode: "number" }),
    payload: jsonText("payload").notNull(),
  },
  table => [
    primaryKey({ columns: [table.eventTime, table.symbol, table.sequenceId] }),
    index("ob_messages_symbol_event_time_seq_idx").on(table.symbol, table.eventTime, table.sequenceId),
    index("ob_messages_kind_event_time_seq_idx").on(table.messageKind, table.eventTime, table.sequenceId),
  ],
);

export type ObMessage = typeof obMessages.$inferSelect;
export type NewObMessage = typeof obMessages.$inferInsert;
