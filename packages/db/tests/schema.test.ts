/**
 * Database Schema Unit Tests
 *
 * - Identity columns match the event log keys
 * - Payload column is plain json (text preserved)
 */

import { describe, expect, it } from "vitest";
import { getTableConfig } from "drizzle-orm/pg-core";

import { obLevels, obMessages } from "../src";

describe("ob_messages", () => {
  const config = getTableConfig(obMessages);

  it("should be keyed by (event_time, symbol, sequence_id)", () => {
    expect(config.name).toBe("ob_messages");
    expect(config.primaryKeys).toHaveLength(1);
    expect(config.primaryKeys[0]?.columns.map(c => c.name)).toEqual(["event_time", "symbol", "sequence_id"]);
  });

  it("should store the payload as json, not jsonb", () => {
    const payload = config.columns.find(c => c.name === "payload");

    expect(payload?.getSQLType()).toBe("json");
    expect(payload?.notNull).toBe(true);
  });

  it("should index symbol scans in (event_time, sequence_id) order", () => {
    const names = config.indexes.map(i => i.config.name);

    expect(names).toContain("ob_messages_symbol_event_time_seq_idx");
    expect(names).toContain("ob_messages_kind_event_time_seq_idx");
  });
});

describe("ob_levels", () => {
  const config = getTableConfig(obLevels);

  it("should be keyed by (event_time, symbol, side, price)", () => {
    expect(config.primaryKeys[0]?.columns.map(c => c.name)).toEqual(["event_time", "symbol", "side", "price"]);
  });

  it("should use numeric(20,8) for price and quantity", () => {
    const price = config.columns.find(c => c.name === "price");
    const quantity = config.columns.find(c => c.name === "quantity");

    expect(price?.getSQLType()).toBe("numeric(20, 8)");
    expect(quantity?.getSQLType()).toBe("numeric(20, 8)");
  });
});
