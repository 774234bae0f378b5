/**
 * Postgres Event Store Unit Tests
 *
 * Query construction only; behaviour against a live database is covered by the
 * in-memory store tests through the same interface.
 */

import { describe, expect, it } from "vitest";
import { PgDialect } from "drizzle-orm/pg-core";

import { buildScanConditions } from "../src/postgres/event-store";

const dialect = new PgDialect();

describe("buildScanConditions", () => {
  const position = { eventTime: new Date("2025-01-01T00:00:00.000Z"), sequenceId: 5 };

  it("should render an inclusive keyset condition for the first page", () => {
    const condition = buildScanConditions("BTC/USD", { position, inclusive: true }, { type: "open" }, {});
    if (!condition) throw new Error("expected a condition");

    const query = dialect.sqlToQuery(condition);

    expect(query.sql).toContain(">= ($2::timestamptz, $3::bigint)");
    expect(query.params).toEqual(["BTC/USD", "2025-01-01T00:00:00.000Z", 5]);
  });

  it("should render an exclusive keyset condition for later pages", () => {
    const condition = buildScanConditions(null, { position, inclusive: false }, { type: "open" }, {});
    if (!condition) throw new Error("expected a condition");

    const query = dialect.sqlToQuery(condition);

    expect(query.sql).toContain("> ($1::timestamptz, $2::bigint)");
    expect(query.sql).not.toContain(">=");
    expect(query.params).toEqual(["2025-01-01T00:00:00.000Z", 5]);
  });

  it("should add the upper bound and kind filter", () => {
    const condition = buildScanConditions(
      "BTC/USD",
      { position, inclusive: true },
      { type: "bounded", until: new Date("2025-01-02T00:00:00.000Z") },
      { kinds: ["snapshot"] },
    );
    if (!condition) throw new Error("expected a condition");

    const query = dialect.sqlToQuery(condition);

    expect(query.params).toEqual(["BTC/USD", "2025-01-01T00:00:00.000Z", 5, "2025-01-02T00:00:00.000Z", "snapshot"]);
  });
});
