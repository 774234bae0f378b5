/**
 * EventTimeAssigner Unit Tests
 */

import { describe, expect, it } from "vitest";

import { EventTimeAssigner } from "../src/event-time";

const t = (iso: string): Date => new Date(iso);

describe("EventTimeAssigner", () => {
  it("should prefer the embedded timestamp", () => {
    const assigner = new EventTimeAssigner();

    const assigned = assigner.assign("BTC/USD", t("2025-01-01T00:00:01.000Z"), t("2025-01-01T00:00:05.000Z"));

    expect(assigned).toEqual({ eventTime: t("2025-01-01T00:00:01.000Z"), source: "embedded", clamped: false });
  });

  it("should fall back to the received time", () => {
    const assigner = new EventTimeAssigner();

    const assigned = assigner.assign("BTC/USD", null, t("2025-01-01T00:00:05.000Z"));

    expect(assigned).toEqual({ eventTime: t("2025-01-01T00:00:05.000Z"), source: "received", clamped: false });
  });

  it("should clamp an earlier candidate to the previous event time of the symbol", () => {
    const assigner = new EventTimeAssigner();
    // snapshot without timestamp stamped at ingest time, then an update whose exchange time is slightly earlier
    assigner.assign("BTC/USD", null, t("2025-01-01T00:00:05.000Z"));

    const assigned = assigner.assign("BTC/USD", t("2025-01-01T00:00:04.990Z"), t("2025-01-01T00:00:05.001Z"));

    expect(assigned.eventTime).toEqual(t("2025-01-01T00:00:05.000Z"));
    expect(assigned.source).toBe("embedded");
    expect(assigned.clamped).toBe(true);
  });

  it("should track symbols independently", () => {
    const assigner = new EventTimeAssigner();
    assigner.assign("BTC/USD", t("2025-01-01T00:00:10.000Z"), t("2025-01-01T00:00:10.000Z"));

    const other = assigner.assign("ETH/USD", t("2025-01-01T00:00:01.000Z"), t("2025-01-01T00:00:10.000Z"));

    expect(other.clamped).toBe(false);
    expect(other.eventTime).toEqual(t("2025-01-01T00:00:01.000Z"));
    expect(assigner.lastFor("BTC/USD")).toBe(t("2025-01-01T00:00:10.000Z").getTime());
  });
});
