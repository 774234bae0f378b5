/**
 * ReplayIndex Unit Tests
 */

import { beforeEach, describe, expect, it } from "vitest";
import { transientStoreError } from "@book-replay/core";
import { createInMemoryEventStore } from "@book-replay/repositories";
import type { InMemoryEventStore } from "@book-replay/repositories";

import { ReplayIndex } from "../../src/services/replay-index";
import { at, failingStore, seed, T0 } from "./fixtures";

describe("ReplayIndex", () => {
  let store: InMemoryEventStore;
  let index: ReplayIndex;

  beforeEach(() => {
    store = createInMemoryEventStore();
    index = new ReplayIndex(store);
  });

  describe("findStartPoint", () => {
    it("should skip updates and return the first snapshot at or after the requested time", async () => {
      await seed(store, "BTC/USD", "update", T0, "u0");
      const snapshot = await seed(store, "BTC/USD", "snapshot", at(T0, 1_000), "s1");
      await seed(store, "BTC/USD", "snapshot", at(T0, 2_000), "s2");

      const result = await index.findStartPoint("BTC/USD", at(T0, -1_000));

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap()).toEqual({
        symbol: "BTC/USD",
        eventTime: at(T0, 1_000),
        sequenceId: snapshot.sequenceId,
      });
    });

    it("should include a snapshot exactly at the requested time", async () => {
      const snapshot = await seed(store, "BTC/USD", "snapshot", T0, "s1");

      const result = await index.findStartPoint("BTC/USD", T0);

      expect(result._unsafeUnwrap().sequenceId).toBe(snapshot.sequenceId);
    });

    it("should resolve equal event times to the lowest sequence id", async () => {
      const first = await seed(store, "BTC/USD", "snapshot", T0, "s1");
      await seed(store, "BTC/USD", "snapshot", T0, "s1-dup");

      const result = await index.findStartPoint("BTC/USD", at(T0, -1));

      expect(result._unsafeUnwrap().sequenceId).toBe(first.sequenceId);
    });

    it("should return NOT_FOUND when only updates follow the requested time", async () => {
      await seed(store, "BTC/USD", "snapshot", T0, "s1");
      await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");

      const result = await index.findStartPoint("BTC/USD", at(T0, 500));

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NOT_FOUND",
        message: "No snapshot found at or after 2025-01-01T00:00:00.500Z",
        symbol: "BTC/USD",
        requestedTime: at(T0, 500),
      });
    });

    it("should only consider the requested symbol", async () => {
      await seed(store, "ETH/USD", "snapshot", T0, "eth");

      const result = await index.findStartPoint("BTC/USD", at(T0, -1));

      expect(result._unsafeUnwrapErr().type).toBe("NOT_FOUND");
    });

    it("should search every symbol when none is given", async () => {
      const eth = await seed(store, "ETH/USD", "snapshot", T0, "eth");
      await seed(store, "BTC/USD", "snapshot", at(T0, 1_000), "btc");

      const result = await index.findStartPoint(null, at(T0, -1));

      expect(result._unsafeUnwrap()).toEqual({ symbol: "ETH/USD", eventTime: T0, sequenceId: eth.sequenceId });
    });

    it("should find a snapshot stamped ahead of the local clock", async () => {
      const ahead = new Date(Date.now() + 3_600_000);
      const snapshot = await seed(store, "BTC/USD", "snapshot", ahead, "ahead");

      const result = await index.findStartPoint("BTC/USD", T0);

      expect(result._unsafeUnwrap()).toEqual({ symbol: "BTC/USD", eventTime: ahead, sequenceId: snapshot.sequenceId });
    });

    it("should pass store errors through", async () => {
      const failing = new ReplayIndex(failingStore(transientStoreError("connection reset")));

      const result = await failing.findStartPoint("BTC/USD", T0);

      expect(result._unsafeUnwrapErr()).toEqual({ type: "TRANSIENT_STORE_ERROR", message: "connection reset" });
    });
  });

  describe("verifyStartPoint", () => {
    it("should accept a start point whose snapshot exists", async () => {
      const snapshot = await seed(store, "BTC/USD", "snapshot", T0, "s1");
      const startPoint = { symbol: "BTC/USD", eventTime: T0, sequenceId: snapshot.sequenceId };

      const result = await index.verifyStartPoint(startPoint);

      expect(result._unsafeUnwrap()).toEqual(startPoint);
    });

    it("should reject a start point after the log was cleared", async () => {
      const snapshot = await seed(store, "BTC/USD", "snapshot", T0, "s1");
      store.clear();

      const result = await index.verifyStartPoint({ symbol: "BTC/USD", eventTime: T0, sequenceId: snapshot.sequenceId });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "STALE_REFERENCE",
        message: `Snapshot BTC/USD@2025-01-01T00:00:00.000Z#${snapshot.sequenceId} no longer exists`,
        symbol: "BTC/USD",
        position: { eventTime: T0, sequenceId: snapshot.sequenceId },
      });
    });

    it("should reject a sequence id that does not match the snapshot", async () => {
      await seed(store, "BTC/USD", "snapshot", T0, "s1");

      const result = await index.verifyStartPoint({ symbol: "BTC/USD", eventTime: T0, sequenceId: 999 });

      expect(result._unsafeUnwrapErr().type).toBe("STALE_REFERENCE");
    });

    it("should reject a position that holds an update", async () => {
      const update = await seed(store, "BTC/USD", "update", T0, "u1");

      const result = await index.verifyStartPoint({ symbol: "BTC/USD", eventTime: T0, sequenceId: update.sequenceId });

      expect(result._unsafeUnwrapErr().type).toBe("STALE_REFERENCE");
    });
  });
});
