/**
 * ReplayStreamController Unit Tests
 *
 * - Emits from the start snapshot through the next snapshot, then stops
 * - Stops on exhaustion, cancel, closed sink and store errors
 * - Realtime pacing keeps recorded spacing up to the cap
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { transientStoreError } from "@book-replay/core";
import type { RawMessageRecord, StartPoint } from "@book-replay/core";
import { createInMemoryEventStore } from "@book-replay/repositories";
import type { InMemoryEventStore } from "@book-replay/repositories";

import { ReplayIndex } from "../../src/services/replay-index";
import { ReplayStreamController } from "../../src/services/replay-stream-controller";
import { at, failingStore, flush, RecordingSink, seed, T0 } from "./fixtures";
import type { SeededRecord } from "./fixtures";

const startOf = (record: SeededRecord): StartPoint => ({
  symbol: record.symbol,
  eventTime: record.eventTime,
  sequenceId: record.sequenceId,
});

describe("ReplayStreamController", () => {
  let store: InMemoryEventStore;

  beforeEach(() => {
    store = createInMemoryEventStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should replay snapshot, update and the next snapshot for a request just before the first snapshot", async () => {
    await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    await seed(store, "BTC/USD", "snapshot", at(T0, 2_000), "s2");
    await seed(store, "BTC/USD", "update", at(T0, 3_000), "u2");

    const startPoint = (await new ReplayIndex(store).findStartPoint("BTC/USD", at(T0, -1_000)))._unsafeUnwrap();
    const sink = new RecordingSink();
    const controller = new ReplayStreamController(store, startPoint, sink);

    expect(controller.state).toBe("idle");
    const outcome = await controller.run();

    expect(sink.labels()).toEqual(["s1", "u1", "s2"]);
    expect(outcome).toEqual({ reason: "snapshot_boundary", emitted: 3 });
    expect(controller.state).toBe("stopped");
  });

  it("should send the stored payload text unchanged", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    const sink = new RecordingSink();

    await new ReplayStreamController(store, startOf(s1), sink).run();

    expect(sink.messages).toEqual([s1.payload]);
  });

  it("should stop when the log is exhausted", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    const sink = new RecordingSink();

    const outcome = await new ReplayStreamController(store, startOf(s1), sink, { pageSize: 1 }).run();

    expect(sink.labels()).toEqual(["s1", "u1"]);
    expect(outcome).toEqual({ reason: "exhausted", emitted: 2 });
  });

  it("should ignore other symbols", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "ETH/USD", "snapshot", at(T0, 500), "eth-s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    await seed(store, "ETH/USD", "update", at(T0, 1_500), "eth-u1");
    await seed(store, "BTC/USD", "snapshot", at(T0, 2_000), "s2");
    const sink = new RecordingSink();

    const outcome = await new ReplayStreamController(store, startOf(s1), sink).run();

    expect(sink.labels()).toEqual(["s1", "u1", "s2"]);
    expect(outcome.reason).toBe("snapshot_boundary");
  });

  it("should keep append order for records with the same event time", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u2");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u3");
    const sink = new RecordingSink();

    await new ReplayStreamController(store, startOf(s1), sink).run();

    expect(sink.labels()).toEqual(["s1", "u1", "u2", "u3"]);
  });

  it("should stop with a stale reference when the start snapshot is gone", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    store.clear();
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    const sink = new RecordingSink();

    const outcome = await new ReplayStreamController(store, startOf(s1), sink).run();

    expect(sink.messages).toEqual([]);
    expect(outcome.reason).toBe("stale_reference");
    expect(outcome.emitted).toBe(0);
    expect(outcome.error?.type).toBe("STALE_REFERENCE");
  });

  it("should stop with a stale reference when the start point holds an update", async () => {
    await seed(store, "BTC/USD", "snapshot", T0, "s1");
    const u1 = await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    const sink = new RecordingSink();

    const outcome = await new ReplayStreamController(store, startOf(u1), sink).run();

    expect(sink.messages).toEqual([]);
    expect(outcome.reason).toBe("stale_reference");
  });

  it("should do nothing when cancelled before running", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    const sink = new RecordingSink();
    const controller = new ReplayStreamController(store, startOf(s1), sink);

    controller.cancel();
    const outcome = await controller.run();

    expect(outcome).toEqual({ reason: "cancelled", emitted: 0 });
    expect(sink.messages).toEqual([]);
    expect(controller.state).toBe("stopped");
  });

  it("should stop without waiting for a pending send when cancelled", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    await seed(store, "BTC/USD", "update", at(T0, 2_000), "u2");
    await seed(store, "BTC/USD", "snapshot", at(T0, 3_000), "s2");
    const sink = new RecordingSink({ blockAt: 1 });
    const controller = new ReplayStreamController(store, startOf(s1), sink);

    const running = controller.run();
    await sink.reached.promise;
    expect(controller.state).toBe("streaming");
    controller.cancel();

    expect(await running).toEqual({ reason: "cancelled", emitted: 1 });
    expect(sink.labels()).toEqual(["s1", "u1"]);
    expect(controller.state).toBe("stopped");
  });

  it("should not send further records once a pending send settles after a cancel", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    await seed(store, "BTC/USD", "update", at(T0, 2_000), "u2");
    const sink = new RecordingSink({ blockAt: 0 });
    const controller = new ReplayStreamController(store, startOf(s1), sink);

    const running = controller.run();
    await sink.reached.promise;
    controller.cancel();
    sink.release.open();

    expect(await running).toEqual({ reason: "cancelled", emitted: 0 });
    await flush();
    expect(sink.labels()).toEqual(["s1"]);
  });

  it("should stop when the sink closes", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    const sink = new RecordingSink({ closeAfter: 1 });

    const outcome = await new ReplayStreamController(store, startOf(s1), sink).run();

    expect(outcome).toEqual({ reason: "sink_closed", emitted: 1 });
    expect(sink.labels()).toEqual(["s1"]);
  });

  it("should stop when a send fails", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
    const sink = new RecordingSink({ failAt: 1 });

    const outcome = await new ReplayStreamController(store, startOf(s1), sink).run();

    expect(outcome).toEqual({ reason: "sink_closed", emitted: 1 });
  });

  it("should surface a store error raised mid-stream", async () => {
    const first: RawMessageRecord = {
      eventTime: T0,
      receivedTime: T0,
      sequenceId: 1,
      channel: "book",
      symbol: "BTC/USD",
      messageKind: "snapshot",
      checksum: null,
      payload: "{}",
    };
    const failing = failingStore(transientStoreError("connection reset"), [first]);
    const sink = new RecordingSink();

    const outcome = await new ReplayStreamController(
      failing,
      { symbol: "BTC/USD", eventTime: T0, sequenceId: 1 },
      sink,
    ).run();

    expect(outcome).toEqual({
      reason: "store_error",
      emitted: 1,
      error: { type: "TRANSIENT_STORE_ERROR", message: "connection reset" },
    });
    expect(sink.messages).toEqual(["{}"]);
  });

  it("should return the same outcome when run twice", async () => {
    const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
    const sink = new RecordingSink();
    const controller = new ReplayStreamController(store, startOf(s1), sink);

    const [first, second] = await Promise.all([controller.run(), controller.run()]);

    expect(first).toBe(second);
    expect(sink.messages).toHaveLength(1);
  });

  it("should run sessions for different symbols independently", async () => {
    const btc = await seed(store, "BTC/USD", "snapshot", T0, "btc-s1");
    const eth = await seed(store, "ETH/USD", "snapshot", T0, "eth-s1");
    for (let i = 1; i <= 5; i++) {
      await seed(store, "BTC/USD", "update", at(T0, i * 100), `btc-u${i}`);
      await seed(store, "ETH/USD", "update", at(T0, i * 100), `eth-u${i}`);
    }
    await seed(store, "ETH/USD", "snapshot", at(T0, 1_000), "eth-s2");

    const btcSink = new RecordingSink();
    const ethSink = new RecordingSink();
    const [btcOutcome, ethOutcome] = await Promise.all([
      new ReplayStreamController(store, startOf(btc), btcSink, { pageSize: 2 }).run(),
      new ReplayStreamController(store, startOf(eth), ethSink, { pageSize: 3 }).run(),
    ]);

    expect(btcSink.labels()).toEqual(["btc-s1", "btc-u1", "btc-u2", "btc-u3", "btc-u4", "btc-u5"]);
    expect(ethSink.labels()).toEqual(["eth-s1", "eth-u1", "eth-u2", "eth-u3", "eth-u4", "eth-u5", "eth-s2"]);
    expect(btcOutcome).toEqual({ reason: "exhausted", emitted: 6 });
    expect(ethOutcome).toEqual({ reason: "snapshot_boundary", emitted: 7 });
  });

  describe("realtime pacing", () => {
    it("should wait for the recorded gap between messages", async () => {
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
      const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
      await seed(store, "BTC/USD", "update", at(T0, 1_000), "u1");
      await seed(store, "BTC/USD", "snapshot", at(T0, 3_000), "s2");
      const sink = new RecordingSink();

      const running = new ReplayStreamController(store, startOf(s1), sink, { pacing: "realtime" }).run();
      await flush();
      expect(sink.labels()).toEqual(["s1"]);

      await vi.advanceTimersByTimeAsync(999);
      expect(sink.labels()).toEqual(["s1"]);

      await vi.advanceTimersByTimeAsync(1);
      await flush();
      expect(sink.labels()).toEqual(["s1", "u1"]);

      await vi.advanceTimersByTimeAsync(2_000);
      expect(await running).toEqual({ reason: "snapshot_boundary", emitted: 3 });
    });

    it("should cap each wait at maxDelayMs", async () => {
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
      const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
      await seed(store, "BTC/USD", "snapshot", at(T0, 3_600_000), "s2");
      const sink = new RecordingSink();

      const running = new ReplayStreamController(store, startOf(s1), sink, {
        pacing: "realtime",
        maxDelayMs: 5_000,
      }).run();
      await flush();

      await vi.advanceTimersByTimeAsync(5_000);
      expect(await running).toEqual({ reason: "snapshot_boundary", emitted: 2 });
    });

    it("should be interrupted by cancel", async () => {
      const s1 = await seed(store, "BTC/USD", "snapshot", T0, "s1");
      await seed(store, "BTC/USD", "update", at(T0, 3_600_000), "u1");
      const sink = new RecordingSink();
      const controller = new ReplayStreamController(store, startOf(s1), sink, { pacing: "realtime" });

      const running = controller.run();
      await flush();
      controller.cancel();

      expect(await running).toEqual({ reason: "cancelled", emitted: 1 });
      expect(sink.labels()).toEqual(["s1"]);
    });
  });
});
