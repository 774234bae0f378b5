import { describe, expect, test } from "vitest";

import { KeyedLock } from "../../src/keyed-lock";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  test("runs tasks for the same key one at a time in call order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("BTC/USD", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("BTC/USD", async () => {
      order.push("second");
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.activeKeys).toBe(0);
  });

  test("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.run("BTC/USD", async () => {
      await gate.promise;
      order.push("btc");
    });
    await lock.run("ETH/USD", async () => {
      order.push("eth");
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(["eth", "btc"]);
  });

  test("releases the key when a task throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("BTC/USD", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.run("BTC/USD", async () => "next")).resolves.toBe("next");
  });
});
