/**
 * Unit tests for the async mutexes
 */

import { describe, test, expect } from "vitest";
import { KeyedMutex, Mutex } from "../../../src/utils/mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Mutex", () => {
  test("runs sections one at a time in call order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive(() => {
      order.push("second");
    });

    expect(mutex.isLocked()).toBe(true);
    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked()).toBe(false);
  });

  test("releases the lock when a section throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(await mutex.runExclusive(() => 42)).toBe(42);
  });
});

describe("KeyedMutex", () => {
  test("serializes per key and lets other keys run", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const a1 = mutex.runExclusive("a", async () => {
      await gate.promise;
      order.push("a1");
    });
    const a2 = mutex.runExclusive("a", () => {
      order.push("a2");
    });
    const b = mutex.runExclusive("b", () => {
      order.push("b");
    });

    await b;
    expect(order).toEqual(["b"]);

    gate.resolve();
    await Promise.all([a1, a2]);
    expect(order).toEqual(["b", "a1", "a2"]);
  });
});
