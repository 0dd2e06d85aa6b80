/**
 * Memory Shared Store Unit Tests
 *
 * @module tests/unit/store/memory-store
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MemorySharedStore, globToRegExp } from "../../../src/store/memory-store.js";

describe("MemorySharedStore", () => {
  let store: MemorySharedStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    store = new MemorySharedStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports kind and answers ping", async () => {
    expect(store.kind).toBe("memory");
    expect(await store.ping()).toBe(true);
  });

  it("returns null for a missing key", async () => {
    expect(await store.get("missing")).toBeNull();
  });

  it("expires values after their TTL", async () => {
    await store.set("k", "v", 10);
    vi.advanceTimersByTime(9_999);
    expect(await store.get("k")).toBe("v");
    vi.advanceTimersByTime(1);
    expect(await store.get("k")).toBeNull();
  });

  describe("setIfAbsent", () => {
    it("creates only when missing", async () => {
      expect(await store.setIfAbsent("k", "first")).toBe(true);
      expect(await store.setIfAbsent("k", "second")).toBe(false);
      expect(await store.get("k")).toBe("first");
    });

    it("creates again once the previous value expired", async () => {
      await store.setIfAbsent("k", "first", 1);
      vi.advanceTimersByTime(1_000);
      expect(await store.setIfAbsent("k", "second")).toBe(true);
      expect(await store.get("k")).toBe("second");
    });
  });

  describe("incrementWithExpiry", () => {
    it("sets the expiry only on the increment that creates the counter", async () => {
      expect(await store.incrementWithExpiry("c", 60)).toEqual({ count: 1, ttlSeconds: 60 });

      vi.advanceTimersByTime(20_000);
      expect(await store.incrementWithExpiry("c", 60)).toEqual({ count: 2, ttlSeconds: 40 });
      expect(await store.ttl("c")).toBe(40);
    });

    it("starts a new window after expiry", async () => {
      await store.incrementWithExpiry("c", 5);
      await store.incrementWithExpiry("c", 5);
      vi.advanceTimersByTime(5_000);
      expect(await store.incrementWithExpiry("c", 5)).toEqual({ count: 1, ttlSeconds: 5 });
    });
  });

  it("increments without expiry", async () => {
    expect(await store.increment("n")).toBe(1);
    expect(await store.increment("n")).toBe(2);
    expect(await store.ttl("n")).toBe(-1);
  });

  it("never decrements below zero", async () => {
    expect(await store.decrement("n")).toBe(0);
    await store.increment("n");
    expect(await store.decrement("n")).toBe(0);
    expect(await store.decrement("n")).toBe(0);
    expect(await store.get("n")).toBe("0");
  });

  it("reports -2 for missing keys and -1 for keys without expiry", async () => {
    expect(await store.ttl("missing")).toBe(-2);
    await store.set("forever", "x");
    expect(await store.ttl("forever")).toBe(-1);
  });

  it("expire attaches a TTL to an existing key only", async () => {
    await store.set("k", "v");
    await store.expire("k", 30);
    expect(await store.ttl("k")).toBe(30);

    await store.expire("missing", 30);
    expect(await store.exists("missing")).toBe(false);
  });

  it("del counts only live keys", async () => {
    await store.set("a", "1");
    await store.set("b", "2", 1);
    vi.advanceTimersByTime(1_000);
    expect(await store.del("a", "b", "c")).toBe(1);
    expect(await store.exists("a")).toBe(false);
  });

  it("lists keys matching a glob", async () => {
    await store.set("ratelimit:ip:1.2.3.4:auth", "1");
    await store.set("ratelimit:user:u1:auth", "1");
    await store.set("blocked:1.2.3.4", "x");

    expect((await store.keys("ratelimit:*")).sort()).toEqual([
      "ratelimit:ip:1.2.3.4:auth",
      "ratelimit:user:u1:auth",
    ]);
    expect(await store.keys("blocked:1.2.3.?")).toEqual(["blocked:1.2.3.4"]);
  });

  it("close drops every key", async () => {
    await store.set("k", "v");
    await store.close();
    expect(await store.exists("k")).toBe(false);
  });
});

describe("globToRegExp", () => {
  it("escapes regular expression characters", () => {
    const matcher = globToRegExp("a.b+c*");
    expect(matcher.test("a.b+cdef")).toBe(true);
    expect(matcher.test("axb+c")).toBe(false);
  });

  it("anchors the pattern", () => {
    expect(globToRegExp("key").test("my-key")).toBe(false);
  });
});
