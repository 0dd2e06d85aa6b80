/**
 * Process-Local Shared Store
 *
 * Map-backed implementation of SharedStore with the same expiry semantics as
 * the Redis implementation. Used when no shared store is configured and as
 * the store in tests. Guarantees hold only within one process.
 *
 * @module store/memory-store
 */

import type { IncrementResult, SharedStore } from "./types.js";

interface MemoryEntry {
  value: string;
  /** Epoch milliseconds, or null for no expiry */
  expiresAt: number | null;
}

/**
 * Convert a glob pattern (`*`, `?`) into an anchored regular expression
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split("")
    .map((char) => {
      if (char === "*") return ".*";
      if (char === "?") return ".";
      return char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${escaped}$`);
}

export class MemorySharedStore implements SharedStore {
  readonly kind = "memory" as const;

  private readonly entries = new Map<string, MemoryEntry>();

  async ping(): Promise<boolean> {
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.expiryFrom(ttlSeconds) });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: this.expiryFrom(ttlSeconds) });
    return true;
  }

  async incrementWithExpiry(key: string, ttlSeconds: number): Promise<IncrementResult> {
    const existing = this.live(key);
    if (!existing) {
      this.entries.set(key, { value: "1", expiresAt: this.expiryFrom(ttlSeconds) });
      return { count: 1, ttlSeconds };
    }

    const count = this.toInt(existing.value) + 1;
    existing.value = String(count);
    return { count, ttlSeconds: this.remaining(existing) };
  }

  async increment(key: string): Promise<number> {
    const existing = this.live(key);
    if (!existing) {
      this.entries.set(key, { value: "1", expiresAt: null });
      return 1;
    }
    const count = this.toInt(existing.value) + 1;
    existing.value = String(count);
    return count;
  }

  async decrement(key: string): Promise<number> {
    const existing = this.live(key);
    if (!existing) {
      return 0;
    }
    const count = Math.max(0, this.toInt(existing.value) - 1);
    existing.value = String(count);
    return count;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return this.remaining(entry);
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    const entry = this.live(key);
    if (entry) {
      entry.expiresAt = this.expiryFrom(ttlSeconds);
    }
  }

  async del(...keys: string[]): Promise<number> {
    let deleted = 0;
    for (const key of keys) {
      if (this.live(key) && this.entries.delete(key)) {
        deleted++;
      }
    }
    return deleted;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async keys(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    return [...this.entries.keys()].filter((key) => this.live(key) && matcher.test(key));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /** Entry if present and unexpired; expired entries are dropped on access */
  private live(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiryFrom(ttlSeconds: number | undefined): number | null {
    return ttlSeconds === undefined ? null : Date.now() + ttlSeconds * 1000;
  }

  private remaining(entry: MemoryEntry): number {
    if (entry.expiresAt === null) return -1;
    return Math.max(0, Math.ceil((entry.expiresAt - Date.now()) / 1000));
  }

  private toInt(value: string): number {
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? 0 : parsed;
  }
}
