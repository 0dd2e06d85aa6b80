/**
 * Redis Shared Store
 *
 * SharedStore on ioredis. Increment-with-expiry runs as one MULTI block so the
 * expiry is attached only by the increment that creates the counter, and a
 * concurrent increment cannot observe a counter without a TTL.
 *
 * @module store/redis-store
 */

import { Redis } from "ioredis";
import type { Logger } from "pino";
import type { IncrementResult, SharedStore, StoreConfig } from "./types.js";
import { StoreUnavailableError } from "./errors.js";
import { getComponentLogger } from "../logging/index.js";

/**
 * Decrement floored at zero, atomically
 */
const DECREMENT_FLOORED_SCRIPT = `
local value = redis.call('DECR', KEYS[1])
if value < 0 then
  redis.call('SET', KEYS[1], '0')
  value = 0
end
return value
`;

function toNumber(value: unknown, fallback: number): number {
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? fallback : parsed;
  }
  return fallback;
}

export class RedisSharedStore implements SharedStore {
  readonly kind = "redis" as const;

  private readonly client: Redis;
  private readonly keyPrefix: string;
  private _logger: Logger | null = null;

  /**
   * @param config - Connection settings; `redisUrl` is required here
   * @param client - Pre-built client, for callers that manage their own
   */
  constructor(config: StoreConfig, client?: Redis) {
    this.keyPrefix = config.keyPrefix;
    this.client =
      client ??
      new Redis(config.redisUrl ?? "redis://localhost:6379", {
        lazyConnect: true,
        connectTimeout: config.connectTimeoutMs,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
      });

    this.client.on("error", (error: Error) => {
      this.logger.warn({ err: error }, "Redis connection error");
    });
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("store:redis");
    }
    return this._logger;
  }

  /**
   * Open the connection
   *
   * @throws {StoreUnavailableError} If the server cannot be reached
   */
  async connect(): Promise<void> {
    if (this.client.status === "ready") {
      return;
    }
    await this.run("connect", () => this.client.connect());
    this.logger.info({ keyPrefix: this.keyPrefix || undefined }, "Connected to shared store");
  }

  async ping(): Promise<boolean> {
    try {
      const reply = await this.client.ping();
      return reply === "PONG";
    } catch (error) {
      this.logger.debug({ err: error }, "Shared store ping failed");
      return false;
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run("get", () => this.client.get(this.k(key)));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.run("set", () =>
      ttlSeconds === undefined
        ? this.client.set(this.k(key), value)
        : this.client.set(this.k(key), value, "EX", ttlSeconds)
    );
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const reply = await this.run("setIfAbsent", () =>
      ttlSeconds === undefined
        ? this.client.set(this.k(key), value, "NX")
        : this.client.set(this.k(key), value, "EX", ttlSeconds, "NX")
    );
    return reply === "OK";
  }

  async incrementWithExpiry(key: string, ttlSeconds: number): Promise<IncrementResult> {
    const fullKey = this.k(key);
    const results = await this.run("incrementWithExpiry", () =>
      this.client
        .multi()
        .set(fullKey, "0", "EX", ttlSeconds, "NX")
        .incr(fullKey)
        .ttl(fullKey)
        .exec()
    );

    if (!results) {
      throw new StoreUnavailableError("incrementWithExpiry", "transaction aborted");
    }

    for (const [error] of results) {
      if (error) {
        throw new StoreUnavailableError("incrementWithExpiry", error.message, error);
      }
    }

    const count = toNumber(results[1]?.[1], 0);
    const ttl = toNumber(results[2]?.[1], ttlSeconds);
    return { count, ttlSeconds: ttl < 0 ? ttlSeconds : ttl };
  }

  async increment(key: string): Promise<number> {
    return this.run("increment", () => this.client.incr(this.k(key)));
  }

  async decrement(key: string): Promise<number> {
    const reply = await this.run("decrement", () =>
      this.client.eval(DECREMENT_FLOORED_SCRIPT, 1, this.k(key))
    );
    return toNumber(reply, 0);
  }

  async ttl(key: string): Promise<number> {
    return this.run("ttl", () => this.client.ttl(this.k(key)));
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.run("expire", () => this.client.expire(this.k(key), ttlSeconds));
  }

  async del(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.run("del", () => this.client.del(...keys.map((key) => this.k(key))));
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.run("exists", () => this.client.exists(this.k(key)));
    return count > 0;
  }

  async keys(pattern: string): Promise<string[]> {
    const matches = await this.run("keys", () => this.client.keys(this.k(pattern)));
    return matches.map((key) => key.slice(this.keyPrefix.length));
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.debug({ err: error }, "Shared store quit failed, disconnecting");
      this.client.disconnect();
    }
  }

  private k(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      throw new StoreUnavailableError(
        operation,
        error instanceof Error ? error.message : String(error),
        cause
      );
    }
  }
}
