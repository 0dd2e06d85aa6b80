/**
 * Shared Store Types
 *
 * The shared store is the only cross-instance coordination point: rate
 * counters, circuit breaker state, IP blocks and violation counters live
 * here. Every mutation is a single atomic operation with an optional expiry;
 * there is no distributed lock.
 *
 * @module store/types
 */

/**
 * Result of an atomic increment that sets expiry on first use
 */
export interface IncrementResult {
  /** Counter value after the increment */
  count: number;

  /** Remaining seconds before the counter expires */
  ttlSeconds: number;
}

/**
 * Which implementation is behind a store
 */
export type SharedStoreKind = "redis" | "memory";

/**
 * Key/counter store shared by all instances
 *
 * Implementations raise StoreUnavailableError for any backend failure so
 * callers can apply their own fail-open or fail-closed policy.
 */
export interface SharedStore {
  readonly kind: SharedStoreKind;

  /** Check connectivity; false instead of throwing */
  ping(): Promise<boolean>;

  get(key: string): Promise<string | null>;

  set(key: string, value: string, ttlSeconds?: number): Promise<void>;

  /**
   * Set only when the key does not exist
   *
   * @returns true if this call created the key
   */
  setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean>;

  /**
   * Atomically increment a counter, setting its expiry only when this
   * increment created it
   */
  incrementWithExpiry(key: string, ttlSeconds: number): Promise<IncrementResult>;

  /** Increment without touching expiry */
  increment(key: string): Promise<number>;

  /** Decrement, never below zero */
  decrement(key: string): Promise<number>;

  /**
   * Remaining lifetime in seconds
   *
   * @returns -2 when the key does not exist, -1 when it has no expiry
   */
  ttl(key: string): Promise<number>;

  expire(key: string, ttlSeconds: number): Promise<void>;

  del(...keys: string[]): Promise<number>;

  exists(key: string): Promise<boolean>;

  /** Keys matching a glob pattern (`*` and `?`) */
  keys(pattern: string): Promise<string[]>;

  close(): Promise<void>;
}

/**
 * Shared store connection settings
 */
export interface StoreConfig {
  /** Redis connection URL; absent means process-local only */
  redisUrl?: string;

  /** Prefix applied to every key */
  keyPrefix: string;

  /** Connection timeout in milliseconds */
  connectTimeoutMs: number;
}
