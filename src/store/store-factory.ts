/**
 * Shared Store Factory
 *
 * @module store/store-factory
 */

import type { SharedStore, StoreConfig } from "./types.js";
import { MemorySharedStore } from "./memory-store.js";
import { RedisSharedStore } from "./redis-store.js";
import { getComponentLogger } from "../logging/index.js";

/**
 * Build the shared store for the configured backend
 *
 * With a Redis URL the Redis store is returned even when the first connect
 * fails; ioredis keeps reconnecting and each component applies its own
 * outage policy per call. Without one, a process-local store is used.
 */
export async function createSharedStore(config: StoreConfig): Promise<SharedStore> {
  const logger = getComponentLogger("store");

  if (!config.redisUrl) {
    logger.info("No REDIS_URL configured, using process-local store");
    return new MemorySharedStore();
  }

  const store = new RedisSharedStore(config);
  try {
    await store.connect();
  } catch (error) {
    logger.warn(
      { err: error },
      "Shared store unreachable at startup; components will use their outage policy"
    );
  }
  return store;
}
