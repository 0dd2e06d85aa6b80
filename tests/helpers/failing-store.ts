/**
 * Failing Shared Store
 *
 * A SharedStore whose every operation raises StoreUnavailableError, standing
 * in for an unreachable Redis. `ping` resolves false like the real client.
 *
 * @module tests/helpers/failing-store
 */

import { StoreUnavailableError } from "../../src/store/errors.js";
import type { IncrementResult, SharedStore } from "../../src/store/types.js";

function unavailable(operation: string): Promise<never> {
  return Promise.reject(new StoreUnavailableError(operation, "connection refused"));
}

export class FailingSharedStore implements SharedStore {
  readonly kind = "redis" as const;

  /** Operations attempted, in order */
  public readonly calls: string[] = [];

  async ping(): Promise<boolean> {
    this.calls.push("ping");
    return false;
  }

  get(_key: string): Promise<string | null> {
    this.calls.push("get");
    return unavailable("get");
  }

  set(_key: string, _value: string, _ttlSeconds?: number): Promise<void> {
    this.calls.push("set");
    return unavailable("set");
  }

  setIfAbsent(_key: string, _value: string, _ttlSeconds?: number): Promise<boolean> {
    this.calls.push("setIfAbsent");
    return unavailable("setIfAbsent");
  }

  incrementWithExpiry(_key: string, _ttlSeconds: number): Promise<IncrementResult> {
    this.calls.push("incrementWithExpiry");
    return unavailable("incrementWithExpiry");
  }

  increment(_key: string): Promise<number> {
    this.calls.push("increment");
    return unavailable("increment");
  }

  decrement(_key: string): Promise<number> {
    this.calls.push("decrement");
    return unavailable("decrement");
  }

  ttl(_key: string): Promise<number> {
    this.calls.push("ttl");
    return unavailable("ttl");
  }

  expire(_key: string, _ttlSeconds: number): Promise<void> {
    this.calls.push("expire");
    return unavailable("expire");
  }

  del(..._keys: string[]): Promise<number> {
    this.calls.push("del");
    return unavailable("del");
  }

  exists(_key: string): Promise<boolean> {
    this.calls.push("exists");
    return unavailable("exists");
  }

  keys(_pattern: string): Promise<string[]> {
    this.calls.push("keys");
    return unavailable("keys");
  }

  async close(): Promise<void> {
    this.calls.push("close");
  }
}
