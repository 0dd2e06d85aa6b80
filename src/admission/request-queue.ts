/**
 * Request Queue
 *
 * Bounded FIFO of requests told to retry while the service is at capacity.
 * `enqueue` refuses new entries once full; `dequeue` hands out the oldest
 * entry unless it has waited longer than the max wait, in which case it is
 * discarded and nothing is returned.
 *
 * `receive` waits up to a timeout for a fresh entry. Queue operations are
 * synchronous, so they never interleave.
 *
 * @module admission/request-queue
 */

import type { Logger } from "pino";
import type { QueuedRequest } from "./types.js";
import { getComponentLogger } from "../logging/index.js";

interface Waiter<T> {
  resolve: (entry: QueuedRequest<T> | undefined) => void;
  timer: NodeJS.Timeout;
}

export class RequestQueue<T> {
  private entries: QueuedRequest<T>[] = [];
  private waiters: Waiter<T>[] = [];
  private _logger: Logger | null = null;

  constructor(
    public readonly capacity: number,
    public readonly maxWaitSeconds: number
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("admission:queue");
    }
    return this._logger;
  }

  /**
   * @returns false when the queue is full
   */
  enqueue(id: string, data: T): boolean {
    const entry: QueuedRequest<T> = { id, data, enqueuedAt: Date.now() };

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(entry);
      return true;
    }

    if (this.entries.length >= this.capacity) {
      this.logger.warn({ id, capacity: this.capacity }, "Request queue full");
      return false;
    }

    this.entries.push(entry);
    return true;
  }

  /**
   * Oldest entry, or undefined when empty or when the oldest was stale
   * (the stale entry is dropped)
   */
  dequeue(): QueuedRequest<T> | undefined {
    const entry = this.entries.shift();
    if (!entry) {
      return undefined;
    }

    if (this.isStale(entry, Date.now())) {
      this.logger.debug({ id: entry.id }, "Discarded stale queued request");
      return undefined;
    }
    return entry;
  }

  /**
   * Wait up to `timeoutMs` for a fresh entry
   *
   * Stale entries at the head are skipped.
   */
  receive(timeoutMs: number): Promise<QueuedRequest<T> | undefined> {
    const now = Date.now();
    while (this.entries.length > 0) {
      const entry = this.entries.shift();
      if (entry && !this.isStale(entry, now)) {
        return Promise.resolve(entry);
      }
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
          resolve(undefined);
        }, timeoutMs),
      };
      waiter.timer.unref();
      this.waiters.push(waiter);
    });
  }

  /**
   * Drop every entry past the max wait
   *
   * @returns Number of entries dropped
   */
  purgeStale(): number {
    const now = Date.now();
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => !this.isStale(entry, now));
    return before - this.entries.length;
  }

  size(): number {
    return this.entries.length;
  }

  isFull(): boolean {
    return this.entries.length >= this.capacity;
  }

  /**
   * Empty the queue and release pending receivers with undefined
   */
  clear(): void {
    this.entries = [];
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
    this.waiters = [];
  }

  private isStale(entry: QueuedRequest<T>, now: number): boolean {
    return now - entry.enqueuedAt > this.maxWaitSeconds * 1000;
  }
}
