/**
 * Backpressure Manager
 *
 * Combines the concurrency gate, the retry queue and a system-load probe.
 * `admit` runs a handler inside a concurrency slot; when no slot is free the
 * request is queued and the caller told to retry, or rejected outright when
 * the queue is full. Nothing is dropped silently.
 *
 * The load probe only drives the `overloaded` flag used for diagnostics and
 * alerting; admission is decided by the concurrency ceiling.
 *
 * @module admission/backpressure-manager
 */

import os from "node:os";
import type { Logger } from "pino";
import type { AdmissionConfig, AdmissionTicket, BackpressureStatus, LoadProbe } from "./types.js";
import type { RequestQueue } from "./request-queue.js";
import type { RequestValidator } from "./request-validator.js";
import { DEFAULT_ADMISSION_CONFIG } from "./request-validator.js";
import { OverloadedError } from "../errors.js";
import { getComponentLogger } from "../logging/index.js";

/**
 * 1-minute load average per core
 *
 * Platforms without load averages report 0.
 */
export const systemLoadProbe: LoadProbe = () => {
  const cores = os.cpus().length || 1;
  return (os.loadavg()[0] ?? 0) / cores;
};

export class BackpressureManager {
  private overloaded = false;
  private lastLoadRatio = 0;
  private _logger: Logger | null = null;

  constructor(
    private readonly validator: RequestValidator,
    private readonly queue: RequestQueue<AdmissionTicket>,
    private readonly config: AdmissionConfig = DEFAULT_ADMISSION_CONFIG,
    private readonly loadProbe: LoadProbe = systemLoadProbe
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("admission:backpressure");
    }
    return this._logger;
  }

  /**
   * Sample system load and update the overloaded flag
   *
   * @returns Load average per core
   */
  checkSystemLoad(): number {
    const ratio = this.loadProbe();
    const wasOverloaded = this.overloaded;
    this.lastLoadRatio = ratio;
    this.overloaded = ratio > this.config.cpuOverloadThreshold;

    if (this.overloaded !== wasOverloaded) {
      const level = this.overloaded ? "warn" : "info";
      this.logger[level](
        { loadRatio: ratio, threshold: this.config.cpuOverloadThreshold },
        this.overloaded ? "System overloaded" : "System load back to normal"
      );
    }
    return ratio;
  }

  isOverloaded(): boolean {
    this.checkSystemLoad();
    return this.overloaded;
  }

  async getStatus(): Promise<BackpressureStatus> {
    this.checkSystemLoad();
    return {
      overloaded: this.overloaded,
      loadRatio: this.lastLoadRatio,
      cpuThreshold: this.config.cpuOverloadThreshold,
      queueSize: this.queue.size(),
      queueCapacity: this.queue.capacity,
      concurrentRequests: await this.validator.getConcurrentCount(),
      maxConcurrentRequests: this.config.maxConcurrentRequests,
    };
  }

  /**
   * Run `handler` in a concurrency slot
   *
   * @throws {OverloadedError} status "queued" with a retry hint when no slot
   *   is free, or "rejected" when the queue is also full
   */
  async admit<T>(ticket: AdmissionTicket, handler: () => Promise<T>): Promise<T> {
    if (!(await this.validator.tryAcquireSlot())) {
      if (this.queue.enqueue(ticket.requestId, ticket)) {
        this.logger.info(
          { requestId: ticket.requestId, queueSize: this.queue.size() },
          "At capacity, request queued"
        );
        throw new OverloadedError(
          "Server overloaded, request queued",
          "queued",
          this.config.queuedRetryAfterSeconds
        );
      }

      this.logger.warn(
        { requestId: ticket.requestId },
        "At capacity and queue full, request rejected"
      );
      throw new OverloadedError("Server overloaded, cannot queue request", "rejected");
    }

    try {
      return await handler();
    } finally {
      await this.validator.decrementConcurrent();
      // A freed slot retires the oldest retry ticket
      this.queue.dequeue();
    }
  }
}
