/**
 * Rotation Scheduler
 *
 * Periodically rotates due secrets. The timer is unref'd so it never keeps
 * the process alive on its own.
 *
 * @module rotation/rotation-scheduler
 */

import type { Logger } from "pino";
import type { SecretRotationManager } from "./rotation-manager.js";
import type { RotationResult } from "./types.js";
import { getComponentLogger } from "../logging/index.js";

export class RotationScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private _logger: Logger | null = null;

  constructor(
    private readonly manager: SecretRotationManager,
    private readonly intervalMs: number
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("rotation:scheduler");
    }
    return this._logger;
  }

  start(): void {
    if (this.timer) {
      this.logger.debug("Rotation scheduler already running");
      return;
    }

    this.timer = setInterval(() => {
      void this.runCheck().catch((error: unknown) => {
        this.logger.error({ err: error }, "Scheduled rotation check failed");
      });
    }, this.intervalMs);
    this.timer.unref();

    this.logger.info({ intervalMs: this.intervalMs }, "Rotation scheduler started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info("Rotation scheduler stopped");
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Rotate everything due now and log one line per secret
   */
  async runCheck(): Promise<RotationResult[]> {
    this.logger.debug("Checking for secrets due for rotation");
    const results = await this.manager.rotateDueSecrets();
    for (const result of results) {
      const level = result.outcome === "failed" ? "warn" : "info";
      this.logger[level](
        { secret: result.secretName, outcome: result.outcome },
        "Scheduled rotation result"
      );
    }
    return results;
  }
}
