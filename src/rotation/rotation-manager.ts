/**
 * Secret Rotation Manager
 *
 * Owns one schedule and one handler per secret. A rotation backs up the
 * current value (as a hash), generates, validates and applies a candidate,
 * then advances the schedule. Any failing step records a failed history
 * entry and leaves the schedule where it was. A rotation whose new value was
 * applied stays rotated even when the schedule file cannot be written; the
 * in-memory state goes out with the next successful save.
 *
 * @module rotation/rotation-manager
 */

import crypto from "node:crypto";
import type { Logger } from "pino";
import type {
  RotationConfig,
  RotationHandler,
  RotationHistoryRecord,
  RotationResult,
  RotationSchedule,
  RotationStatus,
} from "./types.js";
import type { RotationScheduleStore } from "./schedule-store.js";
import { MAX_ROTATION_HISTORY } from "./schedule-store.js";
import {
  advanceSchedule,
  createSchedule,
  daysUntilRotation,
  isDueForRotation,
} from "./schedule.js";
import { getComponentLogger } from "../logging/index.js";
import { AuditEvents } from "../logging/audit-events.js";
import type { AuditLogger } from "../logging/audit-types.js";
import { Mutex } from "../utils/mutex.js";

export class SecretRotationManager {
  private readonly schedules = new Map<string, RotationSchedule>();
  private readonly handlers = new Map<string, RotationHandler>();
  private history: RotationHistoryRecord[] = [];
  private readonly mutex = new Mutex();
  private loaded = false;
  private _logger: Logger | null = null;

  constructor(
    private readonly store: RotationScheduleStore,
    private readonly audit: AuditLogger,
    private readonly config: RotationConfig
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("rotation");
    }
    return this._logger;
  }

  /**
   * Register a handler; a schedule is created for it on first registration
   * using the configured interval for its secret type
   */
  registerHandler(handler: RotationHandler, rotationDays?: number): void {
    this.handlers.set(handler.secretName, handler);
    if (!this.schedules.has(handler.secretName)) {
      this.schedules.set(
        handler.secretName,
        createSchedule(
          handler.secretName,
          handler.secretType,
          rotationDays ?? this.config.intervalDays[handler.secretType]
        )
      );
    }
    this.logger.debug({ secret: handler.secretName }, "Registered rotation handler");
  }

  /**
   * Load persisted schedules and history
   *
   * Persisted schedules replace the defaults created at registration.
   */
  async load(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const file = await this.store.load();
      if (file) {
        for (const [name, schedule] of Object.entries(file.schedules)) {
          this.schedules.set(name, schedule);
        }
        this.history = file.history;
      }
      this.loaded = true;
      this.logger.info({ scheduleCount: this.schedules.size }, "Rotation schedules loaded");
    });
  }

  /**
   * Rotate one secret
   *
   * A no-op unless the schedule is due or `force` is set.
   */
  async rotate(secretName: string, force: boolean = false): Promise<RotationResult> {
    return this.mutex.runExclusive(() => this.rotateLocked(secretName, force));
  }

  /**
   * Rotate every secret whose schedule is due
   *
   * One secret's failure does not stop the others; it shows up as a
   * `failed` result.
   */
  async rotateDueSecrets(): Promise<RotationResult[]> {
    const results: RotationResult[] = [];
    for (const [name, schedule] of [...this.schedules]) {
      if (!isDueForRotation(schedule)) {
        continue;
      }
      try {
        results.push(await this.rotate(name));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error({ err: error, secret: name }, "Rotation attempt aborted");
        results.push({ secretName: name, outcome: "failed", error: message });
      }
    }
    return results;
  }

  getSchedule(secretName: string): RotationSchedule | undefined {
    const schedule = this.schedules.get(secretName);
    return schedule ? { ...schedule } : undefined;
  }

  getRotationStatus(): RotationStatus[] {
    const now = Date.now();
    return [...this.schedules.values()].map((schedule) => ({
      secretName: schedule.secretName,
      secretType: schedule.secretType,
      rotationDays: schedule.rotationDays,
      lastRotated: schedule.lastRotated,
      nextRotation: schedule.nextRotation,
      daysUntilRotation: daysUntilRotation(schedule, now),
      dueForRotation: isDueForRotation(schedule, now),
      rotationCount: schedule.rotationCount,
    }));
  }

  /** Most recent attempts, oldest first */
  getRotationHistory(limit: number = 20): RotationHistoryRecord[] {
    return this.history.slice(-limit);
  }

  private async rotateLocked(secretName: string, force: boolean): Promise<RotationResult> {
    const handler = this.handlers.get(secretName);
    const schedule = this.schedules.get(secretName);
    if (!handler || !schedule) {
      this.logger.error({ secret: secretName }, "No rotation handler registered");
      return { secretName, outcome: "unknown_secret" };
    }

    if (!force && !isDueForRotation(schedule)) {
      this.logger.info(
        { secret: secretName, daysRemaining: daysUntilRotation(schedule) },
        "Secret not due for rotation"
      );
      return { secretName, outcome: "not_due", schedule: { ...schedule } };
    }

    const startTime = performance.now();
    this.logger.info({ secret: secretName, force }, "Starting secret rotation");

    let oldSecretHash: string | undefined;
    try {
      const current = await handler.backupCurrent();
      oldSecretHash =
        current === undefined
          ? undefined
          : crypto.createHash("sha256").update(current).digest("hex");

      const candidate = handler.generate();
      const validation = handler.validate(candidate);
      if (!validation.valid) {
        throw new Error(`Generated secret failed validation: ${validation.reason ?? "invalid"}`);
      }

      await handler.apply(candidate);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error, secret: secretName }, "Secret rotation failed");
      await this.record({
        secretName,
        timestamp: new Date().toISOString(),
        success: false,
        error: message,
      });
      this.audit.emit(
        AuditEvents.secretRotated(secretName, false, schedule.rotationCount, message)
      );
      return { secretName, outcome: "failed", schedule: { ...schedule }, error: message };
    }

    const next = advanceSchedule(schedule);
    this.schedules.set(secretName, next);
    const record: RotationHistoryRecord = {
      secretName,
      timestamp: next.lastRotated,
      success: true,
    };
    if (oldSecretHash !== undefined) {
      record.oldSecretHash = oldSecretHash;
    }
    await this.record(record);

    this.audit.emit(AuditEvents.secretRotated(secretName, true, next.rotationCount));
    this.logger.info(
      {
        metric: "rotation.duration_ms",
        value: Math.round(performance.now() - startTime),
        secret: secretName,
        rotationCount: next.rotationCount,
        nextRotation: next.nextRotation,
      },
      "Secret rotated"
    );

    return { secretName, outcome: "rotated", schedule: { ...next } };
  }

  private async record(entry: RotationHistoryRecord): Promise<void> {
    this.history.push(entry);
    if (this.history.length > MAX_ROTATION_HISTORY) {
      this.history.splice(0, this.history.length - MAX_ROTATION_HISTORY);
    }
    try {
      await this.persist();
    } catch (error) {
      this.logger.error(
        { err: error, secret: entry.secretName },
        "Failed to save rotation schedules, kept in memory"
      );
    }
  }

  private async persist(): Promise<void> {
    if (!this.loaded) {
      this.logger.warn("Persisting rotation schedules before load(); earlier history is replaced");
    }
    await this.store.save({
      version: "1.0",
      schedules: Object.fromEntries(this.schedules),
      history: this.history,
    });
  }
}
