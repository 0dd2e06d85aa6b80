/**
 * Audit Logger Service
 *
 * Append-only security event log with:
 * - Bounded in-memory window of the most recent events
 * - Durable JSON file of the same window, rewritten atomically
 * - Fire-and-forget emission (writes are coalesced off the request path)
 * - Write-failure circuit breaker so a broken disk cannot flood the app log
 * - Query helpers by subject, by type and by recency
 *
 * @module logging/audit-logger
 */

import type { Logger } from "pino";
import { getComponentLogger } from "./logger-factory.js";
import { AuditLogFileSchema } from "./audit-validation.js";
import { readJsonFile, writeJsonFileAtomic } from "../utils/json-file.js";
import type {
  AuditConfig,
  AuditEvent,
  AuditEventType,
  AuditLogFile,
  AuditLogger,
} from "./audit-types.js";

/**
 * Durable-write circuit breaker settings
 */
const WRITE_BREAKER = {
  /** Consecutive write failures before writes are suspended */
  FAILURE_THRESHOLD: 5,
  /** How long writes stay suspended */
  RESET_TIMEOUT_MS: 60_000,
} as const;

export const DEFAULT_AUDIT_CONFIG: AuditConfig = {
  enabled: true,
  logPath: "./data/audit/audit.json",
  maxEvents: 1000,
};

export class AuditLoggerImpl implements AuditLogger {
  private readonly config: AuditConfig;
  private _logger: Logger | null = null;

  private events: AuditEvent[] = [];
  private totalEvents = 0;

  private dirty = false;
  private writeChain: Promise<void> = Promise.resolve();
  private failureCount = 0;
  private suspendedUntil = 0;

  constructor(config: AuditConfig = DEFAULT_AUDIT_CONFIG) {
    this.config = config;
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("audit");
    }
    return this._logger;
  }

  /**
   * Load the persisted window
   *
   * A missing or unreadable file starts an empty log; audit loading never
   * prevents startup.
   */
  async load(): Promise<void> {
    if (!this.config.enabled) {
      this.logger.info("Audit logging is disabled");
      return;
    }

    try {
      const raw = await readJsonFile(this.config.logPath);
      if (raw === undefined) {
        this.logger.debug({ logPath: this.config.logPath }, "No audit log found, starting fresh");
        return;
      }

      const parsed = AuditLogFileSchema.parse(raw);
      this.events = parsed.events.slice(-this.config.maxEvents);
      this.totalEvents = Math.max(parsed.totalEvents, this.events.length);
      this.logger.info(
        { logPath: this.config.logPath, eventCount: this.events.length },
        "Audit log loaded"
      );
    } catch (error) {
      this.logger.error(
        { err: error, logPath: this.config.logPath },
        "Failed to load audit log, starting fresh"
      );
    }
  }

  emit(event: AuditEvent): void {
    if (!this.config.enabled) {
      return;
    }

    this.events.push(event);
    this.totalEvents++;
    if (this.events.length > this.config.maxEvents) {
      this.events.splice(0, this.events.length - this.config.maxEvents);
    }

    const summary = {
      eventType: event.eventType,
      subjectId: event.subjectId,
      sourceIp: event.sourceIp,
      status: event.status,
    };
    if (event.status === "success") {
      this.logger.info(summary, event.description ?? event.eventType);
    } else {
      this.logger.warn(summary, event.description ?? event.eventType);
    }

    this.scheduleWrite();
  }

  getUserEvents(subjectId: string, limit: number = 100): AuditEvent[] {
    return this.newestFirst((event) => event.subjectId === subjectId, limit);
  }

  getEventsByType(eventType: AuditEventType, limit: number = 100): AuditEvent[] {
    return this.newestFirst((event) => event.eventType === eventType, limit);
  }

  getRecentEvents(limit: number = 50): AuditEvent[] {
    return this.newestFirst(() => true, limit);
  }

  /** Events recorded since the log was created, including trimmed ones */
  getTotalEvents(): number {
    return this.totalEvents;
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  /** Whether durable writes are currently suspended after repeated failures */
  isWriteSuspended(): boolean {
    return Date.now() < this.suspendedUntil;
  }

  getLogPath(): string {
    return this.config.logPath;
  }

  private newestFirst(predicate: (event: AuditEvent) => boolean, limit: number): AuditEvent[] {
    const matches: AuditEvent[] = [];
    for (let i = this.events.length - 1; i >= 0 && matches.length < limit; i--) {
      const event = this.events[i];
      if (event && predicate(event)) {
        matches.push(event);
      }
    }
    return matches;
  }

  /**
   * Queue one coalesced write; events emitted while a write is pending ride
   * along with it.
   */
  private scheduleWrite(): void {
    if (this.dirty) {
      return;
    }
    this.dirty = true;
    this.writeChain = this.writeChain.then(() => this.writeSnapshot());
  }

  private async writeSnapshot(): Promise<void> {
    this.dirty = false;

    if (this.isWriteSuspended()) {
      this.logger.debug("Audit write skipped (write breaker open)");
      return;
    }

    const file: AuditLogFile = {
      version: "1.0",
      events: [...this.events],
      totalEvents: this.totalEvents,
    };

    try {
      await writeJsonFileAtomic(this.config.logPath, file);
      if (this.failureCount > 0) {
        this.failureCount = 0;
        this.logger.info("Audit log writes recovered");
      }
    } catch (error) {
      this.failureCount++;
      this.logger.warn(
        {
          err: error,
          failureCount: this.failureCount,
          threshold: WRITE_BREAKER.FAILURE_THRESHOLD,
        },
        "Audit log write failed"
      );

      if (this.failureCount >= WRITE_BREAKER.FAILURE_THRESHOLD) {
        this.suspendedUntil = Date.now() + WRITE_BREAKER.RESET_TIMEOUT_MS;
        this.failureCount = 0;
        this.logger.error(
          { resumeAt: new Date(this.suspendedUntil).toISOString() },
          "Audit log writes suspended after repeated failures"
        );
      }
    }
  }
}
