/**
 * Circuit Breaker
 *
 * CLOSED -> OPEN once failures exceed the threshold; OPEN -> HALF_OPEN once
 * the recovery timeout has elapsed since the last failure; a single trial
 * call in HALF_OPEN closes the circuit on success and reopens it on
 * failure. A success while CLOSED clears the failure count, so only
 * consecutive failures trip the breaker.
 *
 * State lives in the shared store under `circuit:<service>:*` and is
 * mirrored in a process-local registry that answers while the store is
 * unreachable.
 *
 * @module resilience/circuit-breaker
 */

import type { Logger } from "pino";
import type {
  CircuitBreakerOptions,
  CircuitSnapshot,
  CircuitState,
  CircuitStatus,
} from "./types.js";
import type { CircuitStateRegistry } from "./circuit-state-registry.js";
import { CircuitOpenError } from "../errors.js";
import type { SharedStore } from "../store/types.js";
import { getComponentLogger } from "../logging/index.js";
import { AuditEvents } from "../logging/audit-events.js";
import type { AuditLogger } from "../logging/audit-types.js";
import { Mutex } from "../utils/mutex.js";

/** Failure counters expire a day after the last increment created them */
const FAILURE_COUNT_TTL_SECONDS = 86_400;

function parseState(value: string | null): CircuitState {
  return value === "open" || value === "half_open" ? value : "closed";
}

export class CircuitBreaker {
  private readonly mutex = new Mutex();
  private readonly keys: { state: string; failures: string; lastFailure: string };
  private trialInFlight = false;
  private storeBacked = true;
  private _logger: Logger | null = null;

  constructor(
    public readonly serviceName: string,
    private readonly options: CircuitBreakerOptions,
    private readonly store: SharedStore,
    private readonly registry: CircuitStateRegistry,
    private readonly audit: AuditLogger
  ) {
    this.keys = {
      state: `circuit:${serviceName}:state`,
      failures: `circuit:${serviceName}:failures`,
      lastFailure: `circuit:${serviceName}:last_failure`,
    };
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger(`resilience:circuit:${this.serviceName}`);
    }
    return this._logger;
  }

  get failureThreshold(): number {
    return this.options.failureThreshold;
  }

  get recoveryTimeoutSeconds(): number {
    return this.options.recoveryTimeoutSeconds;
  }

  /**
   * Run `operation` through the breaker
   *
   * @throws {CircuitOpenError} Without invoking `operation` while OPEN (or
   *   while a HALF_OPEN trial is already running), and in place of the
   *   operation's error on the failure that opens the circuit
   */
  async call<T>(operation: () => Promise<T>): Promise<T> {
    const admittedAs = await this.mutex.runExclusive(() => this.admit());

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      const tripped = await this.mutex.runExclusive(() => this.recordFailure(admittedAs, error));
      throw tripped ?? error;
    }

    await this.mutex.runExclusive(() => this.recordSuccess(admittedAs));
    return result;
  }

  async getState(): Promise<CircuitState> {
    return (await this.readSnapshot()).state;
  }

  async getStatus(): Promise<CircuitStatus> {
    const snapshot = await this.readSnapshot();
    const status: CircuitStatus = {
      serviceName: this.serviceName,
      state: snapshot.state,
      failureCount: snapshot.failures,
      failureThreshold: this.options.failureThreshold,
      recoveryTimeoutSeconds: this.options.recoveryTimeoutSeconds,
      storeBacked: this.storeBacked,
    };
    if (snapshot.lastFailureAt !== null) {
      status.lastFailureAt = new Date(snapshot.lastFailureAt).toISOString();
    }
    return status;
  }

  /**
   * Force the circuit CLOSED with no recorded failures
   */
  async reset(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const snapshot = await this.readSnapshot();
      this.trialInFlight = false;
      await this.resetFailures();
      if (snapshot.state !== "closed") {
        await this.transition(snapshot.state, "closed", 0);
      }
    });
  }

  /**
   * Decide whether a call may proceed and in which state
   */
  private async admit(): Promise<CircuitSnapshot> {
    const snapshot = await this.readSnapshot();

    if (snapshot.state === "open") {
      const recoveryMs = this.options.recoveryTimeoutSeconds * 1000;
      if (snapshot.lastFailureAt === null) {
        // Open without a trip time: start the recovery clock now
        await this.stampLastFailure(Date.now());
        throw new CircuitOpenError(this.serviceName, this.options.recoveryTimeoutSeconds);
      }
      const elapsedMs = Date.now() - snapshot.lastFailureAt;
      if (elapsedMs < recoveryMs) {
        const retryAfter = Math.max(1, Math.ceil((recoveryMs - elapsedMs) / 1000));
        this.logger.debug({ retryAfter }, "Call rejected by open circuit");
        throw new CircuitOpenError(this.serviceName, retryAfter);
      }

      await this.transition("open", "half_open", snapshot.failures);
      this.trialInFlight = true;
      return { ...snapshot, state: "half_open" };
    }

    if (snapshot.state === "half_open") {
      if (this.trialInFlight) {
        throw new CircuitOpenError(this.serviceName, this.options.recoveryTimeoutSeconds);
      }
      this.trialInFlight = true;
    }

    return snapshot;
  }

  /**
   * @returns The error to raise instead of the operation's, if the circuit opened
   */
  private async recordFailure(
    admittedAs: CircuitSnapshot,
    error: unknown
  ): Promise<CircuitOpenError | undefined> {
    const isFailure = this.options.isFailure ?? (() => true);
    if (!isFailure(error)) {
      if (admittedAs.state === "half_open") {
        this.trialInFlight = false;
      }
      return undefined;
    }

    const failures = await this.incrementFailures();
    this.logger.warn(
      { err: error, failures, threshold: this.options.failureThreshold },
      "Protected call failed"
    );

    if (admittedAs.state === "half_open") {
      this.trialInFlight = false;
      await this.transition("half_open", "open", failures);
      return new CircuitOpenError(this.serviceName, this.options.recoveryTimeoutSeconds, error);
    }

    if (failures > this.options.failureThreshold) {
      const current = await this.readSnapshot();
      if (current.state !== "open") {
        await this.stampLastFailure(Date.now());
        await this.transition(current.state, "open", failures);
      }
      return new CircuitOpenError(this.serviceName, this.options.recoveryTimeoutSeconds, error);
    }

    return undefined;
  }

  private async recordSuccess(admittedAs: CircuitSnapshot): Promise<void> {
    if (admittedAs.state === "half_open") {
      this.trialInFlight = false;
      await this.resetFailures();
      await this.transition("half_open", "closed", 0);
      this.logger.info("Circuit recovered");
      return;
    }

    // A call admitted while CLOSED may finish after the circuit opened
    const current = await this.readSnapshot();
    if (current.state === "closed" && current.failures > 0) {
      await this.resetFailures();
    }
  }

  private async transition(from: CircuitState, to: CircuitState, failures: number): Promise<void> {
    this.registry.update(this.serviceName, { state: to });
    try {
      await this.store.set(this.keys.state, to);
    } catch (error) {
      this.storeBacked = false;
      this.logger.warn({ err: error, to }, "Failed to store circuit state, kept locally");
    }

    this.audit.emit(AuditEvents.circuitStateChanged(this.serviceName, from, to, failures));
    const level = to === "open" ? "warn" : "info";
    this.logger[level]({ from, to, failures }, "Circuit state changed");
  }

  private async incrementFailures(): Promise<number> {
    const now = Date.now();
    const local = this.registry.get(this.serviceName);
    const mirrored = this.registry.update(this.serviceName, {
      failures: local.failures + 1,
      lastFailureAt: now,
    });

    try {
      const { count } = await this.store.incrementWithExpiry(
        this.keys.failures,
        FAILURE_COUNT_TTL_SECONDS
      );
      await this.store.set(this.keys.lastFailure, new Date(now).toISOString());
      this.registry.update(this.serviceName, { failures: count });
      this.storeBacked = true;
      return count;
    } catch (error) {
      this.storeBacked = false;
      this.logger.warn({ err: error }, "Failed to store failure count, counting locally");
      return mirrored.failures;
    }
  }

  private async stampLastFailure(at: number): Promise<void> {
    this.registry.update(this.serviceName, { lastFailureAt: at });
    try {
      await this.store.set(this.keys.lastFailure, new Date(at).toISOString());
    } catch (error) {
      this.storeBacked = false;
      this.logger.warn({ err: error }, "Failed to store circuit trip time, kept locally");
    }
  }

  private async resetFailures(): Promise<void> {
    this.registry.update(this.serviceName, { failures: 0, lastFailureAt: null });
    try {
      await this.store.del(this.keys.failures, this.keys.lastFailure);
    } catch (error) {
      this.storeBacked = false;
      this.logger.warn({ err: error }, "Failed to clear stored failure count");
    }
  }

  /**
   * Current state from the store, or the local mirror when the store fails
   */
  private async readSnapshot(): Promise<CircuitSnapshot> {
    try {
      const [state, failures, lastFailure] = await Promise.all([
        this.store.get(this.keys.state),
        this.store.get(this.keys.failures),
        this.store.get(this.keys.lastFailure),
      ]);
      const parsedFailure = lastFailure === null ? NaN : Date.parse(lastFailure);
      const snapshot: CircuitSnapshot = {
        state: parseState(state),
        failures: failures === null ? 0 : Number.parseInt(failures, 10) || 0,
        lastFailureAt: Number.isNaN(parsedFailure) ? null : parsedFailure,
      };
      this.registry.set(this.serviceName, snapshot);
      this.storeBacked = true;
      return snapshot;
    } catch (error) {
      this.storeBacked = false;
      this.logger.warn({ err: error }, "Shared store unavailable, using local circuit state");
      return this.registry.get(this.serviceName);
    }
  }
}
