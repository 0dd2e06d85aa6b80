/**
 * Circuit Breaker Manager
 *
 * Registry of named breakers sharing one store, one audit sink and one
 * process-local state mirror.
 *
 * @module resilience/circuit-breaker-manager
 */

import type { Logger } from "pino";
import type { CircuitBreakerOptions, CircuitStatus } from "./types.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import { CircuitStateRegistry } from "./circuit-state-registry.js";
import { CircuitOpenError } from "../errors.js";
import type { SharedStore } from "../store/types.js";
import { getComponentLogger } from "../logging/index.js";
import type { AuditLogger } from "../logging/audit-types.js";

/**
 * Known dependencies of the simulation API
 */
export const DEFAULT_CIRCUIT_PRESETS: Readonly<Record<string, CircuitBreakerOptions>> = {
  cbo_scraper: { failureThreshold: 3, recoveryTimeoutSeconds: 300 },
  database: { failureThreshold: 5, recoveryTimeoutSeconds: 60 },
  external_api: { failureThreshold: 5, recoveryTimeoutSeconds: 120 },
};

export const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  recoveryTimeoutSeconds: 60,
};

export class CircuitBreakerManager {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private _logger: Logger | null = null;

  constructor(
    private readonly store: SharedStore,
    private readonly audit: AuditLogger,
    private readonly registry: CircuitStateRegistry = new CircuitStateRegistry(),
    private readonly presets: Readonly<
      Record<string, CircuitBreakerOptions>
    > = DEFAULT_CIRCUIT_PRESETS
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("resilience:circuits");
    }
    return this._logger;
  }

  /**
   * Register a breaker; an existing breaker of the same name is returned as is
   *
   * Options default to the preset for `serviceName`, if any.
   */
  register(serviceName: string, options?: CircuitBreakerOptions): CircuitBreaker {
    const existing = this.breakers.get(serviceName);
    if (existing) {
      return existing;
    }

    const resolved = options ?? this.presets[serviceName] ?? DEFAULT_CIRCUIT_OPTIONS;
    const breaker = new CircuitBreaker(
      serviceName,
      resolved,
      this.store,
      this.registry,
      this.audit
    );
    this.breakers.set(serviceName, breaker);
    this.logger.debug(
      {
        serviceName,
        failureThreshold: resolved.failureThreshold,
        recoveryTimeoutSeconds: resolved.recoveryTimeoutSeconds,
      },
      "Circuit breaker registered"
    );
    return breaker;
  }

  /**
   * Register every preset dependency
   */
  registerDefaults(): CircuitBreaker[] {
    return Object.entries(this.presets).map(([name, options]) => this.register(name, options));
  }

  get(serviceName: string): CircuitBreaker | undefined {
    return this.breakers.get(serviceName);
  }

  names(): string[] {
    return [...this.breakers.keys()];
  }

  async getAllStatus(): Promise<Record<string, CircuitStatus>> {
    const entries = await Promise.all(
      [...this.breakers.entries()].map(
        async ([name, breaker]) => [name, await breaker.getStatus()] as const
      )
    );
    return Object.fromEntries(entries);
  }

  /**
   * Run `operation` through the named breaker
   *
   * With a `fallback`, an open circuit yields the fallback's result instead
   * of a CircuitOpenError. Other errors always propagate.
   */
  async withCircuitBreaker<T>(
    serviceName: string,
    operation: () => Promise<T>,
    fallback?: (error: CircuitOpenError) => Promise<T> | T
  ): Promise<T> {
    const breaker = this.register(serviceName);
    try {
      return await breaker.call(operation);
    } catch (error) {
      if (fallback && error instanceof CircuitOpenError) {
        this.logger.info({ serviceName }, "Circuit open, serving fallback");
        return fallback(error);
      }
      throw error;
    }
  }
}
