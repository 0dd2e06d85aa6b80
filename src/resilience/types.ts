/**
 * Circuit Breaker Types
 *
 * @module resilience/types
 */

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  /** Failures tolerated while CLOSED; the next one opens the circuit */
  failureThreshold: number;

  /** Seconds after the last failure before a trial call is allowed */
  recoveryTimeoutSeconds: number;

  /**
   * Which errors count as dependency failures
   * @default every error
   */
  isFailure?: (error: unknown) => boolean;
}

/**
 * Breaker state as last observed
 */
export interface CircuitSnapshot {
  state: CircuitState;
  failures: number;
  /** Epoch milliseconds */
  lastFailureAt: number | null;
}

export interface CircuitStatus {
  serviceName: string;
  state: CircuitState;
  failureCount: number;
  failureThreshold: number;
  recoveryTimeoutSeconds: number;
  /** ISO 8601 */
  lastFailureAt?: string;
  /** false when the shared store could not be read and the local mirror answered */
  storeBacked: boolean;
}
