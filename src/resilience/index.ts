/**
 * Resilience Module
 *
 * @module resilience
 */

export type {
  CircuitState,
  CircuitBreakerOptions,
  CircuitSnapshot,
  CircuitStatus,
} from "./types.js";
export { CircuitStateRegistry } from "./circuit-state-registry.js";
export { CircuitBreaker } from "./circuit-breaker.js";
export {
  CircuitBreakerManager,
  DEFAULT_CIRCUIT_PRESETS,
  DEFAULT_CIRCUIT_OPTIONS,
} from "./circuit-breaker-manager.js";
