/**
 * Process-Local Circuit State Registry
 *
 * Mirror of every breaker's last known state. Written on every transition
 * and read whenever the shared store is unreachable, so during a store
 * outage breaker state is consistent within this process only.
 *
 * @module resilience/circuit-state-registry
 */

import type { CircuitSnapshot } from "./types.js";

export class CircuitStateRegistry {
  private readonly states = new Map<string, CircuitSnapshot>();

  get(serviceName: string): CircuitSnapshot {
    const snapshot = this.states.get(serviceName);
    return snapshot ? { ...snapshot } : { state: "closed", failures: 0, lastFailureAt: null };
  }

  set(serviceName: string, snapshot: CircuitSnapshot): void {
    this.states.set(serviceName, { ...snapshot });
  }

  update(serviceName: string, patch: Partial<CircuitSnapshot>): CircuitSnapshot {
    const next = { ...this.get(serviceName), ...patch };
    this.states.set(serviceName, next);
    return { ...next };
  }

  names(): string[] {
    return [...this.states.keys()];
  }

  clear(): void {
    this.states.clear();
  }
}
