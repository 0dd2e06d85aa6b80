/**
 * Circuit Breaker Manager Unit Tests
 *
 * @module tests/unit/resilience/circuit-breaker-manager
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import {
  CircuitBreakerManager,
  DEFAULT_CIRCUIT_OPTIONS,
} from "../../../src/resilience/circuit-breaker-manager.js";
import { CircuitStateRegistry } from "../../../src/resilience/circuit-state-registry.js";
import { CircuitOpenError } from "../../../src/errors.js";
import { MemorySharedStore } from "../../../src/store/memory-store.js";
import { MockAuditLogger } from "../../helpers/audit-mock.js";

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterAll(() => {
  resetLogger();
});

describe("CircuitBreakerManager", () => {
  let manager: CircuitBreakerManager;

  beforeEach(() => {
    manager = new CircuitBreakerManager(new MemorySharedStore(), new MockAuditLogger());
  });

  it("returns the same breaker for the same name", () => {
    const first = manager.register("payments", { failureThreshold: 1, recoveryTimeoutSeconds: 5 });
    const second = manager.register("payments");
    expect(second).toBe(first);
    expect(second.failureThreshold).toBe(1);
  });

  it("applies presets by name and defaults otherwise", () => {
    expect(manager.register("cbo_scraper").failureThreshold).toBe(3);
    expect(manager.register("cbo_scraper").recoveryTimeoutSeconds).toBe(300);
    expect(manager.register("something_else").failureThreshold).toBe(
      DEFAULT_CIRCUIT_OPTIONS.failureThreshold
    );
  });

  it("registers every preset", () => {
    manager.registerDefaults();
    expect(manager.names().sort()).toEqual(["cbo_scraper", "database", "external_api"]);
    expect(manager.get("database")?.recoveryTimeoutSeconds).toBe(60);
    expect(manager.get("unknown")).toBeUndefined();
  });

  it("reports status for every breaker", async () => {
    manager.register("database");
    manager.register("external_api");

    const status = await manager.getAllStatus();
    expect(Object.keys(status).sort()).toEqual(["database", "external_api"]);
    expect(status["database"]).toEqual({
      serviceName: "database",
      state: "closed",
      failureCount: 0,
      failureThreshold: 5,
      recoveryTimeoutSeconds: 60,
      storeBacked: true,
    });
  });

  describe("withCircuitBreaker", () => {
    beforeEach(async () => {
      manager.register("cbo_scraper", { failureThreshold: 0, recoveryTimeoutSeconds: 60 });
      await manager
        .withCircuitBreaker("cbo_scraper", async () => {
          throw new Error("scrape failed");
        })
        .catch(() => undefined);
    });

    it("serves the fallback while the circuit is open", async () => {
      const result = await manager.withCircuitBreaker(
        "cbo_scraper",
        async () => "live",
        (error) => `cached (retry in ${error.retryAfterSeconds}s)`
      );
      expect(result).toBe("cached (retry in 60s)");
    });

    it("raises CircuitOpenError without a fallback", async () => {
      await expect(
        manager.withCircuitBreaker("cbo_scraper", async () => "live")
      ).rejects.toBeInstanceOf(CircuitOpenError);
    });

    it("never hides ordinary errors behind the fallback", async () => {
      await expect(
        manager.withCircuitBreaker(
          "database",
          async () => {
            throw new Error("constraint violated");
          },
          () => "fallback"
        )
      ).rejects.toThrow("constraint violated");
    });
  });

  it("shares one registry across breakers", async () => {
    const registry = new CircuitStateRegistry();
    const audit = new MockAuditLogger();
    const shared = new CircuitBreakerManager(new MemorySharedStore(), audit, registry);
    shared.register("database");
    await shared.get("database")?.getStatus();
    expect(registry.names()).toEqual(["database"]);
  });
});
