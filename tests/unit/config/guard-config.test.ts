/**
 * Guard Configuration Unit Tests
 *
 * @module tests/unit/config/guard-config
 */

import path from "node:path";
import { describe, test, expect } from "vitest";
import { loadGuardConfig } from "../../../src/config/guard-config.js";
import { ConfigError } from "../../../src/errors.js";

describe("loadGuardConfig", () => {
  test("should apply defaults for an empty environment", () => {
    const config = loadGuardConfig({});

    expect(config.logging).toEqual({ level: "info", format: "json" });
    expect(config.store).toEqual({ redisUrl: undefined, keyPrefix: "", connectTimeoutMs: 5000 });
    expect(config.secrets.backend).toBe("environment");
    expect(config.secrets.cacheTtlSeconds).toBe(3600);
    expect(config.jwt).toEqual({
      algorithm: "HS256",
      accessExpirationHours: 24,
      refreshExpirationDays: 7,
      defaultRoles: ["user"],
    });
    expect(config.session).toEqual({ timeoutMinutes: 30, maxConcurrentSessions: 5 });
    expect(config.rateLimit.ipLimit).toBe(100);
    expect(config.rateLimit.blockDurationSeconds).toBe(3600);
    expect(config.admission.maxJsonPayloadBytes).toBe(5 * 1024 * 1024);
    expect(config.admission.cpuOverloadThreshold).toBe(0.85);
    expect(config.rotation.intervalDays).toEqual({
      database_password: 90,
      api_key: 180,
      jwt_secret: 365,
    });
    expect(config.audit).toEqual({
      enabled: true,
      logPath: path.join("./data", "audit", "audit.json"),
      maxEvents: 1000,
    });
    expect(Object.keys(config.circuits)).toEqual(["cbo_scraper", "database", "external_api"]);
  });

  test("should read overrides", () => {
    const config = loadGuardConfig({
      LOG_LEVEL: "debug",
      REDIS_URL: "redis://127.0.0.1:6379",
      SECRETS_BACKEND: "vault",
      VAULT_TOKEN: "test-token",
      JWT_ALGORITHM: "HS512",
      RATE_LIMIT_ENABLED: "false",
      RATE_LIMIT_IP_LIMIT: "10",
      MAX_CONCURRENT_REQUESTS: "50",
      DATA_PATH: "/var/lib/guard",
    });

    expect(config.logging.level).toBe("debug");
    expect(config.store.redisUrl).toBe("redis://127.0.0.1:6379");
    expect(config.secrets.backend).toBe("vault");
    expect(config.secrets.vault.token).toBe("test-token");
    expect(config.jwt.algorithm).toBe("HS512");
    expect(config.rateLimit.enabled).toBe(false);
    expect(config.rateLimit.ipLimit).toBe(10);
    expect(config.admission.maxConcurrentRequests).toBe(50);
    expect(config.audit.logPath).toBe(path.join("/var/lib/guard", "audit", "audit.json"));
  });

  test("should stop on the first invalid variable", () => {
    const error = captureConfigError({ RATE_LIMIT_IP_LIMIT: "many" });
    expect(error?.variable).toBe("RATE_LIMIT_IP_LIMIT");

    expect(() => loadGuardConfig({ SECRETS_BACKEND: "keychain" })).toThrow(
      "Invalid configuration for SECRETS_BACKEND: " +
        'expected one of environment, aws, vault, got "keychain"'
    );
  });

  test("should allow a zero secret cache TTL", () => {
    expect(loadGuardConfig({ SECRETS_CACHE_TTL_SECONDS: "0" }).secrets.cacheTtlSeconds).toBe(0);
  });
});

function captureConfigError(env: Record<string, string>): ConfigError | undefined {
  try {
    loadGuardConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  return undefined;
}
