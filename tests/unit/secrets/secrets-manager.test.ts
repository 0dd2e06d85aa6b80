/**
 * Secrets Manager Unit Tests
 *
 * @module tests/unit/secrets/secrets-manager
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import {
  SecretsManager,
  createSecretsBackend,
  createSecretsManager,
} from "../../../src/secrets/secrets-manager.js";
import { EnvironmentSecretsBackend } from "../../../src/secrets/backends/environment-backend.js";
import { SecretNotFoundError, SecretsBackendError } from "../../../src/secrets/errors.js";
import type { SecretsBackend, SecretsConfig } from "../../../src/secrets/types.js";

class FakeBackend implements SecretsBackend {
  readonly type = "vault" as const;
  readonly values = new Map<string, string>();
  readonly records = new Map<string, Record<string, string>>();
  reads = 0;
  failuresBeforeSuccess = 0;
  failRetryable = true;

  async getSecret(name: string): Promise<string | undefined> {
    this.reads++;
    this.maybeFail();
    return this.values.get(name);
  }

  async getSecretRecord(name: string): Promise<Record<string, string> | undefined> {
    this.reads++;
    this.maybeFail();
    return this.records.get(name);
  }

  async putSecret(name: string, value: string): Promise<void> {
    this.values.set(name, value);
  }

  describe(): string {
    return "fake vault";
  }

  private maybeFail(): void {
    if (this.failuresBeforeSuccess > 0) {
      this.failuresBeforeSuccess--;
      throw new SecretsBackendError("vault", "read", "HTTP 503", undefined, this.failRetryable);
    }
  }
}

function baseConfig(overrides: Partial<SecretsConfig> = {}): SecretsConfig {
  return {
    backend: "environment",
    envPrefix: "FISCAL_",
    cacheTtlSeconds: 300,
    pathPrefix: "fiscal-api",
    vault: { address: "http://127.0.0.1:8200", mount: "secret", timeoutMs: 1000 },
    aws: {},
    ...overrides,
  };
}

describe("SecretsManager", () => {
  let backend: FakeBackend;

  beforeAll(() => {
    initializeLogger({ level: "silent", format: "json" });
  });

  afterAll(() => {
    resetLogger();
  });

  beforeEach(() => {
    backend = new FakeBackend();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("caches a resolved secret until its TTL passes", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T00:00:00.000Z"));
    backend.values.set("JWT_SECRET_KEY", "test-secret");
    const manager = new SecretsManager(backend, { cacheTtlSeconds: 60 });

    expect(await manager.get("JWT_SECRET_KEY")).toBe("test-secret");
    expect(await manager.get("JWT_SECRET_KEY")).toBe("test-secret");
    expect(backend.reads).toBe(1);

    vi.advanceTimersByTime(60_000);
    expect(await manager.get("JWT_SECRET_KEY")).toBe("test-secret");
    expect(backend.reads).toBe(2);
  });

  it("does not cache a missing secret", async () => {
    const manager = new SecretsManager(backend, { cacheTtlSeconds: 60 });
    expect(await manager.get("MISSING")).toBeUndefined();
    expect(await manager.get("MISSING")).toBeUndefined();
    expect(backend.reads).toBe(2);
  });

  it("require raises SecretNotFoundError instead of inventing a default", async () => {
    const manager = new SecretsManager(backend, { cacheTtlSeconds: 60 });
    await expect(manager.getJwtSecret()).rejects.toBeInstanceOf(SecretNotFoundError);
    await expect(manager.require("JWT_REFRESH_SECRET")).rejects.toThrow(
      "Secret not found: JWT_REFRESH_SECRET"
    );
  });

  it("retries retryable backend failures", async () => {
    backend.values.set("API_KEY", "test-key");
    backend.failuresBeforeSuccess = 2;
    const manager = new SecretsManager(backend, {
      cacheTtlSeconds: 60,
      maxRetries: 2,
      retryDelayMs: 0,
    });

    expect(await manager.get("API_KEY")).toBe("test-key");
    expect(backend.reads).toBe(3);
  });

  it("does not retry non-retryable failures", async () => {
    backend.failuresBeforeSuccess = 1;
    backend.failRetryable = false;
    const manager = new SecretsManager(backend, { cacheTtlSeconds: 60, retryDelayMs: 0 });

    await expect(manager.get("API_KEY")).rejects.toBeInstanceOf(SecretsBackendError);
    expect(backend.reads).toBe(1);
  });

  it("falls back to the environment backend when the primary keeps failing", async () => {
    backend.failuresBeforeSuccess = 10;
    const fallback = new EnvironmentSecretsBackend("FISCAL_", {
      FISCAL_JWT_SECRET_KEY: "test-fallback-secret",
    });
    const manager = new SecretsManager(backend, {
      cacheTtlSeconds: 60,
      fallback,
      maxRetries: 1,
      retryDelayMs: 0,
    });

    expect(await manager.getJwtSecret()).toBe("test-fallback-secret");
    expect(backend.reads).toBe(2);
  });

  it("rethrows the primary failure when the fallback has no value", async () => {
    backend.failuresBeforeSuccess = 10;
    const manager = new SecretsManager(backend, {
      cacheTtlSeconds: 60,
      fallback: new EnvironmentSecretsBackend("FISCAL_", {}),
      maxRetries: 0,
    });

    await expect(manager.get("JWT_SECRET_KEY")).rejects.toThrow(
      "Secrets vault read failed: HTTP 503"
    );
  });

  it("returns copies of structured secrets", async () => {
    backend.records.set("API_KEYS", { mobile: "test-key-1" });
    const manager = new SecretsManager(backend, { cacheTtlSeconds: 60 });

    const first = await manager.getApiKeys();
    first["mobile"] = "tampered";
    expect(await manager.getApiKeys()).toEqual({ mobile: "test-key-1" });
    expect(await manager.getDatabaseCredentials()).toEqual({});
  });

  it("putSecret writes through and drops the cached value", async () => {
    backend.values.set("API_KEY", "old-key");
    const manager = new SecretsManager(backend, { cacheTtlSeconds: 60 });

    expect(await manager.get("API_KEY")).toBe("old-key");
    await manager.putSecret("API_KEY", "new-key");
    expect(await manager.get("API_KEY")).toBe("new-key");
  });

  it("describes backend and fallback", () => {
    const manager = new SecretsManager(backend, {
      cacheTtlSeconds: 60,
      fallback: new FakeBackend(),
    });
    expect(manager.backendInfo()).toBe("fake vault; fallback: fake vault");
    expect(manager.backendType).toBe("vault");
  });
});

describe("createSecretsBackend", () => {
  beforeAll(() => {
    initializeLogger({ level: "silent", format: "json" });
  });

  afterAll(() => {
    resetLogger();
  });

  it("degrades to the environment backend when Vault has no token", () => {
    const backend = createSecretsBackend(baseConfig({ backend: "vault" }), {});
    expect(backend.type).toBe("environment");
  });

  it("builds Vault when a token is configured", () => {
    const backend = createSecretsBackend(
      baseConfig({
        backend: "vault",
        vault: {
          address: "http://127.0.0.1:8200",
          token: "test-token",
          mount: "secret",
          timeoutMs: 1000,
        },
      }),
      {}
    );
    expect(backend.type).toBe("vault");
  });

  it("gives remote backends the environment fallback", () => {
    const manager = createSecretsManager(
      baseConfig({
        backend: "vault",
        vault: {
          address: "http://127.0.0.1:8200",
          token: "test-token",
          mount: "secret",
          timeoutMs: 1000,
        },
      }),
      {}
    );
    expect(manager.backendInfo()).toMatch(
      /^HashiCorp Vault \(http:\/\/127\.0\.0\.1:8200, secret\/fiscal-api\); fallback: Environment/
    );
  });
});
