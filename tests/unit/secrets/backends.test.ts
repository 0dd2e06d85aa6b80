/**
 * Secrets Backend Unit Tests
 *
 * Vault is exercised against a stubbed fetch; nothing leaves the process.
 *
 * @module tests/unit/secrets/backends
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { EnvironmentSecretsBackend } from "../../../src/secrets/backends/environment-backend.js";
import { VaultSecretsBackend } from "../../../src/secrets/backends/vault-backend.js";
import { SecretsBackendError } from "../../../src/secrets/errors.js";

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterAll(() => {
  resetLogger();
});

describe("EnvironmentSecretsBackend", () => {
  it("reads prefixed, upper-cased variables", async () => {
    const backend = new EnvironmentSecretsBackend("FISCAL_", {
      FISCAL_JWT_SECRET_KEY: "test-secret",
    });
    expect(backend.keyFor("jwt_secret_key")).toBe("FISCAL_JWT_SECRET_KEY");
    expect(await backend.getSecret("jwt_secret_key")).toBe("test-secret");
  });

  it("treats an empty variable as missing", async () => {
    const backend = new EnvironmentSecretsBackend("FISCAL_", { FISCAL_API_KEY: "" });
    expect(await backend.getSecret("API_KEY")).toBeUndefined();
  });

  it("reads structured secrets from the _JSON variable", async () => {
    const backend = new EnvironmentSecretsBackend("FISCAL_", {
      FISCAL_API_KEYS_JSON: '{"mobile":"test-key-1","partner":"test-key-2"}',
    });
    expect(await backend.getSecretRecord("API_KEYS")).toEqual({
      mobile: "test-key-1",
      partner: "test-key-2",
    });
  });

  it("rejects malformed or non-string structured secrets", async () => {
    const backend = new EnvironmentSecretsBackend("FISCAL_", {
      FISCAL_A_JSON: "{not json",
      FISCAL_B_JSON: '{"port":5432}',
    });
    await expect(backend.getSecretRecord("A")).rejects.toThrow(
      "Secrets environment read failed: FISCAL_A_JSON is not valid JSON"
    );
    await expect(backend.getSecretRecord("B")).rejects.toThrow(
      "Secrets environment read failed: FISCAL_B_JSON must be an object of strings"
    );
  });

  it("writes into the environment it was given", async () => {
    const env: Record<string, string | undefined> = {};
    const backend = new EnvironmentSecretsBackend("FISCAL_", env);
    await backend.putSecret("API_KEY", "test-rotated");
    expect(env["FISCAL_API_KEY"]).toBe("test-rotated");
  });
});

describe("VaultSecretsBackend", () => {
  const options = {
    address: "http://vault.test:8200/",
    token: "test-token",
    mount: "secret",
    pathPrefix: "fiscal-api",
    timeoutMs: 1000,
  };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function stubFetch(response: Response) {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
    vi.stubGlobal("fetch", fetchMock);
    return fetchMock;
  }

  it("refuses to start without a token", () => {
    expect(() => new VaultSecretsBackend({ ...options, token: "" })).toThrow(
      "Secrets vault read failed: VAULT_TOKEN is not set"
    );
  });

  it("builds KV v2 data URLs", () => {
    const backend = new VaultSecretsBackend(options);
    expect(backend.secretUrl("JWT_SECRET_KEY")).toBe(
      "http://vault.test:8200/v1/secret/data/fiscal-api/JWT_SECRET_KEY"
    );
  });

  it("reads the value field with the token header", async () => {
    const fetchMock = stubFetch(
      new Response(JSON.stringify({ data: { data: { value: "test-secret" } } }), { status: 200 })
    );
    const backend = new VaultSecretsBackend(options);

    expect(await backend.getSecret("JWT_SECRET_KEY")).toBe("test-secret");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      "http://vault.test:8200/v1/secret/data/fiscal-api/JWT_SECRET_KEY",
      expect.objectContaining({
        method: "GET",
        headers: { "X-Vault-Token": "test-token", "Content-Type": "application/json" },
      }),
    ]);
  });

  it("returns undefined on 404", async () => {
    stubFetch(new Response("", { status: 404 }));
    const backend = new VaultSecretsBackend(options);
    expect(await backend.getSecret("MISSING")).toBeUndefined();
  });

  it("marks 5xx failures retryable and 403 not", async () => {
    const backend = new VaultSecretsBackend(options);

    stubFetch(new Response("", { status: 503 }));
    const unavailable = await backend.getSecret("A").catch((error: unknown) => error);
    expect(unavailable).toBeInstanceOf(SecretsBackendError);
    expect(unavailable instanceof SecretsBackendError && unavailable.retryable).toBe(true);

    stubFetch(new Response("", { status: 403 }));
    const forbidden = await backend.getSecret("A").catch((error: unknown) => error);
    expect(forbidden instanceof SecretsBackendError && forbidden.retryable).toBe(false);
  });

  it("wraps network errors as retryable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    const backend = new VaultSecretsBackend(options);

    const error = await backend.getSecret("A").catch((e: unknown) => e);
    expect(error instanceof SecretsBackendError && error.retryable).toBe(true);
    expect(error instanceof Error && error.message).toBe(
      "Secrets vault read failed: Network error: fetch failed"
    );
  });

  it("rejects structured secrets with non-string values", async () => {
    stubFetch(new Response(JSON.stringify({ data: { data: { port: 5432 } } }), { status: 200 }));
    const backend = new VaultSecretsBackend(options);
    await expect(backend.getSecretRecord("DATABASE_CREDENTIALS")).rejects.toThrow(
      "DATABASE_CREDENTIALS must hold only string values"
    );
  });

  it("writes new values as the value field", async () => {
    const fetchMock = stubFetch(new Response("{}", { status: 200 }));
    const backend = new VaultSecretsBackend(options);

    await backend.putSecret("API_KEY", "test-rotated");
    expect(fetchMock.mock.calls[0]?.[1]).toEqual(
      expect.objectContaining({
        method: "POST",
        body: JSON.stringify({ data: { value: "test-rotated" } }),
      })
    );
  });
});
