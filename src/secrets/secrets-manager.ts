/**
 * Secrets Manager
 *
 * Resolves named secrets through the configured backend with a per-name TTL
 * cache. Transient backend failures are retried; if the backend is still
 * failing the environment backend is consulted as a lower-trust fallback.
 * A secret that cannot be resolved anywhere is reported explicitly, never
 * replaced with a built-in default.
 *
 * @module secrets/secrets-manager
 */

import type { Logger } from "pino";
import type {
  SecretReader,
  SecretWriter,
  SecretsBackend,
  SecretsBackendType,
  SecretsConfig,
} from "./types.js";
import { SECRET_NAMES } from "./types.js";
import { SecretNotFoundError, SecretsBackendError } from "./errors.js";
import { EnvironmentSecretsBackend } from "./backends/environment-backend.js";
import { AwsSecretsBackend } from "./backends/aws-backend.js";
import { VaultSecretsBackend } from "./backends/vault-backend.js";
import { getComponentLogger } from "../logging/index.js";
import { withRetry, createRetryLogger } from "../utils/retry.js";

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Options for the secrets manager
 */
export interface SecretsManagerOptions {
  /** Seconds a resolved secret stays cached */
  cacheTtlSeconds: number;

  /** Lower-trust backend consulted when the primary keeps failing */
  fallback?: SecretsBackend;

  /** Retries for retryable backend errors */
  maxRetries?: number;

  /** Base backoff between retries in milliseconds */
  retryDelayMs?: number;
}

export class SecretsManager implements SecretReader, SecretWriter {
  private readonly valueCache = new Map<string, CacheEntry<string>>();
  private readonly recordCache = new Map<string, CacheEntry<Record<string, string>>>();
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private _logger: Logger | null = null;

  constructor(
    private readonly backend: SecretsBackend,
    private readonly options: SecretsManagerOptions
  ) {
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("secrets");
    }
    return this._logger;
  }

  get backendType(): SecretsBackendType {
    return this.backend.type;
  }

  /**
   * Resolve a string secret
   *
   * @returns undefined when no backend holds the secret
   * @throws {SecretsBackendError} When every backend failed
   */
  async get(name: string): Promise<string | undefined> {
    const cached = this.fromCache(this.valueCache, name);
    if (cached !== undefined) {
      return cached;
    }

    const value = await this.resolve(name, (backend) => backend.getSecret(name));
    if (value !== undefined) {
      this.valueCache.set(name, { value, expiresAt: this.expiry() });
    }
    return value;
  }

  /**
   * Resolve a string secret that must exist
   *
   * @throws {SecretNotFoundError} When no backend holds the secret
   */
  async require(name: string): Promise<string> {
    const value = await this.get(name);
    if (value === undefined) {
      throw new SecretNotFoundError(name);
    }
    return value;
  }

  /**
   * Resolve a structured secret
   *
   * @returns Empty object when no backend holds the secret
   */
  async getRecord(name: string): Promise<Record<string, string>> {
    const cached = this.fromCache(this.recordCache, name);
    if (cached !== undefined) {
      return { ...cached };
    }

    const record = await this.resolve(name, (backend) => backend.getSecretRecord(name));
    if (record === undefined) {
      return {};
    }
    this.recordCache.set(name, { value: record, expiresAt: this.expiry() });
    return { ...record };
  }

  /**
   * Store a new secret value through the primary backend
   *
   * The cached value is dropped whether or not the write succeeds so the
   * next read goes back to the backend.
   */
  async putSecret(name: string, value: string): Promise<void> {
    try {
      await this.backend.putSecret(name, value);
    } finally {
      this.invalidate(name);
    }
  }

  invalidate(name: string): void {
    this.valueCache.delete(name);
    this.recordCache.delete(name);
  }

  clearCache(): void {
    this.valueCache.clear();
    this.recordCache.clear();
  }

  async getJwtSecret(): Promise<string> {
    return this.require(SECRET_NAMES.JWT_SECRET_KEY);
  }

  async getJwtRefreshSecret(): Promise<string> {
    return this.require(SECRET_NAMES.JWT_REFRESH_SECRET);
  }

  async getApiKeys(): Promise<Record<string, string>> {
    return this.getRecord(SECRET_NAMES.API_KEYS);
  }

  async getDatabaseCredentials(): Promise<Record<string, string>> {
    return this.getRecord(SECRET_NAMES.DATABASE_CREDENTIALS);
  }

  backendInfo(): string {
    const fallback = this.options.fallback ? `; fallback: ${this.options.fallback.describe()}` : "";
    return `${this.backend.describe()}${fallback}`;
  }

  private async resolve<T>(
    name: string,
    read: (backend: SecretsBackend) => Promise<T | undefined>
  ): Promise<T | undefined> {
    try {
      return await withRetry(() => read(this.backend), {
        maxRetries: this.maxRetries,
        shouldRetry: (error) => error instanceof SecretsBackendError && error.retryable,
        calculateBackoff: (attempt) => this.retryDelayMs * Math.pow(2, attempt),
        onRetry: createRetryLogger(this.logger, `secret read (${name})`, this.maxRetries),
      });
    } catch (error) {
      const fallback = this.options.fallback;
      if (!fallback || fallback === this.backend) {
        throw error;
      }

      this.logger.warn(
        { err: error, secret: name, fallback: fallback.type },
        "Primary secrets backend failed, trying fallback"
      );
      const value = await read(fallback);
      if (value === undefined) {
        throw error;
      }
      return value;
    }
  }

  private fromCache<T>(cache: Map<string, CacheEntry<T>>, name: string): T | undefined {
    const entry = cache.get(name);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= Date.now()) {
      cache.delete(name);
      return undefined;
    }
    return entry.value;
  }

  private expiry(): number {
    return Date.now() + this.options.cacheTtlSeconds * 1000;
  }
}

/**
 * Build the backend named in configuration
 *
 * A remote backend that cannot be constructed (missing token, bad options)
 * degrades to the environment backend with a warning.
 */
export function createSecretsBackend(
  config: SecretsConfig,
  env: NodeJS.ProcessEnv = process.env
): SecretsBackend {
  const logger = getComponentLogger("secrets");

  try {
    switch (config.backend) {
      case "aws":
        return new AwsSecretsBackend(config.pathPrefix, config.aws.region);
      case "vault":
        return new VaultSecretsBackend({
          address: config.vault.address,
          token: config.vault.token ?? "",
          mount: config.vault.mount,
          pathPrefix: config.pathPrefix,
          timeoutMs: config.vault.timeoutMs,
        });
      case "environment":
        return new EnvironmentSecretsBackend(config.envPrefix, env);
    }
  } catch (error) {
    logger.warn(
      { err: error, backend: config.backend },
      "Failed to initialize secrets backend, falling back to environment variables"
    );
  }
  return new EnvironmentSecretsBackend(config.envPrefix, env);
}

/**
 * Build a secrets manager from configuration
 *
 * Remote backends get the environment backend as their fallback.
 */
export function createSecretsManager(
  config: SecretsConfig,
  env: NodeJS.ProcessEnv = process.env
): SecretsManager {
  const backend = createSecretsBackend(config, env);
  const fallback =
    backend.type === "environment"
      ? undefined
      : new EnvironmentSecretsBackend(config.envPrefix, env);

  const manager = new SecretsManager(backend, {
    cacheTtlSeconds: config.cacheTtlSeconds,
    fallback,
  });
  getComponentLogger("secrets").info({ backend: manager.backendInfo() }, "Secrets manager ready");
  return manager;
}
