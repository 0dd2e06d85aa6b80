/**
 * Secrets Types
 *
 * @module secrets/types
 */

/**
 * Supported secret backends
 *
 * - environment: process environment variables (development)
 * - aws: AWS Secrets Manager
 * - vault: HashiCorp Vault KV v2
 */
export type SecretsBackendType = "environment" | "aws" | "vault";

/**
 * Source of named secrets
 *
 * One implementation per backend, selected from configuration at startup.
 */
export interface SecretsBackend {
  readonly type: SecretsBackendType;

  /**
   * Resolve a single string secret
   *
   * @returns undefined when the backend holds no such secret
   * @throws {SecretsBackendError} When the backend cannot be reached
   */
  getSecret(name: string): Promise<string | undefined>;

  /**
   * Resolve a structured secret (e.g. credentials object)
   *
   * @returns undefined when the backend holds no such secret
   * @throws {SecretsBackendError} When the backend cannot be reached or the
   *   stored value is not a flat JSON object
   */
  getSecretRecord(name: string): Promise<Record<string, string> | undefined>;

  /**
   * Store a new value for a string secret
   *
   * @throws {SecretsBackendError} When the write fails
   */
  putSecret(name: string, value: string): Promise<void>;

  /** Human-readable description for status output */
  describe(): string;
}

/**
 * Write access to secrets, consumed by rotation handlers
 */
export interface SecretWriter {
  putSecret(name: string, value: string): Promise<void>;
}

/**
 * Read access to secrets, consumed by rotation handlers and the token manager
 */
export interface SecretReader {
  get(name: string): Promise<string | undefined>;
  require(name: string): Promise<string>;
}

/**
 * Secrets configuration
 */
export interface SecretsConfig {
  backend: SecretsBackendType;

  /** Environment variable prefix for the environment backend */
  envPrefix: string;

  /** Seconds a resolved secret stays cached */
  cacheTtlSeconds: number;

  /** Path prefix for remote backends: `<pathPrefix>/<name>` */
  pathPrefix: string;

  vault: {
    address: string;
    token?: string;
    mount: string;
    timeoutMs: number;
  };

  aws: {
    region?: string;
  };
}

/**
 * Well-known secret names
 */
export const SECRET_NAMES = {
  JWT_SECRET_KEY: "JWT_SECRET_KEY",
  JWT_REFRESH_SECRET: "JWT_REFRESH_SECRET",
  DATABASE_PASSWORD: "DATABASE_PASSWORD",
  API_KEY: "API_KEY",
  API_KEYS: "API_KEYS",
  DATABASE_CREDENTIALS: "DATABASE_CREDENTIALS",
} as const;
