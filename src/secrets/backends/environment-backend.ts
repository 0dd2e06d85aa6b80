/**
 * Environment Variable Secrets Backend
 *
 * Convention:
 * - String secrets: `<PREFIX><NAME>` (e.g. FISCAL_JWT_SECRET_KEY)
 * - Structured secrets: `<PREFIX><NAME>_JSON` holding a JSON object
 *
 * Writes update the in-process environment only. Intended for development
 * and as the fallback when a remote backend cannot be constructed.
 *
 * @module secrets/backends/environment-backend
 */

import type { Logger } from "pino";
import type { SecretsBackend } from "../types.js";
import { SecretsBackendError } from "../errors.js";
import { SecretRecordSchema } from "../validation.js";
import { getComponentLogger } from "../../logging/index.js";

export class EnvironmentSecretsBackend implements SecretsBackend {
  readonly type = "environment" as const;

  private readonly loadedAt = new Date();
  private _logger: Logger | null = null;

  constructor(
    private readonly prefix: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("secrets:environment");
    }
    return this._logger;
  }

  /** Environment variable holding a string secret */
  keyFor(name: string): string {
    return `${this.prefix}${name.toUpperCase()}`;
  }

  async getSecret(name: string): Promise<string | undefined> {
    const key = this.keyFor(name);
    const value = this.env[key];
    if (value === undefined || value === "") {
      return undefined;
    }
    this.logger.debug({ envKey: key }, "Secret resolved from environment");
    return value;
  }

  async getSecretRecord(name: string): Promise<Record<string, string> | undefined> {
    const key = `${this.keyFor(name)}_JSON`;
    const raw = this.env[key];
    if (raw === undefined || raw === "") {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SecretsBackendError(
        "environment",
        "read",
        `${key} is not valid JSON`,
        error instanceof Error ? error : undefined
      );
    }

    const result = SecretRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new SecretsBackendError("environment", "read", `${key} must be an object of strings`);
    }
    return result.data;
  }

  async putSecret(name: string, value: string): Promise<void> {
    const key = this.keyFor(name);
    this.env[key] = value;
    this.logger.info({ envKey: key }, "Secret updated in process environment");
  }

  describe(): string {
    return `Environment variables (prefix ${this.prefix}, loaded ${this.loadedAt.toISOString()})`;
  }
}
