/**
 * HashiCorp Vault Backend (KV v2)
 *
 * Secrets live at `<mount>/data/<pathPrefix>/<name>`. A string secret is the
 * `value` field of the stored object; a structured secret is the whole
 * object.
 *
 * @module secrets/backends/vault-backend
 */

import type { Logger } from "pino";
import type { SecretsBackend } from "../types.js";
import { SecretsBackendError } from "../errors.js";
import { SecretRecordSchema, VaultReadResponseSchema } from "../validation.js";
import { getComponentLogger } from "../../logging/index.js";

export interface VaultBackendOptions {
  address: string;
  token: string;
  mount: string;
  pathPrefix: string;
  timeoutMs: number;
}

export class VaultSecretsBackend implements SecretsBackend {
  readonly type = "vault" as const;

  private _logger: Logger | null = null;

  constructor(private readonly options: VaultBackendOptions) {
    if (!options.token) {
      throw new SecretsBackendError("vault", "read", "VAULT_TOKEN is not set");
    }
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("secrets:vault");
    }
    return this._logger;
  }

  secretUrl(name: string): string {
    const base = this.options.address.replace(/\/+$/, "");
    return `${base}/v1/${this.options.mount}/data/${this.options.pathPrefix}/${name}`;
  }

  async getSecret(name: string): Promise<string | undefined> {
    const data = await this.readData(name);
    if (data === undefined) {
      return undefined;
    }
    const value = data["value"];
    return typeof value === "string" ? value : undefined;
  }

  async getSecretRecord(name: string): Promise<Record<string, string> | undefined> {
    const data = await this.readData(name);
    if (data === undefined) {
      return undefined;
    }
    const result = SecretRecordSchema.safeParse(data);
    if (!result.success) {
      throw new SecretsBackendError("vault", "read", `${name} must hold only string values`);
    }
    return result.data;
  }

  async putSecret(name: string, value: string): Promise<void> {
    const response = await this.request("write", this.secretUrl(name), {
      method: "POST",
      body: JSON.stringify({ data: { value } }),
    });

    if (!response.ok) {
      throw this.statusError("write", response.status, name);
    }
    this.logger.info({ secret: name }, "Secret stored in Vault");
  }

  describe(): string {
    const { address, mount, pathPrefix } = this.options;
    return `HashiCorp Vault (${address}, ${mount}/${pathPrefix})`;
  }

  private async readData(name: string): Promise<Record<string, unknown> | undefined> {
    const response = await this.request("read", this.secretUrl(name), { method: "GET" });

    if (response.status === 404) {
      return undefined;
    }
    if (!response.ok) {
      throw this.statusError("read", response.status, name);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SecretsBackendError(
        "vault",
        "read",
        "Response is not valid JSON",
        error instanceof Error ? error : undefined
      );
    }

    const parsed = VaultReadResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SecretsBackendError("vault", "read", `Unexpected response shape for ${name}`);
    }
    this.logger.debug({ secret: name }, "Secret resolved from Vault");
    return parsed.data.data.data;
  }

  private async request(
    operation: "read" | "write",
    url: string,
    init: { method: string; body?: string }
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      return await fetch(url, {
        ...init,
        headers: {
          "X-Vault-Token": this.options.token,
          "Content-Type": "application/json",
        },
        signal: controller.signal,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      const message =
        cause?.name === "AbortError"
          ? `Request timeout after ${this.options.timeoutMs}ms`
          : `Network error: ${cause?.message ?? String(error)}`;
      throw new SecretsBackendError("vault", operation, message, cause, true);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private statusError(
    operation: "read" | "write",
    status: number,
    name: string
  ): SecretsBackendError {
    return new SecretsBackendError(
      "vault",
      operation,
      `HTTP ${status} for ${name}`,
      undefined,
      status >= 500 || status === 429
    );
  }
}
