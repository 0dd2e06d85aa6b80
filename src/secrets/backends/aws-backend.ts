/**
 * AWS Secrets Manager Backend
 *
 * Secret ids are `<pathPrefix>/<name>`. String secrets are stored as plain
 * SecretString; structured secrets as a JSON object in SecretString.
 *
 * @module secrets/backends/aws-backend
 */

import {
  GetSecretValueCommand,
  PutSecretValueCommand,
  ResourceNotFoundException,
  SecretsManagerClient,
} from "@aws-sdk/client-secrets-manager";
import type { Logger } from "pino";
import type { SecretsBackend } from "../types.js";
import { SecretsBackendError } from "../errors.js";
import { SecretRecordSchema } from "../validation.js";
import { getComponentLogger } from "../../logging/index.js";

export class AwsSecretsBackend implements SecretsBackend {
  readonly type = "aws" as const;

  private readonly client: SecretsManagerClient;
  private _logger: Logger | null = null;

  constructor(
    private readonly pathPrefix: string,
    region?: string,
    client?: SecretsManagerClient
  ) {
    this.client = client ?? new SecretsManagerClient(region ? { region } : {});
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("secrets:aws");
    }
    return this._logger;
  }

  secretId(name: string): string {
    return `${this.pathPrefix}/${name}`;
  }

  async getSecret(name: string): Promise<string | undefined> {
    const secretId = this.secretId(name);
    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }));
      this.logger.debug({ secretId }, "Secret resolved from AWS Secrets Manager");

      if (response.SecretString !== undefined) {
        return response.SecretString;
      }
      if (response.SecretBinary !== undefined) {
        return Buffer.from(response.SecretBinary).toString("utf8");
      }
      return undefined;
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        return undefined;
      }
      throw this.wrap("read", error);
    }
  }

  async getSecretRecord(name: string): Promise<Record<string, string> | undefined> {
    const raw = await this.getSecret(name);
    if (raw === undefined) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SecretsBackendError(
        "aws",
        "read",
        `${this.secretId(name)} is not valid JSON`,
        error instanceof Error ? error : undefined
      );
    }

    const result = SecretRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new SecretsBackendError(
        "aws",
        "read",
        `${this.secretId(name)} must be an object of strings`
      );
    }
    return result.data;
  }

  async putSecret(name: string, value: string): Promise<void> {
    const secretId = this.secretId(name);
    try {
      await this.client.send(
        new PutSecretValueCommand({ SecretId: secretId, SecretString: value })
      );
      this.logger.info({ secretId }, "Secret stored in AWS Secrets Manager");
    } catch (error) {
      throw this.wrap("write", error);
    }
  }

  describe(): string {
    return `AWS Secrets Manager (prefix ${this.pathPrefix}/)`;
  }

  private wrap(operation: "read" | "write", error: unknown): SecretsBackendError {
    const cause = error instanceof Error ? error : undefined;
    const status = this.httpStatusOf(error);
    const retryable = status === undefined || status >= 500 || status === 429;
    return new SecretsBackendError(
      "aws",
      operation,
      cause?.message ?? String(error),
      cause,
      retryable
    );
  }

  private httpStatusOf(error: unknown): number | undefined {
    if (typeof error !== "object" || error === null || !("$metadata" in error)) {
      return undefined;
    }
    const metadata = error.$metadata;
    if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
      return undefined;
    }
    return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
  }
}
