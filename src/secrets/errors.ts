/**
 * Secrets Module Error Classes
 *
 * @module secrets/errors
 */

import { GuardError } from "../errors.js";
import type { SecretsBackendType } from "./types.js";

/**
 * Required secret is not present in any configured backend
 *
 * Not retryable; the deployment is missing configuration.
 */
export class SecretNotFoundError extends GuardError {
  constructor(public readonly secretName: string) {
    super(`Secret not found: ${secretName}`, "SECRET_NOT_FOUND", 500, false);
  }
}

/**
 * Backend read or write failed
 *
 * Retryable for transport failures and 5xx responses.
 */
export class SecretsBackendError extends GuardError {
  public override readonly cause?: Error;

  constructor(
    public readonly backend: SecretsBackendType,
    public readonly operation: "read" | "write",
    message: string,
    cause?: Error,
    retryable: boolean = false
  ) {
    super(
      `Secrets ${backend} ${operation} failed: ${message}`,
      "SECRETS_BACKEND_ERROR",
      500,
      retryable
    );
    this.cause = cause;
  }
}
