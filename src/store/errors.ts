/**
 * Shared Store Errors
 *
 * @module store/errors
 */

import { GuardError } from "../errors.js";

/**
 * Shared store unreachable or returned an error
 *
 * Retryable; callers decide whether the guarded action fails open or closed.
 */
export class StoreUnavailableError extends GuardError {
  public override readonly cause?: Error;

  constructor(
    public readonly operation: string,
    message: string,
    cause?: Error
  ) {
    super(`Shared store ${operation} failed: ${message}`, "STORE_UNAVAILABLE", 503, true);
    this.cause = cause;
  }
}
