/**
 * Authentication Module Error Classes
 *
 * Credential failures are AuthError (401) refinements; persistence failures
 * are internal errors that never grant access.
 *
 * @module auth/errors
 */

import { AuthError, GuardError } from "../errors.js";

/**
 * Signature, format, algorithm or type check failed
 */
export class InvalidTokenError extends AuthError {
  constructor(public readonly reason: string) {
    super(`Invalid token: ${reason}`, "INVALID_TOKEN");
  }
}

/**
 * Token is past its `exp` claim
 */
export class ExpiredTokenError extends AuthError {
  constructor(public readonly expiredAt: string) {
    super(`Token expired at ${expiredAt}`, "TOKEN_EXPIRED");
  }
}

/**
 * Token metadata is flagged revoked
 */
export class RevokedTokenError extends AuthError {
  constructor(public readonly jti: string) {
    super("Token has been revoked", "TOKEN_REVOKED");
  }
}

/**
 * Session id unknown or session terminated
 */
export class SessionNotFoundError extends AuthError {
  constructor(public readonly sessionIdPrefix: string) {
    super("Session not found or inactive", "SESSION_NOT_FOUND");
  }
}

/**
 * Session is past its expiry
 */
export class SessionExpiredError extends AuthError {
  constructor(public readonly expiredAt: string) {
    super(`Session expired at ${expiredAt}`, "SESSION_EXPIRED");
  }
}

/**
 * CSRF token missing or does not match the session's token
 */
export class CsrfMismatchError extends AuthError {
  constructor() {
    super("CSRF token mismatch", "CSRF_MISMATCH");
  }
}

/**
 * Token metadata file could not be read or written
 */
export class TokenStorageError extends GuardError {
  public override readonly cause?: Error;

  constructor(
    public readonly operation: "read" | "write",
    message: string,
    cause?: Error,
    retryable: boolean = false
  ) {
    super(`Token storage ${operation} failed: ${message}`, "TOKEN_STORAGE_ERROR", 500, retryable);
    this.cause = cause;
  }
}

/**
 * Session file could not be read or written
 */
export class SessionStorageError extends GuardError {
  public override readonly cause?: Error;

  constructor(
    public readonly operation: "read" | "write",
    message: string,
    cause?: Error
  ) {
    super(`Session storage ${operation} failed: ${message}`, "SESSION_STORAGE_ERROR", 500);
    this.cause = cause;
  }
}
