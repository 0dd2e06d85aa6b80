/**
 * Guard Error Taxonomy
 *
 * Every denial the protection core produces is one of six families, each with
 * a fixed HTTP-equivalent status code. Component modules subclass these to add
 * context (token id, service name, retry hint) without changing the family.
 *
 * @module errors
 */

/**
 * Deny decision status reported to the web layer for admission failures
 */
export type OverloadStatus = "queued" | "rejected";

/**
 * Base class for all errors raised by the protection core
 *
 * Carries a machine-readable code, the HTTP-equivalent status code, and a
 * retryable flag for callers deciding whether to try again.
 */
export abstract class GuardError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string;

  /** HTTP-equivalent status code */
  public readonly statusCode: number;

  /** Whether the operation can be retried */
  public readonly retryable: boolean;

  constructor(message: string, code: string, statusCode: number, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing, invalid or expired credential (401)
 */
export class AuthError extends GuardError {
  constructor(message: string, code: string = "AUTHENTICATION_FAILED") {
    super(message, code, 401, false);
  }
}

/**
 * Caller is authenticated but lacks the required role or permission (403)
 */
export class AuthorizationError extends GuardError {
  constructor(
    message: string,
    public readonly required: readonly string[] = [],
    code: string = "FORBIDDEN"
  ) {
    super(message, code, 403, false);
  }
}

/**
 * Dependency presumed unhealthy; the call was not attempted (503)
 */
export class CircuitOpenError extends GuardError {
  /** Failure that tripped the breaker, when this call tripped it */
  public override readonly cause?: unknown;

  constructor(
    public readonly serviceName: string,
    public readonly retryAfterSeconds: number,
    cause?: unknown
  ) {
    super(
      `Circuit breaker open for ${serviceName}; retry in ${retryAfterSeconds}s`,
      "CIRCUIT_OPEN",
      503,
      true
    );
    this.cause = cause;
  }
}

/**
 * Quota exceeded (429)
 */
export class RateLimitError extends GuardError {
  constructor(
    message: string,
    public readonly retryAfterSeconds: number,
    code: string = "RATE_LIMIT_EXCEEDED"
  ) {
    super(message, code, 429, true);
  }
}

/**
 * Malformed or unsafe request (400)
 */
export class ValidationError extends GuardError {
  constructor(message: string, code: string = "INVALID_REQUEST", statusCode: number = 400) {
    super(message, code, statusCode, false);
  }
}

/**
 * Request body larger than the ceiling for its content type (413)
 */
export class PayloadTooLargeError extends ValidationError {
  constructor(
    public readonly contentLength: number,
    public readonly maxBytes: number
  ) {
    super(
      `Payload of ${contentLength} bytes exceeds limit of ${maxBytes} bytes`,
      "PAYLOAD_TOO_LARGE",
      413
    );
  }
}

/**
 * Service at capacity (503)
 *
 * `status` tells the caller whether the request was queued for a later retry
 * or rejected outright because the queue is full.
 */
export class OverloadedError extends GuardError {
  constructor(
    message: string,
    public readonly status: OverloadStatus,
    public readonly retryAfterSeconds?: number
  ) {
    super(message, status === "queued" ? "REQUEST_QUEUED" : "SERVICE_OVERLOADED", 503, true);
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`Invalid configuration for ${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

/**
 * Deny decision returned to the web layer
 */
export interface DenyDecision {
  allowed: false;
  code: string;
  statusCode: number;
  message: string;
  retryAfterSeconds?: number;
  status?: OverloadStatus;
}

/**
 * Map any thrown value to a deny decision
 *
 * Guard errors keep their code, status and hints. Anything else becomes an
 * opaque 500 so internal messages never reach the caller.
 */
export function toDenyDecision(error: unknown): DenyDecision {
  if (!(error instanceof GuardError)) {
    return {
      allowed: false,
      code: "INTERNAL_ERROR",
      statusCode: 500,
      message: "Internal server error",
    };
  }

  // Storage and backend failures keep their code but not their text
  const decision: DenyDecision = {
    allowed: false,
    code: error.code,
    statusCode: error.statusCode,
    message: error.statusCode === 500 ? "Internal server error" : error.message,
  };

  if (error instanceof RateLimitError || error instanceof CircuitOpenError) {
    decision.retryAfterSeconds = error.retryAfterSeconds;
  }
  if (error instanceof OverloadedError) {
    decision.status = error.status;
    if (error.retryAfterSeconds !== undefined) {
      decision.retryAfterSeconds = error.retryAfterSeconds;
    }
  }

  return decision;
}
