/**
 * Rate Limiter Types
 *
 * @module ratelimit/types
 */

export interface RateLimitConfig {
  /** When false every check passes without touching the store */
  enabled: boolean;

  /** Anonymous callers, per IP and endpoint */
  ipLimit: number;
  ipWindowSeconds: number;

  /** Authenticated callers, per subject and endpoint */
  userLimit: number;
  userWindowSeconds: number;

  /** Violations within the violation window that trigger an IP block */
  violationThreshold: number;
  violationWindowSeconds: number;
  blockDurationSeconds: number;

  /** Endpoints reported by `getIpStatus` when none are given */
  statusEndpoints: string[];
}

/**
 * Outcome of an allowed check
 */
export interface RateLimitDecision {
  allowed: true;
  key: string;
  count: number;
  limit: number;
  remaining: number;

  /** Seconds until the window resets */
  resetSeconds: number;

  /** True when the store was unreachable and the check failed open */
  degraded: boolean;
}

/**
 * Stored under `blocked:<ip>`
 */
export interface BlockInfo {
  reason: string;
  /** ISO 8601 */
  blockedAt: string;
  /** ISO 8601 */
  expiresAt: string;
}

export interface EndpointUsage {
  count: number;
  ttlSeconds: number;
}

export interface IpStatus {
  ip: string;

  /** false when the store could not be read */
  available: boolean;

  blocked: boolean;
  blockInfo?: BlockInfo;
  violations: number;
  endpoints: Record<string, EndpointUsage>;
}

/**
 * Who is calling which endpoint
 */
export interface RateLimitSubject {
  ip: string;
  endpoint: string;

  /** Set for authenticated callers; selects the per-subject quota */
  subjectId?: string;

  userAgent?: string;
  requestId?: string;
}
