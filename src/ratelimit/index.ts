/**
 * Rate Limiting Module
 *
 * @module ratelimit
 */

export type {
  RateLimitConfig,
  RateLimitDecision,
  BlockInfo,
  EndpointUsage,
  IpStatus,
  RateLimitSubject,
} from "./types.js";
export { IpBlockedError } from "./errors.js";
export { RateLimiter, DEFAULT_RATE_LIMIT_CONFIG } from "./rate-limiter.js";
