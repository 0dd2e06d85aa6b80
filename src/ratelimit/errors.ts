/**
 * Rate Limiter Errors
 *
 * @module ratelimit/errors
 */

import { RateLimitError } from "../errors.js";

/**
 * Caller IP is temporarily blocked after repeated violations
 */
export class IpBlockedError extends RateLimitError {
  constructor(
    public readonly ip: string,
    public readonly reason: string,
    retryAfterSeconds: number
  ) {
    super("IP address blocked due to abuse", retryAfterSeconds, "IP_BLOCKED");
  }
}
