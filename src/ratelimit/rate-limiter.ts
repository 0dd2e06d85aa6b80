/**
 * Rate Limiter
 *
 * Fixed-window counters in the shared store (`ratelimit:<key>`), created
 * with their expiry on the first increment of a window. Anonymous callers
 * are limited per IP and endpoint, authenticated callers per subject and
 * endpoint with a looser quota.
 *
 * Repeated violations from one IP escalate to a temporary block stored
 * under `blocked:<ip>`; violations are counted under `violations:<ip>`.
 *
 * The request path fails OPEN: when the store is unreachable checks pass
 * and block lookups report "not blocked".
 *
 * @module ratelimit/rate-limiter
 */

import type { Logger } from "pino";
import type {
  BlockInfo,
  EndpointUsage,
  IpStatus,
  RateLimitConfig,
  RateLimitDecision,
  RateLimitSubject,
} from "./types.js";
import { IpBlockedError } from "./errors.js";
import { BlockInfoSchema } from "./validation.js";
import { RateLimitError } from "../errors.js";
import type { SharedStore } from "../store/types.js";
import { getComponentLogger } from "../logging/index.js";
import { AuditEvents } from "../logging/audit-events.js";
import type { AuditLogger, AuditOrigin } from "../logging/audit-types.js";

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  enabled: true,
  ipLimit: 100,
  ipWindowSeconds: 60,
  userLimit: 1000,
  userWindowSeconds: 3600,
  violationThreshold: 5,
  violationWindowSeconds: 300,
  blockDurationSeconds: 3600,
  statusEndpoints: ["simulate", "scenarios", "health"],
};

const RATE_PREFIX = "ratelimit:";

function blockedKey(ip: string): string {
  return `blocked:${ip}`;
}

function violationsKey(ip: string): string {
  return `violations:${ip}`;
}

function originOf(subject: RateLimitSubject): AuditOrigin {
  const origin: AuditOrigin = { sourceIp: subject.ip };
  if (subject.userAgent !== undefined) origin.userAgent = subject.userAgent;
  if (subject.requestId !== undefined) origin.requestId = subject.requestId;
  return origin;
}

export class RateLimiter {
  private _logger: Logger | null = null;

  constructor(
    private readonly store: SharedStore,
    private readonly audit: AuditLogger,
    private readonly config: RateLimitConfig = DEFAULT_RATE_LIMIT_CONFIG
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("ratelimit");
    }
    return this._logger;
  }

  /**
   * Count one request against `key`
   *
   * @throws {RateLimitError} When the count exceeds `limit`; carries the
   *   seconds left in the window (at least 1)
   */
  async check(
    key: string,
    limit: number,
    windowSeconds: number,
    origin?: AuditOrigin
  ): Promise<RateLimitDecision> {
    const rateKey = `${RATE_PREFIX}${key}`;

    if (!this.config.enabled) {
      return this.allowed(rateKey, 0, limit, windowSeconds, false);
    }

    let count: number;
    let ttlSeconds: number;
    try {
      ({ count, ttlSeconds } = await this.store.incrementWithExpiry(rateKey, windowSeconds));
    } catch (error) {
      this.logger.warn({ err: error, key: rateKey }, "Rate limit store unavailable, failing open");
      return this.allowed(rateKey, 0, limit, windowSeconds, true);
    }

    const resetSeconds = ttlSeconds >= 0 ? ttlSeconds : windowSeconds;
    if (count > limit) {
      const retryAfter = Math.max(1, resetSeconds);
      this.logger.warn({ key: rateKey, count, limit, retryAfter }, "Rate limit exceeded");
      this.audit.emit(
        AuditEvents.rateLimitExceeded(rateKey, limit, windowSeconds, retryAfter, origin)
      );
      throw new RateLimitError(
        `Rate limit exceeded. Allowed: ${limit} requests per ${windowSeconds}s`,
        retryAfter
      );
    }

    return this.allowed(rateKey, count, limit, resetSeconds, false);
  }

  /**
   * Per-IP quota (anonymous callers)
   */
  async checkIp(
    ip: string,
    endpoint: string,
    limit: number = this.config.ipLimit,
    windowSeconds: number = this.config.ipWindowSeconds,
    origin: AuditOrigin = { sourceIp: ip }
  ): Promise<RateLimitDecision> {
    return this.check(`ip:${ip}:${endpoint}`, limit, windowSeconds, origin);
  }

  /**
   * Per-subject quota (authenticated callers)
   */
  async checkUser(
    subjectId: string,
    endpoint: string,
    limit: number = this.config.userLimit,
    windowSeconds: number = this.config.userWindowSeconds,
    origin?: AuditOrigin
  ): Promise<RateLimitDecision> {
    return this.check(`user:${subjectId}:${endpoint}`, limit, windowSeconds, origin);
  }

  /**
   * Full request-path check: block list, the quota that fits the caller,
   * and violation escalation
   *
   * @throws {IpBlockedError} When the IP is blocked
   * @throws {RateLimitError} When the quota is exceeded
   */
  async enforce(subject: RateLimitSubject): Promise<RateLimitDecision> {
    const origin = originOf(subject);
    const blockInfo = await this.activeBlock(subject.ip);
    if (blockInfo) {
      this.audit.emit(
        AuditEvents.blockedIpDenied(
          subject.ip,
          subject.endpoint,
          blockInfo.reason,
          blockInfo.retryAfter,
          subject.subjectId,
          origin
        )
      );
      throw new IpBlockedError(subject.ip, blockInfo.reason, blockInfo.retryAfter);
    }

    try {
      return subject.subjectId !== undefined
        ? await this.checkUser(subject.subjectId, subject.endpoint, undefined, undefined, origin)
        : await this.checkIp(subject.ip, subject.endpoint, undefined, undefined, origin);
    } catch (error) {
      if (error instanceof RateLimitError) {
        await this.recordViolation(subject.ip);
      }
      throw error;
    }
  }

  /**
   * Count a violation and block the IP once the threshold is reached
   *
   * Store failures are logged; escalation is skipped rather than failing
   * the request differently.
   *
   * @returns Violations counted in the current window (0 if the store failed)
   */
  async recordViolation(ip: string): Promise<number> {
    try {
      const { count } = await this.store.incrementWithExpiry(
        violationsKey(ip),
        this.config.violationWindowSeconds
      );
      if (count >= this.config.violationThreshold) {
        await this.block(ip, this.config.blockDurationSeconds, "Multiple rate limit violations");
        await this.store.del(violationsKey(ip));
      }
      return count;
    } catch (error) {
      this.logger.error({ err: error, ip }, "Failed to record rate limit violation");
      return 0;
    }
  }

  /**
   * @returns false when not blocked or when the store is unreachable
   */
  async isBlocked(ip: string): Promise<boolean> {
    try {
      return await this.store.exists(blockedKey(ip));
    } catch (error) {
      this.logger.warn({ err: error, ip }, "Block list unavailable, treating IP as unblocked");
      return false;
    }
  }

  /**
   * Block an IP for `durationSeconds`
   *
   * @throws {StoreUnavailableError} If the block cannot be stored
   */
  async block(
    ip: string,
    durationSeconds: number = this.config.blockDurationSeconds,
    reason: string = "Rate limit violation"
  ): Promise<BlockInfo> {
    const now = Date.now();
    const info: BlockInfo = {
      reason,
      blockedAt: new Date(now).toISOString(),
      expiresAt: new Date(now + durationSeconds * 1000).toISOString(),
    };

    await this.store.set(blockedKey(ip), JSON.stringify(info), durationSeconds);
    this.audit.emit(AuditEvents.ipBlocked(ip, durationSeconds, reason));
    this.logger.warn({ ip, durationSeconds, reason }, "IP blocked");
    return info;
  }

  /**
   * Lift a block and forget recorded violations
   *
   * @returns true if a block was removed
   * @throws {StoreUnavailableError} If the store cannot be reached
   */
  async unblock(ip: string): Promise<boolean> {
    const removed = await this.store.del(blockedKey(ip), violationsKey(ip));
    const wasBlocked = removed > 0;
    this.audit.emit(AuditEvents.ipUnblocked(ip));
    this.logger.info({ ip, wasBlocked }, "IP unblocked");
    return wasBlocked;
  }

  /**
   * @throws {StoreUnavailableError} If the store cannot be reached
   */
  async getBlockInfo(ip: string): Promise<BlockInfo | undefined> {
    const raw = await this.store.get(blockedKey(ip));
    if (raw === null) {
      return undefined;
    }

    try {
      const parsed = BlockInfoSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      this.logger.warn({ err: error, ip }, "Unreadable block record");
    }
    return { reason: "unknown", blockedAt: "", expiresAt: "" };
  }

  /**
   * Counters and block state for one IP
   */
  async getIpStatus(
    ip: string,
    endpoints: readonly string[] = this.config.statusEndpoints
  ): Promise<IpStatus> {
    try {
      const usage: Record<string, EndpointUsage> = {};
      for (const endpoint of endpoints) {
        const key = `${RATE_PREFIX}ip:${ip}:${endpoint}`;
        const [count, ttl] = await Promise.all([this.store.get(key), this.store.ttl(key)]);
        usage[endpoint] = {
          count: count === null ? 0 : Number.parseInt(count, 10) || 0,
          ttlSeconds: Math.max(0, ttl),
        };
      }

      const violations = await this.store.get(violationsKey(ip));
      const blockInfo = await this.getBlockInfo(ip);
      const status: IpStatus = {
        ip,
        available: true,
        blocked: blockInfo !== undefined,
        violations: violations === null ? 0 : Number.parseInt(violations, 10) || 0,
        endpoints: usage,
      };
      if (blockInfo) {
        status.blockInfo = blockInfo;
      }
      return status;
    } catch (error) {
      this.logger.error({ err: error, ip }, "Failed to read IP status");
      return { ip, available: false, blocked: false, violations: 0, endpoints: {} };
    }
  }

  /**
   * Delete rate counters whose key (after `ratelimit:`) matches `pattern`
   *
   * @returns Number of counters deleted
   * @throws {StoreUnavailableError} If the store cannot be reached
   */
  async resetLimits(pattern: string = "*"): Promise<number> {
    const keys = await this.store.keys(`${RATE_PREFIX}${pattern}`);
    if (keys.length === 0) {
      return 0;
    }
    const deleted = await this.store.del(...keys);
    this.logger.info({ pattern, deleted }, "Rate limit counters reset");
    return deleted;
  }

  private async activeBlock(
    ip: string
  ): Promise<{ reason: string; retryAfter: number } | undefined> {
    if (!(await this.isBlocked(ip))) {
      return undefined;
    }

    try {
      const [info, ttl] = await Promise.all([
        this.getBlockInfo(ip),
        this.store.ttl(blockedKey(ip)),
      ]);
      return {
        reason: info?.reason ?? "unknown",
        retryAfter: Math.max(1, ttl > 0 ? ttl : this.config.blockDurationSeconds),
      };
    } catch (error) {
      this.logger.warn({ err: error, ip }, "Block details unavailable");
      return { reason: "unknown", retryAfter: this.config.blockDurationSeconds };
    }
  }

  private allowed(
    key: string,
    count: number,
    limit: number,
    resetSeconds: number,
    degraded: boolean
  ): RateLimitDecision {
    return {
      allowed: true,
      key,
      count,
      limit,
      remaining: Math.max(0, limit - count),
      resetSeconds,
      degraded,
    };
  }
}
