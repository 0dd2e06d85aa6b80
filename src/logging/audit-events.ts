/**
 * Audit Event Constructors
 *
 * One constructor per event kind so call sites cannot misspell a type or
 * forget the status. Each returns a complete AuditEvent stamped with the
 * current time.
 *
 * @module logging/audit-events
 */

import type { AuditEvent, AuditEventType, AuditOrigin, AuditStatus } from "./audit-types.js";

/**
 * Fields shared by the constructors
 */
interface EventFields {
  subjectId?: string;
  email?: string;
  description?: string;
  details?: Record<string, unknown>;
  origin?: AuditOrigin;
}

function build(eventType: AuditEventType, status: AuditStatus, fields: EventFields): AuditEvent {
  const event: AuditEvent = {
    timestamp: new Date().toISOString(),
    eventType,
    status,
    details: fields.details ?? {},
  };

  if (fields.subjectId !== undefined) event.subjectId = fields.subjectId;
  if (fields.email !== undefined) event.email = fields.email;
  if (fields.description !== undefined) event.description = fields.description;
  if (fields.origin?.sourceIp !== undefined) event.sourceIp = fields.origin.sourceIp;
  if (fields.origin?.userAgent !== undefined) event.userAgent = fields.origin.userAgent;
  if (fields.origin?.requestId !== undefined) event.requestId = fields.origin.requestId;

  return event;
}

export const AuditEvents = {
  loginSuccess(subjectId: string, email: string, origin?: AuditOrigin): AuditEvent {
    return build("login.success", "success", {
      subjectId,
      email,
      origin,
      description: `User ${email} logged in`,
    });
  },

  loginFailure(email: string, reason: string, origin?: AuditOrigin): AuditEvent {
    return build("login.failure", "failure", {
      email,
      origin,
      description: `Login failed for ${email}: ${reason}`,
      details: { reason },
    });
  },

  loginLimitExceeded(email: string, attempts: number, origin?: AuditOrigin): AuditEvent {
    return build("login.limit_exceeded", "failure", {
      email,
      origin,
      description: `Too many failed logins for ${email}`,
      details: { attempts },
    });
  },

  logout(subjectId: string, origin?: AuditOrigin): AuditEvent {
    return build("logout", "success", { subjectId, origin, description: "User logged out" });
  },

  tokenIssued(
    subjectId: string,
    jti: string,
    tokenType: "access" | "refresh",
    expiresAt: string,
    origin?: AuditOrigin
  ): AuditEvent {
    return build("token.issued", "success", {
      subjectId,
      origin,
      description: `${tokenType} token issued`,
      details: { jti, tokenType, expiresAt },
    });
  },

  tokenRevoked(subjectId: string, jti: string, reason: string, origin?: AuditOrigin): AuditEvent {
    return build("token.revoked", "success", {
      subjectId,
      origin,
      description: `Token revoked: ${reason}`,
      details: { jti, reason },
    });
  },

  tokenRefreshed(
    subjectId: string,
    previousJti: string,
    accessJti: string,
    refreshJti: string,
    origin?: AuditOrigin
  ): AuditEvent {
    return build("token.refreshed", "success", {
      subjectId,
      origin,
      description: "Refresh token rotated",
      details: { previousJti, accessJti, refreshJti },
    });
  },

  passwordChanged(subjectId: string, changedBy: string, origin?: AuditOrigin): AuditEvent {
    return build("password.changed", "success", {
      subjectId,
      origin,
      description: "Password changed",
      details: { changedBy },
    });
  },

  passwordReset(subjectId: string, origin?: AuditOrigin): AuditEvent {
    return build("password.reset", "success", {
      subjectId,
      origin,
      description: "Password reset",
    });
  },

  permissionChanged(
    subjectId: string,
    permission: string,
    action: "granted" | "revoked",
    changedBy: string
  ): AuditEvent {
    return build("permission.changed", "success", {
      subjectId,
      description: `Permission ${permission} ${action}`,
      details: { permission, action, changedBy },
    });
  },

  roleChanged(
    subjectId: string,
    oldRoles: readonly string[],
    newRoles: readonly string[],
    changedBy: string
  ): AuditEvent {
    return build("role.changed", "success", {
      subjectId,
      description: `Roles changed from [${oldRoles.join(", ")}] to [${newRoles.join(", ")}]`,
      details: { oldRoles: [...oldRoles], newRoles: [...newRoles], changedBy },
    });
  },

  sessionStarted(subjectId: string, sessionIdPrefix: string, origin?: AuditOrigin): AuditEvent {
    return build("session.started", "success", {
      subjectId,
      origin,
      description: "Session started",
      details: { sessionIdPrefix },
    });
  },

  sessionEnded(subjectId: string, sessionIdPrefix: string, reason: string): AuditEvent {
    return build("session.ended", "success", {
      subjectId,
      description: `Session ended: ${reason}`,
      details: { sessionIdPrefix, reason },
    });
  },

  unauthorizedAccess(
    resource: string,
    reason: string,
    subjectId?: string,
    origin?: AuditOrigin
  ): AuditEvent {
    return build("access.unauthorized", "failure", {
      subjectId,
      origin,
      description: `Unauthorized access to ${resource}: ${reason}`,
      details: { resource, reason },
    });
  },

  rateLimitExceeded(
    key: string,
    limit: number,
    windowSeconds: number,
    retryAfterSeconds: number,
    origin?: AuditOrigin
  ): AuditEvent {
    return build("ratelimit.exceeded", "failure", {
      origin,
      description: `Rate limit exceeded for ${key}`,
      details: { key, limit, windowSeconds, retryAfterSeconds },
    });
  },

  ipBlocked(ip: string, durationSeconds: number, reason: string): AuditEvent {
    return build("ip.blocked", "success", {
      origin: { sourceIp: ip },
      description: `IP ${ip} blocked: ${reason}`,
      details: { ip, durationSeconds, reason },
    });
  },

  ipUnblocked(ip: string): AuditEvent {
    return build("ip.unblocked", "success", {
      origin: { sourceIp: ip },
      description: `IP ${ip} unblocked`,
      details: { ip },
    });
  },

  blockedIpDenied(
    ip: string,
    endpoint: string,
    reason: string,
    retryAfterSeconds: number,
    subjectId?: string,
    origin?: AuditOrigin
  ): AuditEvent {
    return build("ip.request_denied", "failure", {
      subjectId,
      origin: origin ?? { sourceIp: ip },
      description: `Request from blocked IP ${ip} denied`,
      details: { ip, endpoint, reason, retryAfterSeconds },
    });
  },

  circuitStateChanged(serviceName: string, from: string, to: string, failures: number): AuditEvent {
    return build("circuit.state_changed", to === "open" ? "failure" : "success", {
      description: `Circuit ${serviceName} ${from} -> ${to}`,
      details: { serviceName, from, to, failures },
    });
  },

  secretRotated(
    secretName: string,
    succeeded: boolean,
    rotationCount: number,
    error?: string
  ): AuditEvent {
    return build("secret.rotated", succeeded ? "success" : "failure", {
      description: succeeded
        ? `Secret ${secretName} rotated`
        : `Secret ${secretName} rotation failed`,
      details:
        error === undefined ? { secretName, rotationCount } : { secretName, rotationCount, error },
    });
  },
};
