/**
 * Audit Logging Type Definitions
 *
 * Security audit events share one flat record shape so they can be queried
 * by subject, type and recency. Event-specific context goes in `details`.
 *
 * Never put raw tokens, passwords or secret values in an event: token ids
 * (jti), session id prefixes and secret hashes only.
 *
 * @module logging/audit-types
 */

/**
 * All audit event types
 *
 * Categories:
 * - login.* / logout: credential checks
 * - token.*: access/refresh token lifecycle
 * - password.*, permission.*, role.*: account changes
 * - session.*: server-side session lifecycle
 * - access.*, ratelimit.*, ip.*: security violations and enforcement
 * - circuit.*: dependency health transitions
 * - secret.*: secret rotation
 */
export type AuditEventType =
  | "login.success"
  | "login.failure"
  | "login.limit_exceeded"
  | "logout"
  | "token.issued"
  | "token.revoked"
  | "token.refreshed"
  | "password.changed"
  | "password.reset"
  | "permission.changed"
  | "role.changed"
  | "session.started"
  | "session.ended"
  | "access.unauthorized"
  | "ratelimit.exceeded"
  | "ip.blocked"
  | "ip.unblocked"
  | "ip.request_denied"
  | "circuit.state_changed"
  | "secret.rotated";

/**
 * Outcome recorded on an audit event
 */
export type AuditStatus = "success" | "failure";

/**
 * Caller context attached to events raised while handling a request
 */
export interface AuditOrigin {
  /** Source IP address */
  sourceIp?: string;

  /** Client user agent */
  userAgent?: string;

  /** Request/correlation ID */
  requestId?: string;
}

/**
 * Immutable audit record
 */
export interface AuditEvent extends AuditOrigin {
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;

  eventType: AuditEventType;

  status: AuditStatus;

  /** Subject (user) the event concerns, when known */
  subjectId?: string;

  /** Subject email, when known */
  email?: string;

  /** One-line human-readable summary */
  description?: string;

  /** Event-specific context (token id, roles, retry hint, ...) */
  details: Record<string, unknown>;
}

/**
 * Audit logger configuration
 */
export interface AuditConfig {
  /** Whether events are recorded at all */
  enabled: boolean;

  /** Path of the JSON file holding the most recent events */
  logPath: string;

  /** Number of most recent events kept in memory and on disk */
  maxEvents: number;
}

/**
 * Persisted audit file layout
 */
export interface AuditLogFile {
  version: "1.0";

  /** Most recent events, oldest first */
  events: AuditEvent[];

  /** Events recorded over the file's lifetime, including trimmed ones */
  totalEvents: number;
}

/**
 * Audit sink consumed by every component
 *
 * `emit` never throws and never waits on I/O: a failing durable write must
 * not block or fail the request that raised the event.
 */
export interface AuditLogger {
  /** Record an event (fire-and-forget) */
  emit(event: AuditEvent): void;

  /** Events for one subject, newest first */
  getUserEvents(subjectId: string, limit?: number): AuditEvent[];

  /** Events of one type, newest first */
  getEventsByType(eventType: AuditEventType, limit?: number): AuditEvent[];

  /** Most recent events, newest first */
  getRecentEvents(limit?: number): AuditEvent[];

  /** Wait until all emitted events are durably written */
  flush(): Promise<void>;

  isEnabled(): boolean;
}
