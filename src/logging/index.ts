/**
 * Logging Module - Public API
 *
 * Structured logging on pino with secret redaction and component-scoped
 * child loggers, plus the security audit log.
 *
 * ```typescript
 * initializeLogger({ level: "info", format: "json" });
 * const logger = getComponentLogger("auth:token-manager");
 * logger.info({ jti }, "Access token issued");
 * ```
 *
 * Environment variables:
 * - `LOG_LEVEL`: silent|fatal|error|warn|info|debug|trace (default: info)
 * - `LOG_FORMAT`: json|pretty (default: json)
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

export {
  REDACT_PATHS,
  REDACT_OPTIONS,
  SECRET_PATTERNS,
  looksLikeSecret,
  sanitizeError,
} from "./redactors.js";

export type {
  AuditEventType,
  AuditStatus,
  AuditOrigin,
  AuditEvent,
  AuditConfig,
  AuditLogFile,
  AuditLogger,
} from "./audit-types.js";
export { AuditEvents } from "./audit-events.js";
export { AuditLoggerImpl, DEFAULT_AUDIT_CONFIG } from "./audit-logger.js";
export { AuditEventTypeSchema, AuditEventSchema } from "./audit-validation.js";
