/**
 * Audit Log File Validation
 *
 * @module logging/audit-validation
 */

import { z } from "zod";

export const AuditEventTypeSchema = z.enum([
  "login.success",
  "login.failure",
  "login.limit_exceeded",
  "logout",
  "token.issued",
  "token.revoked",
  "token.refreshed",
  "password.changed",
  "password.reset",
  "permission.changed",
  "role.changed",
  "session.started",
  "session.ended",
  "access.unauthorized",
  "ratelimit.exceeded",
  "ip.blocked",
  "ip.unblocked",
  "ip.request_denied",
  "circuit.state_changed",
  "secret.rotated",
]);

export const AuditEventSchema = z.object({
  timestamp: z.string().datetime(),
  eventType: AuditEventTypeSchema,
  status: z.enum(["success", "failure"]),
  subjectId: z.string().optional(),
  email: z.string().optional(),
  description: z.string().optional(),
  sourceIp: z.string().optional(),
  userAgent: z.string().optional(),
  requestId: z.string().optional(),
  details: z.record(z.unknown()),
});

export const AuditLogFileSchema = z.object({
  version: z.literal("1.0"),
  events: z.array(AuditEventSchema),
  totalEvents: z.number().int().nonnegative(),
});
