/**
 * Runtime validation schemas for CLI command options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options.
 */

import { isIP } from "node:net";
import { z } from "zod";
import { AuditEventTypeSchema } from "../../logging/audit-validation.js";

/**
 * Positive integer option given as a string, with a default
 */
function integerOption(defaultValue: number, min: number, max: number, label: string) {
  return z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .pipe(
      z
        .number()
        .int({ message: `${label} must be a whole number` })
        .min(min, { message: `${label} must be at least ${min}` })
        .max(max, { message: `${label} must be at most ${max}` })
    );
}

export const IpArgumentSchema = z
  .string()
  .refine((value) => isIP(value) !== 0, { message: "must be an IPv4 or IPv6 address" });

export const JsonOptionSchema = z.object({
  json: z.boolean().optional(),
});

export const RotationRunOptionsSchema = z.object({
  force: z.boolean().optional(),
  json: z.boolean().optional(),
});

export const IpBlockOptionsSchema = z.object({
  duration: integerOption(3600, 1, 30 * 24 * 3600, "duration"),
  reason: z.string().min(1).max(200).optional().default("Blocked by administrator"),
});

export const AuditRecentOptionsSchema = z.object({
  limit: integerOption(20, 1, 1000, "limit"),
  type: AuditEventTypeSchema.optional(),
  user: z.string().min(1).optional(),
  json: z.boolean().optional(),
});

export type RotationRunOptions = z.infer<typeof RotationRunOptionsSchema>;
export type IpBlockOptions = z.infer<typeof IpBlockOptionsSchema>;
export type AuditRecentOptions = z.infer<typeof AuditRecentOptionsSchema>;
export type JsonOption = z.infer<typeof JsonOptionSchema>;
