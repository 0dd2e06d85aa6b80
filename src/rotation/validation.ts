/**
 * Rotation Schedule File Validation
 *
 * @module rotation/validation
 */

import { z } from "zod";

export const SecretTypeSchema = z.enum(["database_password", "api_key", "jwt_secret"]);

export const RotationScheduleSchema = z.object({
  secretName: z.string().min(1),
  secretType: SecretTypeSchema,
  rotationDays: z.number().int().positive(),
  lastRotated: z.string().datetime(),
  nextRotation: z.string().datetime(),
  rotationCount: z.number().int().nonnegative(),
});

export const RotationHistoryRecordSchema = z.object({
  secretName: z.string(),
  timestamp: z.string().datetime(),
  success: z.boolean(),
  oldSecretHash: z.string().optional(),
  error: z.string().optional(),
});

export const RotationScheduleFileSchema = z.object({
  version: z.literal("1.0"),
  schedules: z.record(RotationScheduleSchema),
  history: z.array(RotationHistoryRecordSchema),
});
