/**
 * Rate Limiter Validation Schemas
 *
 * @module ratelimit/validation
 */

import { z } from "zod";

export const BlockInfoSchema = z.object({
  reason: z.string(),
  blockedAt: z.string(),
  expiresAt: z.string(),
});
