/**
 * Secrets Validation Schemas
 *
 * @module secrets/validation
 */

import { z } from "zod";

/**
 * Structured secret: flat object of string values
 */
export const SecretRecordSchema = z.record(z.string());

/**
 * Vault KV v2 read response (only the fields used)
 */
export const VaultReadResponseSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()),
  }),
});
