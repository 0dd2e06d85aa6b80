/**
 * Authentication Module Validation Schemas
 *
 * Zod schemas for decoded token parts and persisted files.
 *
 * @module auth/validation
 */

import { z } from "zod";

export const JwtAlgorithmSchema = z.enum(["HS256", "HS384", "HS512"]);

export const TokenTypeSchema = z.enum(["access", "refresh"]);

/**
 * Decoded JOSE header
 */
export const JwtHeaderSchema = z.object({
  alg: z.string(),
  typ: z.string().optional(),
});

/**
 * Decoded claims; unknown claims are dropped
 */
export const TokenClaimsSchema = z.object({
  jti: z.string().min(1),
  sub: z.string().min(1),
  email: z.string(),
  roles: z.array(z.string()),
  type: TokenTypeSchema,
  iat: z.number().int(),
  exp: z.number().int(),
});

export const TokenMetadataSchema = z.object({
  jti: z.string().min(1),
  subjectId: z.string().min(1),
  tokenType: TokenTypeSchema,
  issuedAt: z.string().datetime({ message: "issuedAt must be ISO 8601 format" }),
  expiresAt: z.string().datetime({ message: "expiresAt must be ISO 8601 format" }),
  revoked: z.boolean(),
  revokedAt: z.string().datetime({ message: "revokedAt must be ISO 8601 format" }).optional(),
  revokedReason: z.string().optional(),
  sourceIp: z.string().optional(),
  userAgent: z.string().optional(),
});

export const TokenMetadataFileSchema = z.object({
  version: z.literal("1.0"),
  tokens: z.record(z.string(), TokenMetadataSchema),
});

export const SessionSchema = z.object({
  sessionId: z.string().min(1),
  subjectId: z.string().min(1),
  createdAt: z.string().datetime(),
  lastActivity: z.string().datetime(),
  expiresAt: z.string().datetime(),
  csrfToken: z.string().min(1),
  active: z.boolean(),
  sourceIp: z.string().optional(),
  userAgent: z.string().optional(),
});

export const SessionStoreFileSchema = z.object({
  version: z.literal("1.0"),
  sessions: z.record(z.string(), SessionSchema),
});
