/**
 * Authentication Module Type Definitions
 *
 * Signed tokens (access and refresh), their server-side metadata shadow,
 * and browser sessions with CSRF tokens.
 *
 * @module auth/types
 */

import type { AuditOrigin } from "../logging/audit-types.js";

/**
 * Token flavour carried in the `type` claim
 */
export type TokenType = "access" | "refresh";

/**
 * HMAC signing algorithms accepted for tokens
 */
export type JwtAlgorithm = "HS256" | "HS384" | "HS512";

/**
 * Where a request came from; recorded on tokens, sessions and audit events
 */
export type RequestOrigin = AuditOrigin;

/**
 * Claims carried in every signed token
 */
export interface TokenClaims {
  /** Unique token id */
  jti: string;

  /** Subject (user) id */
  sub: string;

  email: string;

  roles: string[];

  type: TokenType;

  /** Issued-at, seconds since epoch */
  iat: number;

  /** Expiry, seconds since epoch */
  exp: number;
}

/**
 * Server-side shadow record of an issued token, keyed by jti
 *
 * NOTE: the signed token itself is never stored
 */
export interface TokenMetadata {
  jti: string;
  subjectId: string;
  tokenType: TokenType;

  /** ISO 8601 */
  issuedAt: string;

  /** ISO 8601 */
  expiresAt: string;

  /** Once true, never reset */
  revoked: boolean;

  /** ISO 8601 */
  revokedAt?: string;

  revokedReason?: string;
  sourceIp?: string;
  userAgent?: string;
}

/**
 * A freshly signed token
 */
export interface IssuedToken {
  token: string;
  jti: string;

  /** ISO 8601 */
  expiresAt: string;
}

/**
 * Access and refresh token issued together
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: "Bearer";

  /** Access token lifetime in seconds */
  expiresIn: number;

  accessJti: string;
  refreshJti: string;
}

/**
 * Diagnostic view of a token, decoded without signature verification
 */
export interface TokenInfo {
  claims: TokenClaims;
  metadata?: TokenMetadata;
  expired: boolean;
}

/**
 * Minimal identity consumed from the user-store layer
 */
export interface SubjectIdentity {
  id: string;
  email: string;
  roles: string[];
  active: boolean;
}

/**
 * Lookup port onto the user store
 *
 * When present, refresh mints access tokens from the subject's current
 * roles and refuses inactive subjects.
 */
export interface IdentityLookup {
  findById(subjectId: string): Promise<SubjectIdentity | undefined>;
}

/**
 * Source of the two signing secrets
 */
export interface SigningSecretSource {
  getJwtSecret(): Promise<string>;
  getJwtRefreshSecret(): Promise<string>;
}

/**
 * Token issuance settings
 */
export interface TokenConfig {
  algorithm: JwtAlgorithm;

  /** Access token lifetime in hours */
  accessExpirationHours: number;

  /** Refresh token lifetime in days */
  refreshExpirationDays: number;

  /** Roles given to access tokens issued without an explicit role list */
  defaultRoles: string[];
}

/**
 * Token metadata file layout
 */
export interface TokenMetadataFile {
  version: "1.0";
  tokens: Record<string, TokenMetadata>;
}

/**
 * Persistence for token metadata
 */
export interface TokenMetadataStore {
  /**
   * @throws {TokenStorageError} If the file cannot be read or parsed
   */
  load(): Promise<Map<string, TokenMetadata>>;

  /**
   * @throws {TokenStorageError} If the file cannot be written
   */
  save(tokens: Map<string, TokenMetadata>): Promise<void>;
}

/**
 * Browser session with its CSRF token
 */
export interface Session {
  sessionId: string;
  subjectId: string;

  /** ISO 8601 */
  createdAt: string;

  /** ISO 8601 */
  lastActivity: string;

  /** ISO 8601; only ever moves forward */
  expiresAt: string;

  csrfToken: string;
  active: boolean;
  sourceIp?: string;
  userAgent?: string;
}

/**
 * Session settings
 */
export interface SessionConfig {
  timeoutMinutes: number;
  maxConcurrentSessions: number;
}

/**
 * Session file layout
 */
export interface SessionStoreFile {
  version: "1.0";
  sessions: Record<string, Session>;
}

/**
 * Persistence for sessions
 */
export interface SessionStore {
  /**
   * @throws {SessionStorageError} If the file cannot be read or parsed
   */
  load(): Promise<Map<string, Session>>;

  /**
   * @throws {SessionStorageError} If the file cannot be written
   */
  save(sessions: Map<string, Session>): Promise<void>;
}
