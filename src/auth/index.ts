/**
 * Authentication Module
 *
 * Signed access/refresh tokens with server-side revocation metadata, and
 * browser sessions with CSRF tokens.
 *
 * @example
 * ```typescript
 * import { TokenManager, FileTokenMetadataStore } from "./auth/index.js";
 *
 * const tokens = new TokenManager(new FileTokenMetadataStore("./data"), secrets, audit);
 * const pair = await tokens.issueTokenPair("u-1", "ana@example.com", ["user"]);
 * const claims = await tokens.validate(pair.accessToken);
 * ```
 *
 * @module auth
 */

export type {
  TokenType,
  JwtAlgorithm,
  RequestOrigin,
  TokenClaims,
  TokenMetadata,
  IssuedToken,
  TokenPair,
  TokenInfo,
  SubjectIdentity,
  IdentityLookup,
  SigningSecretSource,
  TokenConfig,
  TokenMetadataFile,
  TokenMetadataStore,
  Session,
  SessionConfig,
  SessionStoreFile,
  SessionStore,
} from "./types.js";

export {
  InvalidTokenError,
  ExpiredTokenError,
  RevokedTokenError,
  SessionNotFoundError,
  SessionExpiredError,
  CsrfMismatchError,
  TokenStorageError,
  SessionStorageError,
} from "./errors.js";

export { signJwt, verifyJwt, decodeJwt } from "./jwt.js";
export type { VerifyOptions } from "./jwt.js";
export { FileTokenMetadataStore } from "./token-store.js";
export { TokenManager, DEFAULT_TOKEN_CONFIG } from "./token-manager.js";
export type { TokenManagerOptions } from "./token-manager.js";
export { FileSessionStore } from "./session-store.js";
export { SessionManager, DEFAULT_SESSION_CONFIG } from "./session-manager.js";
