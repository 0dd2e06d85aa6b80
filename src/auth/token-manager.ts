/**
 * Token Manager
 *
 * Issues, validates, refreshes and revokes signed access and refresh
 * tokens. Every issued token gets a metadata record keyed by jti; the
 * revocation flag on that record is checked on every validation and is
 * never cleared once set.
 *
 * Refresh tokens are single-use: `refresh` revokes the presented token and
 * issues a new pair under one lock, so two concurrent refreshes with the
 * same token cannot both succeed.
 *
 * Changes are made on a copy of the metadata table that replaces the cached
 * one only once the store has saved it; audit events follow the save.
 *
 * @module auth/token-manager
 */

import crypto from "node:crypto";
import type { Logger } from "pino";
import type {
  IdentityLookup,
  IssuedToken,
  RequestOrigin,
  SigningSecretSource,
  TokenClaims,
  TokenConfig,
  TokenInfo,
  TokenMetadata,
  TokenMetadataStore,
  TokenPair,
  TokenType,
} from "./types.js";
import { decodeJwt, signJwt, verifyJwt } from "./jwt.js";
import { InvalidTokenError, RevokedTokenError } from "./errors.js";
import { AuthError } from "../errors.js";
import { getComponentLogger } from "../logging/index.js";
import { AuditEvents } from "../logging/audit-events.js";
import type { AuditEvent, AuditLogger } from "../logging/audit-types.js";
import { Mutex } from "../utils/mutex.js";

const HOUR_SECONDS = 60 * 60;
const DAY_SECONDS = 24 * HOUR_SECONDS;

export const DEFAULT_TOKEN_CONFIG: TokenConfig = {
  algorithm: "HS256",
  accessExpirationHours: 24,
  refreshExpirationDays: 7,
  defaultRoles: ["user"],
};

/**
 * Optional collaborators
 */
export interface TokenManagerOptions {
  /** User-store lookup used by `refresh` */
  identities?: IdentityLookup;
}

export class TokenManager {
  private tokens: Map<string, TokenMetadata> | null = null;
  private readonly mutex = new Mutex();
  private _logger: Logger | null = null;

  constructor(
    private readonly store: TokenMetadataStore,
    private readonly secrets: SigningSecretSource,
    private readonly audit: AuditLogger,
    private readonly config: TokenConfig = DEFAULT_TOKEN_CONFIG,
    private readonly options: TokenManagerOptions = {}
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:token-manager");
    }
    return this._logger;
  }

  /** Access token lifetime in seconds */
  get accessTokenTtlSeconds(): number {
    return this.config.accessExpirationHours * HOUR_SECONDS;
  }

  /** Refresh token lifetime in seconds */
  get refreshTokenTtlSeconds(): number {
    return this.config.refreshExpirationDays * DAY_SECONDS;
  }

  /**
   * Issue a signed access token
   *
   * @param roles - Defaults to the configured default roles
   * @throws {TokenStorageError} If the metadata record cannot be persisted
   */
  async issueAccessToken(
    subjectId: string,
    email: string,
    roles?: readonly string[],
    origin?: RequestOrigin
  ): Promise<IssuedToken> {
    return this.mutex.runExclusive(async () => {
      const tokens = await this.draft();
      const events: AuditEvent[] = [];
      const issued = await this.mint(tokens, events, "access", subjectId, email, roles, origin);
      await this.commit(tokens, events);
      return issued;
    });
  }

  /**
   * Issue a signed refresh token
   *
   * The subject's email and roles ride along so a refresh without an
   * identity lookup can reproduce them.
   */
  async issueRefreshToken(
    subjectId: string,
    email: string = "",
    roles?: readonly string[],
    origin?: RequestOrigin
  ): Promise<IssuedToken> {
    return this.mutex.runExclusive(async () => {
      const tokens = await this.draft();
      const events: AuditEvent[] = [];
      const issued = await this.mint(tokens, events, "refresh", subjectId, email, roles, origin);
      await this.commit(tokens, events);
      return issued;
    });
  }

  /**
   * Issue an access and refresh token together (login)
   */
  async issueTokenPair(
    subjectId: string,
    email: string,
    roles?: readonly string[],
    origin?: RequestOrigin
  ): Promise<TokenPair> {
    return this.mutex.runExclusive(async () => {
      const tokens = await this.draft();
      const events: AuditEvent[] = [];
      const pair = await this.mintPair(tokens, events, subjectId, email, roles, origin);
      await this.commit(tokens, events);
      return pair;
    });
  }

  /**
   * Verify a token and return its claims
   *
   * @throws {InvalidTokenError} Bad signature, format or type mismatch
   * @throws {ExpiredTokenError} Past `exp`
   * @throws {RevokedTokenError} Metadata flagged revoked
   */
  async validate(token: string, expectedType: TokenType = "access"): Promise<TokenClaims> {
    const claims = verifyJwt(token, await this.secretFor(expectedType), this.config.algorithm);
    if (claims.type !== expectedType) {
      throw new InvalidTokenError(`expected ${expectedType} token`);
    }

    const tokens = await this.loadTokens();
    if (tokens.get(claims.jti)?.revoked) {
      throw new RevokedTokenError(claims.jti);
    }
    return claims;
  }

  /**
   * Exchange a refresh token for a new pair, revoking the one presented
   *
   * @throws {AuthError} When the refresh token is invalid, expired, already
   *   used, or its subject is no longer active
   */
  async refresh(refreshToken: string, origin?: RequestOrigin): Promise<TokenPair> {
    return this.mutex.runExclusive(async () => {
      const claims = await this.validate(refreshToken, "refresh");
      const tokens = await this.draft();

      let email = claims.email;
      let roles: readonly string[] = claims.roles;
      if (this.options.identities) {
        const identity = await this.options.identities.findById(claims.sub);
        if (!identity || !identity.active) {
          throw new AuthError("Subject not found or inactive", "SUBJECT_INACTIVE");
        }
        email = identity.email;
        roles = identity.roles;
      }

      const nowIso = new Date().toISOString();
      const existing = tokens.get(claims.jti);
      tokens.set(claims.jti, {
        ...(existing ?? {
          jti: claims.jti,
          subjectId: claims.sub,
          tokenType: claims.type,
          issuedAt: new Date(claims.iat * 1000).toISOString(),
          expiresAt: new Date(claims.exp * 1000).toISOString(),
        }),
        revoked: true,
        revokedAt: nowIso,
        revokedReason: "rotated",
      });

      const events: AuditEvent[] = [];
      const pair = await this.mintPair(tokens, events, claims.sub, email, roles, origin);
      events.push(
        AuditEvents.tokenRefreshed(claims.sub, claims.jti, pair.accessJti, pair.refreshJti, origin)
      );
      await this.commit(tokens, events);

      this.logger.info({ subjectId: claims.sub, previousJti: claims.jti }, "Refresh token rotated");
      return pair;
    });
  }

  /**
   * Revoke a single token
   *
   * The signature is verified (expiry ignored) before anything is revoked.
   *
   * @returns false when the token is not a valid token of ours
   */
  async revoke(
    token: string,
    reason: string = "revoked",
    origin?: RequestOrigin
  ): Promise<boolean> {
    const unverified = decodeJwt(token);
    if (!unverified) {
      return false;
    }

    let claims: TokenClaims;
    try {
      claims = verifyJwt(token, await this.secretFor(unverified.type), this.config.algorithm, {
        ignoreExpiration: true,
      });
    } catch (error) {
      if (error instanceof AuthError) {
        this.logger.warn({ reason: error.message }, "Refusing to revoke unverifiable token");
        return false;
      }
      throw error;
    }

    return this.revokeByJti(claims.jti, reason, origin, claims);
  }

  /**
   * Revoke by token id
   *
   * @returns false when no such record exists or it is already revoked
   */
  async revokeByJti(
    jti: string,
    reason: string = "revoked",
    origin?: RequestOrigin,
    claims?: TokenClaims
  ): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const tokens = await this.draft();
      const existing = tokens.get(jti);
      if (existing?.revoked) {
        return false;
      }

      let record: TokenMetadata;
      if (existing) {
        record = existing;
      } else if (claims) {
        record = {
          jti,
          subjectId: claims.sub,
          tokenType: claims.type,
          issuedAt: new Date(claims.iat * 1000).toISOString(),
          expiresAt: new Date(claims.exp * 1000).toISOString(),
          revoked: false,
        };
      } else {
        return false;
      }

      tokens.set(jti, {
        ...record,
        revoked: true,
        revokedAt: new Date().toISOString(),
        revokedReason: reason,
      });
      await this.commit(tokens, [AuditEvents.tokenRevoked(record.subjectId, jti, reason, origin)]);
      return true;
    });
  }

  /**
   * Revoke every live token of a subject
   *
   * @returns Number of records newly revoked
   */
  async revokeAll(subjectId: string, reason: string = "revoke_all"): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const tokens = await this.draft();
      const revokedAt = new Date().toISOString();
      const revokedJtis: string[] = [];

      for (const [jti, record] of tokens) {
        if (record.subjectId === subjectId && !record.revoked) {
          tokens.set(jti, { ...record, revoked: true, revokedAt, revokedReason: reason });
          revokedJtis.push(jti);
        }
      }

      if (revokedJtis.length > 0) {
        await this.commit(
          tokens,
          revokedJtis.map((jti) => AuditEvents.tokenRevoked(subjectId, jti, reason))
        );
      }

      this.logger.info({ subjectId, count: revokedJtis.length }, "Revoked all tokens for subject");
      return revokedJtis.length;
    });
  }

  /**
   * Drop metadata records past their expiry
   *
   * @returns Number of records removed
   */
  async cleanupExpired(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const tokens = await this.draft();
      const now = Date.now();
      let removed = 0;

      for (const [jti, record] of tokens) {
        if (Date.parse(record.expiresAt) <= now) {
          tokens.delete(jti);
          removed++;
        }
      }

      if (removed > 0) {
        await this.commit(tokens, []);
      }
      this.logger.info({ removed, remaining: tokens.size }, "Expired token metadata cleaned up");
      return removed;
    });
  }

  /**
   * Decode a token without verification and attach its metadata
   *
   * @returns undefined for structurally invalid tokens
   */
  async getTokenInfo(token: string): Promise<TokenInfo | undefined> {
    const claims = decodeJwt(token);
    if (!claims) {
      return undefined;
    }

    const tokens = await this.loadTokens();
    const metadata = tokens.get(claims.jti);
    const info: TokenInfo = {
      claims,
      expired: Math.floor(Date.now() / 1000) >= claims.exp,
    };
    if (metadata) {
      info.metadata = { ...metadata };
    }
    return info;
  }

  /**
   * Metadata for one token id
   */
  async getMetadata(jti: string): Promise<TokenMetadata | undefined> {
    const record = (await this.loadTokens()).get(jti);
    return record ? { ...record } : undefined;
  }

  /**
   * Metadata for every token of a subject
   */
  async getSubjectTokens(subjectId: string): Promise<TokenMetadata[]> {
    const tokens = await this.loadTokens();
    return [...tokens.values()].filter((record) => record.subjectId === subjectId);
  }

  private async loadTokens(): Promise<Map<string, TokenMetadata>> {
    if (this.tokens === null) {
      this.tokens = await this.store.load();
    }
    return this.tokens;
  }

  /**
   * Working copy of the metadata table
   */
  private async draft(): Promise<Map<string, TokenMetadata>> {
    return new Map(await this.loadTokens());
  }

  /**
   * Persist a working copy, make it the cached table, then emit its events
   */
  private async commit(tokens: Map<string, TokenMetadata>, events: AuditEvent[]): Promise<void> {
    await this.store.save(tokens);
    this.tokens = tokens;
    for (const event of events) {
      this.audit.emit(event);
    }
  }

  private async secretFor(type: TokenType): Promise<string> {
    return type === "access" ? this.secrets.getJwtSecret() : this.secrets.getJwtRefreshSecret();
  }

  private async mintPair(
    tokens: Map<string, TokenMetadata>,
    events: AuditEvent[],
    subjectId: string,
    email: string,
    roles: readonly string[] | undefined,
    origin: RequestOrigin | undefined
  ): Promise<TokenPair> {
    const access = await this.mint(tokens, events, "access", subjectId, email, roles, origin);
    const refresh = await this.mint(tokens, events, "refresh", subjectId, email, roles, origin);
    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: "Bearer",
      expiresIn: this.accessTokenTtlSeconds,
      accessJti: access.jti,
      refreshJti: refresh.jti,
    };
  }

  /**
   * Sign a token, record its metadata in `tokens` and queue its audit event
   * (caller commits)
   */
  private async mint(
    tokens: Map<string, TokenMetadata>,
    events: AuditEvent[],
    type: TokenType,
    subjectId: string,
    email: string,
    roles: readonly string[] | undefined,
    origin: RequestOrigin | undefined
  ): Promise<IssuedToken> {
    const iat = Math.floor(Date.now() / 1000);
    const ttl = type === "access" ? this.accessTokenTtlSeconds : this.refreshTokenTtlSeconds;
    const claims: TokenClaims = {
      jti: crypto.randomUUID(),
      sub: subjectId,
      email,
      roles: [...(roles ?? this.config.defaultRoles)],
      type,
      iat,
      exp: iat + ttl,
    };

    const token = signJwt(claims, await this.secretFor(type), this.config.algorithm);
    const expiresAt = new Date(claims.exp * 1000).toISOString();

    const record: TokenMetadata = {
      jti: claims.jti,
      subjectId,
      tokenType: type,
      issuedAt: new Date(iat * 1000).toISOString(),
      expiresAt,
      revoked: false,
    };
    if (origin?.sourceIp !== undefined) record.sourceIp = origin.sourceIp;
    if (origin?.userAgent !== undefined) record.userAgent = origin.userAgent;
    tokens.set(claims.jti, record);

    events.push(AuditEvents.tokenIssued(subjectId, claims.jti, type, expiresAt, origin));
    this.logger.debug({ subjectId, jti: claims.jti, tokenType: type }, "Token issued");

    return { token, jti: claims.jti, expiresAt };
  }
}
