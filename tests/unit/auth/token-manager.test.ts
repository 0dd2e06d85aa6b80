/**
 * Token Manager Unit Tests
 *
 * @module tests/unit/auth/token-manager
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { TokenManager } from "../../../src/auth/token-manager.js";
import { FileTokenMetadataStore } from "../../../src/auth/token-store.js";
import { signJwt } from "../../../src/auth/jwt.js";
import {
  ExpiredTokenError,
  InvalidTokenError,
  RevokedTokenError,
  TokenStorageError,
} from "../../../src/auth/errors.js";
import { AuthError } from "../../../src/errors.js";
import type {
  IdentityLookup,
  SigningSecretSource,
  SubjectIdentity,
  TokenConfig,
  TokenMetadata,
  TokenMetadataStore,
} from "../../../src/auth/types.js";
import { MockAuditLogger } from "../../helpers/audit-mock.js";

const START = new Date("2026-01-01T00:00:00.000Z");
const HOUR_MS = 60 * 60 * 1000;

const CONFIG: TokenConfig = {
  algorithm: "HS256",
  accessExpirationHours: 1,
  refreshExpirationDays: 7,
  defaultRoles: ["viewer"],
};

class MemoryTokenStore implements TokenMetadataStore {
  records = new Map<string, TokenMetadata>();
  saves = 0;

  async load(): Promise<Map<string, TokenMetadata>> {
    return new Map(this.records);
  }

  async save(tokens: Map<string, TokenMetadata>): Promise<void> {
    this.saves++;
    this.records = new Map(tokens);
  }
}

const secrets: SigningSecretSource = {
  getJwtSecret: async () => "test-access-secret",
  getJwtRefreshSecret: async () => "test-refresh-secret",
};

class StaticIdentities implements IdentityLookup {
  constructor(private readonly identities: SubjectIdentity[]) {}

  async findById(subjectId: string): Promise<SubjectIdentity | undefined> {
    return this.identities.find((identity) => identity.id === subjectId);
  }
}

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterAll(() => {
  resetLogger();
});

describe("TokenManager", () => {
  let store: MemoryTokenStore;
  let audit: MockAuditLogger;
  let manager: TokenManager;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    store = new MemoryTokenStore();
    audit = new MockAuditLogger();
    manager = new TokenManager(store, secrets, audit, CONFIG);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("issuance", () => {
    it("issues access tokens with default roles and records metadata", async () => {
      const issued = await manager.issueAccessToken("u1", "u1@example.test", undefined, {
        sourceIp: "10.0.0.1",
      });

      expect(issued.expiresAt).toBe("2026-01-01T01:00:00.000Z");
      const claims = await manager.validate(issued.token);
      expect(claims).toMatchObject({
        jti: issued.jti,
        sub: "u1",
        email: "u1@example.test",
        roles: ["viewer"],
        type: "access",
        iat: START.getTime() / 1000,
        exp: START.getTime() / 1000 + 3600,
      });

      expect(await manager.getMetadata(issued.jti)).toEqual({
        jti: issued.jti,
        subjectId: "u1",
        tokenType: "access",
        issuedAt: "2026-01-01T00:00:00.000Z",
        expiresAt: "2026-01-01T01:00:00.000Z",
        revoked: false,
        sourceIp: "10.0.0.1",
      });
      expect(audit.types()).toEqual(["token.issued"]);
      expect(audit.lastEvent()?.details).toEqual({
        jti: issued.jti,
        tokenType: "access",
        expiresAt: "2026-01-01T01:00:00.000Z",
      });
    });

    it("issues a pair in one save", async () => {
      const pair = await manager.issueTokenPair("u1", "u1@example.test", ["analyst"]);

      expect(pair.tokenType).toBe("Bearer");
      expect(pair.expiresIn).toBe(3600);
      expect(store.saves).toBe(1);
      expect((await manager.validate(pair.accessToken)).roles).toEqual(["analyst"]);
      expect((await manager.validate(pair.refreshToken, "refresh")).jti).toBe(pair.refreshJti);
      const records = await manager.getSubjectTokens("u1");
      expect(records.map((record) => record.tokenType).sort()).toEqual(["access", "refresh"]);
    });

    it("reports token lifetimes", () => {
      expect(manager.accessTokenTtlSeconds).toBe(3600);
      expect(manager.refreshTokenTtlSeconds).toBe(7 * 24 * 3600);
    });
  });

  describe("validation", () => {
    it("rejects a refresh token presented as an access token", async () => {
      const refresh = await manager.issueRefreshToken("u1", "u1@example.test");
      await expect(manager.validate(refresh.token)).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it("checks the type claim when both secrets are equal", async () => {
      const shared: SigningSecretSource = {
        getJwtSecret: async () => "test-secret",
        getJwtRefreshSecret: async () => "test-secret",
      };
      const sameSecret = new TokenManager(store, shared, audit, CONFIG);
      const refresh = await sameSecret.issueRefreshToken("u1");

      await expect(sameSecret.validate(refresh.token)).rejects.toThrow(
        "Invalid token: expected access token"
      );
    });

    it("rejects expired tokens", async () => {
      const issued = await manager.issueAccessToken("u1", "u1@example.test");
      vi.advanceTimersByTime(HOUR_MS);
      await expect(manager.validate(issued.token)).rejects.toBeInstanceOf(ExpiredTokenError);
    });

    it("accepts a valid token that has no metadata record", async () => {
      const iat = START.getTime() / 1000;
      const token = signJwt(
        {
          jti: "external",
          sub: "u9",
          email: "",
          roles: ["viewer"],
          type: "access",
          iat,
          exp: iat + 60,
        },
        "test-access-secret",
        "HS256"
      );
      expect((await manager.validate(token)).sub).toBe("u9");
    });
  });

  describe("revocation", () => {
    it("revokes a token for good", async () => {
      const issued = await manager.issueAccessToken("u1", "u1@example.test");

      expect(await manager.revoke(issued.token, "logout")).toBe(true);
      const error = await manager.validate(issued.token).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RevokedTokenError);
      expect(error instanceof AuthError && error.code).toBe("TOKEN_REVOKED");

      expect(await manager.revoke(issued.token)).toBe(false);
      const metadata = await manager.getMetadata(issued.jti);
      expect(metadata?.revoked).toBe(true);
      expect(metadata?.revokedReason).toBe("logout");
      expect(metadata?.revokedAt).toBe("2026-01-01T00:00:00.000Z");

      const revoked = audit.ofType("token.revoked");
      expect(revoked).toHaveLength(1);
      expect(revoked[0]?.details).toEqual({ jti: issued.jti, reason: "logout" });
    });

    it("revokes expired tokens too", async () => {
      const issued = await manager.issueAccessToken("u1", "u1@example.test");
      vi.advanceTimersByTime(2 * HOUR_MS);
      expect(await manager.revoke(issued.token)).toBe(true);
    });

    it("refuses to revoke garbage or foreign tokens", async () => {
      expect(await manager.revoke("not-a-token")).toBe(false);

      const iat = START.getTime() / 1000;
      const foreign = signJwt(
        { jti: "x", sub: "u1", email: "", roles: [], type: "access", iat, exp: iat + 60 },
        "other-secret",
        "HS256"
      );
      expect(await manager.revoke(foreign)).toBe(false);
      expect(await manager.revokeByJti("unknown")).toBe(false);
    });

    it("revokes every live token of a subject", async () => {
      await manager.issueTokenPair("u1", "u1@example.test");
      await manager.issueAccessToken("u2", "u2@example.test");

      expect(await manager.revokeAll("u1", "admin_revoke")).toBe(2);
      expect(await manager.revokeAll("u1")).toBe(0);
      const u2 = await manager.getSubjectTokens("u2");
      expect(u2.every((record) => !record.revoked)).toBe(true);
    });
  });

  describe("refresh", () => {
    it("rotates the refresh token and keeps email and roles", async () => {
      const pair = await manager.issueTokenPair("u1", "u1@example.test", ["analyst"]);
      audit.clear();

      const next = await manager.refresh(pair.refreshToken);

      expect(next.refreshJti).not.toBe(pair.refreshJti);
      expect((await manager.validate(next.accessToken)).roles).toEqual(["analyst"]);
      expect((await manager.getMetadata(pair.refreshJti))?.revokedReason).toBe("rotated");
      await expect(manager.refresh(pair.refreshToken)).rejects.toBeInstanceOf(RevokedTokenError);

      expect(audit.types()).toEqual(["token.issued", "token.issued", "token.refreshed"]);
      expect(audit.lastEvent()?.details).toEqual({
        previousJti: pair.refreshJti,
        accessJti: next.accessJti,
        refreshJti: next.refreshJti,
      });
    });

    it("lets only one of two concurrent refreshes succeed", async () => {
      const pair = await manager.issueTokenPair("u1", "u1@example.test");

      const results = await Promise.allSettled([
        manager.refresh(pair.refreshToken),
        manager.refresh(pair.refreshToken),
      ]);

      expect(results.map((result) => result.status).sort()).toEqual(["fulfilled", "rejected"]);
    });

    it("takes roles from the identity lookup and refuses inactive subjects", async () => {
      const identities = new StaticIdentities([
        { id: "u1", email: "new@example.test", roles: ["admin"], active: true },
        { id: "u2", email: "u2@example.test", roles: ["viewer"], active: false },
      ]);
      const withLookup = new TokenManager(store, secrets, audit, CONFIG, { identities });

      const u1 = await withLookup.issueRefreshToken("u1", "old@example.test", ["viewer"]);
      const next = await withLookup.refresh(u1.token);
      const claims = await withLookup.validate(next.accessToken);
      expect(claims.email).toBe("new@example.test");
      expect(claims.roles).toEqual(["admin"]);

      const u2 = await withLookup.issueRefreshToken("u2");
      const error = await withLookup.refresh(u2.token).catch((e: unknown) => e);
      expect(error instanceof AuthError && error.code).toBe("SUBJECT_INACTIVE");
    });
  });

  describe("when a save fails", () => {
    it("keeps metadata and audit trail as they were", async () => {
      const pair = await manager.issueTokenPair("u1", "u1@example.test");
      const save = vi
        .spyOn(store, "save")
        .mockRejectedValue(new TokenStorageError("write", "disk full"));

      await expect(manager.issueAccessToken("u1", "u1@example.test")).rejects.toThrow(
        "Token storage write failed: disk full"
      );
      await expect(manager.revokeByJti(pair.accessJti)).rejects.toBeInstanceOf(TokenStorageError);
      await expect(manager.refresh(pair.refreshToken)).rejects.toBeInstanceOf(TokenStorageError);
      save.mockRestore();

      expect(await manager.getSubjectTokens("u1")).toHaveLength(2);
      expect((await manager.validate(pair.accessToken)).jti).toBe(pair.accessJti);
      expect(audit.types()).toEqual(["token.issued", "token.issued"]);

      const next = await manager.refresh(pair.refreshToken);
      expect(next.refreshJti).not.toBe(pair.refreshJti);
    });
  });

  describe("housekeeping", () => {
    it("drops metadata past expiry", async () => {
      await manager.issueTokenPair("u1", "u1@example.test");
      vi.advanceTimersByTime(HOUR_MS);

      expect(await manager.cleanupExpired()).toBe(1);
      expect(await manager.getSubjectTokens("u1")).toHaveLength(1);
    });

    it("describes a token with its metadata and expiry", async () => {
      const issued = await manager.issueAccessToken("u1", "u1@example.test");
      vi.advanceTimersByTime(HOUR_MS);

      const info = await manager.getTokenInfo(issued.token);
      expect(info?.expired).toBe(true);
      expect(info?.claims.sub).toBe("u1");
      expect(info?.metadata?.jti).toBe(issued.jti);
      expect(await manager.getTokenInfo("garbage")).toBeUndefined();
    });
  });
});

describe("FileTokenMetadataStore", () => {
  let dataPath: string;

  beforeEach(async () => {
    dataPath = await mkdtemp(join(tmpdir(), "fguard-tokens-"));
  });

  afterEach(async () => {
    await rm(dataPath, { recursive: true, force: true });
  });

  it("starts empty and reads back what it saved", async () => {
    const store = new FileTokenMetadataStore(dataPath);
    expect((await store.load()).size).toBe(0);

    const record: TokenMetadata = {
      jti: "jti-1",
      subjectId: "u1",
      tokenType: "access",
      issuedAt: "2026-01-01T00:00:00.000Z",
      expiresAt: "2026-01-01T01:00:00.000Z",
      revoked: false,
    };
    await store.save(new Map([["jti-1", record]]));

    const reopened = new FileTokenMetadataStore(dataPath);
    expect(await reopened.load()).toEqual(new Map([["jti-1", record]]));
  });

  it("reports invalid JSON as a read failure", async () => {
    await writeFile(join(dataPath, "tokens.json"), "{oops", "utf8");
    const store = new FileTokenMetadataStore(dataPath);

    const error = await store.load().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TokenStorageError);
    expect(error instanceof Error && error.message).toMatch(
      /^Token storage read failed: Invalid JSON in token store: /
    );
  });
});
