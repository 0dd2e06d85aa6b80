/**
 * Compact JWS Unit Tests
 *
 * @module tests/unit/auth/jwt
 */

import { describe, it, expect } from "vitest";
import crypto from "node:crypto";
import { decodeJwt, signJwt, verifyJwt } from "../../../src/auth/jwt.js";
import { ExpiredTokenError } from "../../../src/auth/errors.js";
import type { TokenClaims } from "../../../src/auth/types.js";

const SECRET = "test-secret";
const IAT = 1_767_225_600; // 2026-01-01T00:00:00Z

const claims: TokenClaims = {
  jti: "jti-1",
  sub: "u1",
  email: "u1@example.test",
  roles: ["analyst"],
  type: "access",
  iat: IAT,
  exp: IAT + 3600,
};

function segment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf8").toString("base64url");
}

describe("signJwt / verifyJwt", () => {
  it("verifies its own tokens and returns the claims", () => {
    const token = signJwt(claims, SECRET, "HS256");
    expect(token.split(".")).toHaveLength(3);
    expect(verifyJwt(token, SECRET, "HS256", { nowSeconds: IAT })).toEqual(claims);
  });

  it("writes the algorithm into the header", () => {
    const [header] = signJwt(claims, SECRET, "HS512").split(".");
    expect(JSON.parse(Buffer.from(header ?? "", "base64url").toString("utf8"))).toEqual({
      alg: "HS512",
      typ: "JWT",
    });
  });

  it("rejects a token signed with another algorithm", () => {
    const token = signJwt(claims, SECRET, "HS384");
    expect(() => verifyJwt(token, SECRET, "HS256", { nowSeconds: IAT })).toThrow(
      "Invalid token: unexpected algorithm HS384"
    );
  });

  it("rejects unsigned tokens", () => {
    const token = `${segment({ alg: "none", typ: "JWT" })}.${segment(claims)}.`;
    expect(() => verifyJwt(token, SECRET, "HS256", { nowSeconds: IAT })).toThrow(
      "Invalid token: unexpected algorithm none"
    );
  });

  it("rejects a wrong secret or a tampered payload", () => {
    const token = signJwt(claims, SECRET, "HS256");
    expect(() => verifyJwt(token, "other-secret", "HS256", { nowSeconds: IAT })).toThrow(
      "Invalid token: signature verification failed"
    );

    const [header, , signature] = token.split(".");
    const tampered = `${header}.${segment({ ...claims, roles: ["admin"] })}.${signature}`;
    expect(() => verifyJwt(tampered, SECRET, "HS256", { nowSeconds: IAT })).toThrow(
      "Invalid token: signature verification failed"
    );
  });

  it("rejects expired tokens unless told to ignore expiry", () => {
    const token = signJwt(claims, SECRET, "HS256");
    expect(() => verifyJwt(token, SECRET, "HS256", { nowSeconds: IAT + 3600 })).toThrow(
      ExpiredTokenError
    );
    expect(() => verifyJwt(token, SECRET, "HS256", { nowSeconds: IAT + 3600 })).toThrow(
      "Token expired at 2026-01-01T01:00:00.000Z"
    );
    expect(
      verifyJwt(token, SECRET, "HS256", { nowSeconds: IAT + 7200, ignoreExpiration: true }).jti
    ).toBe("jti-1");
  });

  it.each([
    ["two segments", "abc.def", "Invalid token: malformed token"],
    ["empty header", ".def.ghi", "Invalid token: malformed token"],
    ["non-JSON header", "x.y.z", "Invalid token: malformed segment"],
  ])("rejects %s", (_label, token, message) => {
    expect(() => verifyJwt(token, SECRET, "HS256")).toThrow(message);
  });

  it("rejects well-signed tokens with malformed claims", () => {
    const signingInput = `${segment({ alg: "HS256", typ: "JWT" })}.${segment({ sub: "u1" })}`;
    const signature = crypto.createHmac("sha256", SECRET).update(signingInput).digest("base64url");
    expect(() => verifyJwt(`${signingInput}.${signature}`, SECRET, "HS256")).toThrow(
      "Invalid token: malformed claims"
    );
  });
});

describe("decodeJwt", () => {
  it("returns claims without checking the signature", () => {
    const token = signJwt(claims, SECRET, "HS256");
    expect(decodeJwt(token)).toEqual(claims);
  });

  it("returns undefined for garbage", () => {
    expect(decodeJwt("not-a-token")).toBeUndefined();
    expect(decodeJwt(`${segment({ alg: "HS256" })}.${segment({ sub: "u" })}.sig`)).toBeUndefined();
  });
});
