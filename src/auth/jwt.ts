/**
 * Compact JWS (HMAC) signing and verification
 *
 * Only the HS256/384/512 algorithms are supported. Verification pins the
 * algorithm the caller expects; a token whose header names any other
 * algorithm (including "none") is rejected.
 *
 * @module auth/jwt
 */

import crypto from "node:crypto";
import type { JwtAlgorithm, TokenClaims } from "./types.js";
import { JwtHeaderSchema, TokenClaimsSchema } from "./validation.js";
import { ExpiredTokenError, InvalidTokenError } from "./errors.js";

const HMAC_DIGEST: Record<JwtAlgorithm, string> = {
  HS256: "sha256",
  HS384: "sha384",
  HS512: "sha512",
};

export interface VerifyOptions {
  /** Current time in seconds; defaults to the clock */
  nowSeconds?: number;

  /** Accept tokens past `exp` (used when revoking) */
  ignoreExpiration?: boolean;
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf8").toString("base64url");
}

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
  } catch {
    throw new InvalidTokenError("malformed segment");
  }
}

function hmac(algorithm: JwtAlgorithm, secret: string, input: string): Buffer {
  return crypto.createHmac(HMAC_DIGEST[algorithm], secret).update(input).digest();
}

function splitToken(token: string): [string, string, string] {
  const parts = token.split(".");
  const [header, payload, signature] = parts;
  if (parts.length !== 3 || !header || !payload || signature === undefined) {
    throw new InvalidTokenError("malformed token");
  }
  return [header, payload, signature];
}

/**
 * Sign claims into a compact token
 */
export function signJwt(claims: TokenClaims, secret: string, algorithm: JwtAlgorithm): string {
  const signingInput = `${encodeSegment({ alg: algorithm, typ: "JWT" })}.${encodeSegment(claims)}`;
  const signature = hmac(algorithm, secret, signingInput).toString("base64url");
  return `${signingInput}.${signature}`;
}

/**
 * Verify signature, algorithm and expiry, then return the claims
 *
 * @throws {InvalidTokenError} On malformed input, algorithm mismatch or bad signature
 * @throws {ExpiredTokenError} When `exp` has passed
 */
export function verifyJwt(
  token: string,
  secret: string,
  algorithm: JwtAlgorithm,
  options: VerifyOptions = {}
): TokenClaims {
  const [headerSegment, payloadSegment, signatureSegment] = splitToken(token);

  const header = JwtHeaderSchema.safeParse(decodeSegment(headerSegment));
  if (!header.success) {
    throw new InvalidTokenError("malformed header");
  }
  if (header.data.alg !== algorithm) {
    throw new InvalidTokenError(`unexpected algorithm ${header.data.alg}`);
  }

  const expected = hmac(algorithm, secret, `${headerSegment}.${payloadSegment}`);
  const actual = Buffer.from(signatureSegment, "base64url");
  if (actual.length !== expected.length || !crypto.timingSafeEqual(actual, expected)) {
    throw new InvalidTokenError("signature verification failed");
  }

  const claims = TokenClaimsSchema.safeParse(decodeSegment(payloadSegment));
  if (!claims.success) {
    throw new InvalidTokenError("malformed claims");
  }

  const now = options.nowSeconds ?? Math.floor(Date.now() / 1000);
  if (!options.ignoreExpiration && now >= claims.data.exp) {
    throw new ExpiredTokenError(new Date(claims.data.exp * 1000).toISOString());
  }

  return claims.data;
}

/**
 * Decode claims WITHOUT verifying the signature
 *
 * For diagnostics and for picking the verification secret only.
 *
 * @returns undefined when the token is not structurally valid
 */
export function decodeJwt(token: string): TokenClaims | undefined {
  try {
    const [, payloadSegment] = splitToken(token);
    const claims = TokenClaimsSchema.safeParse(decodeSegment(payloadSegment));
    return claims.success ? claims.data : undefined;
  } catch {
    return undefined;
  }
}
