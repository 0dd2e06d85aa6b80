/**
 * Secret Redaction
 *
 * Path-based redaction handled by pino on every line, plus heuristic
 * patterns for spotting credentials that end up in free text.
 *
 * @module logging/redactors
 */

/**
 * Paths replaced with [REDACTED] on every log entry
 *
 * Pino path syntax: dot notation, `*` wildcard for one level.
 */
export const REDACT_PATHS = [
  "env.JWT_SECRET_KEY",
  "env.JWT_REFRESH_SECRET",
  "env.VAULT_TOKEN",
  "env.AWS_SECRET_ACCESS_KEY",
  "env.REDIS_URL",

  "headers.authorization",
  "headers.Authorization",
  "headers.cookie",
  "headers['x-api-key']",
  "req.headers.authorization",
  "req.headers.cookie",
  "req.headers['x-api-key']",

  "*.apiKey",
  "*.api_key",
  "*.password",
  "*.token",
  "*.secret",
  "*.secretValue",
  "*.accessToken",
  "*.refreshToken",
  "*.csrfToken",
  "*.privateKey",
  "*.credentials",
  "*.connectionString",
  "*.signingKey",
  "*.candidate",
];

export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  remove: false,
} as const;

/**
 * Heuristic patterns for values that look like credentials
 */
export const SECRET_PATTERNS = {
  /** Signed token: header.payload.signature, base64url */
  jwt: /^eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/,

  /** API key minted by the rotation handler: fapi_<8 hex>_<64 hex> */
  apiKey: /^[a-z]+_[0-9a-f]{8}_[0-9a-f]{64}$/,

  /** Vault service token */
  vaultToken: /^hvs\.[A-Za-z0-9_-]{20,}$/,

  /** Long opaque base64url string */
  generic: /^[A-Za-z0-9_-]{40,}$/,
} as const;

/**
 * Check whether a string looks like a credential
 *
 * @example
 * ```typescript
 * looksLikeSecret("eyJhbGciOi...")   // true
 * looksLikeSecret("read:simulation") // false
 * ```
 */
export function looksLikeSecret(value: string): boolean {
  return Object.values(SECRET_PATTERNS).some((pattern) => pattern.test(value));
}

/**
 * Flatten an error into a loggable object
 *
 * Extra enumerable properties are kept so path-based redaction still applies
 * to them. Messages are not scanned; never put a secret in a message.
 */
export function sanitizeError(error: Error): Record<string, unknown> {
  const cause = error.cause instanceof Error ? sanitizeError(error.cause) : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause,
    ...Object.fromEntries(
      Object.entries(error).filter(([key]) => !["name", "message", "stack", "cause"].includes(key))
    ),
  };
}
