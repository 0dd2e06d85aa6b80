/**
 * Fiscal API Guard - Public API
 *
 * Request protection for the fiscal simulation API: secrets and their
 * rotation, tokens and sessions, RBAC, rate limiting, circuit breaking and
 * admission control, assembled into one pipeline with an Express adapter.
 *
 * @example
 * ```typescript
 * import {
 *   createGuardContext,
 *   createHttpApp,
 *   initializeLogger,
 *   loadGuardConfig,
 * } from "fiscal-api-guard";
 *
 * const config = loadGuardConfig();
 * initializeLogger(config.logging);
 * const context = await createGuardContext(config);
 * const app = createHttpApp({ context, version: "1.0.0", routes });
 * ```
 */

export {
  GuardError,
  AuthError,
  AuthorizationError,
  CircuitOpenError,
  RateLimitError,
  ValidationError,
  PayloadTooLargeError,
  OverloadedError,
  ConfigError,
  toDenyDecision,
} from "./errors.js";
export type { DenyDecision, OverloadStatus } from "./errors.js";

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./store/index.js";
export * from "./secrets/index.js";
export * from "./rotation/index.js";
export * from "./auth/index.js";
export * from "./rbac/index.js";
export * from "./resilience/index.js";
export * from "./ratelimit/index.js";
export * from "./admission/index.js";
export * from "./pipeline/index.js";
export * from "./http/index.js";
