/**
 * Protection Pipeline Types
 *
 * @module pipeline/types
 */

import type { RawHeaders } from "../admission/types.js";
import type { Session } from "../auth/types.js";
import type { DenyDecision } from "../errors.js";
import type { AuditOrigin } from "../logging/audit-types.js";
import type { RateLimitDecision } from "../ratelimit/types.js";
import type { Permission, Role } from "../rbac/types.js";

/**
 * Everything the core needs to know about one request
 *
 * The web layer has already extracted the credentials; the core never
 * parses Authorization headers itself.
 */
export interface GuardRequest {
  /** Correlation id; generated when absent */
  requestId?: string;
  /** Bearer access token */
  token?: string;
  apiKey?: string;
  sessionId?: string;
  csrfToken?: string;
  ip: string;
  userAgent?: string;
  /** Endpoint name used for rate-limit keys and audit entries */
  endpoint: string;
  method: string;
  headers: RawHeaders;
  contentType?: string;
  contentLength?: string | number;
  /** Any one of these grants access */
  requiredPermissions?: readonly Permission[];
  /** Any one of these grants access */
  requiredRoles?: readonly Role[];
}

export type AuthMethod = "token" | "api_key";

/**
 * Authenticated caller
 */
export interface Principal {
  subjectId: string;
  email?: string;
  roles: readonly string[];
  authMethod: AuthMethod;
  /** Access token id when authenticated by token */
  tokenId?: string;
}

/**
 * Resolves API keys to principals (owned by the user-store layer)
 */
export interface PrincipalResolver {
  /**
   * @returns undefined for an unknown or inactive key
   */
  resolveApiKey(apiKey: string): Promise<Principal | undefined>;
}

/**
 * Mutable per-request state threaded through the stages
 */
export interface GuardState {
  readonly request: GuardRequest;
  readonly requestId: string;
  readonly origin: AuditOrigin;
  /** Headers left after filtering */
  headers: Record<string, string>;
  /** Lower-cased names the filter dropped; the web layer strips them too */
  removedHeaders: string[];
  principal?: Principal;
  session?: Session;
  rateLimit?: RateLimitDecision;
}

/**
 * One step of the pipeline
 *
 * A stage either throws a GuardError to deny, or calls `next` and returns
 * what it returns.
 */
export interface PipelineStage {
  readonly name: string;
  run<T>(state: GuardState, next: () => Promise<T>): Promise<T>;
}

export type GuardHandler<T> = (state: GuardState) => Promise<T>;

export interface AllowDecision<T> {
  allowed: true;
  requestId: string;
  principal?: Principal;
  rateLimit?: RateLimitDecision;
  result: T;
}

export type GuardDecision<T> = AllowDecision<T> | (DenyDecision & { requestId: string });
