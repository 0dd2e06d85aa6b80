/**
 * Pipeline Stages
 *
 * The default request path, in order: validate the request, authenticate,
 * check the session, authorize, rate-limit, then admit into a concurrency
 * slot. Each factory closes over the component it drives.
 *
 * @module pipeline/stages
 */

import type { GuardState, PipelineStage, Principal, PrincipalResolver } from "./types.js";
import type { BackpressureManager } from "../admission/backpressure-manager.js";
import type { RequestValidator } from "../admission/request-validator.js";
import type { SessionManager } from "../auth/session-manager.js";
import type { TokenManager } from "../auth/token-manager.js";
import { AuthError, GuardError } from "../errors.js";
import { AuditEvents } from "../logging/audit-events.js";
import type { AuditLogger } from "../logging/audit-types.js";
import type { RateLimiter } from "../ratelimit/rate-limiter.js";
import type { Rbac } from "../rbac/rbac.js";
import type { AccessRequirement, Permission, Role } from "../rbac/types.js";

/** Roles of a caller that presented no credential */
export const ANONYMOUS_ROLES: readonly Role[] = ["public"];

const STATE_CHANGING_METHODS: ReadonlySet<string> = new Set(["POST", "PUT", "PATCH", "DELETE"]);

/**
 * Body and header checks before anything else runs
 */
export function validateRequestStage(validator: RequestValidator): PipelineStage {
  return {
    name: "validate",
    run(state, next) {
      const { request } = state;
      validator.assertBody({
        contentType: request.contentType,
        contentLength: request.contentLength,
      });
      const filtered = validator.filterHeaders(request.headers);
      state.headers = filtered.headers;
      state.removedHeaders = filtered.removed.map((removal) => removal.name);
      return next();
    },
  };
}

/**
 * Resolve the caller from a bearer token or API key
 *
 * A request with neither continues anonymously; authorization decides
 * whether that is enough. A credential that fails is always denied.
 */
export function authenticateStage(
  tokens: TokenManager,
  audit: AuditLogger,
  resolver?: PrincipalResolver
): PipelineStage {
  return {
    name: "authenticate",
    async run(state, next) {
      const { request } = state;
      try {
        if (request.token !== undefined) {
          const claims = await tokens.validate(request.token, "access");
          state.principal = {
            subjectId: claims.sub,
            email: claims.email,
            roles: claims.roles,
            authMethod: "token",
            tokenId: claims.jti,
          };
        } else if (request.apiKey !== undefined) {
          state.principal = await resolveApiKey(request.apiKey, resolver);
        }
      } catch (error) {
        if (error instanceof AuthError) {
          audit.emit(
            AuditEvents.unauthorizedAccess(request.endpoint, error.code, undefined, state.origin)
          );
        }
        throw error;
      }
      return next();
    },
  };
}

async function resolveApiKey(
  apiKey: string,
  resolver: PrincipalResolver | undefined
): Promise<Principal> {
  const principal = resolver ? await resolver.resolveApiKey(apiKey) : undefined;
  if (!principal) {
    throw new AuthError("Invalid API key", "INVALID_API_KEY");
  }
  return principal;
}

/**
 * Validate the session and, on state-changing methods, its CSRF token
 *
 * Requests without a session id pass through.
 */
export function sessionStage(sessions: SessionManager): PipelineStage {
  return {
    name: "session",
    async run(state, next) {
      const { request } = state;
      if (request.sessionId === undefined) {
        return next();
      }

      const session = await sessions.validate(request.sessionId);
      if (state.principal && state.principal.subjectId !== session.subjectId) {
        throw new AuthError(
          "Session does not belong to the authenticated subject",
          "SESSION_MISMATCH"
        );
      }
      if (STATE_CHANGING_METHODS.has(request.method.toUpperCase())) {
        await sessions.assertCsrf(request.sessionId, request.csrfToken);
      }
      state.session = session;
      return next();
    },
  };
}

/**
 * Enforce the request's required permissions and roles
 *
 * Anonymous callers are checked with the public role; when that is not
 * enough the denial is a missing credential (401), not a 403.
 */
export function authorizeStage(rbac: Rbac, audit: AuditLogger): PipelineStage {
  return {
    name: "authorize",
    run(state, next) {
      const requirement: AccessRequirement = {
        permissions: state.request.requiredPermissions,
        roles: state.request.requiredRoles,
      };
      enforceRequirement(rbac, audit, state.principal, requirement, state);
      return next();
    },
  };
}

/**
 * Stage requiring any one of `permissions`
 */
export function requirePermission(
  rbac: Rbac,
  audit: AuditLogger,
  ...permissions: Permission[]
): PipelineStage {
  return {
    name: `require-permission:${permissions.join("|")}`,
    run(state, next) {
      enforceRequirement(rbac, audit, state.principal, { permissions }, state);
      return next();
    },
  };
}

/**
 * Stage requiring any one of `roles`
 */
export function requireRole(rbac: Rbac, audit: AuditLogger, ...roles: Role[]): PipelineStage {
  return {
    name: `require-role:${roles.join("|")}`,
    run(state, next) {
      enforceRequirement(rbac, audit, state.principal, { roles }, state);
      return next();
    },
  };
}

function enforceRequirement(
  rbac: Rbac,
  audit: AuditLogger,
  principal: Principal | undefined,
  requirement: AccessRequirement,
  state: Pick<GuardState, "request" | "origin">
): void {
  const resource = state.request.endpoint;

  if (!principal) {
    if (rbac.isAllowed({ roles: ANONYMOUS_ROLES }, requirement)) {
      return;
    }
    audit.emit(
      AuditEvents.unauthorizedAccess(resource, "missing credentials", undefined, state.origin)
    );
    throw new AuthError("No authentication credentials provided", "MISSING_CREDENTIALS");
  }

  rbac.enforce(
    { subjectId: principal.subjectId, roles: principal.roles },
    requirement,
    resource,
    state.origin
  );
}

/**
 * Per-subject quota for authenticated callers, per-IP otherwise
 */
export function rateLimitStage(limiter: RateLimiter): PipelineStage {
  return {
    name: "rate-limit",
    async run(state, next) {
      const { request } = state;
      state.rateLimit = await limiter.enforce({
        ip: request.ip,
        endpoint: request.endpoint,
        subjectId: state.principal?.subjectId,
        userAgent: request.userAgent,
        requestId: state.requestId,
      });
      return next();
    },
  };
}

/**
 * Hold a concurrency slot for the rest of the pipeline
 */
export function admitStage(backpressure: BackpressureManager): PipelineStage {
  return {
    name: "admit",
    run(state, next) {
      return backpressure.admit(
        {
          requestId: state.requestId,
          method: state.request.method,
          endpoint: state.request.endpoint,
        },
        next
      );
    },
  };
}

/**
 * Whether a thrown value is a denial the pipeline produced on purpose
 */
export function isDenial(error: unknown): error is GuardError {
  return error instanceof GuardError;
}
