/**
 * Protection Pipeline Module
 *
 * @module pipeline
 */

export type {
  GuardRequest,
  AuthMethod,
  Principal,
  PrincipalResolver,
  GuardState,
  PipelineStage,
  GuardHandler,
  AllowDecision,
  GuardDecision,
} from "./types.js";

export {
  ANONYMOUS_ROLES,
  validateRequestStage,
  authenticateStage,
  sessionStage,
  authorizeStage,
  requirePermission,
  requireRole,
  rateLimitStage,
  admitStage,
  isDenial,
} from "./stages.js";
export { ProtectionPipeline } from "./protection-pipeline.js";
export { SecretsApiKeyResolver } from "./api-key-resolver.js";
export type { ApiKeySource } from "./api-key-resolver.js";
export { createGuardContext } from "./guard-context.js";
export type { GuardContext, GuardOverrides } from "./guard-context.js";
