/**
 * Guard Context
 *
 * Builds every component once, wires them together and assembles the
 * default pipeline. Tests and embedders pass overrides for any component
 * (an in-memory store, a mock audit logger, a fixed secrets backend).
 *
 * @example
 * ```typescript
 * const context = await createGuardContext(loadGuardConfig());
 * const decision = await context.pipeline.evaluate(request, handler);
 * await context.close();
 * ```
 *
 * @module pipeline/guard-context
 */

import type { Logger } from "pino";
import type { AdmissionTicket } from "../admission/types.js";
import { BackpressureManager } from "../admission/backpressure-manager.js";
import { RequestQueue } from "../admission/request-queue.js";
import { RequestValidator } from "../admission/request-validator.js";
import { FileSessionStore } from "../auth/session-store.js";
import { SessionManager } from "../auth/session-manager.js";
import { FileTokenMetadataStore } from "../auth/token-store.js";
import { TokenManager } from "../auth/token-manager.js";
import type { IdentityLookup } from "../auth/types.js";
import type { GuardConfig } from "../config/guard-config.js";
import type { Env } from "../config/env.js";
import { AuditLoggerImpl } from "../logging/audit-logger.js";
import type { AuditLogger } from "../logging/audit-types.js";
import { getComponentLogger } from "../logging/index.js";
import { RateLimiter } from "../ratelimit/rate-limiter.js";
import { Rbac, loadRolePermissionTable } from "../rbac/rbac.js";
import { CircuitBreakerManager } from "../resilience/circuit-breaker-manager.js";
import { CircuitStateRegistry } from "../resilience/circuit-state-registry.js";
import { createDefaultHandlers } from "../rotation/handlers.js";
import { SecretRotationManager } from "../rotation/rotation-manager.js";
import { RotationScheduler } from "../rotation/rotation-scheduler.js";
import { FileRotationScheduleStore } from "../rotation/schedule-store.js";
import type { SecretsManager } from "../secrets/secrets-manager.js";
import { createSecretsManager } from "../secrets/secrets-manager.js";
import { createSharedStore } from "../store/store-factory.js";
import type { SharedStore } from "../store/types.js";
import { SecretsApiKeyResolver } from "./api-key-resolver.js";
import { ProtectionPipeline } from "./protection-pipeline.js";
import {
  admitStage,
  authenticateStage,
  authorizeStage,
  rateLimitStage,
  sessionStage,
  validateRequestStage,
} from "./stages.js";
import type { PrincipalResolver } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

/**
 * Components that can be replaced when building a context
 */
export interface GuardOverrides {
  store?: SharedStore;
  audit?: AuditLogger;
  secrets?: SecretsManager;
  principals?: PrincipalResolver;
  identities?: IdentityLookup;
  /** Environment read by the environment secrets backend */
  env?: Env;
}

export interface GuardContext {
  readonly config: GuardConfig;
  readonly store: SharedStore;
  readonly audit: AuditLogger;
  readonly secrets: SecretsManager;
  readonly rotation: SecretRotationManager;
  readonly rotationScheduler: RotationScheduler;
  readonly tokens: TokenManager;
  readonly sessions: SessionManager;
  readonly rbac: Rbac;
  readonly circuits: CircuitBreakerManager;
  readonly rateLimiter: RateLimiter;
  readonly validator: RequestValidator;
  readonly queue: RequestQueue<AdmissionTicket>;
  readonly backpressure: BackpressureManager;
  readonly principals: PrincipalResolver;
  readonly pipeline: ProtectionPipeline;

  /** Stop background work, flush the audit log and close the store */
  close(): Promise<void>;
}

async function createAuditLogger(config: GuardConfig): Promise<AuditLogger> {
  const audit = new AuditLoggerImpl(config.audit);
  await audit.load();
  return audit;
}

/**
 * Build and wire all components
 *
 * The rotation scheduler is started only when rotation is enabled. The
 * shared store, supplied or created, is closed again when a later step
 * fails.
 */
export async function createGuardContext(
  config: GuardConfig,
  overrides: GuardOverrides = {}
): Promise<GuardContext> {
  const logger = getComponentLogger("pipeline:context");
  const store = overrides.store ?? (await createSharedStore(config.store));

  try {
    return await assembleContext(config, overrides, store, logger);
  } catch (error) {
    logger.error({ err: error }, "Guard context setup failed, closing shared store");
    await store.close().catch((closeError: unknown) => {
      logger.warn({ err: closeError }, "Failed to close shared store");
    });
    throw error;
  }
}

async function assembleContext(
  config: GuardConfig,
  overrides: GuardOverrides,
  store: SharedStore,
  logger: Logger
): Promise<GuardContext> {
  const audit = overrides.audit ?? (await createAuditLogger(config));
  const secrets =
    overrides.secrets ?? createSecretsManager(config.secrets, overrides.env ?? process.env);

  const rotation = new SecretRotationManager(
    new FileRotationScheduleStore(config.dataPath),
    audit,
    config.rotation
  );
  for (const handler of createDefaultHandlers(secrets, secrets)) {
    rotation.registerHandler(handler);
  }
  await rotation.load();
  const rotationScheduler = new RotationScheduler(
    rotation,
    config.rotation.checkIntervalHours * HOUR_MS
  );

  const tokens = new TokenManager(
    new FileTokenMetadataStore(config.dataPath),
    secrets,
    audit,
    config.jwt,
    overrides.identities ? { identities: overrides.identities } : {}
  );
  const sessions = new SessionManager(new FileSessionStore(config.dataPath), audit, config.session);
  const rbac = new Rbac(audit, await loadRolePermissionTable());

  const circuits = new CircuitBreakerManager(
    store,
    audit,
    new CircuitStateRegistry(),
    config.circuits
  );
  circuits.registerDefaults();

  const rateLimiter = new RateLimiter(store, audit, config.rateLimit);
  const validator = new RequestValidator(store, config.admission);
  const queue = new RequestQueue<AdmissionTicket>(
    config.admission.queueSize,
    config.admission.queueMaxWaitSeconds
  );
  const backpressure = new BackpressureManager(validator, queue, config.admission);
  const principals = overrides.principals ?? new SecretsApiKeyResolver(secrets);

  const pipeline = new ProtectionPipeline([
    validateRequestStage(validator),
    authenticateStage(tokens, audit, principals),
    sessionStage(sessions),
    authorizeStage(rbac, audit),
    rateLimitStage(rateLimiter),
    admitStage(backpressure),
  ]);

  if (config.rotation.enabled) {
    rotationScheduler.start();
  }

  logger.info(
    {
      store: store.kind,
      secrets: secrets.backendInfo(),
      stages: pipeline.stageNames,
    },
    "Guard context ready"
  );

  return {
    config,
    store,
    audit,
    secrets,
    rotation,
    rotationScheduler,
    tokens,
    sessions,
    rbac,
    circuits,
    rateLimiter,
    validator,
    queue,
    backpressure,
    principals,
    pipeline,

    async close(): Promise<void> {
      rotationScheduler.stop();
      queue.clear();
      await audit.flush();
      await store.close();
      logger.info("Guard context closed");
    },
  };
}
