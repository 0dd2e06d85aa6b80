/**
 * Health Check Route
 *
 * Unauthenticated liveness endpoint for load balancers. A reachable shared
 * store is reported as healthy; an unreachable one as degraded, since every
 * component keeps answering with its outage policy.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import type { HealthResponse } from "../types.js";
import { getComponentLogger } from "../../logging/index.js";
import type { SharedStore } from "../../store/types.js";
import type { AuditLogger } from "../../logging/audit-types.js";

let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:health");
  }
  return logger;
}

export interface HealthCheckDependencies {
  store: SharedStore;
  audit: AuditLogger;
  version: string;
}

export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();

  router.get("/health", async (_req: Request, res: Response): Promise<void> => {
    const startTime = performance.now();
    const storeReachable = await deps.store.ping();

    const response: HealthResponse = {
      status: storeReachable ? "healthy" : "degraded",
      version: deps.version,
      uptime: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
      checks: {
        store: storeReachable ? "connected" : "disconnected",
        audit: deps.audit.isEnabled() ? "enabled" : "disabled",
      },
    };

    getLogger().debug(
      {
        status: response.status,
        metric: "health.check_ms",
        value: Math.round(performance.now() - startTime),
      },
      "Health check completed"
    );

    res.status(200).json(response);
  });

  return router;
}
