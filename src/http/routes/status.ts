/**
 * Status Route
 *
 * Operational view for administrators: backpressure, circuit states, store
 * reachability and the secrets backend. Mounted behind the guard with the
 * `manage:system` permission.
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import type { StatusResponse } from "../types.js";
import type { BackpressureManager } from "../../admission/backpressure-manager.js";
import type { CircuitBreakerManager } from "../../resilience/circuit-breaker-manager.js";
import type { SecretsManager } from "../../secrets/secrets-manager.js";
import type { SharedStore } from "../../store/types.js";

export interface StatusRouteDependencies {
  backpressure: BackpressureManager;
  circuits: CircuitBreakerManager;
  store: SharedStore;
  secrets: SecretsManager;
}

export function createStatusRouter(deps: StatusRouteDependencies): Router {
  const router = Router();

  router.get("/status", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [backpressure, circuits, reachable] = await Promise.all([
        deps.backpressure.getStatus(),
        deps.circuits.getAllStatus(),
        deps.store.ping(),
      ]);

      const response: StatusResponse = {
        backpressure,
        circuits,
        store: { kind: deps.store.kind, reachable },
        secrets: deps.secrets.backendInfo(),
      };
      res.status(200).json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
