/**
 * HTTP Server Setup
 *
 * Express application with the guard in front of every `/api/v1` route.
 * `/health` stays outside the guard for load balancers; `/api/v1/status`
 * requires `manage:system`. Applications mount their own routes under
 * `/api/v1` and declare per-endpoint requirements.
 */

import express from "express";
import type { Express, Router } from "express";
import helmet from "helmet";
import type { Server as HttpServer } from "node:http";
import {
  createCorsMiddleware,
  createGuardMiddleware,
  errorHandler,
  loadCorsConfig,
  notFoundHandler,
  requestLogging,
} from "./middleware/index.js";
import type { CorsConfig } from "./middleware/index.js";
import { createHealthRouter, createStatusRouter } from "./routes/index.js";
import { endpointName } from "./request-utils.js";
import type { HttpConfig, HttpServerInstance, RouteRequirement } from "./types.js";
import type { Env } from "../config/env.js";
import { readBoolean, readInteger, readString } from "../config/env.js";
import { getComponentLogger } from "../logging/index.js";
import type { GuardContext } from "../pipeline/guard-context.js";

/**
 * Lazy-initialized logger to avoid initialization at module load time
 */
let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:server");
  }
  return logger;
}

export const DEFAULT_ROUTE_REQUIREMENTS: Readonly<Record<string, RouteRequirement>> = {
  status: { permissions: ["manage:system"] },
};

export interface HttpServerDependencies {
  context: GuardContext;
  version: string;
  /** Application routes mounted under /api/v1 behind the guard */
  routes?: Router;
  /** Requirement per endpoint name (first path segment under /api/v1) */
  requirements?: Readonly<Record<string, RouteRequirement>>;
  corsConfig?: CorsConfig;
  trustProxy?: boolean | number;
}

/**
 * Create and configure the Express application
 */
export function createHttpApp(deps: HttpServerDependencies): Express {
  const app = express();
  const { context } = deps;
  const requirements = { ...DEFAULT_ROUTE_REQUIREMENTS, ...deps.requirements };

  app.disable("x-powered-by");
  app.set("trust proxy", deps.trustProxy ?? false);

  app.use(helmet());
  app.use(requestLogging);

  const corsMiddleware = createCorsMiddleware(deps.corsConfig ?? loadCorsConfig());
  if (corsMiddleware) {
    app.use(corsMiddleware);
  }

  app.use(
    createHealthRouter({ store: context.store, audit: context.audit, version: deps.version })
  );

  // Guard runs before body parsing so oversized bodies are refused unread
  app.use(
    "/api/v1",
    createGuardMiddleware(context.pipeline, {
      requirementOf: (req) => requirements[endpointName(req.path)],
    })
  );
  app.use("/api/v1", express.json({ limit: context.config.admission.maxJsonPayloadBytes }));
  app.use(
    "/api/v1",
    createStatusRouter({
      backpressure: context.backpressure,
      circuits: context.circuits,
      store: context.store,
      secrets: context.secrets,
    })
  );
  if (deps.routes) {
    app.use("/api/v1", deps.routes);
  }

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Start listening
 */
export async function startHttpServer(
  app: Express,
  config: HttpConfig
): Promise<HttpServerInstance> {
  return new Promise((resolve, reject) => {
    const httpServer: HttpServer = app.listen(config.port, config.host, () => {
      getLogger().info({ host: config.host, port: config.port }, "HTTP server listening");

      resolve({
        port: config.port,
        host: config.host,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            getLogger().info("Closing HTTP server");
            httpServer.close((err) => {
              if (err) {
                getLogger().error({ err }, "Error closing HTTP server");
                rejectClose(err);
              } else {
                getLogger().info("HTTP server closed");
                resolveClose();
              }
            });
          }),
      });
    });

    httpServer.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        getLogger().error({ port: config.port, host: config.host }, "Port already in use");
        reject(new Error(`Port ${config.port} is already in use`));
      } else if (error.code === "EACCES") {
        getLogger().error({ port: config.port }, "Permission denied to bind to port");
        reject(new Error(`Permission denied to bind to port ${config.port}`));
      } else {
        getLogger().error({ err: error }, "HTTP server error");
        reject(error);
      }
    });
  });
}

/**
 * HTTP_PORT (3001), HTTP_HOST (127.0.0.1), HTTP_TRUST_PROXY (false)
 *
 * @throws {ConfigError} For a value that does not parse
 */
export function loadHttpConfig(env: Env = process.env): HttpConfig {
  const port = readInteger(env, "HTTP_PORT", 3001, { min: 1, max: 65535 });
  const host = readString(env, "HTTP_HOST", "127.0.0.1");
  const trustProxy = readBoolean(env, "HTTP_TRUST_PROXY", false);

  if (host === "0.0.0.0") {
    getLogger().warn({ host }, "HTTP server binding to all interfaces");
  }

  return { port, host, trustProxy };
}
