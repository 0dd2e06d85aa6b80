/**
 * CORS Middleware
 *
 * Allow-list CORS on the `cors` package. A disallowed origin gets the
 * standard JSON error body with status 403.
 *
 * @module http/middleware/cors
 */

import cors from "cors";
import type { NextFunction, Request, Response } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import type { Env } from "../../config/env.js";
import { readBoolean, readInteger, readOptionalString } from "../../config/env.js";
import type { CorsConfig, CorsMiddleware } from "./cors-types.js";
import { DEFAULT_CORS_CONFIG } from "./cors-types.js";
import type { ErrorResponse } from "../types.js";

export type { CorsConfig, CorsMiddleware } from "./cors-types.js";
export { DEFAULT_CORS_CONFIG } from "./cors-types.js";

let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:cors");
  }
  return logger;
}

class CorsOriginError extends Error {
  constructor(public readonly origin: string) {
    super(`Origin ${origin} not allowed by CORS policy`);
    this.name = "CorsOriginError";
  }
}

/**
 * @returns null when CORS is disabled
 */
export function createCorsMiddleware(config: CorsConfig): CorsMiddleware | null {
  if (!config.enabled) {
    getLogger().info("CORS is disabled");
    return null;
  }

  const allowed = new Set(config.origins);
  const corsMiddleware = cors({
    origin: (origin, callback) => {
      if (!origin || allowed.has(origin)) {
        callback(null, true);
        return;
      }
      callback(new CorsOriginError(origin), false);
    },
    methods: config.methods,
    allowedHeaders: config.allowedHeaders,
    exposedHeaders: config.exposedHeaders,
    credentials: config.credentials,
    maxAge: config.maxAge,
    optionsSuccessStatus: 204,
  });

  getLogger().info({ origins: config.origins }, "CORS middleware enabled");

  return (req: Request, res: Response, next: NextFunction): void => {
    corsMiddleware(req, res, (err?: unknown) => {
      if (err instanceof CorsOriginError) {
        getLogger().warn({ origin: err.origin, path: req.path }, "CORS request blocked");
        const body: ErrorResponse = {
          error: {
            message: "CORS policy: Origin not allowed",
            code: "CORS_ORIGIN_NOT_ALLOWED",
            statusCode: 403,
          },
        };
        res.status(403).json(body);
        return;
      }
      next(err);
    });
  };
}

/**
 * CORS_ENABLED, CORS_ORIGINS (comma-separated), CORS_CREDENTIALS, CORS_MAX_AGE
 *
 * @throws {ConfigError} For a value that does not parse
 */
export function loadCorsConfig(env: Env = process.env): CorsConfig {
  const origins = readOptionalString(env, "CORS_ORIGINS")
    ?.split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    ...DEFAULT_CORS_CONFIG,
    enabled: readBoolean(env, "CORS_ENABLED", DEFAULT_CORS_CONFIG.enabled),
    origins: origins ?? DEFAULT_CORS_CONFIG.origins,
    credentials: readBoolean(env, "CORS_CREDENTIALS", DEFAULT_CORS_CONFIG.credentials),
    maxAge: readInteger(env, "CORS_MAX_AGE", DEFAULT_CORS_CONFIG.maxAge, { min: 0 }),
  };
}
