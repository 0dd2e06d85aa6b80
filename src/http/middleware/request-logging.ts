/**
 * Request Logging Middleware
 *
 * Assigns each request a correlation id (read back by the guard as the
 * pipeline request id) and logs completion with its duration.
 */

import crypto from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import { getComponentLogger } from "../../logging/index.js";
import { REQUEST_ID_HEADER, extractSourceIp } from "../request-utils.js";

/**
 * Lazy-initialized logger to avoid initialization at module load time
 */
let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:request");
  }
  return logger;
}

/**
 * Request logging middleware
 *
 * Client-supplied request ids are replaced so they cannot collide with or
 * forge entries in the audit trail. Bodies are never logged.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const startTime = performance.now();
  const requestId = crypto.randomUUID();
  req.headers[REQUEST_ID_HEADER] = requestId;

  getLogger().debug(
    {
      requestId,
      method: req.method,
      path: req.path,
      ip: extractSourceIp(req),
      contentType: req.get("content-type"),
    },
    "Incoming request"
  );

  res.on("finish", () => {
    const logData = {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      metric: "http.request_ms",
      value: Math.round(performance.now() - startTime),
    };

    if (res.statusCode >= 500) {
      getLogger().error(logData, "Request completed with server error");
    } else if (res.statusCode >= 400) {
      getLogger().warn(logData, "Request completed with client error");
    } else {
      getLogger().info(logData, "Request completed");
    }
  });

  next();
}
