/**
 * Error Handler Middleware
 *
 * Last middleware in the chain. Guard errors raised by route handlers (an
 * open circuit, a storage failure) keep their code and status; anything
 * else becomes an opaque 500. Details are logged, never sent.
 */

import type { NextFunction, Request, Response } from "express";
import { GuardError, ValidationError, toDenyDecision } from "../../errors.js";
import { getComponentLogger } from "../../logging/index.js";
import { REQUEST_ID_HEADER } from "../request-utils.js";
import type { ErrorResponse } from "../types.js";
import { sendDenial } from "./guard.js";

/**
 * Lazy-initialized logger to avoid initialization at module load time
 */
let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:error");
  }
  return logger;
}

/**
 * Check if error is a JSON parsing error from express.json() middleware
 */
function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = req.get(REQUEST_ID_HEADER);
  const error = isJsonParseError(err)
    ? new ValidationError("Invalid JSON in request body", "INVALID_JSON")
    : err;
  const decision = toDenyDecision(error);

  const logData = {
    requestId,
    err,
    method: req.method,
    path: req.path,
    statusCode: decision.statusCode,
  };
  if (error instanceof GuardError && decision.statusCode < 500) {
    getLogger().info(logData, "Request rejected");
  } else {
    getLogger().error(logData, "Request failed");
  }

  if (res.headersSent) {
    return;
  }
  sendDenial(res, decision, requestId);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: "NOT_FOUND",
      statusCode: 404,
    },
  };

  res.status(404).json(response);
}
