/**
 * Guard Middleware
 *
 * Runs the protection pipeline in front of the downstream handlers, which
 * see the request without the headers the validator dropped. The
 * pipeline's final handler is the rest of the express chain, so the
 * concurrency slot is held until the response finishes or the connection
 * closes. Denials are written here with the JSON error body and, for 429
 * and 503, a `Retry-After` header.
 *
 * @module http/middleware/guard
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { DenyDecision } from "../../errors.js";
import type { ProtectionPipeline } from "../../pipeline/protection-pipeline.js";
import type { GuardState } from "../../pipeline/types.js";
import { endpointName, toGuardRequest } from "../request-utils.js";
import type { ErrorResponse, GuardMiddlewareOptions } from "../types.js";

/**
 * Per-request guard outcome available to route handlers as `res.locals.guard`
 */
export interface GuardLocals {
  requestId: string;
  subjectId?: string;
  roles: readonly string[];
}

function waitForResponse(res: Response, next: NextFunction): Promise<void> {
  return new Promise((resolve) => {
    res.once("finish", resolve);
    res.once("close", resolve);
    next();
  });
}

/**
 * Write a deny decision as the response
 */
export function sendDenial(res: Response, decision: DenyDecision, requestId?: string): void {
  if (decision.retryAfterSeconds !== undefined) {
    res.setHeader("Retry-After", String(decision.retryAfterSeconds));
  }

  const body: ErrorResponse = {
    error: {
      message: decision.message,
      code: decision.code,
      statusCode: decision.statusCode,
    },
  };
  if (decision.retryAfterSeconds !== undefined) {
    body.error.retryAfterSeconds = decision.retryAfterSeconds;
  }
  if (decision.status !== undefined) body.error.status = decision.status;
  if (requestId !== undefined) body.error.requestId = requestId;

  res.status(decision.statusCode).json(body);
}

export function createGuardMiddleware(
  pipeline: ProtectionPipeline,
  options: GuardMiddlewareOptions = {}
): RequestHandler {
  const endpointOf = options.endpointOf ?? ((req: Request) => endpointName(req.path));
  const requirementOf = options.requirementOf ?? (() => undefined);

  return (req: Request, res: Response, next: NextFunction): void => {
    const request = toGuardRequest(req, endpointOf(req), requirementOf(req));

    const handler = async (state: GuardState): Promise<void> => {
      for (const name of state.removedHeaders) {
        delete req.headers[name];
      }

      const locals: GuardLocals = {
        requestId: state.requestId,
        roles: state.principal?.roles ?? [],
      };
      if (state.principal) locals.subjectId = state.principal.subjectId;
      res.locals["guard"] = locals;
      res.setHeader("X-Request-Id", state.requestId);
      if (state.rateLimit) {
        res.setHeader("X-RateLimit-Limit", String(state.rateLimit.limit));
        res.setHeader("X-RateLimit-Remaining", String(state.rateLimit.remaining));
      }
      await waitForResponse(res, next);
    };

    void pipeline
      .evaluate(request, handler)
      .then((decision) => {
        if (!decision.allowed && !res.headersSent) {
          sendDenial(res, decision, decision.requestId);
        }
      })
      .catch(next);
  };
}
