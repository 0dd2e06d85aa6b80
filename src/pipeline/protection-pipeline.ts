/**
 * Protection Pipeline
 *
 * Runs an ordered list of stages in front of a handler and turns the
 * outcome into an allow or deny decision. Stages deny by throwing a
 * GuardError; anything else that escapes becomes an opaque 500 decision.
 * The process never crashes on a single request.
 *
 * @module pipeline/protection-pipeline
 */

import crypto from "node:crypto";
import type { Logger } from "pino";
import type {
  AllowDecision,
  GuardDecision,
  GuardHandler,
  GuardRequest,
  GuardState,
  PipelineStage,
} from "./types.js";
import { toDenyDecision } from "../errors.js";
import { getComponentLogger } from "../logging/index.js";
import type { AuditOrigin } from "../logging/audit-types.js";
import { isDenial } from "./stages.js";

function originOf(request: GuardRequest, requestId: string): AuditOrigin {
  const origin: AuditOrigin = { sourceIp: request.ip, requestId };
  if (request.userAgent !== undefined) origin.userAgent = request.userAgent;
  return origin;
}

export class ProtectionPipeline {
  private _logger: Logger | null = null;

  constructor(private readonly stages: readonly PipelineStage[]) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("pipeline");
    }
    return this._logger;
  }

  /**
   * Stage names in execution order
   */
  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /**
   * New pipeline with `stage` inserted before the stage named `before`, or
   * appended when `before` is omitted or unknown
   */
  with(stage: PipelineStage, before?: string): ProtectionPipeline {
    const index = before === undefined ? -1 : this.stages.findIndex((s) => s.name === before);
    const stages = [...this.stages];
    stages.splice(index === -1 ? stages.length : index, 0, stage);
    return new ProtectionPipeline(stages);
  }

  /**
   * Run every stage, then `handler`
   */
  async evaluate<T>(request: GuardRequest, handler: GuardHandler<T>): Promise<GuardDecision<T>> {
    const startTime = performance.now();
    const requestId = request.requestId ?? crypto.randomUUID();
    const state: GuardState = {
      request,
      requestId,
      origin: originOf(request, requestId),
      headers: {},
      removedHeaders: [],
    };

    const dispatch = (index: number): Promise<T> => {
      const stage = this.stages[index];
      if (!stage) {
        return handler(state);
      }
      return stage.run(state, () => dispatch(index + 1));
    };

    try {
      const result = await dispatch(0);
      this.logger.debug(
        {
          requestId,
          endpoint: request.endpoint,
          metric: "pipeline.duration_ms",
          value: Math.round(performance.now() - startTime),
        },
        "Request allowed"
      );

      const decision: AllowDecision<T> = { allowed: true, requestId, result };
      if (state.principal) decision.principal = state.principal;
      if (state.rateLimit) decision.rateLimit = state.rateLimit;
      return decision;
    } catch (error) {
      const deny = toDenyDecision(error);
      if (isDenial(error) && error.statusCode < 500) {
        this.logger.info(
          { requestId, endpoint: request.endpoint, code: deny.code, statusCode: deny.statusCode },
          "Request denied"
        );
      } else {
        this.logger.error(
          { err: error, requestId, endpoint: request.endpoint, code: deny.code },
          "Request failed"
        );
      }
      return { ...deny, requestId };
    }
  }
}
