/**
 * HTTP Adapter Type Definitions
 *
 * @module http/types
 */

import type { Request } from "express";
import type { BackpressureStatus } from "../admission/types.js";
import type { Permission, Role } from "../rbac/types.js";
import type { CircuitStatus } from "../resilience/types.js";

/**
 * HTTP listener settings
 */
export interface HttpConfig {
  port: number;
  host: string;
  /** Value handed to express's `trust proxy` setting */
  trustProxy: boolean | number;
}

/**
 * Health check response structure
 */
export interface HealthResponse {
  status: "healthy" | "degraded" | "unhealthy";
  version: string;
  /** Seconds */
  uptime: number;
  timestamp: string;
  checks: {
    store: "connected" | "disconnected";
    audit: "enabled" | "disabled";
  };
}

/**
 * Operational status exposed to administrators
 */
export interface StatusResponse {
  backpressure: BackpressureStatus;
  circuits: Record<string, CircuitStatus>;
  store: { kind: string; reachable: boolean };
  secrets: string;
}

/**
 * Route-level access requirement for the guard middleware
 */
export interface RouteRequirement {
  permissions?: readonly Permission[];
  roles?: readonly Role[];
}

/**
 * Options for the guard middleware
 */
export interface GuardMiddlewareOptions {
  /** Endpoint name for rate-limit keys; defaults to the first path segment */
  endpointOf?: (req: Request) => string;
  /** Requirement for the route; defaults to none */
  requirementOf?: (req: Request) => RouteRequirement | undefined;
}

/**
 * JSON error body written for every denial
 */
export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
    retryAfterSeconds?: number;
    status?: string;
    requestId?: string;
  };
}

/**
 * HTTP server instance with additional metadata
 */
export interface HttpServerInstance {
  close: () => Promise<void>;
  port: number;
  host: string;
}
