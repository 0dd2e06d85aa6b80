/**
 * CORS Middleware Type Definitions
 *
 * @module http/middleware/cors-types
 */

import type { RequestHandler } from "express";

export interface CorsConfig {
  enabled: boolean;

  /** Exact origins allowed; requests without an Origin header always pass */
  origins: string[];

  methods: string[];
  allowedHeaders: string[];
  exposedHeaders: string[];
  credentials: boolean;

  /** Seconds a preflight result may be cached */
  maxAge: number;
}

export type CorsMiddleware = RequestHandler;

/**
 * Localhost-only by default; deployments list their front-end origins in
 * CORS_ORIGINS.
 */
export const DEFAULT_CORS_CONFIG: CorsConfig = {
  enabled: true,
  origins: ["http://localhost:3000"],
  methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  allowedHeaders: [
    "Authorization",
    "Content-Type",
    "X-API-Key",
    "X-Session-Id",
    "X-CSRF-Token",
    "X-Request-Id",
  ],
  exposedHeaders: ["X-Request-Id", "Retry-After", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
  credentials: true,
  maxAge: 86400,
};
