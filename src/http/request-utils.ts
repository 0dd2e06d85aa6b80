/**
 * HTTP Request Utility Functions
 *
 * Credential and client extraction from express requests. Forwarded
 * headers are never read directly: the client address comes from
 * `req.ip`, which honours the app's `trust proxy` setting.
 *
 * @module http/request-utils
 */

import type { Request } from "express";
import type { GuardRequest } from "../pipeline/types.js";
import type { RouteRequirement } from "./types.js";

export const API_KEY_HEADER = "x-api-key";
export const SESSION_HEADER = "x-session-id";
export const CSRF_HEADER = "x-csrf-token";
export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Client IP address, or "unknown" when the socket has none
 */
export function extractSourceIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? "unknown";
}

/**
 * Token from an `Authorization: Bearer <token>` header
 */
export function extractBearerToken(req: Request): string | undefined {
  const header = req.get("authorization");
  if (!header) {
    return undefined;
  }
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1];
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.get(name);
  return value === undefined || value === "" ? undefined : value;
}

/**
 * First path segment after an optional `/api/v<n>` prefix
 *
 * `/api/v1/simulate/run` -> `simulate`; `/` -> `root`
 */
export function endpointName(path: string): string {
  const segments = path.split("/").filter((segment) => segment.length > 0);
  const rest =
    segments[0] === "api" && /^v\d+$/.test(segments[1] ?? "") ? segments.slice(2) : segments;
  return rest[0] ?? "root";
}

/**
 * Map an express request into the core's request description
 */
export function toGuardRequest(
  req: Request,
  endpoint: string,
  requirement: RouteRequirement | undefined
): GuardRequest {
  const request: GuardRequest = {
    ip: extractSourceIp(req),
    endpoint,
    method: req.method,
    headers: req.headers,
  };

  const requestId = headerValue(req, REQUEST_ID_HEADER);
  const token = extractBearerToken(req);
  const apiKey = headerValue(req, API_KEY_HEADER);
  const sessionId = headerValue(req, SESSION_HEADER);
  const csrfToken = headerValue(req, CSRF_HEADER);
  const userAgent = headerValue(req, "user-agent");
  const contentType = headerValue(req, "content-type");
  const contentLength = headerValue(req, "content-length");

  if (requestId !== undefined) request.requestId = requestId;
  if (token !== undefined) request.token = token;
  if (apiKey !== undefined) request.apiKey = apiKey;
  if (sessionId !== undefined) request.sessionId = sessionId;
  if (csrfToken !== undefined) request.csrfToken = csrfToken;
  if (userAgent !== undefined) request.userAgent = userAgent;
  if (contentType !== undefined) request.contentType = contentType;
  if (contentLength !== undefined) request.contentLength = contentLength;
  if (requirement?.permissions) request.requiredPermissions = requirement.permissions;
  if (requirement?.roles) request.requiredRoles = requirement.roles;

  return request;
}
