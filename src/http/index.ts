/**
 * HTTP Adapter Module
 *
 * Express wiring for the protection pipeline.
 */

export {
  createHttpApp,
  startHttpServer,
  loadHttpConfig,
  DEFAULT_ROUTE_REQUIREMENTS,
  type HttpServerDependencies,
} from "./server.js";

export type {
  HttpConfig,
  HealthResponse,
  StatusResponse,
  RouteRequirement,
  GuardMiddlewareOptions,
  ErrorResponse,
  HttpServerInstance,
} from "./types.js";

export {
  createHealthRouter,
  createStatusRouter,
  type HealthCheckDependencies,
  type StatusRouteDependencies,
} from "./routes/index.js";

export {
  requestLogging,
  errorHandler,
  notFoundHandler,
  createGuardMiddleware,
  sendDenial,
  createCorsMiddleware,
  loadCorsConfig,
  DEFAULT_CORS_CONFIG,
  type GuardLocals,
  type CorsConfig,
  type CorsMiddleware,
} from "./middleware/index.js";

export {
  extractSourceIp,
  extractBearerToken,
  endpointName,
  toGuardRequest,
  API_KEY_HEADER,
  SESSION_HEADER,
  CSRF_HEADER,
  REQUEST_ID_HEADER,
} from "./request-utils.js";
