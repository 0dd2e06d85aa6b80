/**
 * HTTP Middleware Exports
 */

export { requestLogging } from "./request-logging.js";
export { errorHandler, notFoundHandler } from "./error-handler.js";
export { createGuardMiddleware, sendDenial } from "./guard.js";
export type { GuardLocals } from "./guard.js";
export { createCorsMiddleware, loadCorsConfig, DEFAULT_CORS_CONFIG } from "./cors.js";
export type { CorsConfig, CorsMiddleware } from "./cors-types.js";
