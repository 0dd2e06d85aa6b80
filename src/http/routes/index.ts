/**
 * HTTP Routes Exports
 */

export { createHealthRouter, type HealthCheckDependencies } from "./health.js";
export { createStatusRouter, type StatusRouteDependencies } from "./status.js";
