/**
 * Admission Control Module
 *
 * Request validation, the concurrency gate, the retry queue and load-based
 * backpressure.
 *
 * @module admission
 */

export type {
  AdmissionConfig,
  RawHeaders,
  HeaderRemovalReason,
  HeaderFilterResult,
  BodyDescriptor,
  QueuedRequest,
  AdmissionTicket,
  BackpressureStatus,
  LoadProbe,
} from "./types.js";

export {
  RequestValidator,
  DEFAULT_ADMISSION_CONFIG,
  ALLOWED_CONTENT_TYPES,
  SUSPICIOUS_HEADERS,
  CONCURRENT_REQUESTS_KEY,
  mainContentType,
} from "./request-validator.js";
export { RequestQueue } from "./request-queue.js";
export { BackpressureManager, systemLoadProbe } from "./backpressure-manager.js";
