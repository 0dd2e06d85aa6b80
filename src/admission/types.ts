/**
 * Admission Control Types
 *
 * @module admission/types
 */

export interface AdmissionConfig {
  /** Concurrent requests admitted before new ones are queued */
  maxConcurrentRequests: number;

  /** Capacity of the retry queue */
  queueSize: number;

  /** Queued entries older than this are discarded on dequeue */
  queueMaxWaitSeconds: number;

  /** Retry hint given to queued callers */
  queuedRetryAfterSeconds: number;

  maxJsonPayloadBytes: number;
  maxFormPayloadBytes: number;
  maxRequestBytes: number;
  maxHeaderValueLength: number;

  /** Load average per core above which the system counts as overloaded */
  cpuOverloadThreshold: number;
}

/**
 * Raw header map as delivered by the HTTP layer
 */
export type RawHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

export type HeaderRemovalReason = "suspicious" | "too_long" | "null_byte" | "control_character";

export interface HeaderFilterResult {
  headers: Record<string, string>;
  removed: Array<{ name: string; reason: HeaderRemovalReason }>;
}

/**
 * Body description checked before the handler runs
 */
export interface BodyDescriptor {
  contentType?: string;
  /** Raw Content-Length header or a parsed number */
  contentLength?: string | number;
}

export interface QueuedRequest<T> {
  id: string;
  data: T;
  /** Epoch milliseconds */
  enqueuedAt: number;
}

/**
 * Ticket describing a request waiting for admission
 */
export interface AdmissionTicket {
  requestId: string;
  method: string;
  endpoint: string;
}

export interface BackpressureStatus {
  overloaded: boolean;
  /** 1-minute load average divided by core count */
  loadRatio: number;
  cpuThreshold: number;
  queueSize: number;
  queueCapacity: number;
  concurrentRequests: number;
  maxConcurrentRequests: number;
}

/**
 * Returns load average per core
 */
export type LoadProbe = () => number;
