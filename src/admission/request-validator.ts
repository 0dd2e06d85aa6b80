/**
 * Request Validator
 *
 * Checks run before any handler logic: content type against an allow-list,
 * content length against a ceiling chosen by content type, and header
 * filtering. Also tracks the live concurrent-request count that gates
 * admission.
 *
 * The concurrent counter lives in the shared store under
 * `requests:concurrent` so every instance sees the same total. A
 * process-local count is kept alongside and answers while the store is
 * unreachable.
 *
 * @module admission/request-validator
 */

import type { Logger } from "pino";
import type {
  AdmissionConfig,
  BodyDescriptor,
  HeaderFilterResult,
  HeaderRemovalReason,
  RawHeaders,
} from "./types.js";
import { PayloadTooLargeError, ValidationError } from "../errors.js";
import type { SharedStore } from "../store/types.js";
import { getComponentLogger } from "../logging/index.js";

const MIB = 1024 * 1024;

export const DEFAULT_ADMISSION_CONFIG: AdmissionConfig = {
  maxConcurrentRequests: 1000,
  queueSize: 5000,
  queueMaxWaitSeconds: 30,
  queuedRetryAfterSeconds: 5,
  maxJsonPayloadBytes: 5 * MIB,
  maxFormPayloadBytes: 10 * MIB,
  maxRequestBytes: 10 * MIB,
  maxHeaderValueLength: 8000,
  cpuOverloadThreshold: 0.85,
};

export const ALLOWED_CONTENT_TYPES: ReadonlySet<string> = new Set([
  "application/json",
  "application/x-www-form-urlencoded",
  "multipart/form-data",
  "text/plain",
]);

/**
 * Headers a client can use to spoof routing or origin information
 */
export const SUSPICIOUS_HEADERS: ReadonlySet<string> = new Set([
  "x-forwarded-host",
  "x-forwarded-proto",
  "x-forwarded-for",
  "x-original-url",
  "x-original-host",
  "x-rewrite-url",
]);

export const CONCURRENT_REQUESTS_KEY = "requests:concurrent";

// Tab is the only control character allowed in a header value
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\x01-\x08\x0a-\x1f\x7f]/;

/**
 * Media type without parameters, lowercased
 */
export function mainContentType(contentType: string): string {
  return (contentType.split(";")[0] ?? "").trim().toLowerCase();
}

export class RequestValidator {
  private localConcurrent = 0;
  private _logger: Logger | null = null;

  constructor(
    private readonly store: SharedStore,
    private readonly config: AdmissionConfig = DEFAULT_ADMISSION_CONFIG
  ) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("admission:validator");
    }
    return this._logger;
  }

  get maxConcurrentRequests(): number {
    return this.config.maxConcurrentRequests;
  }

  /**
   * A missing content type is accepted (bodiless requests)
   */
  validateContentType(contentType: string | undefined): boolean {
    if (contentType === undefined || contentType.trim() === "") {
      return true;
    }
    return ALLOWED_CONTENT_TYPES.has(mainContentType(contentType));
  }

  /**
   * Byte ceiling for a body of the given content type
   */
  maxPayloadBytes(contentType: string | undefined): number {
    const type = contentType?.toLowerCase() ?? "";
    if (type.includes("json")) {
      return this.config.maxJsonPayloadBytes;
    }
    if (type.includes("form-data")) {
      return this.config.maxFormPayloadBytes;
    }
    return this.config.maxRequestBytes;
  }

  /**
   * @returns false for a non-numeric or negative length or one over the ceiling
   */
  validateContentLength(
    contentLength: string | number | undefined,
    contentType: string | undefined
  ): boolean {
    const length = parseContentLength(contentLength);
    return length !== null && length <= this.maxPayloadBytes(contentType);
  }

  /**
   * Drop spoofable headers and unsafe values; everything else passes
   * through unchanged under its lowercased name
   */
  filterHeaders(headers: RawHeaders): HeaderFilterResult {
    const result: HeaderFilterResult = { headers: {}, removed: [] };

    for (const [rawName, rawValue] of Object.entries(headers)) {
      if (rawValue === undefined) {
        continue;
      }
      const name = rawName.toLowerCase();
      const value = typeof rawValue === "string" ? rawValue : rawValue.join(", ");
      const reason = this.rejectionReason(name, value);
      if (reason) {
        result.removed.push({ name, reason });
        continue;
      }
      result.headers[name] = value;
    }

    if (result.removed.length > 0) {
      this.logger.warn({ removed: result.removed }, "Removed unsafe request headers");
    }
    return result;
  }

  /**
   * Content type and length checks for one request
   *
   * @throws {ValidationError} Unsupported content type or unreadable length
   * @throws {PayloadTooLargeError} Body over the ceiling for its type
   */
  assertBody(body: BodyDescriptor): void {
    if (!this.validateContentType(body.contentType)) {
      throw new ValidationError(
        `Unsupported content type: ${mainContentType(body.contentType ?? "")}`,
        "UNSUPPORTED_CONTENT_TYPE",
        415
      );
    }

    const length = parseContentLength(body.contentLength);
    if (length === null) {
      throw new ValidationError("Invalid Content-Length header", "INVALID_CONTENT_LENGTH");
    }

    const maxBytes = this.maxPayloadBytes(body.contentType);
    if (length > maxBytes) {
      throw new PayloadTooLargeError(length, maxBytes);
    }
  }

  async getConcurrentCount(): Promise<number> {
    try {
      const value = await this.store.get(CONCURRENT_REQUESTS_KEY);
      return value === null ? 0 : Number.parseInt(value, 10) || 0;
    } catch (error) {
      this.logger.debug({ err: error }, "Concurrent count unavailable, using local count");
      return this.localConcurrent;
    }
  }

  /**
   * Admission gate: true while below the concurrency ceiling
   */
  async canAcceptRequest(): Promise<boolean> {
    return (await this.getConcurrentCount()) < this.config.maxConcurrentRequests;
  }

  /**
   * Take a concurrency slot if one is free
   *
   * Increments first and compares the returned count, so concurrent callers
   * cannot all pass the ceiling. An over-ceiling increment is undone.
   *
   * @returns true if the caller now holds a slot and must release it with
   *   `decrementConcurrent`
   */
  async tryAcquireSlot(): Promise<boolean> {
    const count = await this.incrementConcurrent();
    if (count <= this.config.maxConcurrentRequests) {
      return true;
    }
    await this.decrementConcurrent();
    return false;
  }

  async incrementConcurrent(): Promise<number> {
    this.localConcurrent++;
    try {
      return await this.store.increment(CONCURRENT_REQUESTS_KEY);
    } catch (error) {
      this.logger.warn({ err: error }, "Failed to increment shared concurrent count");
      return this.localConcurrent;
    }
  }

  async decrementConcurrent(): Promise<number> {
    this.localConcurrent = Math.max(0, this.localConcurrent - 1);
    try {
      return await this.store.decrement(CONCURRENT_REQUESTS_KEY);
    } catch (error) {
      this.logger.warn({ err: error }, "Failed to decrement shared concurrent count");
      return this.localConcurrent;
    }
  }

  private rejectionReason(name: string, value: string): HeaderRemovalReason | undefined {
    if (SUSPICIOUS_HEADERS.has(name)) {
      return "suspicious";
    }
    if (value.length > this.config.maxHeaderValueLength) {
      return "too_long";
    }
    if (value.includes("\0")) {
      return "null_byte";
    }
    if (CONTROL_CHARACTERS.test(value)) {
      return "control_character";
    }
    return undefined;
  }
}

/**
 * @returns Byte count, 0 when absent, or null when unreadable
 */
function parseContentLength(contentLength: string | number | undefined): number | null {
  if (contentLength === undefined || contentLength === "") {
    return 0;
  }
  if (typeof contentLength === "number") {
    return Number.isInteger(contentLength) && contentLength >= 0 ? contentLength : null;
  }
  if (!/^\d+$/.test(contentLength.trim())) {
    return null;
  }
  return Number.parseInt(contentLength.trim(), 10);
}
