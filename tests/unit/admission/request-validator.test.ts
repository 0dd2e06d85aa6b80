/**
 * Request Validator Unit Tests
 *
 * @module tests/unit/admission/request-validator
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import {
  CONCURRENT_REQUESTS_KEY,
  RequestValidator,
  mainContentType,
} from "../../../src/admission/request-validator.js";
import type { AdmissionConfig } from "../../../src/admission/types.js";
import { PayloadTooLargeError, ValidationError } from "../../../src/errors.js";
import { MemorySharedStore } from "../../../src/store/memory-store.js";
import { FailingSharedStore } from "../../helpers/failing-store.js";

const CONFIG: AdmissionConfig = {
  maxConcurrentRequests: 2,
  queueSize: 2,
  queueMaxWaitSeconds: 10,
  queuedRetryAfterSeconds: 5,
  maxJsonPayloadBytes: 100,
  maxFormPayloadBytes: 200,
  maxRequestBytes: 50,
  maxHeaderValueLength: 20,
  cpuOverloadThreshold: 0.8,
};

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterAll(() => {
  resetLogger();
});

describe("RequestValidator", () => {
  let store: MemorySharedStore;
  let validator: RequestValidator;

  beforeEach(() => {
    store = new MemorySharedStore();
    validator = new RequestValidator(store, CONFIG);
  });

  describe("content type", () => {
    it("strips parameters and case", () => {
      expect(mainContentType("Application/JSON; charset=utf-8")).toBe("application/json");
    });

    it("accepts allowed types and bodiless requests", () => {
      expect(validator.validateContentType(undefined)).toBe(true);
      expect(validator.validateContentType(" ")).toBe(true);
      expect(validator.validateContentType("application/json; charset=utf-8")).toBe(true);
      expect(validator.validateContentType("multipart/form-data; boundary=x")).toBe(true);
    });

    it("rejects anything else", () => {
      expect(validator.validateContentType("application/xml")).toBe(false);
      expect(validator.validateContentType("text/html")).toBe(false);
    });
  });

  describe("content length", () => {
    it("picks the ceiling by content type", () => {
      expect(validator.maxPayloadBytes("application/json")).toBe(100);
      expect(validator.maxPayloadBytes("multipart/form-data; boundary=x")).toBe(200);
      expect(validator.maxPayloadBytes("application/x-www-form-urlencoded")).toBe(50);
      expect(validator.maxPayloadBytes(undefined)).toBe(50);
    });

    it("accepts lengths up to the ceiling", () => {
      expect(validator.validateContentLength("100", "application/json")).toBe(true);
      expect(validator.validateContentLength(101, "application/json")).toBe(false);
      expect(validator.validateContentLength(undefined, undefined)).toBe(true);
    });

    it("rejects unreadable lengths", () => {
      expect(validator.validateContentLength("-1", "text/plain")).toBe(false);
      expect(validator.validateContentLength("12abc", "text/plain")).toBe(false);
      expect(validator.validateContentLength(1.5, "text/plain")).toBe(false);
    });
  });

  describe("filterHeaders", () => {
    it("drops spoofable and unsafe headers and keeps the rest", () => {
      const result = validator.filterHeaders({
        Host: "api.test",
        "X-Forwarded-For": "203.0.113.7",
        "x-long": "a".repeat(21),
        "x-null": "a\0b",
        "x-ctrl": "a\nb",
        "x-tab": "a\tb",
        accept: ["text/plain", "application/json"],
        "x-absent": undefined,
      });

      expect(result.headers).toEqual({
        host: "api.test",
        "x-tab": "a\tb",
        accept: "text/plain, application/json",
      });
      expect(result.removed).toEqual([
        { name: "x-forwarded-for", reason: "suspicious" },
        { name: "x-long", reason: "too_long" },
        { name: "x-null", reason: "null_byte" },
        { name: "x-ctrl", reason: "control_character" },
      ]);
    });

    it("keeps values exactly at the length limit", () => {
      expect(validator.filterHeaders({ "x-edge": "a".repeat(20) }).removed).toEqual([]);
    });
  });

  describe("assertBody", () => {
    it("passes a valid body", () => {
      expect(() =>
        validator.assertBody({ contentType: "application/json", contentLength: "42" })
      ).not.toThrow();
    });

    it("raises 415 for an unsupported type", () => {
      const error = captureSync(() =>
        validator.assertBody({ contentType: "application/xml", contentLength: "1" })
      );
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.code).toBe("UNSUPPORTED_CONTENT_TYPE");
      expect(error instanceof ValidationError && error.statusCode).toBe(415);
      expect(error instanceof Error && error.message).toBe(
        "Unsupported content type: application/xml"
      );
    });

    it("raises 400 for an unreadable length", () => {
      const error = captureSync(() => validator.assertBody({ contentLength: "lots" }));
      expect(error instanceof ValidationError && error.code).toBe("INVALID_CONTENT_LENGTH");
      expect(error instanceof ValidationError && error.statusCode).toBe(400);
    });

    it("raises 413 for a body over the ceiling", () => {
      const error = captureSync(() =>
        validator.assertBody({ contentType: "application/json", contentLength: 101 })
      );
      expect(error).toBeInstanceOf(PayloadTooLargeError);
      expect(error instanceof Error && error.message).toBe(
        "Payload of 101 bytes exceeds limit of 100 bytes"
      );
    });
  });

  describe("concurrency gate", () => {
    it("counts requests in the shared store", async () => {
      expect(await validator.incrementConcurrent()).toBe(1);
      expect(await validator.incrementConcurrent()).toBe(2);
      expect(await validator.canAcceptRequest()).toBe(false);

      expect(await validator.decrementConcurrent()).toBe(1);
      expect(await validator.canAcceptRequest()).toBe(true);
      expect(await store.get(CONCURRENT_REQUESTS_KEY)).toBe("1");
    });

    it("sees requests counted by another instance", async () => {
      const other = new RequestValidator(store, CONFIG);
      await other.incrementConcurrent();
      await other.incrementConcurrent();
      expect(await validator.canAcceptRequest()).toBe(false);
    });

    it("grants no more slots than the ceiling to concurrent callers", async () => {
      const granted = await Promise.all(
        Array.from({ length: 5 }, () => validator.tryAcquireSlot())
      );

      expect(granted.filter(Boolean)).toHaveLength(2);
      expect(await store.get(CONCURRENT_REQUESTS_KEY)).toBe("2");
    });

    it("never goes below zero", async () => {
      expect(await validator.decrementConcurrent()).toBe(0);
      expect(await validator.getConcurrentCount()).toBe(0);
    });

    it("falls back to the local count when the store is down", async () => {
      const local = new RequestValidator(new FailingSharedStore(), CONFIG);
      expect(await local.incrementConcurrent()).toBe(1);
      expect(await local.incrementConcurrent()).toBe(2);
      expect(await local.canAcceptRequest()).toBe(false);
      expect(await local.decrementConcurrent()).toBe(1);
      expect(await local.getConcurrentCount()).toBe(1);
    });
  });
});

function captureSync(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
