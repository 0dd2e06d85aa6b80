/**
 * Unit tests for retry utility
 *
 * Tests exponential backoff, conditional retry and retry callbacks.
 */

import { describe, test, expect, vi, beforeAll, afterAll } from "vitest";
import {
  withRetry,
  defaultExponentialBackoff,
  createRetryLogger,
} from "../../../src/utils/retry.js";
import { getComponentLogger, initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { createLogCapture } from "../../helpers/log-capture.js";

const noDelay = (): number => 0;

describe("defaultExponentialBackoff", () => {
  test.each([
    [0, 1000],
    [1, 2000],
    [2, 4000],
    [10, 1024000],
  ])("attempt %i waits %i ms", (attempt, delay) => {
    expect(defaultExponentialBackoff(attempt)).toBe(delay);
  });
});

describe("withRetry", () => {
  test("returns result on first attempt", async () => {
    const operation = vi.fn(async () => "success");

    expect(await withRetry(operation, { maxRetries: 3 })).toBe("success");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("retries until the operation succeeds", async () => {
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      if (calls < 3) {
        throw new Error(`failure ${calls}`);
      }
      return "eventually";
    });

    const result = await withRetry(operation, { maxRetries: 3, calculateBackoff: noDelay });
    expect(result).toBe("eventually");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("throws the last error once retries are exhausted", async () => {
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    });

    await expect(
      withRetry(operation, { maxRetries: 2, calculateBackoff: noDelay })
    ).rejects.toThrow("failure 3");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("maxRetries 0 makes a single attempt", async () => {
    const operation = vi.fn(async () => {
      throw new Error("once");
    });

    await expect(withRetry(operation, { maxRetries: 0 })).rejects.toThrow("once");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("stops when shouldRetry declines", async () => {
    const operation = vi.fn(async () => {
      throw new TypeError("not transient");
    });
    const shouldRetry = vi.fn((error: Error) => !(error instanceof TypeError));

    await expect(
      withRetry(operation, { maxRetries: 5, shouldRetry, calculateBackoff: noDelay })
    ).rejects.toBeInstanceOf(TypeError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledTimes(1);
  });

  test("wraps non-Error rejections", async () => {
    const operation = vi.fn(async (): Promise<string> => {
      throw "plain string";
    });

    await expect(withRetry(operation, { maxRetries: 0 })).rejects.toThrow("plain string");
  });

  test("reports each retry with its backoff", async () => {
    let calls = 0;
    const operation = async (): Promise<number> => {
      calls++;
      if (calls < 3) {
        throw new Error("busy");
      }
      return calls;
    };
    const onRetry = vi.fn((_attempt: number, _error: Error, _delayMs: number) => undefined);

    await withRetry(operation, { maxRetries: 3, calculateBackoff: noDelay, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map(([attempt, , delay]) => [attempt, delay])).toEqual([
      [0, 0],
      [1, 0],
    ]);
  });

  test("waits the computed backoff between attempts", async () => {
    vi.useFakeTimers();
    try {
      let calls = 0;
      const operation = vi.fn(async () => {
        calls++;
        if (calls === 1) {
          throw new Error("busy");
        }
        return "ok";
      });

      const pending = withRetry(operation, { maxRetries: 1, calculateBackoff: () => 500 });
      await vi.advanceTimersByTimeAsync(499);
      expect(operation).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(await pending).toBe("ok");
      expect(operation).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("createRetryLogger", () => {
  const capture = createLogCapture();

  beforeAll(() => {
    initializeLogger({ level: "warn", format: "json", stream: capture.stream });
  });

  afterAll(() => {
    resetLogger();
  });

  test("logs a one-based attempt with the error", () => {
    const onRetry = createRetryLogger(getComponentLogger("secrets"), "vault read", 2);
    onRetry(0, new TypeError("fetch failed"), 200);

    const entry = capture.find((log) => log.msg === "Retrying vault read");
    expect(entry?.level).toBe("warn");
    expect(entry?.component).toBe("secrets");
    expect(entry?.["attempt"]).toBe(1);
    expect(entry?.["maxRetries"]).toBe(2);
    expect(entry?.["delayMs"]).toBe(200);
    expect(entry?.["error"]).toBe("fetch failed");
    expect(entry?.["errorType"]).toBe("TypeError");
  });
});
