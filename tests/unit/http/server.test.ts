/**
 * HTTP Server Configuration Unit Tests
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { loadHttpConfig } from "../../../src/http/server.js";
import { DEFAULT_CORS_CONFIG, loadCorsConfig } from "../../../src/http/middleware/cors.js";
import { endpointName } from "../../../src/http/request-utils.js";
import { ConfigError } from "../../../src/errors.js";

beforeAll(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterAll(() => {
  resetLogger();
});

describe("loadHttpConfig", () => {
  test("should default to loopback on port 3001", () => {
    expect(loadHttpConfig({})).toEqual({ port: 3001, host: "127.0.0.1", trustProxy: false });
  });

  test("should read overrides", () => {
    expect(
      loadHttpConfig({ HTTP_PORT: "8080", HTTP_HOST: "0.0.0.0", HTTP_TRUST_PROXY: "true" })
    ).toEqual({ port: 8080, host: "0.0.0.0", trustProxy: true });
  });

  test("should accept the port range bounds", () => {
    expect(loadHttpConfig({ HTTP_PORT: "1" }).port).toBe(1);
    expect(loadHttpConfig({ HTTP_PORT: "65535" }).port).toBe(65535);
  });

  test("should reject ports outside the range or not integers", () => {
    for (const value of ["0", "65536", "-1", "abc", "3001.5"]) {
      expect(() => loadHttpConfig({ HTTP_PORT: value })).toThrow(ConfigError);
    }
  });
});

describe("loadCorsConfig", () => {
  test("should default to the localhost origin", () => {
    expect(loadCorsConfig({})).toEqual(DEFAULT_CORS_CONFIG);
  });

  test("should split and trim CORS_ORIGINS", () => {
    const config = loadCorsConfig({
      CORS_ORIGINS: "https://app.example.test, https://admin.example.test,",
      CORS_CREDENTIALS: "false",
      CORS_MAX_AGE: "600",
    });

    expect(config.origins).toEqual(["https://app.example.test", "https://admin.example.test"]);
    expect(config.credentials).toBe(false);
    expect(config.maxAge).toBe(600);
  });

  test("should honour CORS_ENABLED", () => {
    expect(loadCorsConfig({ CORS_ENABLED: "false" }).enabled).toBe(false);
  });
});

describe("endpointName", () => {
  test("should take the first segment after the version prefix", () => {
    expect(endpointName("/api/v1/simulate/run")).toBe("simulate");
    expect(endpointName("/api/v2/scenarios")).toBe("scenarios");
  });

  test("should fall back to the first segment without a prefix", () => {
    expect(endpointName("/status")).toBe("status");
    expect(endpointName("/api/latest")).toBe("api");
  });

  test("should name the root", () => {
    expect(endpointName("/")).toBe("root");
    expect(endpointName("/api/v1")).toBe("root");
  });
});
