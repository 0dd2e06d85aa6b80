/**
 * Tests for CLI Dependency Initialization
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, afterEach, vi } from "vitest";
import {
  initializeDependencies,
  withDependencies,
} from "../../../src/cli/utils/dependency-init.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { createTestContext } from "../../helpers/test-context.js";

describe("dependency-init", () => {
  afterEach(() => {
    resetLogger();
  });

  describe("initializeDependencies", () => {
    it("should build a context with the rotation scheduler disabled", async () => {
      const dataPath = await fs.mkdtemp(path.join(os.tmpdir(), "guard-cli-"));
      const deps = await initializeDependencies({
        DATA_PATH: dataPath,
        LOG_LEVEL: "silent",
        LOG_FORMAT: "json",
        AUDIT_LOG_ENABLED: "false",
        SECRET_ROTATION_ENABLED: "true",
      });

      try {
        expect(deps.context.config.rotation.enabled).toBe(false);
        expect(deps.context.rotationScheduler.isRunning()).toBe(false);
        expect(deps.context.store.kind).toBe("memory");
      } finally {
        await deps.context.close();
        await fs.rm(dataPath, { recursive: true, force: true });
      }
    });
  });

  describe("withDependencies", () => {
    it("should return the command result and close the context", async () => {
      initializeLogger({ level: "silent", format: "json" });
      const ctx = await createTestContext();
      const closeSpy = vi.spyOn(ctx.context, "close");

      const result = await withDependencies(async () => "done", async () => ctx.deps);

      expect(result).toBe("done");
      expect(closeSpy).toHaveBeenCalledTimes(1);
      await ctx.dispose();
    });

    it("should close the context when the command throws", async () => {
      initializeLogger({ level: "silent", format: "json" });
      const ctx = await createTestContext();
      const closeSpy = vi.spyOn(ctx.context, "close");

      await expect(
        withDependencies(
          async () => {
            throw new Error("command failed");
          },
          async () => ctx.deps
        )
      ).rejects.toThrow("command failed");
      expect(closeSpy).toHaveBeenCalledTimes(1);
      await ctx.dispose();
    });
  });
});
