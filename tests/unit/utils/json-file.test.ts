/**
 * Unit tests for JSON file persistence helpers
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readJsonFile, writeJsonFileAtomic } from "../../../src/utils/json-file.js";

describe("json-file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fguard-json-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("readJsonFile returns undefined for a missing file", async () => {
    expect(await readJsonFile(join(dir, "missing.json"))).toBeUndefined();
  });

  test("readJsonFile throws on invalid JSON", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, "{oops", "utf8");
    await expect(readJsonFile(path)).rejects.toBeInstanceOf(SyntaxError);
  });

  test("writeJsonFileAtomic creates parents and leaves no temp file", async () => {
    const path = join(dir, "nested", "state.json");
    await writeJsonFileAtomic(path, { version: "1.0", items: [1, 2] });

    expect(await readFile(path, "utf8")).toBe(
      JSON.stringify({ version: "1.0", items: [1, 2] }, null, 2)
    );
    expect(await readdir(join(dir, "nested"))).toEqual(["state.json"]);
    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });

  test("writeJsonFileAtomic replaces the previous content", async () => {
    const path = join(dir, "state.json");
    await writeJsonFileAtomic(path, { n: 1 });
    await writeJsonFileAtomic(path, { n: 2 });
    expect(await readJsonFile(path)).toEqual({ n: 2 });
  });
});
