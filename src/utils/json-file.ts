/**
 * JSON File Persistence Helpers
 *
 * Shared by the token, session, rotation-schedule and audit stores. Writes go
 * to a temp file first and are renamed into place, so a crash mid-write
 * leaves the previous file intact.
 *
 * @module utils/json-file
 */

import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Read and parse a JSON file
 *
 * @returns Parsed content, or undefined when the file does not exist
 * @throws SyntaxError when the file is not valid JSON
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(content);
}

/**
 * Write a value as pretty-printed JSON using temp file + rename
 *
 * Creates the parent directory (mode 0700) when missing.
 */
export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await mkdir(dirname(filePath), { recursive: true, mode: 0o700 });

  try {
    await writeFile(tempPath, JSON.stringify(value, null, 2), { encoding: "utf8", mode: 0o600 });
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
