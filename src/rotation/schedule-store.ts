/**
 * Rotation Schedule Store
 *
 * Persists schedules keyed by secret name plus the most recent rotation
 * history to `{dataPath}/rotation-schedules.json`.
 *
 * @module rotation/schedule-store
 */

import { join } from "node:path";
import type { RotationScheduleFile } from "./types.js";
import { RotationScheduleFileSchema } from "./validation.js";
import { ScheduleStorageError } from "./errors.js";
import { readJsonFile, writeJsonFileAtomic } from "../utils/json-file.js";

/** Rotation attempts kept in the history */
export const MAX_ROTATION_HISTORY = 100;

export interface RotationScheduleStore {
  /** @returns undefined when nothing has been persisted yet */
  load(): Promise<RotationScheduleFile | undefined>;
  save(file: RotationScheduleFile): Promise<void>;
}

export class FileRotationScheduleStore implements RotationScheduleStore {
  private readonly filePath: string;

  constructor(dataPath: string) {
    this.filePath = join(dataPath, "rotation-schedules.json");
  }

  getStoragePath(): string {
    return this.filePath;
  }

  async load(): Promise<RotationScheduleFile | undefined> {
    try {
      const raw = await readJsonFile(this.filePath);
      return raw === undefined ? undefined : RotationScheduleFileSchema.parse(raw);
    } catch (error) {
      throw new ScheduleStorageError(
        "read",
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }
  }

  async save(file: RotationScheduleFile): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, {
        ...file,
        history: file.history.slice(-MAX_ROTATION_HISTORY),
      });
    } catch (error) {
      throw new ScheduleStorageError(
        "write",
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }
  }
}
