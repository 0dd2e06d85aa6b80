/**
 * Rotation Module Error Classes
 *
 * @module rotation/errors
 */

import { GuardError } from "../errors.js";

/**
 * Rotation schedule file could not be read or written
 */
export class ScheduleStorageError extends GuardError {
  public override readonly cause?: Error;

  constructor(
    public readonly operation: "read" | "write",
    message: string,
    cause?: Error
  ) {
    super(`Rotation schedule ${operation} failed: ${message}`, "SCHEDULE_STORAGE_ERROR", 500);
    this.cause = cause;
  }
}
