/**
 * Secret Rotation Module
 *
 * @module rotation
 */

export type {
  SecretType,
  RotationSchedule,
  RotationHandler,
  CandidateValidation,
  RotationHistoryRecord,
  RotationOutcome,
  RotationResult,
  RotationStatus,
  RotationScheduleFile,
  RotationConfig,
} from "./types.js";
export {
  createSchedule,
  isDueForRotation,
  daysUntilRotation,
  advanceSchedule,
} from "./schedule.js";
export {
  DatabasePasswordHandler,
  ApiKeyHandler,
  JwtSecretHandler,
  createDefaultHandlers,
} from "./handlers.js";
export { ScheduleStorageError } from "./errors.js";
export { FileRotationScheduleStore, MAX_ROTATION_HISTORY } from "./schedule-store.js";
export type { RotationScheduleStore } from "./schedule-store.js";
export { SecretRotationManager } from "./rotation-manager.js";
export { RotationScheduler } from "./rotation-scheduler.js";
