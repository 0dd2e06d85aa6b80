/**
 * Secret Rotation Types
 *
 * @module rotation/types
 */

/**
 * Kinds of rotatable secrets
 */
export type SecretType = "database_password" | "api_key" | "jwt_secret";

/**
 * Rotation schedule for one secret
 *
 * Invariant: `nextRotation` is always `lastRotated + rotationDays`.
 */
export interface RotationSchedule {
  secretName: string;
  secretType: SecretType;
  rotationDays: number;
  /** ISO 8601 */
  lastRotated: string;
  /** ISO 8601 */
  nextRotation: string;
  rotationCount: number;
}

/**
 * Candidate check result
 */
export interface CandidateValidation {
  valid: boolean;
  reason?: string;
}

/**
 * Per-secret rotation strategy
 *
 * `apply` throws when the new value cannot be put in place; the manager
 * then records a failure and leaves the schedule untouched.
 */
export interface RotationHandler {
  readonly secretName: string;
  readonly secretType: SecretType;

  /** Produce a new candidate value */
  generate(): string;

  /** Check a candidate before it is applied */
  validate(candidate: string): CandidateValidation;

  /** Put the candidate in place */
  apply(candidate: string): Promise<void>;

  /** Current value, captured (as a hash) before rotation */
  backupCurrent(): Promise<string | undefined>;
}

/**
 * One rotation attempt, successful or not
 */
export interface RotationHistoryRecord {
  secretName: string;
  /** ISO 8601 */
  timestamp: string;
  success: boolean;
  /** SHA-256 of the replaced value, never the value itself */
  oldSecretHash?: string;
  error?: string;
}

/**
 * Outcome of `rotate`
 */
export type RotationOutcome = "rotated" | "not_due" | "failed" | "unknown_secret";

export interface RotationResult {
  secretName: string;
  outcome: RotationOutcome;
  /** Schedule after the attempt */
  schedule?: RotationSchedule;
  error?: string;
}

/**
 * Status line for one schedule
 */
export interface RotationStatus {
  secretName: string;
  secretType: SecretType;
  rotationDays: number;
  lastRotated: string;
  nextRotation: string;
  daysUntilRotation: number;
  dueForRotation: boolean;
  rotationCount: number;
}

/**
 * Persisted schedule file layout
 */
export interface RotationScheduleFile {
  version: "1.0";
  schedules: Record<string, RotationSchedule>;
  history: RotationHistoryRecord[];
}

/**
 * Rotation configuration
 */
export interface RotationConfig {
  /** Whether the scheduled check runs */
  enabled: boolean;

  /** Hours between scheduled due-checks */
  checkIntervalHours: number;

  /** Default rotation interval in days per secret type */
  intervalDays: Record<SecretType, number>;
}
