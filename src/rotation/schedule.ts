/**
 * Rotation Schedule Arithmetic
 *
 * Pure helpers; `now` is injectable so callers and tests agree on time.
 *
 * @module rotation/schedule
 */

import type { RotationSchedule, SecretType } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Create a schedule whose next rotation is `rotationDays` after `lastRotated`
 */
export function createSchedule(
  secretName: string,
  secretType: SecretType,
  rotationDays: number,
  lastRotated: Date = new Date(),
  rotationCount: number = 0
): RotationSchedule {
  return {
    secretName,
    secretType,
    rotationDays,
    lastRotated: lastRotated.toISOString(),
    nextRotation: new Date(lastRotated.getTime() + rotationDays * DAY_MS).toISOString(),
    rotationCount,
  };
}

export function isDueForRotation(schedule: RotationSchedule, now: number = Date.now()): boolean {
  return now >= Date.parse(schedule.nextRotation);
}

/**
 * Whole days left before the schedule is due, never negative
 */
export function daysUntilRotation(schedule: RotationSchedule, now: number = Date.now()): number {
  const remaining = Date.parse(schedule.nextRotation) - now;
  return Math.max(0, Math.floor(remaining / DAY_MS));
}

/**
 * Schedule after a successful rotation at `now`
 */
export function advanceSchedule(
  schedule: RotationSchedule,
  now: number = Date.now()
): RotationSchedule {
  return createSchedule(
    schedule.secretName,
    schedule.secretType,
    schedule.rotationDays,
    new Date(now),
    schedule.rotationCount + 1
  );
}
