/**
 * Value validation for logged metrics
 *
 * The parser only enforces the control pause limit; the other limits are
 * for storage to apply before it accepts an entry.
 */

import type { ParsedEntry } from "../models/index.js";
import { assertNever } from "../models/index.js";

/**
 * Physiological and logging limits
 */
export const VALIDATION = {
  HEART_RATE_MAX: 300,
  TEMPERATURE_MIN: 30,
  TEMPERATURE_MAX: 45,
  BODYWEIGHT_MAX: 500,
  BODYFAT_MAX: 100,
  RPE_MIN: 1,
  RPE_MAX: 10,
  CONTROL_PAUSE_MAX: 600,
  SETS_MAX: 100,
  REPS_MAX: 10000,
} as const;

/**
 * Validate heart rate is within physiological range
 */
export function isValidHeartRate(bpm: number): boolean {
  return Number.isInteger(bpm) && bpm > 0 && bpm < VALIDATION.HEART_RATE_MAX;
}

export function isValidHrv(ms: number): boolean {
  return ms > 0;
}

/**
 * Validate body temperature is within physiological range
 */
export function isValidTemperature(celsius: number): boolean {
  return celsius > VALIDATION.TEMPERATURE_MIN && celsius < VALIDATION.TEMPERATURE_MAX;
}

export function isValidBodyweight(kg: number): boolean {
  return kg > 0 && kg < VALIDATION.BODYWEIGHT_MAX;
}

export function isValidBodyfat(pct: number): boolean {
  return pct > 0 && pct < VALIDATION.BODYFAT_MAX;
}

/**
 * RPE is on a 1-10 scale, inclusive
 */
export function isValidRpe(rpe: number): boolean {
  return rpe >= VALIDATION.RPE_MIN && rpe <= VALIDATION.RPE_MAX;
}

/**
 * Control pause is a whole number of seconds, strictly between 0 and 600
 */
export function isValidControlPause(seconds: number): boolean {
  return Number.isInteger(seconds) && seconds > 0 && seconds < VALIDATION.CONTROL_PAUSE_MAX;
}

/**
 * Reps need 1-100 sets, each a positive whole number no larger than 10000
 */
export function isValidReps(reps: readonly number[]): boolean {
  return (
    reps.length > 0 &&
    reps.length <= VALIDATION.SETS_MAX &&
    reps.every((r) => Number.isInteger(r) && r > 0 && r <= VALIDATION.REPS_MAX)
  );
}

/**
 * List the values of an entry that fall outside plausible limits.
 * An empty list means the entry is within range.
 */
export function checkEntryLimits(entry: ParsedEntry): string[] {
  const problems: string[] = [];

  switch (entry.type) {
    case "exercise":
      if (entry.weightKg !== null && entry.weightKg <= 0) problems.push("weight must be positive");
      if (!isValidReps(entry.reps)) problems.push("reps must be positive whole numbers");
      if (entry.rpe !== null && !isValidRpe(entry.rpe)) problems.push("RPE must be between 1 and 10");
      break;
    case "hr":
      if (!isValidHeartRate(entry.bpm)) {
        problems.push(`heart rate ${entry.bpm} bpm is outside 1-${VALIDATION.HEART_RATE_MAX - 1}`);
      }
      break;
    case "hrv":
      if (!isValidHrv(entry.ms)) problems.push("HRV must be positive");
      break;
    case "temp":
      if (!isValidTemperature(entry.celsius)) {
        problems.push(
          `temperature ${entry.celsius}°C is outside ${VALIDATION.TEMPERATURE_MIN}-${VALIDATION.TEMPERATURE_MAX}`
        );
      }
      break;
    case "weight":
      if (!isValidBodyweight(entry.kg)) problems.push(`bodyweight ${entry.kg}kg is out of range`);
      if (entry.bodyfatPct !== null && !isValidBodyfat(entry.bodyfatPct)) {
        problems.push(`body fat ${entry.bodyfatPct}% is out of range`);
      }
      break;
    case "cp":
      if (!isValidControlPause(entry.seconds)) problems.push("control pause must be 1-599 seconds");
      break;
    default:
      return assertNever(entry);
  }

  return problems;
}
