/**
 * Exercise parser
 *
 * Grammar: name [weight[kg]] reps [[rpe]N]
 *
 * Weight and reps are both bare numbers, so a single left-to-right scan
 * with one token of lookahead decides between them:
 *   - a number followed by a reps pattern is the weight ("squat 100 3x5")
 *   - otherwise a number that is itself a reps pattern is the reps
 *     ("squat 100" is 100 reps, not 100 kg)
 *   - anything else number-shaped ("42.5", "100kg") is the weight
 * RPE is only looked for once reps are filled. An RPE outside 1-10 is
 * dropped without error.
 */

import type { ExerciseEntry } from "../models/index.js";
import { EntryParseError } from "../errors.js";
import type { ParseContext } from "./context.js";
import { parseDecimal } from "./context.js";
import { isValidReps, isValidRpe, VALIDATION } from "./validation.js";

const WEIGHT_PATTERN = /^(\d+(?:\.\d+)?)(kg)?$/;
const REPS_PATTERN = /^(\d+x\d+|\d+(,\d+)*)$/;
const SETS_X_REPS_PATTERN = /^(\d+)x(\d+)$/;
const RPE_PATTERN = /^(?:rpe)?(\d+(?:\.\d+)?)$/;

export function isRepsPattern(token: string): boolean {
  return REPS_PATTERN.test(token);
}

function checkRepsLimits(sets: number, reps: readonly number[]): void {
  if (sets > VALIDATION.SETS_MAX) {
    throw new EntryParseError("unparseable_reps", `Too many sets: ${sets} (max ${VALIDATION.SETS_MAX})`);
  }
  if (reps.some((r) => r > VALIDATION.REPS_MAX)) {
    throw new EntryParseError("unparseable_reps", `Too many reps in a set (max ${VALIDATION.REPS_MAX})`);
  }
}

/**
 * Expand reps notation into one element per set:
 * "3x5" -> [5, 5, 5], "8,6,4" -> [8, 6, 4], "10" -> [10]
 *
 * Fails with unparseable_reps above 100 sets or 10000 reps per set.
 */
export function parseReps(token: string): number[] {
  const setsMatch = SETS_X_REPS_PATTERN.exec(token);
  if (setsMatch) {
    const sets = parseInt(setsMatch[1], 10);
    const reps = parseInt(setsMatch[2], 10);
    checkRepsLimits(sets, [reps]);
    return Array.from({ length: sets }, () => reps);
  }

  const reps = token.split(",").map((part) => parseInt(part, 10));
  checkRepsLimits(reps.length, reps);
  return reps;
}

export function parseExercise(tokens: readonly string[], context: ParseContext): ExerciseEntry {
  if (tokens.length < 2) {
    throw new EntryParseError("unparseable_reps", "Exercise needs at least name and reps");
  }

  const [rawName, ...rest] = tokens;
  const name = context.aliases.resolve("exercises", rawName);

  let weightKg: number | null = null;
  let reps: number[] | null = null;
  let rpe: number | null = null;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];

    if (weightKg === null && reps === null) {
      const weightMatch = WEIGHT_PATTERN.exec(token);
      if (weightMatch) {
        const hasRepsNext = i + 1 < rest.length && isRepsPattern(rest[i + 1]);
        if (!hasRepsNext && isRepsPattern(token)) {
          reps = parseReps(token);
        } else {
          weightKg = parseDecimal(weightMatch[1], "weight");
        }
        continue;
      }
    }

    if (reps === null) {
      if (isRepsPattern(token)) reps = parseReps(token);
      continue;
    }

    if (rpe === null) {
      const rpeMatch = RPE_PATTERN.exec(token);
      if (!rpeMatch) continue;

      const value = parseFloat(rpeMatch[1]);
      if (isValidRpe(value)) rpe = value;
    }
  }

  if (reps === null) {
    throw new EntryParseError("unparseable_reps", "Could not parse reps");
  }
  if (!isValidReps(reps)) {
    throw new EntryParseError("unparseable_reps", `Reps must be positive: ${reps.join(",")}`);
  }

  return {
    type: "exercise",
    name,
    weightKg,
    reps,
    rpe,
    timestamp: context.timestamp,
    tags: context.tags,
  };
}
