/**
 * Strength training entry
 */

import type { BaseEntry } from "./base.js";

/**
 * A logged exercise, e.g. "squat 100 3x5 8"
 */
export interface ExerciseEntry extends BaseEntry {
  readonly type: "exercise";
  /** Exercise name after alias resolution */
  readonly name: string;
  /** Load in kg, null for bodyweight movements */
  readonly weightKg: number | null;
  /** One element per set */
  readonly reps: readonly number[];
  /** Rate of perceived exertion, 1-10 */
  readonly rpe: number | null;
}
