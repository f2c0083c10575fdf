/**
 * Union types and helpers for all parsed entries
 */

import type { ExerciseEntry } from "./exercise.js";
import type {
  HeartRateEntry,
  HrvEntry,
  TemperatureEntry,
  BodyweightEntry,
  ControlPauseEntry,
} from "./metrics.js";

/**
 * All possible parsed entries
 */
export type ParsedEntry =
  | ExerciseEntry
  | HeartRateEntry
  | HrvEntry
  | TemperatureEntry
  | BodyweightEntry
  | ControlPauseEntry;

/**
 * Entry type discriminator
 */
export type EntryType = ParsedEntry["type"];

/**
 * Entries that carry a condition string
 */
export type ConditionEntry = Extract<ParsedEntry, { conditions: string | null }>;

export type ConditionEntryType = ConditionEntry["type"];

/**
 * All entry types as a const array for iteration
 */
export const ENTRY_TYPES = ["exercise", "hr", "hrv", "temp", "weight", "cp"] as const;

export const CONDITION_ENTRY_TYPES = ["hr", "hrv", "temp", "cp"] as const;

const CONDITION_TYPE_SET: ReadonlySet<EntryType> = new Set(CONDITION_ENTRY_TYPES);

/**
 * Get the entry type string used for storage
 */
export function getEntryType(entry: ParsedEntry): EntryType {
  return entry.type;
}

export function isConditionEntryType(type: EntryType): type is ConditionEntryType {
  return CONDITION_TYPE_SET.has(type);
}

/**
 * Exhaustiveness guard for switches over entry types
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled entry: ${JSON.stringify(value)}`);
}
