/**
 * @healthlog/core - Models
 *
 * Type definitions for parsed entries and their stored form
 */

export type { BaseEntry } from "./base.js";

export type { ExerciseEntry } from "./exercise.js";

export type {
  HrvMetric,
  HeartRateEntry,
  HrvEntry,
  TemperatureEntry,
  BodyweightEntry,
  ControlPauseEntry,
} from "./metrics.js";
export { HRV_METRICS, DEFAULT_HRV_METRIC } from "./metrics.js";

export type {
  ParsedEntry,
  EntryType,
  ConditionEntry,
  ConditionEntryType,
} from "./entries.js";
export {
  ENTRY_TYPES,
  CONDITION_ENTRY_TYPES,
  getEntryType,
  isConditionEntryType,
  assertNever,
} from "./entries.js";

export type {
  ExerciseRecord,
  HeartRateRecord,
  HrvRecord,
  TemperatureRecord,
  BodyweightRecord,
  ControlPauseRecord,
  EntryRecord,
} from "./records.js";
