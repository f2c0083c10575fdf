/**
 * Structured export form handed to storage
 *
 * Absent values serialize as null, never as a missing key, so a stored
 * record always has the same shape for its type.
 */

interface BaseRecord {
  /** ISO-8601 timestamp */
  timestamp: string;
  tags: string[] | null;
}

export interface ExerciseRecord extends BaseRecord {
  type: "exercise";
  name: string;
  weightKg: number | null;
  reps: number[];
  rpe: number | null;
}

export interface HeartRateRecord extends BaseRecord {
  type: "hr";
  bpm: number;
  conditions: string | null;
}

export interface HrvRecord extends BaseRecord {
  type: "hrv";
  ms: number;
  metric: string;
  conditions: string | null;
}

export interface TemperatureRecord extends BaseRecord {
  type: "temp";
  celsius: number;
  conditions: string | null;
}

export interface BodyweightRecord extends BaseRecord {
  type: "weight";
  kg: number;
  bodyfatPct: number | null;
}

export interface ControlPauseRecord extends BaseRecord {
  type: "cp";
  seconds: number;
  conditions: string | null;
}

export type EntryRecord =
  | ExerciseRecord
  | HeartRateRecord
  | HrvRecord
  | TemperatureRecord
  | BodyweightRecord
  | ControlPauseRecord;
