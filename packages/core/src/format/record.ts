/**
 * Conversion between parsed entries and their stored record form
 */

import type { EntryRecord, EntryType, HrvMetric, ParsedEntry } from "../models/index.js";
import { assertNever, HRV_METRICS } from "../models/index.js";
import { validateConditions } from "../conditions/index.js";
import { EntryParseError } from "../errors.js";
import { isValidReps } from "../parsers/validation.js";

/**
 * Export an entry for storage. Absent values become null.
 */
export function toRecord(entry: ParsedEntry): EntryRecord {
  const timestamp = entry.timestamp.toISOString();
  const tags = entry.tags ? [...entry.tags] : null;

  switch (entry.type) {
    case "exercise":
      return {
        type: "exercise",
        name: entry.name,
        weightKg: entry.weightKg,
        reps: [...entry.reps],
        rpe: entry.rpe,
        timestamp,
        tags,
      };
    case "hr":
      return { type: "hr", bpm: entry.bpm, conditions: entry.conditions, timestamp, tags };
    case "hrv":
      return {
        type: "hrv",
        ms: entry.ms,
        metric: entry.metric,
        conditions: entry.conditions,
        timestamp,
        tags,
      };
    case "temp":
      return { type: "temp", celsius: entry.celsius, conditions: entry.conditions, timestamp, tags };
    case "weight":
      return { type: "weight", kg: entry.kg, bodyfatPct: entry.bodyfatPct, timestamp, tags };
    case "cp":
      return { type: "cp", seconds: entry.seconds, conditions: entry.conditions, timestamp, tags };
    default:
      return assertNever(entry);
  }
}

// =============================================================================
// Record validation
// =============================================================================

type Fields = Record<string, unknown>;

function invalid(message: string): EntryParseError {
  return new EntryParseError("invalid_record", `Invalid record: ${message}`);
}

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireNumber(fields: Fields, key: string): number {
  const value = fields[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalid(`${key} must be a number`);
  }
  return value;
}

function nullableNumber(fields: Fields, key: string): number | null {
  return fields[key] === null ? null : requireNumber(fields, key);
}

function requireString(fields: Fields, key: string): string {
  const value = fields[key];
  if (typeof value !== "string" || value === "") {
    throw invalid(`${key} must be a non-empty string`);
  }
  return value;
}

function nullableString(fields: Fields, key: string): string | null {
  return fields[key] === null ? null : requireString(fields, key);
}

function readTags(fields: Fields): string[] | null {
  const value = fields.tags;
  if (value === null) return null;
  if (!Array.isArray(value)) throw invalid("tags must be an array or null");

  const tags: string[] = [];
  for (const tag of value) {
    if (typeof tag !== "string" || tag === "") throw invalid("tags must be strings");
    tags.push(tag);
  }
  return tags.length > 0 ? tags : null;
}

function readTimestamp(fields: Fields): Date {
  const timestamp = new Date(requireString(fields, "timestamp"));
  if (Number.isNaN(timestamp.getTime())) throw invalid("timestamp is not a date");
  return timestamp;
}

function readReps(fields: Fields): number[] {
  const value = fields.reps;
  if (!Array.isArray(value)) throw invalid("reps must be an array");

  const reps: number[] = [];
  for (const set of value) {
    if (typeof set !== "number") throw invalid("reps must be numbers");
    reps.push(set);
  }
  if (!isValidReps(reps)) throw invalid("reps must be positive whole numbers");
  return reps;
}

function readConditions(fields: Fields, entryType: EntryType): string | null {
  const conditions = nullableString(fields, "conditions");
  validateConditions(conditions, entryType);
  return conditions;
}

function readMetric(fields: Fields): HrvMetric {
  const metric = requireString(fields, "metric");
  const known = HRV_METRICS.find((m) => m === metric);
  if (!known) throw invalid(`unknown hrv metric '${metric}'`);
  return known;
}

/**
 * Rebuild an entry from a stored record. The condition string is checked
 * again, so a record that was edited by hand cannot bring in a conflict.
 */
export function fromRecord(data: unknown): ParsedEntry {
  if (!isFields(data)) throw invalid("expected an object");

  const timestamp = readTimestamp(data);
  const tags = readTags(data);
  const type = data.type;

  switch (type) {
    case "exercise":
      return {
        type: "exercise",
        name: requireString(data, "name"),
        weightKg: nullableNumber(data, "weightKg"),
        reps: readReps(data),
        rpe: nullableNumber(data, "rpe"),
        timestamp,
        tags,
      };
    case "hr":
      return { type: "hr", bpm: requireNumber(data, "bpm"), conditions: readConditions(data, "hr"), timestamp, tags };
    case "hrv":
      return {
        type: "hrv",
        ms: requireNumber(data, "ms"),
        metric: readMetric(data),
        conditions: readConditions(data, "hrv"),
        timestamp,
        tags,
      };
    case "temp":
      return {
        type: "temp",
        celsius: requireNumber(data, "celsius"),
        conditions: readConditions(data, "temp"),
        timestamp,
        tags,
      };
    case "weight":
      return {
        type: "weight",
        kg: requireNumber(data, "kg"),
        bodyfatPct: nullableNumber(data, "bodyfatPct"),
        timestamp,
        tags,
      };
    case "cp":
      return {
        type: "cp",
        seconds: requireNumber(data, "seconds"),
        conditions: readConditions(data, "cp"),
        timestamp,
        tags,
      };
    default:
      throw invalid(`unknown type ${JSON.stringify(type)}`);
  }
}
