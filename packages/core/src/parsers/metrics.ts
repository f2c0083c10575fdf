/**
 * Health metric parsers
 *
 * Each metric is "keyword value [extras...]". The value is mandatory; the
 * extras are conditions (hr, hrv, temp, cp), an hrv metric subtype, or a
 * body fat percentage.
 */

import type {
  HeartRateEntry,
  HrvEntry,
  HrvMetric,
  TemperatureEntry,
  BodyweightEntry,
  ControlPauseEntry,
} from "../models/index.js";
import { DEFAULT_HRV_METRIC, HRV_METRICS } from "../models/index.js";
import { resolveConditions } from "../conditions/index.js";
import { EntryParseError, MissingValueError } from "../errors.js";
import type { ParseContext } from "./context.js";
import { parseDecimal, parseInteger } from "./context.js";
import { isValidControlPause, VALIDATION } from "./validation.js";

const SECONDS_PATTERN = /^(\d+)s?$/;
const BODYFAT_PATTERN = /^(\d+(?:\.\d+)?)%?$/;

function isHrvMetric(value: string): value is HrvMetric {
  return HRV_METRICS.some((metric) => metric === value);
}

export function parseHeartRate(tokens: readonly string[], context: ParseContext): HeartRateEntry {
  if (tokens.length === 0) {
    throw new MissingValueError("hr", "Heart rate needs BPM value");
  }

  const [value, ...rest] = tokens;

  return {
    type: "hr",
    bpm: parseInteger(value, "BPM value"),
    conditions: resolveConditions(rest, "hr", context.aliases.get("conditions")),
    timestamp: context.timestamp,
    tags: context.tags,
  };
}

export function parseHrv(tokens: readonly string[], context: ParseContext): HrvEntry {
  if (tokens.length === 0) {
    throw new MissingValueError("hrv", "HRV needs milliseconds value");
  }

  const [value, ...rest] = tokens;
  const ms = parseDecimal(value, "milliseconds value");

  let metric: HrvMetric = DEFAULT_HRV_METRIC;
  const conditionTokens: string[] = [];

  for (const token of rest) {
    const resolved = context.aliases.resolve("hrv_metrics", token);
    if (isHrvMetric(resolved)) {
      metric = resolved;
    } else {
      conditionTokens.push(token);
    }
  }

  return {
    type: "hrv",
    ms,
    metric,
    conditions: resolveConditions(conditionTokens, "hrv", context.aliases.get("conditions")),
    timestamp: context.timestamp,
    tags: context.tags,
  };
}

export function parseTemperature(tokens: readonly string[], context: ParseContext): TemperatureEntry {
  if (tokens.length === 0) {
    throw new MissingValueError("temp", "Temperature needs Celsius value");
  }

  const [value, ...rest] = tokens;

  return {
    type: "temp",
    celsius: parseDecimal(value, "Celsius value"),
    conditions: resolveConditions(rest, "temp", context.aliases.get("conditions")),
    timestamp: context.timestamp,
    tags: context.tags,
  };
}

export function parseBodyweight(tokens: readonly string[], context: ParseContext): BodyweightEntry {
  if (tokens.length === 0) {
    throw new MissingValueError("weight", "Bodyweight needs kg value");
  }

  const [value] = tokens;

  // "18" and "18%" both mean 18% body fat; anything else is ignored
  const bodyfatMatch = tokens.length > 1 ? BODYFAT_PATTERN.exec(tokens[1]) : null;

  return {
    type: "weight",
    kg: parseDecimal(value, "kg value"),
    bodyfatPct: bodyfatMatch ? parseDecimal(bodyfatMatch[1], "body fat") : null,
    timestamp: context.timestamp,
    tags: context.tags,
  };
}

export function parseControlPause(tokens: readonly string[], context: ParseContext): ControlPauseEntry {
  if (tokens.length === 0) {
    throw new MissingValueError("cp", "Control pause needs seconds value");
  }

  const [value, ...rest] = tokens;

  const secondsMatch = SECONDS_PATTERN.exec(value);
  if (!secondsMatch) {
    throw new EntryParseError("invalid_seconds", `Invalid seconds value: ${value}`);
  }

  const seconds = parseInt(secondsMatch[1], 10);
  if (!isValidControlPause(seconds)) {
    throw new EntryParseError(
      "invalid_seconds",
      `Seconds must be between 1 and ${VALIDATION.CONTROL_PAUSE_MAX - 1}`
    );
  }

  return {
    type: "cp",
    seconds,
    conditions: resolveConditions(rest, "cp", context.aliases.get("conditions")),
    timestamp: context.timestamp,
    tags: context.tags,
  };
}
