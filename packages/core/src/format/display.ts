/**
 * Single-line display strings for parsed entries
 */

import type { ParsedEntry } from "../models/index.js";
import { assertNever } from "../models/index.js";
import { formatConditions } from "../conditions/index.js";

function formatTags(tags: readonly string[] | null): string {
  if (!tags || tags.length === 0) return "";
  return " " + tags.map((tag) => `@${tag}`).join(" ");
}

function withConditions(text: string, conditions: string | null): string {
  return conditions ? `${text} ${formatConditions(conditions)}` : text;
}

/**
 * Format an entry the way it is echoed back to the user, e.g.
 * "squat 100kg [5,5,5] RPE 8 @gym" or "HR 58 bpm (resting, postprandial)"
 */
export function formatEntry(entry: ParsedEntry): string {
  switch (entry.type) {
    case "exercise": {
      const weight = entry.weightKg !== null ? `${entry.weightKg}kg` : "(BW)";
      const rpe = entry.rpe !== null ? ` RPE ${entry.rpe}` : "";
      return `${entry.name} ${weight} [${entry.reps.join(",")}]${rpe}${formatTags(entry.tags)}`;
    }
    case "hr":
      return withConditions(`HR ${entry.bpm} bpm`, entry.conditions) + formatTags(entry.tags);
    case "hrv":
      return withConditions(`HRV ${entry.ms}ms (${entry.metric})`, entry.conditions) + formatTags(entry.tags);
    case "temp":
      return withConditions(`Temp ${entry.celsius}°C`, entry.conditions) + formatTags(entry.tags);
    case "weight": {
      const bodyfat = entry.bodyfatPct !== null ? ` (${entry.bodyfatPct}% BF)` : "";
      return `Weight ${entry.kg}kg${bodyfat}${formatTags(entry.tags)}`;
    }
    case "cp":
      return withConditions(`CP ${entry.seconds}s`, entry.conditions) + formatTags(entry.tags);
    default:
      return assertNever(entry);
  }
}
