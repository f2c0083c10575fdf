/**
 * Condition resolution and validation
 *
 * Turns loose tokens into the canonical condition string: one value per
 * dimension, ordered by dimension priority, comma-joined. The output
 * depends only on the set of values, never on the order they were typed.
 */

import type { EntryType } from "../models/index.js";
import type { AliasMap } from "../aliases/table.js";
import type { Dimension } from "./dimensions.js";
import { dimensionOf } from "./dimensions.js";
import {
  ConditionConflictError,
  EntryParseError,
  InapplicableConditionError,
} from "../errors.js";

function checkApplicable(value: string, dimension: Dimension, entryType: EntryType): void {
  if (!dimension.appliesTo.has(entryType)) {
    throw new InapplicableConditionError(value, entryType, dimension.name);
  }
}

/**
 * Resolve condition tokens for an entry type.
 *
 * Tokens that are not condition values (after alias lookup) are skipped;
 * they may belong to another field. Recognized values are checked and
 * raise on an inapplicable dimension or a second value in a dimension.
 *
 * @returns The condition string, or null when no condition was found
 */
export function resolveConditions(
  tokens: readonly string[],
  entryType: EntryType,
  aliases?: AliasMap
): string | null {
  const found = new Map<Dimension, string>();

  for (const token of tokens) {
    const value = aliases?.get(token) ?? token;

    const dimension = dimensionOf(value);
    if (!dimension) continue;

    checkApplicable(value, dimension, entryType);

    const existing = found.get(dimension);
    if (existing !== undefined) {
      throw new ConditionConflictError(dimension.name, existing, value);
    }

    found.set(dimension, value);
  }

  if (found.size === 0) return null;

  return [...found.entries()]
    .sort(([a], [b]) => a.priority - b.priority)
    .map(([, value]) => value)
    .join(",");
}

/**
 * Re-check a stored condition string against an entry type.
 * Unlike resolution, unknown values are an error here.
 */
export function validateConditions(conditions: string | null, entryType: EntryType): void {
  if (conditions === null) return;

  const seen = new Map<Dimension, string>();

  for (const value of conditions.split(",")) {
    const dimension = dimensionOf(value);
    if (!dimension) {
      throw new EntryParseError("unknown_condition", `Unknown condition: '${value}'`);
    }

    checkApplicable(value, dimension, entryType);

    const existing = seen.get(dimension);
    if (existing !== undefined) {
      throw new ConditionConflictError(dimension.name, existing, value);
    }
    seen.set(dimension, value);
  }
}

/**
 * Format conditions for display: "(resting, postprandial)", or "" when none
 */
export function formatConditions(conditions: string | null): string {
  if (!conditions) return "";
  return `(${conditions.split(",").join(", ")})`;
}
