/**
 * Condition dimensions
 *
 * A dimension is an axis of mutually exclusive qualifiers. Lower priority
 * sorts first in a condition string. Every value belongs to exactly one
 * dimension.
 */

import type { EntryType } from "../models/index.js";
import { CONDITION_ENTRY_TYPES } from "../models/index.js";

export type DimensionName =
  | "activity"
  | "time_of_day"
  | "metabolic"
  | "emotional"
  | "technique";

export interface Dimension {
  name: DimensionName;
  priority: number;
  values: ReadonlySet<string>;
  appliesTo: ReadonlySet<EntryType>;
}

const ALL_CONDITION_TYPES: ReadonlySet<EntryType> = new Set(CONDITION_ENTRY_TYPES);

/**
 * All dimensions in priority order.
 * Technique is temperature-only; the rest apply to every condition entry.
 */
export const DIMENSIONS: readonly Dimension[] = [
  {
    name: "activity",
    priority: 1,
    values: new Set(["waking", "resting", "active", "post-workout"]),
    appliesTo: ALL_CONDITION_TYPES,
  },
  {
    name: "time_of_day",
    priority: 2,
    values: new Set(["morning", "evening"]),
    appliesTo: ALL_CONDITION_TYPES,
  },
  {
    name: "metabolic",
    priority: 3,
    values: new Set(["postprandial", "fasted"]),
    appliesTo: ALL_CONDITION_TYPES,
  },
  {
    name: "emotional",
    priority: 4,
    values: new Set(["stressed", "relaxed"]),
    appliesTo: ALL_CONDITION_TYPES,
  },
  {
    name: "technique",
    priority: 5,
    values: new Set(["oral", "underarm", "forehead_ir", "ear"]),
    appliesTo: new Set<EntryType>(["temp"]),
  },
];

const DIMENSION_BY_NAME = new Map<DimensionName, Dimension>();
const DIMENSION_BY_VALUE = new Map<string, Dimension>();
const PRIORITIES = new Set<number>();

for (const dimension of DIMENSIONS) {
  if (PRIORITIES.has(dimension.priority)) {
    throw new Error(`Duplicate dimension priority ${dimension.priority} (${dimension.name})`);
  }
  PRIORITIES.add(dimension.priority);
  DIMENSION_BY_NAME.set(dimension.name, dimension);
  for (const value of dimension.values) {
    const owner = DIMENSION_BY_VALUE.get(value);
    if (owner) {
      throw new Error(`Condition '${value}' is in both ${owner.name} and ${dimension.name}`);
    }
    DIMENSION_BY_VALUE.set(value, dimension);
  }
}

export function getDimension(name: DimensionName): Dimension | undefined {
  return DIMENSION_BY_NAME.get(name);
}

/**
 * Look up the dimension that owns a condition value
 */
export function dimensionOf(value: string): Dimension | undefined {
  return DIMENSION_BY_VALUE.get(value);
}

export function isConditionValue(value: string): boolean {
  return DIMENSION_BY_VALUE.has(value);
}

/**
 * Dimensions that apply to an entry type, ascending priority
 */
export function getApplicableDimensions(entryType: EntryType): Dimension[] {
  return DIMENSIONS.filter((d) => d.appliesTo.has(entryType)).sort(
    (a, b) => a.priority - b.priority
  );
}

/**
 * All condition values valid for an entry type
 */
export function getApplicableValues(entryType: EntryType): Set<string> {
  const values = new Set<string>();
  for (const dimension of getApplicableDimensions(entryType)) {
    for (const value of dimension.values) values.add(value);
  }
  return values;
}
