/**
 * Parse failures
 *
 * Every failure raised by the parser is an EntryParseError; `code`
 * distinguishes the kind. Messages are written for the person who typed
 * the entry and are shown to them as-is.
 */

import type { EntryType } from "./models/index.js";

export type ParseErrorCode =
  | "empty_input"
  | "missing_value"
  | "unparseable_reps"
  | "invalid_number"
  | "invalid_seconds"
  | "invalid_timestamp"
  | "inapplicable_condition"
  | "conflicting_condition"
  | "unknown_condition"
  | "invalid_record"
  | "alias_exists"
  | "alias_not_found";

export class EntryParseError extends Error {
  readonly code: ParseErrorCode;

  constructor(code: ParseErrorCode, message: string) {
    super(message);
    this.name = "EntryParseError";
    this.code = code;
  }
}

/**
 * The mandatory primary value of a metric entry is missing
 */
export class MissingValueError extends EntryParseError {
  readonly entryType: EntryType;

  constructor(entryType: EntryType, message: string) {
    super("missing_value", message);
    this.name = "MissingValueError";
    this.entryType = entryType;
  }
}

/**
 * A known condition value whose dimension does not apply to the entry type
 */
export class InapplicableConditionError extends EntryParseError {
  readonly value: string;
  readonly entryType: EntryType;
  readonly dimension: string;

  constructor(value: string, entryType: EntryType, dimension: string) {
    super(
      "inapplicable_condition",
      `Condition '${value}' (${dimension}) does not apply to ${entryType} entries`
    );
    this.name = "InapplicableConditionError";
    this.value = value;
    this.entryType = entryType;
    this.dimension = dimension;
  }
}

/**
 * Two values from the same dimension on one entry
 */
export class ConditionConflictError extends EntryParseError {
  readonly dimension: string;
  /** [first seen, conflicting] */
  readonly values: readonly [string, string];

  constructor(dimension: string, first: string, second: string) {
    super(
      "conflicting_condition",
      `Cannot specify both '${first}' and '${second}' (${dimension} dimension)`
    );
    this.name = "ConditionConflictError";
    this.dimension = dimension;
    this.values = [first, second];
  }
}

export function isEntryParseError(error: unknown): error is EntryParseError {
  return error instanceof EntryParseError;
}
