/**
 * Shared state and helpers for the per-type field parsers
 */

import type { AliasTable } from "../aliases/index.js";
import { EntryParseError } from "../errors.js";

/**
 * Everything a field parser needs besides its tokens
 */
export interface ParseContext {
  timestamp: Date;
  tags: readonly string[] | null;
  /** Snapshot of the alias table taken when the parse started */
  aliases: AliasTable;
}

const INTEGER_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^\d+(?:\.\d+)?$/;

function invalidNumber(token: string, label: string): EntryParseError {
  return new EntryParseError("invalid_number", `Invalid ${label}: '${token}'`);
}

/**
 * Read a whole number; digits beyond the safe integer range are rejected
 */
export function parseInteger(token: string, label: string): number {
  const value = INTEGER_PATTERN.test(token) ? parseInt(token, 10) : NaN;
  if (!Number.isSafeInteger(value)) throw invalidNumber(token, label);
  return value;
}

/**
 * Read a plain decimal; a value too large to be finite is rejected
 */
export function parseDecimal(token: string, label: string): number {
  const value = DECIMAL_PATTERN.test(token) ? parseFloat(token) : NaN;
  if (!Number.isFinite(value)) throw invalidNumber(token, label);
  return value;
}
