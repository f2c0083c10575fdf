/**
 * Entry parser
 *
 * The first token after directive extraction picks the entry type; any
 * word that is not a metric keyword starts an exercise.
 */

import type { EntryType, ParsedEntry } from "../models/index.js";
import { AliasResolver, AliasTable } from "../aliases/index.js";
import { EntryParseError } from "../errors.js";
import type { ParseContext } from "./context.js";
import { tokenize } from "./tokenizer.js";
import { parseExercise } from "./exercise.js";
import {
  parseHeartRate,
  parseHrv,
  parseTemperature,
  parseBodyweight,
  parseControlPause,
} from "./metrics.js";

type MetricType = Exclude<EntryType, "exercise">;

/**
 * Keywords (and synonyms) that select a metric entry
 */
export const METRIC_KEYWORDS: ReadonlyMap<string, MetricType> = new Map<string, MetricType>([
  ["hr", "hr"],
  ["hrv", "hrv"],
  ["temp", "temp"],
  ["weight", "weight"],
  ["bw", "weight"],
  ["cp", "cp"],
  ["pause", "cp"],
]);

export interface ParseOptions {
  /** Alias table to resolve against (default: no aliases) */
  aliases?: AliasTable;
  /** Reference time for the timestamp and @directives (default: now) */
  now?: Date;
}

/**
 * Parse one line of input into a typed entry
 *
 * @example
 * ```typescript
 * parseEntry("squat 100 3x5 @gym");
 * // { type: "exercise", name: "squat", weightKg: 100, reps: [5, 5, 5], rpe: null, tags: ["gym"], ... }
 * ```
 */
export function parseEntry(text: string, options: ParseOptions = {}): ParsedEntry {
  const aliases = options.aliases ?? AliasTable.empty();
  const { timestamp, tags, tokens } = tokenize(text, options.now ?? new Date(), aliases.get("tags"));

  if (tokens.length === 0) {
    throw new EntryParseError("empty_input", "Empty input");
  }

  const context: ParseContext = { timestamp, tags, aliases };
  const [first, ...rest] = tokens;
  const metric = METRIC_KEYWORDS.get(first);

  switch (metric) {
    case "hr":
      return parseHeartRate(rest, context);
    case "hrv":
      return parseHrv(rest, context);
    case "temp":
      return parseTemperature(rest, context);
    case "weight":
      return parseBodyweight(rest, context);
    case "cp":
      return parseControlPause(rest, context);
    case undefined:
      return parseExercise(tokens, context);
  }
}

export interface EntryParser {
  parse(text: string, now?: Date): ParsedEntry;
  /** Swap in a new alias table; parses already running keep the old one */
  reload(table: AliasTable): void;
  readonly aliases: AliasResolver;
}

export interface EntryParserOptions {
  aliases?: AliasTable;
}

/**
 * Create a parser bound to a reloadable alias table
 */
export function createEntryParser(options: EntryParserOptions = {}): EntryParser {
  const resolver = new AliasResolver(options.aliases);

  return {
    parse: (text, now) => parseEntry(text, { aliases: resolver.current, now }),
    reload: (table) => resolver.reload(table),
    aliases: resolver,
  };
}
