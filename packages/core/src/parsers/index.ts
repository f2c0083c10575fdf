/**
 * @healthlog/core - Parsers
 *
 * Free-text entry parsing
 */

// Entry point
export {
  parseEntry,
  createEntryParser,
  METRIC_KEYWORDS,
  type ParseOptions,
  type EntryParser,
  type EntryParserOptions,
} from "./entry.js";

// Directive extraction
export {
  tokenize,
  extractTimestamp,
  extractTags,
  type TokenizedInput,
  type ExtractedTimestamp,
  type ExtractedTags,
} from "./tokenizer.js";

// Field parsers (for callers that dispatch themselves)
export { parseExercise, parseReps, isRepsPattern } from "./exercise.js";
export {
  parseHeartRate,
  parseHrv,
  parseTemperature,
  parseBodyweight,
  parseControlPause,
} from "./metrics.js";
export type { ParseContext } from "./context.js";

// Validation utilities
export {
  VALIDATION,
  isValidHeartRate,
  isValidHrv,
  isValidTemperature,
  isValidBodyweight,
  isValidBodyfat,
  isValidRpe,
  isValidControlPause,
  isValidReps,
  checkEntryLimits,
} from "./validation.js";
