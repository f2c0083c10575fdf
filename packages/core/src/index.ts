/**
 * @healthlog/core
 *
 * Parses free-text health and training log lines into typed entries
 *
 * @example
 * ```typescript
 * import { AliasTable, createEntryParser, formatEntry, toRecord } from "@healthlog/core";
 *
 * const parser = createEntryParser({ aliases: AliasTable.fromConfig({ exercises: { sq: "squat" } }) });
 * const entry = parser.parse("sq 100 3x5 @gym");
 * formatEntry(entry); // "squat 100kg [5,5,5] @gym"
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Errors
export * from "./errors.js";

// Conditions - Dimension catalog and resolution
export * from "./conditions/index.js";

// Aliases - Shorthand tables
export * from "./aliases/index.js";

// Parsers - Text to entry
export * from "./parsers/index.js";

// Formatting - Display strings and stored records
export * from "./format/index.js";
