/**
 * Command handlers
 *
 * Each handler returns the text to show instead of printing it, so the
 * one-shot commands and the interactive log session share them.
 */

import {
  ALIAS_CATEGORIES,
  checkEntryLimits,
  formatEntry,
  isAliasCategory,
  isEntryParseError,
  toRecord,
} from "@healthlog/core";
import type { AliasTable, EntryParser } from "@healthlog/core";
import type { AliasStore } from "./alias-store.js";

export interface CommandContext {
  parser: EntryParser;
  store: AliasStore;
}

export interface CommandResult {
  ok: boolean;
  output: string;
  /** Values outside plausible limits; the entry is still accepted */
  warnings?: string[];
}

const ALIAS_HELP = [
  "Alias commands:",
  "  alias <term> - Search aliases",
  "  alias list [category] - List aliases",
  "  alias add <category> <abbrev> <name>",
  "  alias remove <category> <abbrev>",
  "",
  `Categories: ${ALIAS_CATEGORIES.join(", ")}`,
].join("\n");

function success(output: string): CommandResult {
  return { ok: true, output };
}

function failure(output: string): CommandResult {
  return { ok: false, output };
}

function invalidCategory(category: string): CommandResult {
  return failure(`Invalid category '${category}'\nValid: ${ALIAS_CATEGORIES.join(", ")}`);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Entries
// =============================================================================

export interface ParseCommandOptions {
  /** Print the storage record as JSON instead of the display string */
  json?: boolean;
  now?: Date;
}

export function runParseCommand(
  parser: EntryParser,
  text: string,
  options: ParseCommandOptions = {}
): CommandResult {
  try {
    const entry = parser.parse(text, options.now);
    const output = options.json ? JSON.stringify(toRecord(entry), null, 2) : formatEntry(entry);
    const warnings = checkEntryLimits(entry);
    return warnings.length > 0 ? { ok: true, output, warnings } : success(output);
  } catch (error) {
    if (isEntryParseError(error)) {
      return failure(`Parse error: ${error.message}`);
    }
    throw error;
  }
}

// =============================================================================
// Aliases
// =============================================================================

export function searchAliases(table: AliasTable, term: string): CommandResult {
  const matches = table.search(term);
  if (matches.length === 0) {
    return success(`No aliases found for '${term}'`);
  }
  return success(matches.map((m) => `${m.abbrev} → ${m.canonical} (${m.category})`).join("\n"));
}

export function listAliases(table: AliasTable, category: string): CommandResult {
  if (!category) {
    const counts = table.counts();
    const lines = ["Alias categories:"];
    for (const cat of ALIAS_CATEGORIES) {
      lines.push(`  ${cat}: ${counts[cat]} aliases`);
    }
    lines.push("\nUse: alias list <category>");
    return success(lines.join("\n"));
  }

  const name = category.toLowerCase();
  if (!isAliasCategory(name)) {
    return invalidCategory(name);
  }

  const aliases = table.list(name);
  if (aliases.length === 0) {
    return success(`No aliases in '${name}'`);
  }

  const lines = [`${name} aliases:`];
  for (const { abbrev, canonical } of aliases) {
    lines.push(`  ${abbrev} → ${canonical}`);
  }
  lines.push(`\n(${aliases.length} total)`);
  return success(lines.join("\n"));
}

/**
 * Apply a change to the stored table, save it and hand it to the parser
 */
function updateAliases(
  context: CommandContext,
  change: (table: AliasTable) => AliasTable,
  message: string
): CommandResult {
  try {
    const next = change(context.store.load());
    context.store.save(next);
    context.parser.reload(next);
    return success(message);
  } catch (error) {
    if (isEntryParseError(error)) {
      return failure(error.message);
    }
    return failure(`Error: ${errorMessage(error)}`);
  }
}

export function addAlias(context: CommandContext, args: string): CommandResult {
  const parts = args.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length < 3) {
    return failure(
      "Usage: alias add <category> <abbrev> <name>\nExample: alias add exercises bp bench press"
    );
  }

  const category = parts[0].toLowerCase();
  const abbrev = parts[1].toLowerCase();
  const canonical = parts.slice(2).join(" ");

  if (!isAliasCategory(category)) {
    return invalidCategory(category);
  }

  return updateAliases(
    context,
    (table) => table.withAlias(category, abbrev, canonical),
    `✓ Added: ${abbrev} → ${canonical} (${category})`
  );
}

export function removeAlias(context: CommandContext, args: string): CommandResult {
  const parts = args.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length < 2) {
    return failure("Usage: alias remove <category> <abbrev>\nExample: alias remove exercises bp");
  }

  const category = parts[0].toLowerCase();
  const abbrev = parts[1].toLowerCase();

  if (!isAliasCategory(category)) {
    return invalidCategory(category);
  }

  return updateAliases(
    context,
    (table) => table.withoutAlias(category, abbrev),
    `✓ Removed: ${abbrev} (${category})`
  );
}

/**
 * Dispatch the text after "alias": list, add, remove, or a search term
 */
export function runAliasCommand(context: CommandContext, args: string): CommandResult {
  const trimmed = args.trim();
  if (!trimmed) {
    return success(ALIAS_HELP);
  }

  const [subcommand] = trimmed.split(/\s+/);
  const rest = trimmed.slice(subcommand.length);

  switch (subcommand.toLowerCase()) {
    case "list":
      return listAliases(context.parser.aliases.current, rest.trim());
    case "add":
      return addAlias(context, rest);
    case "remove":
      return removeAlias(context, rest);
    default:
      return searchAliases(context.parser.aliases.current, trimmed);
  }
}

// =============================================================================
// Interactive session
// =============================================================================

/**
 * Handle one line typed into the log session. Blank lines yield null.
 */
export function handleLine(context: CommandContext, line: string): CommandResult | null {
  const text = line.trim();
  if (!text) return null;

  const [first] = text.split(/\s+/);
  if (first.toLowerCase() === "alias") {
    return runAliasCommand(context, text.slice(first.length));
  }

  return runParseCommand(context.parser, text);
}
