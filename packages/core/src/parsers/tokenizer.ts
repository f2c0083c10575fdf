/**
 * Directive extraction
 *
 * Pulls the @timestamp and @tag directives out of raw input before the
 * entry itself is parsed. The timestamp goes first so that "@14:30" or
 * "@yesterday" can never be read as a tag.
 */

import type { AliasMap } from "../aliases/index.js";
import { EntryParseError } from "../errors.js";

export interface ExtractedTimestamp {
  timestamp: Date;
  /** Input with the directive removed */
  text: string;
}

export interface ExtractedTags {
  /** Resolved, deduplicated tags in first-seen order; null when none */
  tags: string[] | null;
  text: string;
}

export interface TokenizedInput {
  timestamp: Date;
  tags: string[] | null;
  tokens: string[];
}

interface TimestampPattern {
  pattern: RegExp;
  toDate: (match: RegExpExecArray, now: Date) => Date;
}

function atTimeOfDay(match: RegExpExecArray, now: Date): Date {
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    throw new EntryParseError("invalid_timestamp", `Invalid time: ${match[0]}`);
  }

  const timestamp = new Date(now);
  timestamp.setHours(hour, minute, 0, 0);
  return timestamp;
}

function startOfYesterday(_match: RegExpExecArray, now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
}

function onDate(match: RegExpExecArray): Date {
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10) - 1;
  const day = parseInt(match[3], 10);

  const timestamp = new Date(year, month, day);
  // Date rolls 2026-02-30 over into March
  if (timestamp.getMonth() !== month || timestamp.getDate() !== day) {
    throw new EntryParseError("invalid_timestamp", `Invalid date: ${match[0]}`);
  }
  return timestamp;
}

// Priority order: first pattern that matches anywhere wins
const TIMESTAMP_PATTERNS: TimestampPattern[] = [
  { pattern: /@(\d{1,2}):(\d{2})/, toDate: atTimeOfDay },
  { pattern: /@yesterday/, toDate: startOfYesterday },
  { pattern: /@(\d{4})-(\d{2})-(\d{2})/, toDate: onDate },
];

// A tag is any @word except the @yesterday directive
const TAG_PATTERN = /@(?!yesterday(?![a-z0-9_-]))([a-z][a-z0-9_-]*)/gi;

/**
 * Extract a single @timestamp directive: @HH:MM, @yesterday or @YYYY-MM-DD.
 * Without one, the timestamp is `now`.
 */
export function extractTimestamp(text: string, now: Date): ExtractedTimestamp {
  for (const { pattern, toDate } of TIMESTAMP_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const timestamp = toDate(match, now);
    const remaining = text.slice(0, match.index) + text.slice(match.index + match[0].length);
    return { timestamp, text: remaining.trim() };
  }

  return { timestamp: new Date(now), text };
}

/**
 * Extract every @tag directive, resolving each through the tag aliases
 */
export function extractTags(text: string, tagAliases?: AliasMap): ExtractedTags {
  const tags = new Set<string>();

  for (const match of text.matchAll(TAG_PATTERN)) {
    const tag = match[1].toLowerCase();
    tags.add(tagAliases?.get(tag) ?? tag);
  }

  const remaining = text.replace(TAG_PATTERN, " ").replace(/\s+/g, " ").trim();
  return { tags: tags.size > 0 ? [...tags] : null, text: remaining };
}

/**
 * Normalize raw input and split it into directives and entry tokens
 */
export function tokenize(raw: string, now: Date, tagAliases?: AliasMap): TokenizedInput {
  const normalized = raw.trim().toLowerCase();

  const { timestamp, text: withoutTimestamp } = extractTimestamp(normalized, now);
  const { tags, text } = extractTags(withoutTimestamp, tagAliases);

  return {
    timestamp,
    tags,
    tokens: text.split(/\s+/).filter((token) => token.length > 0),
  };
}
