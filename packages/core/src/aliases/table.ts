/**
 * Alias tables
 *
 * Maps user shorthand to canonical terms, per category. Tables are
 * immutable: every edit returns a new table.
 */

import { EntryParseError } from "../errors.js";

export const ALIAS_CATEGORIES = ["exercises", "hrv_metrics", "conditions", "tags"] as const;

export type AliasCategory = (typeof ALIAS_CATEGORIES)[number];

/** abbreviation -> canonical term */
export type AliasMap = ReadonlyMap<string, string>;

/**
 * Plain-object form, as found in an alias config file
 */
export type AliasConfig = Partial<Record<AliasCategory, Record<string, string>>>;

export interface AliasMatch {
  category: AliasCategory;
  abbrev: string;
  canonical: string;
}

const EMPTY_MAP: AliasMap = new Map();

export function isAliasCategory(value: string): value is AliasCategory {
  return ALIAS_CATEGORIES.some((category) => category === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate an untrusted object (e.g. parsed JSON) as an alias config.
 * Categories this version does not know are dropped.
 */
export function parseAliasConfig(data: unknown): AliasConfig {
  if (!isRecord(data)) {
    throw new Error("Alias config must be an object of categories");
  }

  const config: AliasConfig = {};
  for (const category of ALIAS_CATEGORIES) {
    const entries = data[category];
    if (entries === undefined) continue;
    if (!isRecord(entries)) {
      throw new Error(`Alias category '${category}' must be an object`);
    }

    const mapping: Record<string, string> = {};
    for (const [abbrev, canonical] of Object.entries(entries)) {
      if (typeof canonical !== "string") {
        throw new Error(`Alias '${abbrev}' in '${category}' must map to a string`);
      }
      mapping[abbrev] = canonical;
    }
    config[category] = mapping;
  }

  return config;
}

export class AliasTable {
  private readonly maps: ReadonlyMap<AliasCategory, AliasMap>;

  private constructor(maps: ReadonlyMap<AliasCategory, AliasMap>) {
    this.maps = maps;
  }

  static empty(): AliasTable {
    return new AliasTable(new Map());
  }

  /**
   * Build a table from config. Abbreviations are lowercased to match
   * lowercased input.
   */
  static fromConfig(config: AliasConfig): AliasTable {
    const maps = new Map<AliasCategory, AliasMap>();
    for (const category of ALIAS_CATEGORIES) {
      const entries = config[category];
      if (!entries) continue;
      maps.set(
        category,
        new Map(Object.entries(entries).map(([abbrev, canonical]) => [abbrev.toLowerCase(), canonical]))
      );
    }
    return new AliasTable(maps);
  }

  get(category: AliasCategory): AliasMap {
    return this.maps.get(category) ?? EMPTY_MAP;
  }

  /**
   * Canonical term for `term`, or `term` itself when there is no alias
   */
  resolve(category: AliasCategory, term: string): string {
    return this.get(category).get(term) ?? term;
  }

  /**
   * Aliases in one category, sorted by abbreviation
   */
  list(category: AliasCategory): AliasMatch[] {
    return [...this.get(category)]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([abbrev, canonical]) => ({ category, abbrev, canonical }));
  }

  counts(): Record<AliasCategory, number> {
    return {
      exercises: this.get("exercises").size,
      hrv_metrics: this.get("hrv_metrics").size,
      conditions: this.get("conditions").size,
      tags: this.get("tags").size,
    };
  }

  /**
   * Case-insensitive substring search over abbreviations and canonical terms
   */
  search(term: string): AliasMatch[] {
    const needle = term.toLowerCase();
    const results: AliasMatch[] = [];

    for (const category of ALIAS_CATEGORIES) {
      for (const [abbrev, canonical] of this.get(category)) {
        if (abbrev.toLowerCase().includes(needle) || canonical.toLowerCase().includes(needle)) {
          results.push({ category, abbrev, canonical });
        }
      }
    }

    return results;
  }

  withAlias(category: AliasCategory, abbrev: string, canonical: string): AliasTable {
    const key = abbrev.toLowerCase();
    const existing = this.get(category).get(key);
    if (existing !== undefined) {
      throw new EntryParseError(
        "alias_exists",
        `Alias '${key}' already exists → ${existing}\nRemove it first to replace.`
      );
    }
    return this.replace(category, new Map([...this.get(category), [key, canonical]]));
  }

  withoutAlias(category: AliasCategory, abbrev: string): AliasTable {
    const key = abbrev.toLowerCase();
    if (!this.get(category).has(key)) {
      throw new EntryParseError("alias_not_found", `Alias '${key}' not found in ${category}`);
    }
    const next = new Map(this.get(category));
    next.delete(key);
    return this.replace(category, next);
  }

  toConfig(): AliasConfig {
    const config: AliasConfig = {};
    for (const [category, mapping] of this.maps) {
      config[category] = Object.fromEntries(mapping);
    }
    return config;
  }

  private replace(category: AliasCategory, mapping: AliasMap): AliasTable {
    const maps = new Map(this.maps);
    maps.set(category, mapping);
    return new AliasTable(maps);
  }
}
