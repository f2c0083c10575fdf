/**
 * Alias table persistence
 *
 * The user's aliases live in a JSON file of category -> { abbrev: canonical }.
 * Until the first alias is added the file does not exist and the bundled
 * defaults are used.
 */

import { readFileSync, writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { AliasTable, parseAliasConfig } from "@healthlog/core";
import defaultAliases from "../data/default-aliases.json" with { type: "json" };

export interface AliasStore {
  load(): AliasTable;
  save(table: AliasTable): void;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * The alias table shipped with the CLI
 */
export function defaultAliasTable(): AliasTable {
  return AliasTable.fromConfig(parseAliasConfig(defaultAliases));
}

/**
 * Load the alias table at `path`, or the defaults when the file is missing
 */
export function loadAliasTable(path: string): AliasTable {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return defaultAliasTable();
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Alias file ${path} is not valid JSON`, { cause: error });
  }

  return AliasTable.fromConfig(parseAliasConfig(data));
}

/**
 * Write the table to `path`, creating its directory if needed
 */
export function saveAliasTable(path: string, table: AliasTable): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(table.toConfig(), null, 2) + "\n");
}

export function createFileAliasStore(path: string): AliasStore {
  return {
    load: () => loadAliasTable(path),
    save: (table) => saveAliasTable(path, table),
  };
}
