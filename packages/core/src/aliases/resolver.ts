/**
 * Holder for the live alias table
 *
 * Readers take the current table by reference; reload swaps in a whole new
 * table, so a reader sees either the old table or the new one.
 */

import type { AliasCategory } from "./table.js";
import { AliasTable } from "./table.js";

export class AliasResolver {
  private table: AliasTable;
  private revision = 0;

  constructor(table: AliasTable = AliasTable.empty()) {
    this.table = table;
  }

  /** The table in effect right now */
  get current(): AliasTable {
    return this.table;
  }

  /** Incremented on every reload */
  get version(): number {
    return this.revision;
  }

  resolve(category: AliasCategory, term: string): string {
    return this.table.resolve(category, term);
  }

  reload(table: AliasTable): void {
    this.table = table;
    this.revision++;
  }
}
