/**
 * @healthlog/core - Aliases
 */

export {
  ALIAS_CATEGORIES,
  AliasTable,
  isAliasCategory,
  parseAliasConfig,
  type AliasCategory,
  type AliasConfig,
  type AliasMap,
  type AliasMatch,
} from "./table.js";

export { AliasResolver } from "./resolver.js";
