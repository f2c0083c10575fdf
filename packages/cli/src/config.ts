/**
 * CLI configuration from the environment
 */

import { homedir } from "os";
import { join } from "path";

export const DEFAULT_ALIASES_PATH = join(homedir(), ".healthlog", "aliases.json");

export interface CliConfig {
  /** JSON file holding the user's alias table */
  aliasesPath: string;
}

/**
 * Read configuration from environment variables (after dotenv has run)
 */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const aliasesPath = env.HEALTHLOG_ALIASES?.trim();
  return {
    aliasesPath: aliasesPath ? aliasesPath : DEFAULT_ALIASES_PATH,
  };
}
