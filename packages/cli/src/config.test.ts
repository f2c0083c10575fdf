import { describe, it, expect } from "vitest";
import { homedir } from "os";
import { join } from "path";
import { DEFAULT_ALIASES_PATH, loadCliConfig } from "./config.js";

describe("loadCliConfig", () => {
  it("defaults the alias file to the home directory", () => {
    expect(DEFAULT_ALIASES_PATH).toBe(join(homedir(), ".healthlog", "aliases.json"));
    expect(loadCliConfig({})).toEqual({ aliasesPath: DEFAULT_ALIASES_PATH });
  });

  it("reads HEALTHLOG_ALIASES", () => {
    expect(loadCliConfig({ HEALTHLOG_ALIASES: "/data/aliases.json" }).aliasesPath).toBe(
      "/data/aliases.json"
    );
  });

  it("ignores a blank HEALTHLOG_ALIASES", () => {
    expect(loadCliConfig({ HEALTHLOG_ALIASES: "  " }).aliasesPath).toBe(DEFAULT_ALIASES_PATH);
  });
});
