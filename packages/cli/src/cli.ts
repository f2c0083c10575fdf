#!/usr/bin/env node
/**
 * Health log CLI
 */

import { program } from "commander";
import { config } from "dotenv";
import { createInterface } from "readline";
import { createEntryParser } from "@healthlog/core";
import { loadCliConfig } from "./config.js";
import { createFileAliasStore } from "./alias-store.js";
import { handleLine, runAliasCommand, runParseCommand } from "./commands.js";
import type { CommandContext, CommandResult } from "./commands.js";

// Load .env before reading configuration
config();

function createContext(): CommandContext {
  const { aliasesPath } = loadCliConfig();
  const store = createFileAliasStore(aliasesPath);

  try {
    return { parser: createEntryParser({ aliases: store.load() }), store };
  } catch (error) {
    console.error(`Failed to load aliases from ${aliasesPath}:`, error);
    process.exit(1);
  }
}

/**
 * Print a result; true when it succeeded
 */
function report(result: CommandResult): boolean {
  if (!result.ok) {
    console.error(result.output);
    return false;
  }

  console.log(result.output);
  for (const warning of result.warnings ?? []) {
    console.error(`Warning: ${warning}`);
  }
  return true;
}

program
  .name("healthlog")
  .description("Parse free-text health and training log entries")
  .version("0.1.0");

program
  .command("parse")
  .description("Parse one entry, e.g. healthlog parse squat 100 3x5 @gym")
  .argument("<text...>", "entry text")
  .option("--json", "print the storage record as JSON")
  .option("--at <iso>", "reference time for the entry (default: now)")
  .action((words: string[], options: { json?: boolean; at?: string }) => {
    let now: Date | undefined;
    if (options.at) {
      now = new Date(options.at);
      if (Number.isNaN(now.getTime())) {
        console.error(`Invalid --at time: ${options.at}`);
        process.exit(1);
      }
    }

    const { parser } = createContext();
    const ok = report(runParseCommand(parser, words.join(" "), { json: options.json, now }));
    if (!ok) {
      process.exit(1);
    }
  });

program
  .command("alias")
  .description("Search or manage aliases (alias list|add|remove|<term>)")
  .argument("[args...]", "subcommand and its arguments")
  .action((args: string[]) => {
    const ok = report(runAliasCommand(createContext(), args.join(" ")));
    if (!ok) {
      process.exit(1);
    }
  });

// Interactive session: one entry or alias command per line
program
  .command("log")
  .description("Read entries line by line until end of input")
  .action(() => {
    const context = createContext();
    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: "> ",
    });

    rl.prompt();
    rl.on("line", (line) => {
      try {
        const result = handleLine(context, line);
        if (result) {
          report(result);
        }
      } catch (error) {
        console.error("Error:", error);
      }
      rl.prompt();
    });
    rl.on("close", () => {
      console.log();
    });
  });

program.parse();
