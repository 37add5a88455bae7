#!/usr/bin/env node
/**
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { askCommand } from "./commands/ask";
import { initCommand } from "./commands/init";
import { modelsCommand } from "./commands/models";
import { toolsListCommand } from "./commands/toolsList";
import { toolsDocsCommand } from "./commands/toolsDocs";

export function createCli(): Command {
  const program = new Command();

  program
    .name("ponder")
    .description("Ponder CLI: ask a tool-using agent, inspect its tools and models")
    .version("0.1.0");

  program.addCommand(initCommand());
  program.addCommand(askCommand());
  program.addCommand(toolsListCommand());
  program.addCommand(toolsDocsCommand());
  program.addCommand(modelsCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      console.error(e instanceof Error ? e.message : String(e));
      process.exit(1);
    });
}
