/**
 * ponder tools:docs
 * Prints the system prompt the agent would start with
 */

import { Command } from "commander";
import { composeSystemPrompt } from "../../core/agent/promptComposer";
import { ToolRegistry } from "../../core/tool-engine";
import { EventBus } from "../../core/eventBus";
import { createBuiltinTools } from "../../core/tools";
import { loadConfig } from "../utils/loadConfig";
import { parseToolList } from "./ask";

export function toolsDocsCommand(): Command {
  const cmd = new Command("tools:docs");
  cmd
    .description("Print the system prompt for the configured tools")
    .option("-t, --tools <list>", "comma-separated built-in tools", parseToolList)
    .option("-c, --config <file>", "configuration file")
    .action((opts: { tools?: ReturnType<typeof parseToolList>; config?: string }) => {
      try {
        const config = loadConfig({ file: opts.config });
        const tools = createBuiltinTools(opts.tools ?? config.tools, {
          workDir: config.workDir,
          tavilyApiKey: config.tavilyApiKey,
        });
        const registry = new ToolRegistry(new EventBus(), tools);
        process.stdout.write(composeSystemPrompt(registry.list()));
      } catch (e) {
        console.error("Failed to compose tool docs:", e instanceof Error ? e.message : String(e));
        process.exit(1);
      }
    });
  return cmd;
}
