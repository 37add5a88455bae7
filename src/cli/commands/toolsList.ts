/**
 * ponder tools:list
 */

import { Command } from "commander";
import { ToolRegistry } from "../../core/tool-engine";
import { EventBus } from "../../core/eventBus";
import { BUILTIN_TOOL_NAMES, createBuiltinTools } from "../../core/tools";
import { ToolDef } from "../../core/types";
import { printTable } from "../utils/printTable";
import { loadConfig } from "../utils/loadConfig";

/**
 * First line of the tool's documentation
 */
export function summarize(tool: ToolDef): string {
  return tool.description.trim().split("\n")[0] ?? "";
}

function inputNames(tool: ToolDef): string {
  const properties = tool.parameters?.properties;
  if (typeof properties !== "object" || properties === null) return "";
  return Object.keys(properties).join(", ");
}

export function toolRows(tools: readonly ToolDef[], enabled: readonly string[]): string[][] {
  return tools.map((tool) => [
    tool.name,
    inputNames(tool) || "-",
    enabled.includes(tool.name) ? "yes" : "no",
    summarize(tool),
  ]);
}

export function toolsListCommand(): Command {
  const cmd = new Command("tools:list");
  cmd
    .description("List the available tools")
    .option("-c, --config <file>", "configuration file")
    .action((opts: { config?: string }) => {
      try {
        const config = loadConfig({ file: opts.config });
        const registry = new ToolRegistry(
          new EventBus(),
          createBuiltinTools(BUILTIN_TOOL_NAMES, { workDir: config.workDir, tavilyApiKey: config.tavilyApiKey })
        );
        // answer is always on
        const enabled = ["answer", ...config.tools];
        printTable(["NAME", "INPUT", "ENABLED", "DESCRIPTION"], toolRows(registry.list(), enabled));
      } catch (e) {
        console.error("Failed to list tools:", e instanceof Error ? e.message : String(e));
        process.exit(1);
      }
    });
  return cmd;
}
