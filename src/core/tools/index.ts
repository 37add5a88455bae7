/**
 * Built-in tools
 */

import { ToolDef } from "../types";
import { calculatorTool } from "./calculator";
import { createDateTool } from "./date";
import { createExecuteScriptTool } from "./executeScript";
import { createWebSearchTool } from "./webSearch";

export { answerTool, TERMINAL_TOOL_NAME } from "./answer";
export { calculatorTool, evaluateExpression, INVALID_EXPRESSION } from "./calculator";
export { createDateTool, formatLocalMinute } from "./date";
export { createWebSearchTool, MISSING_KEY_MESSAGE, TAVILY_SEARCH_URL } from "./webSearch";
export type { WebSearchToolConfig } from "./webSearch";
export { createExecuteScriptTool, execaRunner, withFigurePath, SCRIPT_FILENAME } from "./executeScript";
export type { CommandRunner, CommandResult, ExecuteScriptToolConfig } from "./executeScript";

export const BUILTIN_TOOL_NAMES = ["calculator", "date", "web_search", "execute_script"] as const;
export type BuiltinToolName = (typeof BUILTIN_TOOL_NAMES)[number];

export interface BuiltinToolsConfig {
  tavilyApiKey?: string;
  workDir: string;
  python?: string;
  scriptTimeoutMs?: number;
}

/**
 * Build the named built-in tools, in the order given. `answer` is not listed
 * here; the registry always adds it.
 */
export function createBuiltinTools(names: readonly BuiltinToolName[], config: BuiltinToolsConfig): ToolDef[] {
  return names.map((name) => {
    switch (name) {
      case "calculator":
        return calculatorTool;
      case "date":
        return createDateTool();
      case "web_search":
        return createWebSearchTool({ apiKey: config.tavilyApiKey });
      case "execute_script":
        return createExecuteScriptTool({
          workDir: config.workDir,
          python: config.python,
          timeoutMs: config.scriptTimeoutMs,
        });
    }
  });
}

export function isBuiltinToolName(name: string): name is BuiltinToolName {
  return (BUILTIN_TOOL_NAMES as readonly string[]).includes(name);
}
