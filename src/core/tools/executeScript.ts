/**
 * Runs a Python script in a working directory and reports its stdout.
 * Interpreter, directory and timeout are fixed when the tool is built.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import execa from "execa";
import { ToolDef } from "../types";

export const SCRIPT_FILENAME = "temp_script.py";
const FIGURE_MARKER = /^## Figure:\s*(\S+)/;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  /** Why the command failed, when it did; set even if it never started */
  message?: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { cwd: string; timeoutMs: number }
) => Promise<CommandResult>;

export interface ExecuteScriptToolConfig {
  workDir: string;
  python?: string;
  timeoutMs?: number;
  runCommand?: CommandRunner;
}

export const execaRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    reject: false,
  });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? 1,
    timedOut: result.timedOut,
    // reject: false hands back the error itself, e.g. ENOENT for a missing interpreter
    message: result.failed && "shortMessage" in result && typeof result.shortMessage === "string" ? result.shortMessage : undefined,
  };
};

/**
 * Appends the location of a figure the script announced with `## Figure: <name>`.
 */
export function withFigurePath(output: string, workDir: string): string {
  const match = FIGURE_MARKER.exec(output);
  if (!match) return output;
  return `${output}\nFigure file: ${path.resolve(workDir, match[1])}`;
}

export function createExecuteScriptTool(config: ExecuteScriptToolConfig): ToolDef {
  const python = config.python ?? "python3";
  const timeoutMs = config.timeoutMs ?? 60_000;
  const runCommand = config.runCommand ?? execaRunner;

  return {
    name: "execute_script",
    description: [
      "Execute python code and return the result as a string.",
      "You may import any python module, e.g. datetime or pandas.",
      "If the script produces a figure, write it to a PNG file in the current working directory and print its name as the first line of output using the format '## Figure: [name] ##' so it is visible to the user.",
      "",
      "Args:",
      "    script (str): The python script to evaluate",
      "",
      "Returns:",
      "    str: the result of running the script or an error message in case of failure",
    ].join("\n"),
    parameters: {
      type: "object",
      properties: {
        script: { type: "string" },
      },
      required: ["script"],
    },
    run: async (args) => {
      await mkdir(config.workDir, { recursive: true });
      await writeFile(path.join(config.workDir, SCRIPT_FILENAME), String(args.script), "utf8");

      const result = await runCommand(python, [SCRIPT_FILENAME], { cwd: config.workDir, timeoutMs });

      if (result.timedOut) {
        return `Error: Script execution timed out after ${timeoutMs}ms`;
      }
      if (result.exitCode !== 0) {
        const detail = result.stderr.trim() || result.message || "";
        return `Error: Script execution failed\n${detail}`.trimEnd();
      }
      return withFigurePath(result.stdout, config.workDir);
    },
  };
}
