/**
 * ponder init
 */

import { Command } from "commander";
import fs from "fs";
import path from "path";
import { promisify } from "util";
import { CONFIG_FILENAME } from "../utils/loadConfig";

const mkdir = promisify(fs.mkdir);
const writeFile = promisify(fs.writeFile);
const exists = (p: string) => fs.existsSync(p);

export const DEFAULT_CONFIG_FILE = {
  backend: "ollama",
  model: "llama3.1",
  maxSteps: 10,
  tools: ["calculator", "date"],
  workDir: "work",
  logger: { level: "info", format: "pretty" },
};

/**
 * Create ponder.config.json and the script working directory under `root`.
 * Returns one line per action taken.
 */
export async function initWorkspace(root: string, force = false): Promise<string[]> {
  const report: string[] = [];
  const configPath = path.join(root, CONFIG_FILENAME);
  const workPath = path.join(root, DEFAULT_CONFIG_FILE.workDir);

  if (!force && exists(configPath)) {
    report.push(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
  } else {
    await writeFile(configPath, JSON.stringify(DEFAULT_CONFIG_FILE, null, 2) + "\n", { encoding: "utf8" });
    report.push(`Created ${CONFIG_FILENAME}`);
  }

  if (!exists(workPath)) {
    await mkdir(workPath, { recursive: true });
    report.push(`Created ${DEFAULT_CONFIG_FILE.workDir}/`);
  } else {
    report.push(`${DEFAULT_CONFIG_FILE.workDir}/ already exists`);
  }

  return report;
}

export function initCommand(): Command {
  const cmd = new Command("init");
  cmd
    .description(`Initialize a workspace (creates ${CONFIG_FILENAME} and the script work directory)`)
    .option("-f, --force", "overwrite existing files")
    .action(async (opts: { force?: boolean }) => {
      try {
        for (const line of await initWorkspace(process.cwd(), opts.force)) {
          console.log(line);
        }
        console.log("Initialization complete.");
      } catch (e) {
        console.error("Failed to initialize workspace:", e instanceof Error ? e.message : String(e));
        process.exit(1);
      }
    });

  return cmd;
}
