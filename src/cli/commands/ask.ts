/**
 * ponder ask <question...>
 */

import { Command, InvalidArgumentError } from "commander";
import { isBuiltinToolName, BuiltinToolName } from "../../core/tools";
import { PonderError } from "../../core/errors";
import { loadConfig } from "../utils/loadConfig";
import { createAgent, createRuntime } from "../utils/bootstrap";

interface AskOptions {
  maxSteps?: number;
  backend?: string;
  model?: string;
  tools?: BuiltinToolName[];
  history?: boolean;
  config?: string;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return n;
}

export function parseToolList(value: string): BuiltinToolName[] {
  const names = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  const tools: BuiltinToolName[] = [];
  for (const name of names) {
    if (!isBuiltinToolName(name)) {
      throw new InvalidArgumentError(`unknown tool "${name}"`);
    }
    tools.push(name);
  }
  return tools;
}

export function askCommand(): Command {
  const cmd = new Command("ask");
  cmd
    .description("Ask the agent a question")
    .argument("<question...>", "the question")
    .option("-n, --max-steps <n>", "maximum number of model exchanges", parsePositiveInt)
    .option("-b, --backend <name>", "model backend (ollama|openai)")
    .option("-m, --model <name>", "model name")
    .option("-t, --tools <list>", "comma-separated built-in tools", parseToolList)
    .option("--history", "print the conversation after the answer")
    .option("-c, --config <file>", "configuration file")
    .action(async (words: string[], opts: AskOptions) => {
      try {
        const env = { ...process.env };
        if (opts.backend) env.PONDER_BACKEND = opts.backend;
        const config = loadConfig({ env, file: opts.config });
        if (opts.model) config.model = opts.model;

        const runtime = createRuntime(config);
        const agent = createAgent(runtime, opts.tools ?? config.tools);

        const answer = await agent.task(words.join(" "), opts.maxSteps ?? config.maxSteps);
        console.log(answer);

        if (opts.history) {
          console.log("\n---- History ----\n");
          console.log(agent.messageHistory());
        }
        runtime.logger.flush();
      } catch (e) {
        const code = e instanceof PonderError ? ` [${e.code}]` : "";
        console.error(`❌ Ask failed${code}:`, e instanceof Error ? e.message : String(e));
        process.exit(1);
      }
    });

  return cmd;
}
