/**
 * ponder models
 * Lists the models served by the configured Ollama instance
 */

import { Command } from "commander";
import { EventBus } from "../../core/eventBus";
import { OllamaTransport } from "../../core/models/ollamaAdapter";
import { loadConfig } from "../utils/loadConfig";

export function modelsCommand(): Command {
  const cmd = new Command("models");
  cmd
    .description("List available Ollama models")
    .option("-c, --config <file>", "configuration file")
    .action(async (opts: { config?: string }) => {
      try {
        const config = loadConfig({ file: opts.config });
        const transport = new OllamaTransport(new EventBus(), { baseURL: config.ollama.url });
        const models = await transport.listModels();

        if (models.length === 0) {
          console.log("No models found. Pull a model with: ollama pull <model-name>");
          return;
        }

        console.log(`\n📦 Available models (${models.length}):\n`);
        models.forEach((name, index) => {
          const marker = name === config.model || name.startsWith(`${config.model}:`) ? " (configured)" : "";
          console.log(`${index + 1}. ${name}${marker}`);
        });
      } catch (e) {
        console.error("❌ Error:", e instanceof Error ? e.message : String(e));
        console.error("   Is Ollama running? Start it with: ollama serve");
        process.exit(1);
      }
    });
  return cmd;
}
