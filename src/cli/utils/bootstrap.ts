/**
 * Wires a loaded configuration into a logger, a transport and an agent
 */

import path from "path";
import { Agent } from "../../core/agent/agentCore";
import { EventBus } from "../../core/eventBus";
import { AgentLogger, initializeLogger } from "../../core/logger";
import { ChatTransport } from "../../core/models/adapter";
import { OllamaTransport } from "../../core/models/ollamaAdapter";
import { OpenAITransport } from "../../core/models/openaiAdapter";
import { BuiltinToolName, createBuiltinTools } from "../../core/tools";
import { PonderConfig } from "./loadConfig";

export interface Runtime {
  eventBus: EventBus;
  logger: AgentLogger;
  config: PonderConfig;
}

export function createRuntime(config: PonderConfig): Runtime {
  const eventBus = new EventBus();
  const logger = initializeLogger(eventBus, {
    level: config.logger.level,
    format: config.logger.format,
    file: config.logger.file ? { enabled: true, path: config.logger.file } : undefined,
    source: "cli",
  });
  return { eventBus, logger, config };
}

export function createTransport({ config, eventBus }: Runtime): ChatTransport {
  switch (config.backend) {
    case "ollama":
      return new OllamaTransport(eventBus, { baseURL: config.ollama.url, numCtx: config.ollama.numCtx });
    case "openai":
      return new OpenAITransport(eventBus, {
        apiKey: config.openai.apiKey ?? "",
        baseURL: config.openai.baseURL,
      });
  }
}

export function createAgent(runtime: Runtime, toolNames: readonly BuiltinToolName[] = runtime.config.tools): Agent {
  const { config, eventBus, logger } = runtime;
  const tools = createBuiltinTools(toolNames, {
    tavilyApiKey: config.tavilyApiKey,
    workDir: path.resolve(config.workDir),
    python: config.python,
    scriptTimeoutMs: config.scriptTimeoutMs,
  });

  return new Agent(
    {
      model: config.model,
      transport: createTransport(runtime),
      tools,
      maxSteps: config.maxSteps,
    },
    eventBus,
    logger.child({ component: "agent" })
  );
}
