/**
 * Process-wide logger access
 */

import { EventBus } from "../eventBus";
import { LoggerConfig } from "./config";
import { AgentLogger, LoggerContext } from "./logger";

export { AgentLogger } from "./logger";
export type { LoggerContext } from "./logger";
export * from "./config";
export { formatDuration, redactSensitive } from "./formatters";

let globalLogger: AgentLogger | null = null;

export function initializeLogger(eventBus: EventBus, config: Partial<LoggerConfig> = {}): AgentLogger {
  globalLogger?.dispose();
  globalLogger = new AgentLogger(eventBus, config);
  return globalLogger;
}

export function getLogger(): AgentLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger?.dispose();
  globalLogger = null;
}

export function createContextualLogger(context: LoggerContext): AgentLogger {
  return getLogger().child(context);
}

export const logger = {
  debug: (message: string, context?: LoggerContext) => getLogger().debug(message, context),
  info: (message: string, context?: LoggerContext) => getLogger().info(message, context),
  warn: (message: string, context?: LoggerContext) => getLogger().warn(message, context),
  error: (message: string | Error, context?: LoggerContext) => getLogger().error(message, context),
  fatal: (message: string | Error, context?: LoggerContext) => getLogger().fatal(message, context),

  agent: (agentId: string) => createContextualLogger({ agentId }),
  tool: (toolName: string) => createContextualLogger({ toolName }),
};
