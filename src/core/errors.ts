/**
 * Custom error types for Ponder
 */

export class PonderError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PonderError";
    Object.setPrototypeOf(this, PonderError.prototype);
  }
}

export class ToolRegistrationError extends PonderError {
  constructor(toolName: string, reason: string) {
    super(
      `Cannot register tool ${toolName}: ${reason}`,
      "TOOL_REGISTRATION_ERROR",
      400,
      { toolName, reason }
    );
    this.name = "ToolRegistrationError";
    Object.setPrototypeOf(this, ToolRegistrationError.prototype);
  }
}

/**
 * The model backend could not be reached or kept failing. The agent loop has no
 * way around this, so it is the one error `Agent.task` lets through.
 */
export class TransportError extends PonderError {
  constructor(
    message: string,
    public provider: string,
    public originalError?: Error
  ) {
    super(
      `Transport error (${provider}): ${message}`,
      "TRANSPORT_ERROR",
      502,
      { provider, originalError: originalError?.message }
    );
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class AgentBusyError extends PonderError {
  constructor(agentId: string) {
    super(
      `Agent ${agentId} is already running a task`,
      "AGENT_BUSY",
      409,
      { agentId }
    );
    this.name = "AgentBusyError";
    Object.setPrototypeOf(this, AgentBusyError.prototype);
  }
}

export class ConfigError extends PonderError {
  constructor(message: string, public issues: string[] = []) {
    super(
      `Invalid configuration: ${message}`,
      "CONFIG_ERROR",
      400,
      { issues }
    );
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export {
  TimeoutError,
  ToolExecutionError,
  ModelError,
} from "./errors/standardErrors";
export type { ToolErrorCode, ModelErrorCode } from "./errors/standardErrors";
