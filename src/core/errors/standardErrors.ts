/**
 * Standardized error classes
 */

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
    public readonly code: string = "timeout_error"
  ) {
    super(message);
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Returned (never thrown) by the tool registry when an invocation does not
 * produce a result.
 */
export type ToolErrorCode = "tool_not_found" | "validation_error" | "tool_execution_error" | "tool_timeout";

export class ToolExecutionError extends Error {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly code: ToolErrorCode = "tool_execution_error",
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "ToolExecutionError";
    Object.setPrototypeOf(this, ToolExecutionError.prototype);
  }
}

export type ModelErrorCode =
  | "model_error"
  | "network_error"
  | "rate_limit_error"
  | "server_overload"
  | "timeout_error"
  | "validation_error";

export class ModelError extends Error {
  constructor(
    message: string,
    public readonly modelName?: string,
    public readonly originalError?: Error,
    public readonly code: ModelErrorCode = "model_error"
  ) {
    super(message);
    this.name = "ModelError";
    Object.setPrototypeOf(this, ModelError.prototype);
  }
}
