/**
 * Library entry
 */

export { Agent, DEFAULT_MAX_STEPS, exhaustedMessage } from "./core/agent/agentCore";
export type { AgentConfig, StepOutcome } from "./core/agent/agentCore";
export { composeSystemPrompt, describeTool } from "./core/agent/promptComposer";
export { parseResponse } from "./core/agent/responseParser";
export type { Directive, ParseResult, RunawayReason } from "./core/agent/responseParser";

export { ToolRegistry, TOOL_NAME_PATTERN } from "./core/tool-engine";
export type { ToolRegistryOptions } from "./core/tool-engine";
export * from "./core/tools";

export { BaseTransport, classifyHttpStatus } from "./core/models/adapter";
export type { ChatRequest, ChatTransport, TransportConfig } from "./core/models/adapter";
export { OllamaTransport, DEFAULT_OLLAMA_URL } from "./core/models/ollamaAdapter";
export { OpenAITransport } from "./core/models/openaiAdapter";
export { ScriptedTransport } from "./core/models/mockAdapter";

export { EventBus } from "./core/eventBus";
export type { EventEnvelope, EventType } from "./core/eventBus";
export { initializeLogger, getLogger, resetLogger, AgentLogger } from "./core/logger";
export * from "./core/errors";
export type { ChatMessage, ChatRole, JsonObject, JsonValue, ToolDef, ToolExecutionContext } from "./core/types";
export { ok, err } from "./core/utils/result";
export type { Result } from "./core/utils/result";
