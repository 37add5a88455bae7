/**
 * Core type definitions shared by the agent, the tool registry and the transports.
 */

import type { EventBus } from "../eventBus";

/**
 * Roles in the agent's conversation history
 */
export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * A JSON Schema document describing a tool's input object
 */
export type JsonSchema = Record<string, unknown>;

/**
 * What a tool may hand back; anything that is not a string is serialised before
 * it becomes an observation.
 */
export type ToolOutput = JsonValue;

/**
 * Tool execution context
 */
export interface ToolExecutionContext {
  eventBus: EventBus;
  toolName: string;
  callerId?: string;
}

export type ToolRunner = (args: JsonObject, ctx: ToolExecutionContext) => Promise<ToolOutput> | ToolOutput;

/**
 * Tool descriptor: name, the documentation shown to the model, the input schema
 * and the callable.
 */
export interface ToolDef {
  name: string;
  description: string;
  parameters?: JsonSchema;
  run: ToolRunner;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
