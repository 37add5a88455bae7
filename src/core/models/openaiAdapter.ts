/**
 * OpenAI transport: chat completions through the official SDK.
 * Also fits any OpenAI-compatible server reachable through `baseURL`.
 */

import OpenAI from "openai";
import { EventBus } from "../eventBus";
import { ModelError } from "../errors/standardErrors";
import { ChatMessage } from "../types";
import { BaseTransport, ChatRequest, TransportConfig, classifyHttpStatus } from "./adapter";

export interface OpenAITransportConfig extends TransportConfig {
  apiKey: string;
  baseURL?: string;
  temperature?: number;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class OpenAITransport extends BaseTransport {
  readonly id = "openai";
  private client: OpenAI;
  private temperature: number;

  constructor(eventBus: EventBus, config: OpenAITransportConfig) {
    super(eventBus, config);
    if (!config.apiKey) {
      throw new Error("OpenAI API key is required");
    }

    // Retries are handled by BaseTransport
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
      timeout: this.config.timeoutMs,
    });
    this.temperature = config.temperature ?? 0;
  }

  protected async sendOnce(request: ChatRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: this.temperature,
    });

    const choice = response.choices[0];
    if (!choice) {
      throw new ModelError("No response choice from OpenAI", request.model, undefined, "validation_error");
    }
    return choice.message.content ?? "";
  }

  protected toModelError(error: unknown, model: string): ModelError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ModelError(error.message, model, error, "timeout_error");
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new ModelError(error.message, model, error, "network_error");
    }
    if (error instanceof OpenAI.APIError) {
      const code = error.status === undefined ? "model_error" : classifyHttpStatus(error.status);
      return new ModelError(error.message, model, error, code);
    }
    return super.toModelError(error, model);
  }
}
