/**
 * Ollama transport: local models through the Ollama HTTP API (/api/chat)
 */

import { z } from "zod";
import { EventBus } from "../eventBus";
import { ModelError } from "../errors/standardErrors";
import { BaseTransport, ChatRequest, TransportConfig, classifyHttpStatus } from "./adapter";

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_NUM_CTX = 32768;

export interface OllamaTransportConfig extends TransportConfig {
  baseURL?: string; // Ollama API base URL (default: http://localhost:11434)
  numCtx?: number; // Context window requested from the server
  temperature?: number;
  fetchImpl?: typeof fetch;
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export class OllamaTransport extends BaseTransport {
  readonly id = "ollama";
  private baseURL: string;
  private numCtx: number;
  private temperature?: number;
  private fetchImpl: typeof fetch;

  constructor(eventBus: EventBus, config: OllamaTransportConfig = {}) {
    super(eventBus, config);
    this.baseURL = (config.baseURL ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, "");
    this.numCtx = config.numCtx ?? DEFAULT_NUM_CTX;
    this.temperature = config.temperature;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  /**
   * List models available on the Ollama server
   */
  async listModels(): Promise<string[]> {
    const response = await this.fetchImpl(`${this.baseURL}/api/tags`, {
      signal: AbortSignal.timeout(5000),
    });
    if (!response.ok) {
      throw new ModelError(`Ollama API error: ${response.status} ${response.statusText}`, undefined, undefined, classifyHttpStatus(response.status));
    }
    const data = OllamaTagsSchema.parse(await response.json());
    return data.models.map((m) => m.name);
  }

  protected async sendOnce(request: ChatRequest): Promise<string> {
    const response = await this.fetchImpl(`${this.baseURL}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: request.model,
        messages: request.messages,
        stream: false,
        options: {
          num_ctx: this.numCtx,
          ...(this.temperature === undefined ? {} : { temperature: this.temperature }),
        },
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ModelError(
        `Ollama API error: ${response.status} ${errorText}`.trim(),
        request.model,
        undefined,
        classifyHttpStatus(response.status)
      );
    }

    const parsed = OllamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelError("Ollama returned an unexpected payload", request.model, undefined, "validation_error");
    }
    return parsed.data.message.content;
  }
}
