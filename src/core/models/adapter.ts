/**
 * Chat transport API: the one function the agent needs from a model backend.
 * It takes the whole ordered history and returns the assistant's new text.
 */

import { EventBus } from "../eventBus";
import { TransportError } from "../errors";
import { ModelError, ModelErrorCode } from "../errors/standardErrors";
import { ChatMessage } from "../types";

export interface ChatRequest {
  model: string;
  messages: readonly ChatMessage[];
}

export interface ChatTransport {
  readonly id: string;
  chat(request: ChatRequest): Promise<string>;
}

export interface TransportConfig {
  maxAttempts?: number;
  retryIntervals?: number[];
  timeoutMs?: number;
}

const RETRYABLE_CODES: readonly ModelErrorCode[] = [
  "network_error",
  "rate_limit_error",
  "server_overload",
  "timeout_error",
];

export function classifyHttpStatus(status: number): ModelErrorCode {
  if (status === 429) return "rate_limit_error";
  if (status === 408) return "timeout_error";
  if (status >= 500) return "server_overload";
  return "model_error";
}

function isAbortLike(error: unknown): error is Error {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/**
 * Retry loop shared by the concrete transports. Transient failures are retried
 * on the configured schedule; anything else, or the last failed attempt, ends
 * in a TransportError.
 */
export abstract class BaseTransport implements ChatTransport {
  abstract readonly id: string;
  protected config: Required<TransportConfig>;

  constructor(protected eventBus: EventBus, config: TransportConfig = {}) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      retryIntervals: config.retryIntervals ?? [500, 1000, 2000],
      timeoutMs: config.timeoutMs ?? 120_000,
    };
  }

  async chat(request: ChatRequest): Promise<string> {
    const { maxAttempts, retryIntervals } = this.config;
    let lastError: ModelError | undefined;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const start = Date.now();
      try {
        const content = await this.sendOnce(request);

        this.eventBus.emit("ModelResponseEvent", {
          transport: this.id,
          model: request.model,
          attempt,
          duration: Date.now() - start,
          messages: request.messages.length,
          responseLength: content.length,
        });

        return content;
      } catch (error) {
        lastError = this.toModelError(error, request.model);

        this.eventBus.emit("ModelErrorEvent", {
          transport: this.id,
          model: request.model,
          attempt,
          code: lastError.code,
          message: lastError.message,
        });

        if (!RETRYABLE_CODES.includes(lastError.code)) break;

        if (attempt < maxAttempts - 1) {
          const delay = retryIntervals[attempt] ?? retryIntervals[retryIntervals.length - 1] ?? 1000;
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    throw new TransportError(lastError?.message ?? "no attempt was made", this.id, lastError);
  }

  /**
   * Single attempt
   */
  protected abstract sendOnce(request: ChatRequest): Promise<string>;

  protected toModelError(error: unknown, model: string): ModelError {
    if (error instanceof ModelError) return error;
    if (isAbortLike(error)) {
      return new ModelError(`Request timed out after ${this.config.timeoutMs}ms`, model, error, "timeout_error");
    }
    if (error instanceof TypeError) {
      // fetch rejects with a TypeError when the connection fails
      return new ModelError(error.message, model, error, "network_error");
    }
    if (error instanceof Error) return new ModelError(error.message, model, error);
    return new ModelError("Unknown model error", model);
  }
}
