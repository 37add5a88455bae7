/**
 * Scripted transport for tests and offline runs: replays canned replies and
 * records every request it receives.
 */

import { EventBus } from "../eventBus";
import { ModelError } from "../errors/standardErrors";
import { ChatMessage } from "../types";
import { BaseTransport, ChatRequest, TransportConfig } from "./adapter";

export type ScriptedReply = (request: ChatRequest, callIndex: number) => string | Promise<string>;

export class ScriptedTransport extends BaseTransport {
  readonly id = "scripted";
  readonly requests: Array<{ model: string; messages: ChatMessage[] }> = [];
  private calls = 0;

  constructor(eventBus: EventBus, private script: readonly string[] | ScriptedReply, config?: TransportConfig) {
    super(eventBus, config);
  }

  get callCount(): number {
    return this.calls;
  }

  protected async sendOnce(request: ChatRequest): Promise<string> {
    const index = this.calls++;
    this.requests.push({ model: request.model, messages: request.messages.map((m) => ({ ...m })) });

    if (typeof this.script === "function") {
      return this.script(request, index);
    }

    const reply = this.script[index];
    if (reply === undefined) {
      throw new ModelError(`Script exhausted after ${this.script.length} replies`, request.model);
    }
    return reply;
  }
}
