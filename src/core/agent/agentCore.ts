/**
 * Agent: the step-bounded reasoning/acting loop.
 *
 * Each step sends the pending input to the model, parses the reply and either
 * dispatches a tool (its result becomes the next input) or returns the payload
 * of the terminal `answer` tool. Parser and tool failures are turned into
 * observations for the model; only transport failures reach the caller.
 */

import { ulid } from "ulid";
import { EventBus } from "../eventBus";
import { AgentBusyError } from "../errors";
import { AgentLogger } from "../logger";
import { ChatTransport } from "../models/adapter";
import { ToolRegistry } from "../tool-engine";
import { TERMINAL_TOOL_NAME } from "../tools/answer";
import { ChatMessage, ToolDef } from "../types";
import { composeSystemPrompt } from "./promptComposer";
import { Directive, parseResponse } from "./responseParser";

export const DEFAULT_MAX_STEPS = 10;

export interface AgentConfig {
  id?: string;
  /** Model name handed to the transport */
  model: string;
  transport: ChatTransport;
  tools?: ToolDef[];
  maxSteps?: number;
  toolTimeoutMs?: number;
}

export type StepOutcome =
  | { kind: "continue"; input: string }
  | { kind: "answer"; reply: string }
  | { kind: "exhausted"; message: string };

export const OBSERVATION_INVALID_FORMAT = "Observation: Error: Invalid response format";
export const OBSERVATION_INVALID_INPUT = "Observation: Error: Invalid Action Input format";

export function exhaustedMessage(maxSteps: number): string {
  return `Agent was unable to answer your question in the maximal number of steps (${maxSteps})`;
}

export class Agent {
  readonly id: string;
  readonly registry: ToolRegistry;
  readonly systemPrompt: string;
  private messages: ChatMessage[];
  private running = false;
  private cfg: Required<Pick<AgentConfig, "model" | "maxSteps">> & AgentConfig;

  constructor(cfg: AgentConfig, private eventBus: EventBus, private logger?: AgentLogger) {
    this.id = cfg.id ?? `agent-${ulid()}`;
    this.cfg = { ...cfg, maxSteps: cfg.maxSteps ?? DEFAULT_MAX_STEPS };
    this.registry = new ToolRegistry(eventBus, cfg.tools ?? [], { timeoutMs: cfg.toolTimeoutMs });
    this.systemPrompt = composeSystemPrompt(this.registry.list());
    this.messages = [{ role: "system", content: this.systemPrompt }];
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Answer `query`, using at most `maxSteps` model exchanges. History carries
   * over between tasks on the same agent.
   */
  async task(query: string, maxSteps: number = this.cfg.maxSteps): Promise<string> {
    if (this.running) {
      throw new AgentBusyError(this.id);
    }
    this.running = true;

    const start = Date.now();
    let step = 0;
    let outcome: StepOutcome = { kind: "exhausted", message: exhaustedMessage(maxSteps) };
    let failed = false;

    this.eventBus.emit("AgentStartEvent", { agentId: this.id, task: query, maxSteps });

    try {
      let input = query;
      while (step < maxSteps) {
        step += 1;
        const result = await this.step(input, step);
        if (result.kind === "answer") {
          outcome = result;
          break;
        }
        if (result.kind === "continue") {
          input = result.input;
        }
      }
      return outcome.kind === "answer" ? outcome.reply : exhaustedMessage(maxSteps);
    } catch (e) {
      failed = true;
      throw e;
    } finally {
      this.running = false;
      const duration = Date.now() - start;
      const kind = failed ? "failed" : outcome.kind;
      this.eventBus.emit("AgentFinishEvent", { agentId: this.id, steps: step, duration, outcome: kind });
      this.logger?.traceAgentExecution(this.id, query, step, duration, kind);
    }
  }

  /**
   * The conversation after the system prompt, one block per message
   */
  messageHistory(): string {
    return this.messages
      .slice(1)
      .map((m) => `**${m.role}**:\n${m.content}\n`)
      .join("\n");
  }

  getMessages(): ChatMessage[] {
    return this.messages.map((m) => ({ ...m }));
  }

  private async step(input: string, step: number): Promise<StepOutcome> {
    const reply = await this.chat(input);
    const parsed = parseResponse(reply);

    this.eventBus.emit("AgentStepEvent", { agentId: this.id, step, result: parsed.kind });

    switch (parsed.kind) {
      case "runaway":
        // Drop the reply and the turn that produced it, then ask again
        this.messages.splice(-2, 2);
        this.logger?.debug("Discarded runaway response", { agentId: this.id, step, reason: parsed.reason });
        return { kind: "continue", input };
      case "malformed":
        return { kind: "continue", input: OBSERVATION_INVALID_FORMAT };
      case "invalid_input":
        return { kind: "continue", input: OBSERVATION_INVALID_INPUT };
      case "directive":
        return this.dispatch(parsed.directive);
    }
  }

  private async dispatch({ action, input }: Directive): Promise<StepOutcome> {
    if (!this.registry.has(action)) {
      return { kind: "continue", input: `Observation: Error: Invalid action (${action})` };
    }

    const start = Date.now();
    const result = await this.registry.invoke(action, input, this.id);
    this.logger?.traceToolExecution(
      action,
      input,
      Date.now() - start,
      result.ok,
      result.ok ? undefined : result.error.message,
      { agentId: this.id }
    );

    if (!result.ok) {
      return {
        kind: "continue",
        input: `Observation: Error: There was a problem using the tool ('${action}') with the given input: ${result.error.message}`,
      };
    }

    if (action === TERMINAL_TOOL_NAME) {
      return { kind: "answer", reply: result.value };
    }
    return { kind: "continue", input: `Observation: ${result.value}` };
  }

  private async chat(input: string): Promise<string> {
    this.messages.push({ role: "user", content: input });

    const start = Date.now();
    const reply = await this.cfg.transport.chat({ model: this.cfg.model, messages: this.messages });
    this.logger?.traceModelCall(this.cfg.model, this.messages.length, reply, Date.now() - start, { agentId: this.id });

    this.messages.push({ role: "assistant", content: reply });
    return reply;
  }
}
