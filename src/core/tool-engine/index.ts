/**
 * Tool registry:
 * - holds tool descriptors by name, in registration order
 * - always carries the terminal `answer` tool, registered first
 * - validates input against each tool's JSON Schema (ajv)
 * - turns every invocation failure into an error result; nothing thrown by a
 *   tool reaches the caller
 */

import Ajv, { ValidateFunction } from "ajv";
import { EventBus } from "../eventBus";
import { ToolRegistrationError } from "../errors";
import { TimeoutError, ToolExecutionError } from "../errors/standardErrors";
import { JsonObject, ToolDef, ToolExecutionContext, ToolOutput } from "../types";
import { ok, err, Result } from "../utils/result";
import { answerTool } from "../tools/answer";
import { describeToolDefIssues } from "./toolSchema";

export { TOOL_NAME_PATTERN, ToolDefSchema, describeToolDefIssues } from "./toolSchema";

export interface ToolRegistryOptions {
  /** Per-invocation limit; when absent a hanging tool stalls its caller. */
  timeoutMs?: number;
}

interface RegisteredTool {
  def: ToolDef;
  validate: ValidateFunction | null;
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private ajv = new Ajv({ allErrors: true });

  constructor(
    private eventBus: EventBus,
    tools: readonly ToolDef[] = [],
    private options: ToolRegistryOptions = {}
  ) {
    this.register(answerTool);
    this.registerAll(tools);
  }

  /**
   * Add a tool. A name that is already taken is rejected, which also keeps
   * callers from replacing `answer`.
   */
  register(def: ToolDef): this {
    const issues = describeToolDefIssues(def);
    if (issues.length > 0) {
      throw new ToolRegistrationError(String(def?.name), issues.join("; "));
    }
    if (this.tools.has(def.name)) {
      throw new ToolRegistrationError(def.name, "a tool with this name is already registered");
    }

    let validate: ValidateFunction | null = null;
    if (def.parameters) {
      try {
        validate = this.ajv.compile(def.parameters);
      } catch (e) {
        throw new ToolRegistrationError(def.name, `invalid parameter schema (${e instanceof Error ? e.message : String(e)})`);
      }
    }

    this.tools.set(def.name, { def, validate });
    return this;
  }

  registerAll(defs: readonly ToolDef[]): this {
    for (const def of defs) this.register(def);
    return this;
  }

  lookup(name: string): ToolDef | undefined {
    return this.tools.get(name)?.def;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDef[] {
    return Array.from(this.tools.values(), (t) => t.def);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  async invoke(name: string, input: JsonObject, callerId?: string): Promise<Result<string, ToolExecutionError>> {
    const entry = this.tools.get(name);
    if (!entry) {
      return this.fail(new ToolExecutionError(`Tool not found: ${name}`, name, "tool_not_found"));
    }

    if (entry.validate && !entry.validate(input)) {
      const details = this.ajv.errorsText(entry.validate.errors, { dataVar: "input" });
      return this.fail(new ToolExecutionError(`Invalid input: ${details}`, name, "validation_error"));
    }

    const ctx: ToolExecutionContext = { eventBus: this.eventBus, toolName: name, callerId };
    this.eventBus.emit("ToolInvocationEvent", { toolName: name, args: input, callerId });
    const start = Date.now();

    try {
      const output = await this.withTimeout(name, async () => entry.def.run(input, ctx));
      const text = stringifyOutput(output);
      this.eventBus.emit("ToolResultEvent", { toolName: name, result: text, duration: Date.now() - start });
      return ok(text);
    } catch (e) {
      let error: ToolExecutionError;
      if (e instanceof ToolExecutionError) {
        error = e;
      } else if (e instanceof TimeoutError) {
        error = new ToolExecutionError(e.message, name, "tool_timeout", e);
      } else {
        error = new ToolExecutionError(e instanceof Error ? e.message : String(e), name, "tool_execution_error", e);
      }
      return this.fail(error, Date.now() - start);
    }
  }

  private fail(error: ToolExecutionError, duration?: number): Result<string, ToolExecutionError> {
    this.eventBus.emit("ToolErrorEvent", {
      toolName: error.toolName,
      code: error.code,
      message: error.message,
      duration,
    });
    return err(error);
  }

  private async withTimeout(name: string, run: () => Promise<ToolOutput>): Promise<ToolOutput> {
    const timeoutMs = this.options.timeoutMs;
    if (timeoutMs === undefined) return run();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(`Tool ${name} timed out after ${timeoutMs}ms`, timeoutMs)),
        timeoutMs
      );
    });

    try {
      return await Promise.race([run(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function stringifyOutput(output: ToolOutput): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}
