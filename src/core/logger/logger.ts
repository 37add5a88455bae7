/**
 * Pino-based logger with EventBus integration.
 *
 * Streams are written synchronously: a CLI run or a test run ends as soon as
 * the work is done, with no transport worker left behind.
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { EventBus, EventEnvelope, EventType, Listener } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFormatter, formatDuration, redactSensitive } from "./formatters";

export interface LoggerContext {
  agentId?: string;
  toolName?: string;
  step?: number;
  correlationId?: string;
  [key: string]: unknown;
}

type EventLevel = "debug" | "info" | "warn";

const EVENT_MAPPINGS: ReadonlyArray<{ event: EventType; level: EventLevel; message: string }> = [
  { event: "AgentStartEvent", level: "info", message: "Agent started" },
  { event: "AgentStepEvent", level: "debug", message: "Agent step executed" },
  { event: "AgentFinishEvent", level: "info", message: "Agent finished" },
  { event: "ToolInvocationEvent", level: "debug", message: "Tool invoked" },
  { event: "ToolResultEvent", level: "debug", message: "Tool completed" },
  { event: "ToolErrorEvent", level: "warn", message: "Tool error" },
  { event: "ModelResponseEvent", level: "debug", message: "Model responded" },
  { event: "ModelErrorEvent", level: "warn", message: "Model error" },
];

function buildStreams(config: LoggerConfig): pino.StreamEntry[] {
  // "silent" is enforced by the logger level; streams need a concrete one
  const level = config.level === "silent" ? "fatal" : config.level;
  const streams: pino.StreamEntry[] = [];

  if (config.destination) {
    streams.push({ level, stream: config.destination });
  } else if (config.format === "pretty") {
    streams.push({
      level,
      stream: pinoPretty({
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: 2,
        sync: true,
      }),
    });
  } else {
    streams.push({ level, stream: pino.destination({ dest: 2, sync: true }) });
  }

  if (config.file?.enabled) {
    streams.push({
      level: "info",
      stream: pino.destination({ dest: config.file.path, mkdir: true, sync: true }),
    });
  }

  return streams;
}

export class AgentLogger {
  private pinoLogger: pino.Logger;
  private config: LoggerConfig;
  private subscriptions: Array<{ event: EventType; listener: Listener }> = [];

  constructor(private eventBus: EventBus, config: Partial<LoggerConfig> = {}, parent?: pino.Logger) {
    this.config = createLoggerConfig(config);

    if (parent) {
      // Children share the parent's streams and bus subscriptions
      this.pinoLogger = parent;
      return;
    }

    this.pinoLogger = pino(
      {
        level: this.config.level,
        formatters: createFormatter(this.config),
        serializers: { err: pino.stdSerializers.err },
      },
      pino.multistream(buildStreams(this.config))
    );

    this.setupEventBusIntegration();
  }

  get level(): string {
    return this.pinoLogger.level;
  }

  /**
   * Create child logger with context
   */
  child(context: LoggerContext): AgentLogger {
    return new AgentLogger(this.eventBus, this.config, this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  startTimer(name: string, context?: LoggerContext): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer: ${name}`, { ...context, duration, timer: name });
      return duration;
    };
  }

  traceAgentExecution(
    agentId: string,
    task: string,
    steps: number,
    duration: number,
    outcome: string,
    context?: LoggerContext
  ): void {
    this.info("Agent execution completed", {
      ...context,
      agentId,
      task,
      steps,
      duration,
      elapsed: formatDuration(duration),
      outcome,
      type: "agent_execution",
    });
  }

  traceToolExecution(
    toolName: string,
    args: unknown,
    duration: number,
    success: boolean,
    error?: string,
    context?: LoggerContext
  ): void {
    const level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        ...context,
        toolName,
        args: redactSensitive(args),
        duration,
        success,
        error,
        type: "tool_execution",
      },
      `Tool ${toolName} ${success ? "succeeded" : "failed"} (${duration}ms)`
    );
  }

  traceModelCall(model: string, promptMessages: number, response: string, duration: number, context?: LoggerContext): void {
    this.debug("Model interaction", {
      ...context,
      model,
      promptMessages,
      responseLength: response.length,
      duration,
      type: "model_call",
    });
  }

  flush(): void {
    this.pinoLogger.flush();
  }

  /**
   * Stop mirroring bus events into the log
   */
  dispose(): void {
    for (const { event, listener } of this.subscriptions) {
      this.eventBus.off(event, listener);
    }
    this.subscriptions = [];
  }

  private setupEventBusIntegration(): void {
    for (const { event, level, message } of EVENT_MAPPINGS) {
      const listener = (evt: EventEnvelope) => {
        this.pinoLogger[level](
          {
            event,
            payload: redactSensitive(evt.payload),
            type: "eventbus",
            correlationId: evt.id,
          },
          message
        );
      };
      this.eventBus.on(event, listener);
      this.subscriptions.push({ event, listener });
    }
  }
}
