/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded in-memory history
 */

import { ulid } from "ulid";

export type EventType =
  | "AgentStartEvent"
  | "AgentStepEvent"
  | "AgentFinishEvent"
  | "ModelResponseEvent"
  | "ModelErrorEvent"
  | "ToolInvocationEvent"
  | "ToolResultEvent"
  | "ToolErrorEvent";

export interface EventEnvelope<T = unknown> {
  id: string;
  type: EventType;
  timestamp: number;
  payload: T;
  meta?: Record<string, unknown>;
}

export type Listener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular"; // How to handle overflow
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 10000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on(type: EventType | "any", listener: Listener): void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
  }

  off(type: EventType | "any", listener: Listener): void {
    this.listeners.get(type)?.delete(listener);
  }

  emit<T>(type: EventType, payload: T, meta?: Record<string, unknown>): EventEnvelope<T> {
    const envelope: EventEnvelope<T> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }

    // A failing listener must not break the emitter; report and move on.
    for (const key of [type, "any"] as const) {
      const set = this.listeners.get(key);
      if (!set) continue;
      for (const l of set) {
        try {
          l(envelope);
        } catch (e) {
          console.error(`[EventBus] Listener error for ${key}:`, e);
        }
      }
    }

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;
    const since = options?.since;

    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (options?.type) {
      filtered = filtered.filter((e) => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }
}
