/**
 * Logger Formatters
 */

import type { LoggerOptions } from "pino";
import { LoggerConfig } from "./config";

const SENSITIVE_KEYS = ["password", "token", "apikey", "api_key", "secret", "auth"];

/**
 * Create Pino formatters based on configuration
 */
export function createFormatter(config: LoggerConfig): NonNullable<LoggerOptions["formatters"]> {
  const formatters: NonNullable<LoggerOptions["formatters"]> = {
    log: (obj: Record<string, unknown>) => (config.source ? { ...obj, source: config.source } : obj),
  };

  // pino-pretty reads numeric levels; labels only go into JSON lines
  if (config.format === "json") {
    formatters.level = (label: string) => ({ level: label });
  }

  return formatters;
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Replace values under credential-looking keys, recursively
 */
export function redactSensitive(value: unknown, maxDepth = 5, depth = 0): unknown {
  if (depth >= maxDepth) return "[Max Depth Reached]";
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, maxDepth, depth + 1));
  }
  if (value === null || typeof value !== "object") return value;

  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const lower = key.toLowerCase();
    out[key] = SENSITIVE_KEYS.some((s) => lower.includes(s))
      ? "[REDACTED]"
      : redactSensitive(inner, maxDepth, depth + 1);
  }
  return out;
}
