/**
 * CLI configuration: ponder.config.json overlaid with environment variables,
 * validated with zod.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../../core/errors";
import { BUILTIN_TOOL_NAMES } from "../../core/tools";
import { DEFAULT_OLLAMA_URL } from "../../core/models/ollamaAdapter";

export const CONFIG_FILENAME = "ponder.config.json";

/** Model used when neither the file nor the environment names one */
export const DEFAULT_MODELS = {
  ollama: "llama3.1",
  openai: "gpt-4o-mini",
} as const;

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const ConfigShape = z.object({
  backend: z.enum(["ollama", "openai"]).default("ollama"),
  model: z.string().min(1).optional(),
  maxSteps: z.coerce.number().int().positive().default(10),
  tools: z.array(z.enum(BUILTIN_TOOL_NAMES)).default(["calculator", "date"]),
  ollama: z
    .object({
      url: z.string().url().default(DEFAULT_OLLAMA_URL),
      numCtx: z.coerce.number().int().positive().optional(),
    })
    .default({}),
  openai: z
    .object({
      apiKey: z.string().optional(),
      baseURL: z.string().url().optional(),
    })
    .default({}),
  tavilyApiKey: z.string().optional(),
  workDir: z.string().min(1).default("work"),
  python: z.string().min(1).default("python3"),
  scriptTimeoutMs: z.coerce.number().int().positive().default(60_000),
  logger: z
    .object({
      level: LogLevelSchema.default("info"),
      format: z.enum(["json", "pretty"]).default("pretty"),
      file: z.string().optional(),
    })
    .default({}),
});

export const PonderConfigSchema = ConfigShape.transform((config) => ({
  ...config,
  model: config.model ?? DEFAULT_MODELS[config.backend],
}));

export type PonderConfig = z.infer<typeof PonderConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; a missing explicit file is an error */
  file?: string;
}

type RawConfig = Record<string, unknown>;

function readConfigFile(file: string, required: boolean): RawConfig {
  if (!fs.existsSync(file)) {
    if (required) throw new ConfigError(`config file not found: ${file}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new ConfigError(`cannot parse ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${file} must contain a JSON object`);
  }
  return { ...parsed };
}

function section(raw: RawConfig, key: string): RawConfig {
  const value = raw[key];
  return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function setIfPresent(target: RawConfig, key: string, value: string | undefined): void {
  if (value !== undefined && value !== "") target[key] = value;
}

/**
 * Environment variables win over the file
 */
function applyEnv(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const merged: RawConfig = { ...raw };
  const ollama = section(raw, "ollama");
  const openai = section(raw, "openai");
  const logger = section(raw, "logger");

  setIfPresent(merged, "backend", env.PONDER_BACKEND);
  setIfPresent(merged, "maxSteps", env.PONDER_MAX_STEPS);
  setIfPresent(merged, "workDir", env.PONDER_WORK_DIR);
  setIfPresent(merged, "python", env.PONDER_PYTHON);
  setIfPresent(merged, "tavilyApiKey", env.TAVILY_API_KEY);

  setIfPresent(ollama, "url", env.OLLAMA_URL);
  setIfPresent(openai, "apiKey", env.OPENAI_API_KEY);
  setIfPresent(openai, "baseURL", env.OPENAI_BASE_URL);
  setIfPresent(logger, "level", env.LOG_LEVEL);
  setIfPresent(logger, "format", env.LOG_FORMAT);

  // The model variable follows the backend that will actually be used
  const backend = merged.backend ?? "ollama";
  setIfPresent(merged, "model", backend === "openai" ? env.OPENAI_MODEL : env.OLLAMA_MODEL);

  return { ...merged, ollama, openai, logger };
}

export function loadConfig(options: LoadConfigOptions = {}): PonderConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const file = options.file ? path.resolve(cwd, options.file) : path.join(cwd, CONFIG_FILENAME);

  const raw = applyEnv(readConfigFile(file, options.file !== undefined), env);
  const result = PonderConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(issues.join("; "), issues);
  }

  const config = result.data;
  if (config.backend === "openai" && !config.openai.apiKey) {
    throw new ConfigError("openai backend requires OPENAI_API_KEY", ["openai.apiKey: Required"]);
  }
  return config;
}
