import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const DEFAULT_MODEL = "gemma2:27b";
export const DEFAULT_HOST = "http://127.0.0.1:11434";

const MODEL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._\-/]*(:[A-Za-z0-9._-]+)?$/;

export const modelNameSchema = z
  .string()
  .regex(MODEL_NAME_PATTERN, "must look like name[:tag], e.g. gemma2:27b");

/** Largest delay Node's timers honour; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export const logLevelSchema = z
  .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
  .default("info");

const envSchema = z.object({
  OLLAMA_HOST: z.string().min(1).default(DEFAULT_HOST),
  OLLAMA_MODEL: modelNameSchema.default(DEFAULT_MODEL),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().min(1).max(MAX_TIMER_MS).default(120000),
  CLASSIFIER_TIMEOUT_RETRIES: z.coerce.number().int().min(0).max(1).default(1),
  CLASSIFIER_RETRY_DELAY_MS: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(1000),
  CLASSIFIER_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
  CLASSIFIER_MAX_BODY_CHARS: z.coerce.number().int().min(1).default(4000),
  LOG_LEVEL: logLevelSchema,
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

type Env = z.infer<typeof envSchema>;

export type Config = {
  env: Env["NODE_ENV"];
  logLevel: Env["LOG_LEVEL"];
  backend: {
    model: string;
    host: string;
    timeoutMs: number;
  };
  batch: {
    concurrency: number;
    maxBodyChars: number;
    timeoutRetries: number;
    retryDelayMs: number;
  };
};

export class ConfigError extends Error {
  readonly fieldErrors: Record<string, string[] | undefined>;

  constructor(fieldErrors: Record<string, string[] | undefined>) {
    const fields = Object.entries(fieldErrors)
      .map(([key, errors]) => `${key}: ${(errors ?? []).join("; ")}`)
      .join(", ");
    super(`Invalid environment variables: ${fields}`);
    this.name = "ConfigError";
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Validate an environment record. Empty strings count as unset so that a
 * blank `OLLAMA_HOST=` line in .env falls back to the default.
 */
export function parseConfig(source: NodeJS.ProcessEnv): Config {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }

  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    backend: {
      model: env.OLLAMA_MODEL,
      host: env.OLLAMA_HOST,
      timeoutMs: env.CLASSIFIER_TIMEOUT_MS,
    },
    batch: {
      concurrency: env.CLASSIFIER_CONCURRENCY,
      maxBodyChars: env.CLASSIFIER_MAX_BODY_CHARS,
      timeoutRetries: env.CLASSIFIER_TIMEOUT_RETRIES,
      retryDelayMs: env.CLASSIFIER_RETRY_DELAY_MS,
    },
  };
}

let cachedConfig: Config | undefined;

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}
