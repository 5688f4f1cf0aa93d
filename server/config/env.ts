/**
 * Environment variable validation
 *
 * Validates the variables the chosen topology needs at startup and fails fast
 * if any are missing. Which variables are required depends on QUEUE_TYPE and
 * STORAGE_BACKEND: a co-located, in-memory deployment only needs the LLM key.
 */

import { z } from "zod";
import { ConfigurationError } from "../utils/errors";
import { logInfo, logWarn, logError } from "../utils/logger";

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
    });

/** Off unless set to 1, true, yes or on. */
const optInFlag = () =>
  z
    .string()
    .optional()
    .transform((value) => ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase()));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  GEMINI_API_KEY: z.string().default(""),

  QUEUE_TYPE: z.enum(["memory", "redis"]).default("memory"),
  REDIS_URL: z.string().optional(),
  REDIS_REQUEST_KEY: z.string().default("chat:requests"),
  REDIS_RESPONSE_KEY_PREFIX: z.string().default("chat:response:"),
  REDIS_RESPONSE_TTL_SECONDS: z.coerce.number().int().positive().default(86400),

  STORAGE_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
  DATABASE_URL: z.string().optional(),

  SEARCH_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
  CORPUS_PATH: z.string().optional(),

  EXTERNAL_SEARCH_ENABLED: booleanFlag(true),
  WORKER_ENABLED: booleanFlag(true),
  /** Raw retrieval progress lines instead of the user-facing ones. */
  CHAT_DEBUG_RETRIEVAL_EMITS: optInFlag(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
});

export type EnvConfig = z.infer<typeof envSchema>;

type EnvSource = Record<string, string | undefined>;

function isBlank(value: string | undefined): boolean {
  return !value || value.trim() === "";
}

function requiredVarsFor(config: EnvConfig): string[] {
  const required = ["GEMINI_API_KEY"];
  if (config.STORAGE_BACKEND === "postgres" || config.SEARCH_BACKEND === "postgres") {
    required.push("DATABASE_URL");
  }
  if (config.QUEUE_TYPE === "redis") {
    required.push("REDIS_URL");
  }
  return required;
}

/**
 * Validates that all environment variables needed by the configured topology are set.
 * Call this at startup before constructing the chat context.
 *
 * @throws ConfigurationError if any required variables are missing or malformed
 */
export function validateEnv(source: EnvSource = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`);
    const message = `Invalid environment variables:\n${issues.join("\n")}`;
    logError("startup_failed", { reason: "invalid_env", issues: issues.length });
    throw new ConfigurationError(message);
  }

  const config = parsed.data;
  const missing = requiredVarsFor(config).filter((name) => isBlank(source[name]));
  const warnings: string[] = [];

  if (config.QUEUE_TYPE === "redis" && config.WORKER_ENABLED) {
    warnings.push("QUEUE_TYPE=redis runs the worker as a separate process; WORKER_ENABLED is ignored by the API");
  }
  if (config.STORAGE_BACKEND === "memory" && config.NODE_ENV === "production") {
    warnings.push("STORAGE_BACKEND=memory in production: threads and turns are lost on restart");
  }

  for (const warning of warnings) {
    logWarn("env_warning", { warning });
  }

  if (missing.length > 0) {
    const message = `Missing required environment variables:\n${missing.map((v) => `  - ${v}`).join("\n")}`;
    logError("startup_failed", { reason: "missing_env", missing });
    throw new ConfigurationError(message);
  }

  logInfo("env_validated", {
    queue: config.QUEUE_TYPE,
    storage: config.STORAGE_BACKEND,
    search: config.SEARCH_BACKEND,
  });
  return config;
}

/**
 * Parse the environment without the required-variable check.
 * Used by tests and tooling that construct a context with fakes.
 */
export function getEnvConfig(source: EnvSource = process.env): EnvConfig {
  return envSchema.parse(source);
}

