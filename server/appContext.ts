/**
 * Process-scoped chat context
 *
 * Built once at startup and passed explicitly to the pipeline, the HTTP
 * handlers and the worker. Tests build it with fakes through `overrides`.
 */

import { fileURLToPath } from "node:url";
import { chatConfig, type ChatConfig } from "./chat/chatConfig";
import { PlanStore } from "./chat/planStore";
import { ProgressStore } from "./chat/progressStore";
import { GeminiProvider } from "./llm/geminiProvider";
import { createQueue } from "./queue";
import { MemorySearchIndex } from "./search/memorySearchIndex";
import { PgSearchIndex } from "./search/pgSearchIndex";
import { DisabledWebSkill, GeminiWebSkill } from "./search/webSkill";
import { createDatabase, type Database } from "./storage/db";
import { DrizzlePersistence } from "./storage/drizzlePersistence";
import { MemoryPersistence } from "./storage/memoryPersistence";
import { ConfigurationError } from "./utils/errors";
import { logInfo } from "./utils/logger";
import type { EnvConfig } from "./config/env";
import type { LlmProvider } from "./llm/types";
import type { ChatQueue } from "./queue";
import type { SearchIndex, WebSkill } from "./search/types";
import type { PersistencePort } from "./storage/types";

export interface ChatContext {
  config: ChatConfig;
  env: EnvConfig;
  llm: LlmProvider;
  search: SearchIndex;
  web: WebSkill;
  persistence: PersistencePort;
  queue: ChatQueue;
  progress: ProgressStore;
  plans: PlanStore;
  /** Milliseconds since the epoch. */
  clock: () => number;
}

export type ChatContextOverrides = Partial<Omit<ChatContext, "env">>;

const DEFAULT_CORPUS_PATH = fileURLToPath(new URL("../shared/data/sampleCorpus.json", import.meta.url));

function requireDatabaseUrl(env: EnvConfig): string {
  if (!env.DATABASE_URL) {
    throw new ConfigurationError("DATABASE_URL is required for the postgres backends");
  }
  return env.DATABASE_URL;
}

export function createChatContext(env: EnvConfig, overrides: ChatContextOverrides = {}): ChatContext {
  let db: Database | null = null;
  const database = (): Database => {
    db ??= createDatabase(requireDatabaseUrl(env));
    return db;
  };

  const llm =
    overrides.llm ??
    new GeminiProvider({ apiKey: env.GEMINI_API_KEY, timeoutMs: env.LLM_TIMEOUT_MS, env: process.env });

  const search =
    overrides.search ??
    (env.SEARCH_BACKEND === "postgres"
      ? new PgSearchIndex(database())
      : MemorySearchIndex.fromFile(env.CORPUS_PATH || DEFAULT_CORPUS_PATH));

  const web =
    overrides.web ??
    (env.EXTERNAL_SEARCH_ENABLED
      ? new GeminiWebSkill({ apiKey: env.GEMINI_API_KEY, timeoutMs: env.LLM_TIMEOUT_MS, env: process.env })
      : new DisabledWebSkill());

  const persistence =
    overrides.persistence ??
    (env.STORAGE_BACKEND === "postgres" ? new DrizzlePersistence(database()) : new MemoryPersistence());

  const clock = overrides.clock ?? Date.now;
  const config = overrides.config ?? chatConfig;

  const context: ChatContext = {
    config,
    env,
    llm,
    search,
    web,
    persistence,
    queue: overrides.queue ?? createQueue(env),
    progress: overrides.progress ?? new ProgressStore(config.PROGRESS_CHANNEL_CAPACITY, clock),
    plans: overrides.plans ?? new PlanStore(),
    clock,
  };

  logInfo("chat_context_created", {
    queue: context.queue.kind,
    storage: context.persistence.kind,
    search: env.SEARCH_BACKEND,
    externalSearch: context.web.enabled,
  });

  return context;
}
