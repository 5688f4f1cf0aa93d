import { describe, it, expect } from "vitest";
import { getEnvConfig, validateEnv } from "../env";
import { ConfigurationError } from "../../utils/errors";

describe("getEnvConfig", () => {
  it("should leave retrieval debug emits off by default", () => {
    expect(getEnvConfig({}).CHAT_DEBUG_RETRIEVAL_EMITS).toBe(false);
  });

  it("should turn retrieval debug emits on only for opt-in values", () => {
    expect(getEnvConfig({ CHAT_DEBUG_RETRIEVAL_EMITS: "1" }).CHAT_DEBUG_RETRIEVAL_EMITS).toBe(true);
    expect(getEnvConfig({ CHAT_DEBUG_RETRIEVAL_EMITS: " Yes " }).CHAT_DEBUG_RETRIEVAL_EMITS).toBe(true);
    expect(getEnvConfig({ CHAT_DEBUG_RETRIEVAL_EMITS: "off" }).CHAT_DEBUG_RETRIEVAL_EMITS).toBe(false);
    expect(getEnvConfig({ CHAT_DEBUG_RETRIEVAL_EMITS: "maybe" }).CHAT_DEBUG_RETRIEVAL_EMITS).toBe(false);
  });

  it("should read other flags as on unless switched off", () => {
    expect(getEnvConfig({}).EXTERNAL_SEARCH_ENABLED).toBe(true);
    expect(getEnvConfig({ EXTERNAL_SEARCH_ENABLED: "false" }).EXTERNAL_SEARCH_ENABLED).toBe(false);
  });
});

describe("validateEnv", () => {
  it("should require the LLM key", () => {
    expect(() => validateEnv({})).toThrow(ConfigurationError);
  });

  it("should require a Redis URL for the Redis queue", () => {
    expect(() => validateEnv({ GEMINI_API_KEY: "test-key", QUEUE_TYPE: "redis" })).toThrow(
      "Missing required environment variables:\n  - REDIS_URL"
    );
  });
});
