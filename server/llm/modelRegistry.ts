/**
 * Model Registry - Centralized model selection for the chat pipeline
 *
 * Every pipeline stage that calls the LLM has a default model and an
 * environment override (MODEL_PLANNER, MODEL_RAG, ...). Control steps use
 * the fast model; the integrator uses the same by default and is the first
 * candidate for a stronger one.
 */

export type ModelStage = "planner" | "rag" | "reasoning" | "tool" | "integrator" | "communication";

export const MODEL_STAGES: readonly ModelStage[] = [
  "planner",
  "rag",
  "reasoning",
  "tool",
  "integrator",
  "communication",
];

const MODELS = {
  FAST: "gemini-2.5-flash",
  LITE: "gemini-2.5-flash-lite",
} as const;

const ENV_OVERRIDES: Record<ModelStage, string> = {
  planner: "MODEL_PLANNER",
  rag: "MODEL_RAG",
  reasoning: "MODEL_REASONING",
  tool: "MODEL_TOOL",
  integrator: "MODEL_INTEGRATOR",
  communication: "MODEL_COMMUNICATION",
};

const DEFAULT_MODELS: Record<ModelStage, string> = {
  planner: MODELS.FAST,
  rag: MODELS.FAST,
  reasoning: MODELS.FAST,
  tool: MODELS.FAST,
  integrator: MODELS.FAST,
  communication: MODELS.LITE,
};

type EnvSource = Record<string, string | undefined>;

/**
 * Get the model for a pipeline stage, honoring its environment override.
 */
export function getModelForStage(stage: ModelStage, env: EnvSource = process.env): string {
  const override = env[ENV_OVERRIDES[stage]];
  if (override && override.trim()) return override.trim();
  return DEFAULT_MODELS[stage];
}

/**
 * Get the fallback model for retry scenarios
 */
export function getFallbackModel(env: EnvSource = process.env): string {
  return env["MODEL_DEGRADED"] || MODELS.FAST;
}

/**
 * Retry configuration for LLM calls
 */
export interface RetryConfig {
  maxRetries: number;
  retryDelayMs: number;
  useFallbackOnRetry: boolean;
  /** Errors for which a retry is pointless (e.g. quota exhaustion). */
  isRetryable: (error: unknown) => boolean;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 1,
  retryDelayMs: 500,
  useFallbackOnRetry: true,
  isRetryable: () => true,
};

/**
 * Wrapper for LLM calls with automatic retry and fallback
 *
 * @param fn - Function that makes the LLM call, receives model name as parameter
 * @param primaryModel - Model tried first
 * @returns Result from the LLM call and the model that produced it
 */
export async function withModelFallback<T>(
  fn: (model: string) => Promise<T>,
  primaryModel: string,
  config: Partial<RetryConfig> = {},
  env: EnvSource = process.env
): Promise<{ result: T; modelUsed: string; didFallback: boolean }> {
  const { maxRetries, retryDelayMs, useFallbackOnRetry, isRetryable } = { ...DEFAULT_RETRY_CONFIG, ...config };

  let lastError: unknown = null;
  let attempt = 0;
  let currentModel = primaryModel;
  let didFallback = false;

  while (attempt <= maxRetries) {
    try {
      const result = await fn(currentModel);
      return { result, modelUsed: currentModel, didFallback };
    } catch (error) {
      lastError = error;
      attempt++;
      if (!isRetryable(error)) break;

      if (attempt <= maxRetries) {
        // Switch to fallback model on retry if configured
        const fallback = getFallbackModel(env);
        if (useFallbackOnRetry && currentModel !== fallback) {
          currentModel = fallback;
          didFallback = true;
        }

        // Brief delay before retry
        await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
      }
    }
  }

  throw lastError;
}
