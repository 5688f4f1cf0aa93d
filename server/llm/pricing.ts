import type { LlmUsage } from "../chat/types";

export interface ModelPricing {
  provider: string;
  model: string;
  inputPer1M: number;
  outputPer1M: number;
}

export const MODEL_PRICING: Record<string, ModelPricing> = {
  "gemini-2.5-flash": {
    provider: "google",
    model: "gemini-2.5-flash",
    inputPer1M: 0.30,
    outputPer1M: 2.50,
  },
  "gemini-2.5-flash-lite": {
    provider: "google",
    model: "gemini-2.5-flash-lite",
    inputPer1M: 0.10,
    outputPer1M: 0.40,
  },
  "gemini-2.5-pro": {
    provider: "google",
    model: "gemini-2.5-pro",
    inputPer1M: 1.25,
    outputPer1M: 10.00,
  },
  "gemini-2.0-flash": {
    provider: "google",
    model: "gemini-2.0-flash",
    inputPer1M: 0.10,
    outputPer1M: 0.40,
  },
};

/**
 * USD cost of one call. Models without a price entry cost 0.
 */
export function calculateCost(usage: Pick<LlmUsage, "model" | "inputTokens" | "outputTokens">): number {
  const pricing = MODEL_PRICING[usage.model];
  if (!pricing) return 0;

  const inputCost = (usage.inputTokens / 1_000_000) * pricing.inputPer1M;
  const outputCost = (usage.outputTokens / 1_000_000) * pricing.outputPer1M;

  return inputCost + outputCost;
}

export function getProvider(model: string): string {
  const pricing = MODEL_PRICING[model];
  return pricing?.provider || "unknown";
}
