import { describe, it, expect } from "vitest";
import {
  extractCitedIndices,
  FALLBACK_INTRO,
  rollupUsage,
  sourceConfidenceBadge,
  synthesizeFinalMessage,
} from "../integrator";
import { BrokenStreamLlm, FakeLlm, TEST_USAGE } from "./helpers/fakes";
import type { Plan } from "../types";

const plan: Plan = {
  subquestions: [
    {
      id: "sq1",
      text: "How do I file an appeal?",
      kind: "non_patient",
      questionIntent: "canonical",
      intentScore: 0,
      onRagFail: [],
      capabilitiesPrimary: null,
      requiresJurisdiction: null,
    },
  ],
  thinkingLog: [],
  llmUsage: null,
};

const expectedFallback = `${FALLBACK_INTRO}\n\n**sq1** (Policy/document): How do I file an appeal?\n→ File within 60 days.\n`;

describe("sourceConfidenceBadge", () => {
  it("should report no sources when any part had none", () => {
    expect(sourceConfidenceBadge([], [])).toBe("no_sources");
    expect(sourceConfidenceBadge(["corpus_only", "no_sources"], [{ confidenceLabel: "process_confident" }])).toBe(
      "no_sources"
    );
  });

  it("should rank web-only above web-augmented", () => {
    expect(sourceConfidenceBadge(["corpus_plus_google", "google_only"], [])).toBe("informational_only");
    expect(sourceConfidenceBadge(["corpus_only", "corpus_plus_google"], [])).toBe("augmented_with_google");
  });

  it("should grade corpus-only answers by their labels", () => {
    expect(
      sourceConfidenceBadge(["corpus_only"], [{ confidenceLabel: "process_confident" }, { confidenceLabel: "process_confident" }])
    ).toBe("approved_authoritative");
    expect(
      sourceConfidenceBadge(["corpus_only"], [{ confidenceLabel: "process_confident" }, { confidenceLabel: "process_with_caution" }])
    ).toBe("proceed_with_caution");
    expect(sourceConfidenceBadge(["corpus_only"], [{ confidenceLabel: null }])).toBe("approved_informational");
  });
});

describe("extractCitedIndices", () => {
  it("should keep in-range markers once, in ascending order", () => {
    expect(extractCitedIndices("See [2] and [1], also [2], [9] and [0].", 3)).toEqual([1, 2]);
  });

  it("should return nothing when there are no sources", () => {
    expect(extractCitedIndices("See [1].", 0)).toEqual([]);
  });
});

describe("synthesizeFinalMessage", () => {
  const input = { plan, answers: ["File within 60 days."], userMessage: "How do I file an appeal?", jurisdiction: "Aetna" };

  it("should stream chunks and return the combined message", async () => {
    const llm = new FakeLlm({ integrator: "Combined answer [1]." });
    const chunks: string[] = [];

    const result = await synthesizeFinalMessage(llm, input, async (chunk) => {
      chunks.push(chunk);
    });

    expect(chunks).toEqual(["Combined a", "nswer [1]."]);
    expect(result).toEqual({
      message: "Combined answer [1].",
      usage: { ...TEST_USAGE, stage: "integrator" },
      fallback: false,
    });
    expect(llm.calls[0].prompt).toBe(
      "User message: How do I file an appeal?\nJurisdiction: Aetna\n\nPart sq1: How do I file an appeal?\nAnswer: File within 60 days.\n\nWrite the combined reply."
    );
  });

  it("should render the part answers when the LLM fails", async () => {
    const result = await synthesizeFinalMessage(new FakeLlm(), input, async () => undefined);
    expect(result).toEqual({ message: expectedFallback, usage: null, fallback: true });
  });

  it("should fall back after a stream that fails part way", async () => {
    const chunks: string[] = [];

    const result = await synthesizeFinalMessage(new BrokenStreamLlm({}, "Partial reply "), input, async (chunk) => {
      chunks.push(chunk);
    });

    expect(chunks).toEqual(["Partial reply "]);
    expect(result).toEqual({ message: expectedFallback, usage: null, fallback: true });
  });

  it("should render the part answers when the LLM returns only whitespace", async () => {
    const result = await synthesizeFinalMessage(new FakeLlm({ integrator: "   " }), input, async () => undefined);
    expect(result.message).toBe(expectedFallback);
    expect(result.fallback).toBe(true);
    expect(result.usage).toEqual({ ...TEST_USAGE, stage: "integrator" });
  });
});

describe("rollupUsage", () => {
  it("should price each stage and total tokens and cost", () => {
    const rollup = rollupUsage([
      { provider: "google", model: "gemini-2.5-flash", inputTokens: 1_000_000, outputTokens: 100_000, stage: "plan" },
      { ...TEST_USAGE, stage: "rag" },
    ]);

    expect(rollup.breakdown.map((b) => [b.stage, b.model, b.cost_usd])).toEqual([
      ["plan", "gemini-2.5-flash", 0.55],
      ["rag", "test-model", 0],
    ]);
    expect(rollup.tokensUsed).toEqual({ input_tokens: 1_000_010, output_tokens: 100_005 });
    expect(rollup.costUsd).toBeCloseTo(0.55);
    expect(rollup.modelUsed).toBe("gemini-2.5-flash");
  });

  it("should return zeros without usage", () => {
    expect(rollupUsage([])).toEqual({
      breakdown: [],
      tokensUsed: { input_tokens: 0, output_tokens: 0 },
      costUsd: 0,
      modelUsed: null,
    });
  });
});
