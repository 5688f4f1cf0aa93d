/**
 * INTEGRATE helpers: final message synthesis, confidence badge, citations
 * and the usage/cost rollup.
 */

import { calculateCost } from "../llm/pricing";
import { describeError } from "../utils/errors";
import { logWarn } from "../utils/logger";
import type { LlmProvider } from "../llm/types";
import type {
  IndexedSource,
  LlmUsage,
  Plan,
  RetrievalSignal,
  SourceConfidenceBadge,
  StagedUsage,
  UsageBreakdownEntry,
} from "./types";

export const FALLBACK_INTRO = "Here’s what I found based on your question.";

const INTEGRATOR_SYSTEM_PROMPT = `You combine answers to the parts of a user's healthcare policy question into one reply.

Rules:
- Keep every fact and every [n] citation marker from the part answers; never invent new markers.
- Drop per-part "Sources:" lists; the client shows sources separately.
- Answer in plain, friendly prose. Use short paragraphs or bullets when there are several parts.
- Say so plainly when a part could not be answered.
- Never ask for or use patient-specific details.`;

// ===== CONFIDENCE BADGE =====

export function sourceConfidenceBadge(
  signals: readonly RetrievalSignal[],
  sources: readonly Pick<IndexedSource, "confidenceLabel">[]
): SourceConfidenceBadge {
  if (signals.length === 0 || signals.includes("no_sources")) return "no_sources";
  if (signals.includes("google_only")) return "informational_only";
  if (signals.includes("corpus_plus_google")) return "augmented_with_google";

  const labels = sources.flatMap((s) => (s.confidenceLabel ? [s.confidenceLabel] : []));
  if (labels.includes("process_with_caution")) return "proceed_with_caution";
  if (labels.length > 0 && labels.every((l) => l === "process_confident")) return "approved_authoritative";
  return "approved_informational";
}

// ===== CITATIONS =====

/** `[n]` markers in the text, restricted to 1..sourceCount, unique and ascending. */
export function extractCitedIndices(text: string, sourceCount: number): number[] {
  const cited = new Set<number>();
  for (const match of text.matchAll(/\[(\d+)\]/g)) {
    const n = Number(match[1]);
    if (Number.isInteger(n) && n >= 1 && n <= sourceCount) cited.add(n);
  }
  return [...cited].sort((a, b) => a - b);
}

// ===== SYNTHESIS =====

export function renderFallbackMessage(plan: Plan, answers: readonly string[]): string {
  const lines = [`${FALLBACK_INTRO}\n`];
  plan.subquestions.forEach((sq, i) => {
    const answer = answers[i] ?? "[No answer yet]";
    const label = sq.kind === "patient" ? "Personal (we don’t have access yet)" : "Policy/document";
    lines.push(`**${sq.id}** (${label}): ${sq.text}`);
    lines.push(`→ ${answer}\n`);
  });
  return lines.join("\n");
}

function buildIntegratorPrompt(
  plan: Plan,
  answers: readonly string[],
  userMessage: string,
  jurisdiction: string
): string {
  const parts = plan.subquestions
    .map((sq, i) => `Part ${sq.id}: ${sq.text}\nAnswer: ${answers[i] ?? "(no answer)"}`)
    .join("\n\n");
  const scope = jurisdiction ? `\nJurisdiction: ${jurisdiction}` : "";
  return `User message: ${userMessage}${scope}\n\n${parts}\n\nWrite the combined reply.`;
}

export interface SynthesisResult {
  message: string;
  usage: StagedUsage | null;
  fallback: boolean;
}

/**
 * Streams the combined reply, passing each chunk to `onChunk`. Any LLM
 * failure (or an empty reply) yields the deterministic rendering instead.
 */
export async function synthesizeFinalMessage(
  llm: LlmProvider,
  input: {
    plan: Plan;
    answers: readonly string[];
    userMessage: string;
    jurisdiction: string;
    correlationId?: string;
  },
  onChunk: (chunk: string) => Promise<void>
): Promise<SynthesisResult> {
  // filled by the stream's onUsage callback
  const reported: { usage: LlmUsage | null } = { usage: null };
  let text = "";

  try {
    const stream = llm.streamGenerate(
      buildIntegratorPrompt(input.plan, input.answers, input.userMessage, input.jurisdiction),
      {
        stage: "integrator",
        system: INTEGRATOR_SYSTEM_PROMPT,
        temperature: 0.2,
        logContext: { correlationId: input.correlationId },
        onUsage: (u) => {
          reported.usage = u;
        },
      }
    );
    for await (const chunk of stream) {
      if (!chunk) continue;
      text += chunk;
      await onChunk(chunk);
    }
  } catch (error) {
    logWarn("integrator_failed", { correlationId: input.correlationId, stage: "integrate", error: describeError(error) });
    return { message: renderFallbackMessage(input.plan, input.answers), usage: null, fallback: true };
  }

  const staged: StagedUsage | null = reported.usage ? { ...reported.usage, stage: "integrator" } : null;
  if (!text.trim()) {
    return { message: renderFallbackMessage(input.plan, input.answers), usage: staged, fallback: true };
  }
  return { message: text.trim(), usage: staged, fallback: false };
}

// ===== USAGE =====

function roundUsd(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

export interface UsageRollup {
  breakdown: UsageBreakdownEntry[];
  tokensUsed: { input_tokens: number; output_tokens: number };
  costUsd: number;
  modelUsed: string | null;
}

export function rollupUsage(usages: readonly StagedUsage[]): UsageRollup {
  const breakdown = usages.map(
    (u): UsageBreakdownEntry => ({
      stage: u.stage,
      model: u.model,
      provider: u.provider,
      input_tokens: u.inputTokens,
      output_tokens: u.outputTokens,
      cost_usd: roundUsd(calculateCost(u)),
    })
  );
  const total = usages.reduce((sum, u) => sum + calculateCost(u), 0);
  return {
    breakdown,
    tokensUsed: {
      input_tokens: usages.reduce((sum, u) => sum + u.inputTokens, 0),
      output_tokens: usages.reduce((sum, u) => sum + u.outputTokens, 0),
    },
    costUsd: roundUsd(total),
    modelUsed: usages[0]?.model ?? null,
  };
}
