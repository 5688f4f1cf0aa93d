import { describeError } from "../../utils/errors";
import { logWarn } from "../../utils/logger";
import type { LlmProvider } from "../../llm/types";
import type { StagedUsage } from "../types";

const REASONING_SYSTEM_PROMPT = `You are a helpful assistant for healthcare policy questions. The user asked something that does not require looking up documents.

Provide a clear, concise explanation using general knowledge. If you're unsure, say so. Keep it conversational and not overly long. Never ask for or use patient-specific details.`;

export const REASONING_FAILURE_ANSWER = "I had trouble generating an answer. Please try again.";
export const REASONING_EMPTY_ANSWER =
  "I'm not sure how to answer that. Could you rephrase or provide more context?";

export interface ReasoningAnswer {
  answer: string;
  usage: StagedUsage | null;
}

/** LLM-only answer with no retrieval context. Never throws. */
export async function answerWithReasoning(
  llm: LlmProvider,
  question: string,
  correlationId?: string
): Promise<ReasoningAnswer> {
  try {
    const { text, usage } = await llm.generate(`User question: ${question}\n\nAnswer:`, {
      stage: "reasoning",
      system: REASONING_SYSTEM_PROMPT,
      logContext: { correlationId },
    });
    const answer = text.trim() || REASONING_EMPTY_ANSWER;
    return { answer, usage: { ...usage, stage: "reasoning" } };
  } catch (error) {
    logWarn("reasoning_agent_failed", { correlationId, stage: "resolve", error: describeError(error) });
    return { answer: REASONING_FAILURE_ANSWER, usage: null };
  }
}
