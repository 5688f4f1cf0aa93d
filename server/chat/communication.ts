/**
 * Communication gate: the single path for user-facing output of a run.
 *
 * thinking       -> progress line, no LLM
 * clarification  -> LLM phrasing (communication stage), raw text on failure
 * refinement_ask -> same as clarification
 * final          -> message chunk, or the whole message when `replace` is set
 */

import { describeError } from "../utils/errors";
import { logDebug } from "../utils/logger";
import type { LlmProvider } from "../llm/types";
import type { ProgressStore } from "./progressStore";
import type { StagedUsage } from "./types";

export type UserPayload =
  | { type: "thinking"; content: string }
  | { type: "clarification"; content: string; slots: readonly string[] }
  | { type: "refinement_ask"; content: string; original: string; suggestions: readonly string[] }
  | { type: "final"; content: string; replace?: boolean };

export interface CommunicationDeps {
  progress: ProgressStore;
  llm: LlmProvider;
}

export interface Delivered {
  text: string;
  usage: StagedUsage | null;
}

export const MAX_PHRASED_WORDS = 25;

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function clarificationPrompt(draft: string, slots: readonly string[]): string {
  const needed = slots.map((s) => s.replace(/^jurisdiction\./, "")).join(", ") || "jurisdiction";
  return `We need to know the user's ${needed} before answering their healthcare policy question. Here is a draft prompt:
'${draft}'

Rewrite it as a single, friendly, conversational sentence. Do not use markdown, bullets, or parentheses. Keep it under ${MAX_PHRASED_WORDS} words.`;
}

function refinementPrompt(draft: string, original: string, suggestions: readonly string[]): string {
  const options = suggestions.length > 0 ? suggestions.slice(0, 5).map((s) => `- ${s}`).join("\n") : "- the same question rephrased";
  return `The user's question might be ambiguous.
Original: ${original.slice(0, 200)}

Possible interpretations:
${options}

Draft reply: '${draft}'

Rewrite the draft as one friendly sentence asking the user to confirm which they meant or to rephrase. Do not use markdown. Keep it under ${MAX_PHRASED_WORDS} words.`;
}

/**
 * LLM rewording of a clarification or refinement ask. Falls back to the
 * draft on failure, on empty output or when the reply runs too long.
 */
async function phrase(
  llm: LlmProvider,
  prompt: string,
  draft: string,
  correlationId: string
): Promise<Delivered> {
  try {
    const { text, usage } = await llm.generate(prompt, {
      stage: "communication",
      temperature: 0.3,
      logContext: { correlationId },
    });
    const phrased = text.trim();
    const staged: StagedUsage = { ...usage, stage: "communication" };
    if (!phrased || wordCount(phrased) >= MAX_PHRASED_WORDS) {
      return { text: draft, usage: staged };
    }
    return { text: phrased, usage: staged };
  } catch (error) {
    logDebug("communication_phrasing_fallback", { correlationId, error: describeError(error) });
    return { text: draft, usage: null };
  }
}

/** Synchronous thinking path of the gate; returns the line as delivered. */
export function sendThinking(deps: CommunicationDeps, correlationId: string, content: string): string {
  const line = content.trim();
  if (line) deps.progress.appendThinking(correlationId, line);
  return line;
}

export async function sendToUser(
  deps: CommunicationDeps,
  correlationId: string,
  payload: UserPayload
): Promise<Delivered> {
  switch (payload.type) {
    case "thinking":
      return { text: sendThinking(deps, correlationId, payload.content), usage: null };

    case "clarification": {
      const delivered = await phrase(
        deps.llm,
        clarificationPrompt(payload.content, payload.slots),
        payload.content,
        correlationId
      );
      deps.progress.appendMessageChunk(correlationId, delivered.text);
      return delivered;
    }

    case "refinement_ask": {
      const delivered = await phrase(
        deps.llm,
        refinementPrompt(payload.content, payload.original, payload.suggestions),
        payload.content,
        correlationId
      );
      deps.progress.appendMessageChunk(correlationId, delivered.text);
      return delivered;
    }

    case "final":
      if (payload.replace) {
        deps.progress.replaceMessage(correlationId, payload.content);
      } else {
        deps.progress.appendMessageChunk(correlationId, payload.content);
      }
      return { text: payload.content, usage: null };

    default: {
      const unreachable: never = payload;
      throw new Error(`Unknown payload: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Emitter that routes each line through the gate as a thinking payload. */
export function createThinkingEmitter(
  deps: CommunicationDeps,
  correlationId: string,
  onLine?: (line: string) => void
): (line: string) => void {
  return (line) => {
    const delivered = sendThinking(deps, correlationId, line);
    if (delivered) onLine?.(delivered);
  };
}
