/**
 * Slot fill vs new question, and the refined query carried across turns.
 *
 *   "how do I file an appeal"      -> refined query "how do I file an appeal"
 *   (assistant asks for the payer)
 *   "Sunshine Health"              -> slot_fill, "how do I file an appeal for Sunshine Health"
 *   "how do I check eligibility"   -> new_question, refined query replaced
 */

import { getJurisdiction, jurisdictionSummary } from "./jurisdiction";
import { detectPayers, detectProgram, detectState, detectUserRole } from "./referenceData";
import type { ConversationTurn, Jurisdiction, MessageClassification, ThreadState } from "./types";

const NEW_QUESTION_PATTERNS: readonly RegExp[] = [
  /\b(how do i|how do you|what is|what are|when does|where do)\b/i,
  /\b(also|and then|what about|different question|new topic)\b/i,
];

const AFFIRMATION_PATTERN = /\b(same|that one|that|yes)\b/i;

function tokenCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function isNewQuestionShaped(text: string): boolean {
  return NEW_QUESTION_PATTERNS.some((pattern) => pattern.test(text));
}

/** Short reply naming a payer, state, program or role. */
export function looksLikeSlotAnswer(text: string): boolean {
  const t = text.trim();
  if (!t || tokenCount(t) > 5) return false;
  return (
    detectPayers(t).length > 0 ||
    detectState(t) !== null ||
    detectProgram(t) !== null ||
    detectUserRole(t) !== null
  );
}

const CLARIFICATION_HINTS = ["health plan", "payer", "which", "specify", "state", "program", "medicare", "medicaid"];

/** True when the previous assistant message reads like a jurisdiction question. */
export function lastTurnWasClarification(lastTurn: ConversationTurn | null): boolean {
  if (!lastTurn) return false;
  const content = lastTurn.assistantContent.toLowerCase();
  return CLARIFICATION_HINTS.some((hint) => content.includes(hint));
}

export function classifyMessage(
  message: string,
  lastTurn: ConversationTurn | null,
  openSlots: readonly string[],
  lastRefinedQuery: string | null
): MessageClassification {
  const text = (message || "").trim();
  if (!text) return "new_question";
  const tokens = tokenCount(text);

  if (openSlots.length > 0) {
    if (looksLikeSlotAnswer(text)) return "slot_fill";
    if (AFFIRMATION_PATTERN.test(text) && tokens <= 4) return "slot_fill";
  } else if (lastTurnWasClarification(lastTurn) && looksLikeSlotAnswer(text)) {
    // slots can be lost when the thread state failed to persist
    return "slot_fill";
  }

  if (tokens >= 4 && isNewQuestionShaped(text)) return "new_question";

  if (lastRefinedQuery && tokens <= 4 && !text.endsWith("?")) return "slot_fill";

  return "new_question";
}

/**
 * Append " for {jurisdiction summary}" to the base query, unless the summary
 * already appears in it (case-insensitive) or either side is empty.
 */
export function buildRefinedQuery(base: string, jurisdiction: Jurisdiction | null): string {
  const trimmed = (base || "").trim();
  if (!trimmed) return trimmed;

  const summary = jurisdictionSummary(jurisdiction);
  if (!summary) return trimmed;
  if (trimmed.toLowerCase().includes(summary.toLowerCase())) return trimmed;

  return `${trimmed} for ${summary}`;
}

/**
 * slot_fill merges the current jurisdiction into the previous refined query;
 * a new question starts from the first planned sub-question (or the raw
 * message) and gets the known jurisdiction merged in the same way.
 */
export function computeRefinedQuery(
  classification: MessageClassification,
  message: string,
  lastRefinedQuery: string | null,
  state: ThreadState,
  planSubquestionText: string | null
): string {
  const jurisdiction = getJurisdiction(state.active);
  if (classification === "slot_fill" && lastRefinedQuery) {
    return buildRefinedQuery(lastRefinedQuery, jurisdiction);
  }
  const planned = (planSubquestionText ?? "").trim();
  return buildRefinedQuery(planned || message, jurisdiction);
}
