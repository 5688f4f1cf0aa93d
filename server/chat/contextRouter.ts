import type { ConversationTurn, ResetReason, ThreadState } from "./types";

export type ContextRoute = "STANDALONE" | "LIGHT" | "STATEFUL";

const PRONOUN_REFERENCE = /\b(that|this|above|same|previous|those|it|them)\b/i;
const NEW_TOPIC = /\b(new question|different topic|different question|new topic|switch to)\b/i;

const LIGHT_ASSISTANT_CHARS = 200;
const STATEFUL_ASSISTANT_CHARS = 300;
const STATEFUL_TURNS = 2;

/**
 * How much prior context the planner sees for this message.
 * No embeddings; keyword and state checks only.
 */
export function routeContext(
  message: string,
  state: ThreadState,
  _lastTurns: readonly ConversationTurn[],
  resetReason: ResetReason | null
): ContextRoute {
  const text = (message || "").trim();

  if (resetReason === "payer_change") return "STANDALONE";
  if (NEW_TOPIC.test(text)) return "STANDALONE";

  if (PRONOUN_REFERENCE.test(text)) return "STATEFUL";
  if (state.openSlots.length > 0) return "STATEFUL";
  if ((state.active.payer ?? "").trim() || state.active.domain) return "STATEFUL";

  return "LIGHT";
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Render the context header (and recent turns) prepended to the planner input.
 * Never includes patient-specific details; the header says so explicitly.
 */
export function buildContextPack(
  route: ContextRoute,
  state: ThreadState,
  lastTurns: readonly ConversationTurn[],
  openSlots: readonly string[]
): string {
  if (route === "STANDALONE") return "";

  const active = state.active;
  const payers = active.payers.map((p) => p.trim()).filter(Boolean);
  const payer = payers.length > 0 ? payers.join(", ") : (active.payer ?? "").trim() || "-";
  const domain = active.domain ?? "-";
  const jurisdiction = (active.jurisdiction ?? "").trim() || "-";
  const role = active.userRole ?? "-";
  const slots = openSlots.length > 0 ? openSlots.join(", ") : "none";

  const header =
    `Context: payer=${payer}; domain=${domain}; jurisdiction=${jurisdiction}; role=${role}. ` +
    `Open questions: ${slots}. Do not use patient-specific details.`;

  if (route === "LIGHT") {
    const last = lastTurns[lastTurns.length - 1];
    if (!last) return `${header}\n\n`;
    const assistant = clip(last.assistantContent.trim(), LIGHT_ASSISTANT_CHARS);
    return `${header}\n\nLast turn:\nUser: ${last.userContent.trim()}\nAssistant: ${assistant}\n\n`;
  }

  const parts = [header];
  lastTurns.slice(-STATEFUL_TURNS).forEach((turn, i) => {
    const assistant = clip(turn.assistantContent.trim(), STATEFUL_ASSISTANT_CHARS);
    parts.push(`Turn ${i + 1}:\nUser: ${turn.userContent.trim()}\nAssistant: ${assistant}`);
  });
  return `${parts.join("\n\n")}\n\n`;
}
