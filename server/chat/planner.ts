/**
 * Planner: decompose a message into sub-questions and classify each.
 *
 * LLM decomposition (JSON) first; on any failure a rule-based split on the
 * configured separators. Kind, intent and score fall back to keyword and
 * prefix heuristics when the LLM omits or garbles them. Emits user-facing
 * thinking lines as it goes.
 */

import { z } from "zod";
import { QUESTION_INTENTS, RAG_FAIL_DIRECTIVES, SUBQUESTION_KINDS } from "@shared/chatProtocol";
import { chatConfig } from "./chatConfig";
import { capabilitiesForPlanner } from "./agents/capabilities";
import { intentToScore } from "./retrievalBlend";
import { escapeRegExp, phrasePattern } from "./referenceData";
import { describeError } from "../utils/errors";
import { logInfo, logWarn } from "../utils/logger";
import type { LlmProvider } from "../llm/types";
import type {
  LlmUsage,
  Plan,
  QuestionIntent,
  RagFailDirective,
  SubQuestion,
  SubQuestionKind,
  ThinkingEmitter,
} from "./types";

export interface PlannerConfig {
  separators: readonly string[];
  patientKeywords: readonly string[];
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  separators: chatConfig.DECOMPOSITION_SEPARATORS,
  patientKeywords: chatConfig.PATIENT_KEYWORDS,
};

export interface PlannerDeps {
  llm: LlmProvider | null;
  /** Context pack plus capabilities, prepended to the decomposition prompt. */
  context?: string;
  emit?: ThinkingEmitter;
  correlationId?: string;
  config?: PlannerConfig;
}

const TOOL_TRIGGERS = ["search for", "look up", "google", "scrape", "can you search", "what can you do"];
const TOOL_TRIGGER_PATTERN = phrasePattern(TOOL_TRIGGERS);

const FACTUAL_STARTS = ["what is", "what are", "how many", "when ", "where ", "which ", "who ", "what date", "what number"];
const CANONICAL_STARTS = ["describe", "explain", "how does", "how do ", "what is the process", "summarize", "outline"];

// ===== HEURISTICS =====

export function splitOnSeparators(text: string, separators: readonly string[]): string[] {
  const seps = separators.length > 0 ? separators : DEFAULT_PLANNER_CONFIG.separators;
  const pattern = new RegExp(seps.map(escapeRegExp).join("|"), "i");
  const parts = text
    .split(pattern)
    .map((p) => p.trim())
    .filter(Boolean);
  return parts.length > 0 ? parts : [text];
}

export function classifyKind(text: string, patientKeywords: readonly string[]): "patient" | "non_patient" {
  return phrasePattern(patientKeywords).test(text) ? "patient" : "non_patient";
}

export function hasToolTrigger(text: string): boolean {
  return TOOL_TRIGGER_PATTERN.test(text);
}

/** Prefix heuristic; factual prefixes are checked first. */
export function heuristicIntent(text: string): QuestionIntent | null {
  const t = text.trim().toLowerCase();
  if (FACTUAL_STARTS.some((p) => t.startsWith(p))) return "factual";
  if (CANONICAL_STARTS.some((p) => t.startsWith(p))) return "canonical";
  return null;
}

// ===== LLM DECOMPOSITION =====

const DECOMPOSE_SYSTEM_PROMPT = `You split a user's message to a healthcare policy assistant into sub-questions.

Return ONLY JSON:
{"subquestions":[{"id":"sq1","text":"...","kind":"non_patient","question_intent":"canonical","intent_score":0.2,"requires_jurisdiction":true,"on_rag_fail":[],"capabilities_primary":null}]}

Rules:
- kind: "patient" when the user asks about their own records, eligibility or care; "tool" for explicit web search, scrape or capability questions; otherwise "non_patient".
- question_intent: "factual" for a specific fact or lookup, "canonical" for a process or policy description.
- intent_score: 0 = canonical, 1 = factual.
- requires_jurisdiction: false for meta or capability questions that do not depend on payer, state or program.
- on_rag_fail: ["search_google"] when a web search would help if our materials have nothing; ["reasoning"] when a general explanation would do.
- capabilities_primary: "rag", "tools", "web" or "reasoning".
- Keep each sub-question self-contained. Do not answer the question.`;

const optionalString = z.string().nullable().optional().catch(undefined);

const llmSubquestionSchema = z.union([
  z.string(),
  z.object({
    id: optionalString,
    text: z.string().catch(""),
    kind: optionalString,
    question_intent: optionalString,
    intent_score: z.number().nullable().optional().catch(undefined),
    requires_jurisdiction: z.boolean().nullable().optional().catch(undefined),
    on_rag_fail: z.array(z.string()).optional().catch(undefined),
    capabilities_primary: optionalString,
  }),
]);

const llmPlanSchema = z.object({
  subquestions: z.array(llmSubquestionSchema),
});

interface DraftSubquestion {
  id: string;
  text: string;
  kind: SubQuestionKind | null;
  intent: QuestionIntent | null;
  score: number | null;
  requiresJurisdiction: boolean | null;
  onRagFail: RagFailDirective[];
  capabilitiesPrimary: string | null;
}

function normalizeKind(value: string | null | undefined): SubQuestionKind | null {
  const v = (value ?? "").trim().toLowerCase();
  return SUBQUESTION_KINDS.find((k) => k === v) ?? null;
}

function normalizeIntent(value: string | null | undefined): QuestionIntent | null {
  const v = (value ?? "").trim().toLowerCase();
  if (v === "procedural" || v === "diagnostic") return "canonical";
  return QUESTION_INTENTS.find((i) => i === v) ?? null;
}

function normalizeDirectives(values: readonly string[] | undefined): RagFailDirective[] {
  const out = new Set<RagFailDirective>();
  for (const raw of values ?? []) {
    const v = raw.trim().toLowerCase();
    const direct = RAG_FAIL_DIRECTIVES.find((d) => d === v);
    if (direct) out.add(direct);
    else if (v.includes("web") || v.includes("google") || v.includes("search")) out.add("search_google");
  }
  return [...out];
}

/**
 * Strip code fences and parse the decomposition JSON. Returns null for
 * anything that is not a non-empty subquestion list.
 */
export function parseDecomposition(raw: string): DraftSubquestion[] | null {
  if (!raw.trim() || !raw.includes("subquestions") || !raw.includes("{")) return null;

  const cleaned = raw
    .replace(/```json\n?/g, "")
    .replace(/```\n?/g, "")
    .trim();

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch {
    return null;
  }

  const parsed = llmPlanSchema.safeParse(json);
  if (!parsed.success) return null;

  const drafts: DraftSubquestion[] = [];
  parsed.data.subquestions.forEach((item, i) => {
    const fallbackId = `sq${i + 1}`;
    if (typeof item === "string") {
      const text = item.trim();
      if (text) {
        drafts.push({
          id: fallbackId,
          text,
          kind: null,
          intent: heuristicIntent(text),
          score: null,
          requiresJurisdiction: null,
          onRagFail: [],
          capabilitiesPrimary: null,
        });
      }
      return;
    }

    const text = item.text.trim();
    if (!text) return;
    const score =
      typeof item.intent_score === "number" && item.intent_score >= 0 && item.intent_score <= 1
        ? Math.round(item.intent_score * 100) / 100
        : null;
    drafts.push({
      id: (item.id ?? "").trim() || fallbackId,
      text,
      kind: normalizeKind(item.kind),
      intent: normalizeIntent(item.question_intent) ?? heuristicIntent(text),
      score,
      requiresJurisdiction: typeof item.requires_jurisdiction === "boolean" ? item.requires_jurisdiction : null,
      onRagFail: normalizeDirectives(item.on_rag_fail),
      capabilitiesPrimary: (item.capabilities_primary ?? "").trim().toLowerCase() || null,
    });
  });

  return drafts.length > 0 ? drafts : null;
}

async function llmDecompose(
  message: string,
  deps: PlannerDeps
): Promise<{ drafts: DraftSubquestion[] | null; usage: LlmUsage | null }> {
  if (!deps.llm) return { drafts: null, usage: null };

  const context = deps.context ? `${deps.context}\n\n` : "";
  const prompt = `${context}Available paths and capabilities: ${capabilitiesForPlanner()}\n\nUser message: ${message}`;

  try {
    const { text, usage } = await deps.llm.generate(prompt, {
      stage: "planner",
      system: DECOMPOSE_SYSTEM_PROMPT,
      temperature: 0,
      logContext: { correlationId: deps.correlationId },
    });
    const drafts = parseDecomposition(text);
    if (!drafts) {
      logWarn("plan_decomposition_unparseable", { correlationId: deps.correlationId, stage: "plan" });
    }
    return { drafts, usage };
  } catch (error) {
    logWarn("plan_decomposition_failed", {
      correlationId: deps.correlationId,
      stage: "plan",
      error: describeError(error),
    });
    return { drafts: null, usage: null };
  }
}

function ruleBasedDecompose(text: string, separators: readonly string[]): DraftSubquestion[] {
  return splitOnSeparators(text, separators).map((part, i) => ({
    id: `sq${i + 1}`,
    text: part,
    kind: null,
    intent: null,
    score: null,
    requiresJurisdiction: null,
    onRagFail: [],
    capabilitiesPrimary: null,
  }));
}

function finalize(draft: DraftSubquestion, config: PlannerConfig): SubQuestion {
  const keywordKind = classifyKind(draft.text, config.patientKeywords);
  const toolTriggered = hasToolTrigger(draft.text);

  let kind: SubQuestionKind;
  if (draft.kind === "patient" || keywordKind === "patient") kind = "patient";
  else if (toolTriggered || draft.kind === "tool") kind = "tool";
  else kind = "non_patient";

  const intent = draft.intent ?? heuristicIntent(draft.text);
  const requiresJurisdiction = kind === "tool" ? false : draft.requiresJurisdiction;

  return {
    id: draft.id,
    text: draft.text,
    kind,
    questionIntent: intent,
    intentScore: draft.score ?? intentToScore(intent),
    onRagFail: draft.onRagFail,
    capabilitiesPrimary: kind === "tool" ? draft.capabilitiesPrimary ?? "tools" : draft.capabilitiesPrimary,
    requiresJurisdiction,
  };
}

function snippet(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export async function planMessage(message: string, deps: PlannerDeps): Promise<Plan> {
  const config = deps.config ?? DEFAULT_PLANNER_CONFIG;
  const thinkingLog: string[] = [];
  const emit = (line: string): void => {
    const trimmed = line.trim();
    if (!trimmed) return;
    thinkingLog.push(trimmed);
    deps.emit?.(trimmed);
  };

  const text = (message || "").trim();
  emit("I'm reading your question and breaking it down.");
  if (!text) {
    emit("You didn't ask anything yet. Please type a question.");
    return { subquestions: [], thinkingLog, llmUsage: null };
  }

  const { drafts: llmDrafts, usage } = await llmDecompose(text, deps);
  let drafts: DraftSubquestion[];
  if (llmDrafts) {
    drafts = llmDrafts;
    emit(`I broke your question into ${plural(drafts.length, "part")}.`);
  } else {
    emit("I'm splitting your message into clear parts.");
    drafts = ruleBasedDecompose(text, config.separators);
  }

  const subquestions = drafts.map((d) => finalize(d, config));

  for (const sq of subquestions) {
    switch (sq.kind) {
      case "patient":
        emit(`• ${sq.id}: "${snippet(sq.text)}" - This looks personal; I don't have access to your records.`);
        break;
      case "tool":
        emit(`• ${sq.id}: "${snippet(sq.text)}" - I'll use a tool for this.`);
        break;
      case "non_patient":
        emit(`• ${sq.id}: "${snippet(sq.text)}" - I can look this up.`);
        break;
    }
  }

  const patientCount = subquestions.filter((sq) => sq.kind === "patient").length;
  if (patientCount === 0) {
    emit("Nothing personal in there. I can answer from what we have on file.");
  } else if (patientCount === subquestions.length) {
    emit("These are about your own info. I can't access that yet, so I'll say so where it comes up.");
  } else {
    emit(`One part is about your own info; I'll answer the other ${subquestions.length - patientCount} from our materials.`);
  }
  emit(subquestions.length === 1 ? "I'll answer that for you." : `I'll answer these ${subquestions.length} parts for you.`);

  logInfo("plan_built", {
    correlationId: deps.correlationId,
    stage: "plan",
    subquestions: subquestions.length,
    source: llmDrafts ? "llm" : "rules",
  });

  return { subquestions, thinkingLog, llmUsage: usage };
}

/** Single sub-question plan used when planning fails outright. */
export function minimalPlan(message: string): Plan {
  const text = (message || "").trim() || "What can you help with?";
  return {
    subquestions: [
      {
        id: "sq1",
        text,
        kind: "non_patient",
        questionIntent: "canonical",
        intentScore: 0.5,
        onRagFail: [],
        capabilitiesPrimary: null,
        requiresJurisdiction: null,
      },
    ],
    thinkingLog: [],
    llmUsage: null,
  };
}
