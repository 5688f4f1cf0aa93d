/**
 * Pipeline stages over one PipelineRun:
 *
 *   STATE_LOAD -> CLASSIFY -> PLAN -> CLARIFY -> {early exit | RESOLVE -> INTEGRATE} -> PUBLISH
 *
 * Each stage reads and fills fields of the run. The orchestrator owns the
 * sequencing and the failure boundary.
 */

import { answerSubquestion } from "./agents/agentRouter";
import { buildBlueprint } from "./blueprint";
import { buildClarificationOptions, needJurisdictionClarification, needQueryRefinement } from "./clarification";
import { createThinkingEmitter, sendToUser, type CommunicationDeps } from "./communication";
import { buildContextPack, routeContext } from "./contextRouter";
import { wrapEmitterForUser } from "./emitAdapter";
import {
  extractCitedIndices,
  rollupUsage,
  sourceConfidenceBadge,
  synthesizeFinalMessage,
} from "./integrator";
import { getJurisdiction, jurisdictionSummary, ragFiltersFromActive } from "./jurisdiction";
import { buildRefinedQuery, classifyMessage, computeRefinedQuery } from "./messageClassifier";
import { minimalPlan, planMessage } from "./planner";
import { toPlanSnapshot } from "./planStore";
import { decayDelta, extractStateDelta } from "./stateExtractor";
import { applyDelta, defaultThreadState } from "./threadState";
import { GENERIC_FAILURE_MESSAGE, describeError } from "../utils/errors";
import { logDebug, logInfo, logWarn, sanitizeUserContent } from "../utils/logger";
import type { ChatContext } from "../appContext";
import type { AgentDeps } from "./agents/types";
import type { TurnRecord } from "../storage/types";
import type {
  BlueprintEntry,
  ConversationTurn,
  IndexedSource,
  MessageClassification,
  Plan,
  QueueRequest,
  ResetReason,
  ResponsePayload,
  ResponseSource,
  ResponseStatus,
  RetrievalSignal,
  StagedUsage,
  ThinkingEmitter,
  ThreadState,
} from "./types";

export type PipelineStage = "state_load" | "classify" | "plan" | "clarify" | "resolve" | "integrate" | "publish";

/** Transient per-request aggregate, discarded after publish. */
export interface PipelineRun {
  readonly correlationId: string;
  readonly threadId: string | null;
  readonly message: string;
  effectiveMessage: string;
  classification: MessageClassification;
  state: ThreadState;
  /** Open slots as they stood before this message was extracted. */
  priorOpenSlots: string[];
  resetReason: ResetReason | null;
  lastTurns: ConversationTurn[];
  lastTurnSources: ResponseSource[];
  contextPack: string;
  plan: Plan | null;
  blueprint: BlueprintEntry[];
  refinedQuery: string | null;
  answers: string[];
  sources: IndexedSource[];
  signals: RetrievalSignal[];
  usages: StagedUsage[];
  thinkingLog: string[];
  payload: ResponsePayload | null;
  emit: ThinkingEmitter;
}

export function createPipelineRun(ctx: ChatContext, request: QueueRequest): PipelineRun {
  const thinkingLog: string[] = [];
  return {
    correlationId: request.correlation_id,
    threadId: request.thread_id,
    message: request.message.trim(),
    effectiveMessage: request.message.trim(),
    classification: "new_question",
    state: defaultThreadState(),
    priorOpenSlots: [],
    resetReason: null,
    lastTurns: [],
    lastTurnSources: [],
    contextPack: "",
    plan: null,
    blueprint: [],
    refinedQuery: null,
    answers: [],
    sources: [],
    signals: [],
    usages: [],
    thinkingLog,
    payload: null,
    emit: createThinkingEmitter(communicationDeps(ctx), request.correlation_id, (line) => thinkingLog.push(line)),
  };
}

function communicationDeps(ctx: ChatContext): CommunicationDeps {
  return { progress: ctx.progress, llm: ctx.llm };
}

/**
 * Persistence never decides the outcome of a run: failures are logged and
 * the fallback value is used.
 */
async function bestEffort<T>(run: PipelineRun, operation: string, fn: () => Promise<T>, fallback: T): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logWarn("persistence_failed", {
      correlationId: run.correlationId,
      threadId: run.threadId ?? undefined,
      operation,
      error: describeError(error),
    });
    return fallback;
  }
}

// ===== PAYLOADS =====

function toResponseSource(source: IndexedSource): ResponseSource {
  return {
    index: source.index,
    document_id: source.documentId,
    document_name: source.documentName,
    page_number: source.pageNumber,
    source_type: source.sourceType,
    match_score: source.matchScore,
    confidence_label: source.confidenceLabel,
    text: source.text,
  };
}

export function buildPayload(run: PipelineRun, status: ResponseStatus, message: string): ResponsePayload {
  const rollup = rollupUsage(run.usages);
  const sources = status === "completed" ? run.sources : [];
  return {
    status,
    message,
    plan: run.plan ? toPlanSnapshot(run.plan) : null,
    thinking_log: [...run.thinkingLog],
    response_source: "plan",
    model_used: rollup.modelUsed,
    tokens_used: rollup.tokensUsed,
    usage_breakdown: rollup.breakdown,
    cost_usd: rollup.costUsd,
    sources: sources.map(toResponseSource),
    source_confidence_strip: sourceConfidenceBadge(status === "completed" ? run.signals : [], sources),
    cited_source_indices: status === "completed" ? extractCitedIndices(message, sources.length) : [],
    thread_id: run.threadId,
  };
}

export function buildFailedPayload(run: PipelineRun): ResponsePayload {
  return buildPayload(run, "failed", GENERIC_FAILURE_MESSAGE);
}

// ===== STATE_LOAD =====

export async function loadState(ctx: ChatContext, run: PipelineRun): Promise<void> {
  const { persistence, config } = ctx;
  const threadId = run.threadId;

  const stored = threadId
    ? await bestEffort(run, "getState", () => persistence.getState(threadId), null)
    : null;

  const decay = decayDelta(stored ?? defaultThreadState(), config.STATE_DECAY_TURNS);
  const decayed = applyDelta(stored ?? defaultThreadState(), decay.delta);
  run.priorOpenSlots = [...decayed.openSlots];

  const extraction = extractStateDelta(run.message, decayed, run.correlationId);
  run.state = applyDelta(decayed, extraction.delta);
  run.resetReason = extraction.resetReason ?? decay.resetReason;

  if (run.resetReason === "payer_change") {
    run.emit("You switched plans, so I'm starting fresh on this question.");
  }

  if (threadId) {
    const state = run.state;
    await bestEffort(run, "saveState", () => persistence.saveState(threadId, state), undefined);
    run.lastTurns = await bestEffort(
      run,
      "getLastTurnMessages",
      () => persistence.getLastTurnMessages(threadId, config.CONTEXT_TURNS),
      []
    );
    run.lastTurnSources = await bestEffort(run, "getLastTurnSources", () => persistence.getLastTurnSources(threadId), []);
  }

  const route = routeContext(run.message, run.state, run.lastTurns, run.resetReason);
  run.contextPack = buildContextPack(route, run.state, run.lastTurns, run.state.openSlots);

  logDebug("state_loaded", {
    correlationId: run.correlationId,
    threadId: threadId ?? undefined,
    stage: "state_load",
    route,
    resetReason: run.resetReason,
    openSlots: run.state.openSlots,
    payer: run.state.active.payer,
  });
}

// ===== CLASSIFY =====

export function classify(run: PipelineRun): void {
  const lastTurn = run.lastTurns[run.lastTurns.length - 1] ?? null;
  run.classification = classifyMessage(run.message, lastTurn, run.priorOpenSlots, run.state.refinedQuery);

  if (run.classification === "slot_fill" && run.state.refinedQuery) {
    run.effectiveMessage = buildRefinedQuery(run.state.refinedQuery, getJurisdiction(run.state.active));
  } else {
    run.effectiveMessage = run.message;
  }

  logInfo("message_classified", {
    correlationId: run.correlationId,
    stage: "classify",
    classification: run.classification,
    effectiveMessage: sanitizeUserContent(run.effectiveMessage),
  });
}

// ===== PLAN =====

export async function plan(ctx: ChatContext, run: PipelineRun): Promise<void> {
  let planned: Plan;
  try {
    planned = await planMessage(run.effectiveMessage, {
      llm: ctx.llm,
      context: run.contextPack || undefined,
      emit: run.emit,
      correlationId: run.correlationId,
    });
  } catch (error) {
    logWarn("plan_failed", { correlationId: run.correlationId, stage: "plan", error: describeError(error) });
    planned = minimalPlan(run.effectiveMessage);
  }
  if (planned.subquestions.length === 0) {
    planned = { ...minimalPlan(run.effectiveMessage), llmUsage: planned.llmUsage };
  }

  run.plan = planned;
  if (planned.llmUsage) run.usages.push({ ...planned.llmUsage, stage: "plan" });

  run.refinedQuery = computeRefinedQuery(
    run.classification,
    run.message,
    run.state.refinedQuery,
    run.state,
    planned.subquestions[0]?.text ?? null
  );
  run.blueprint = buildBlueprint(planned, ctx.config.RAG_DEFAULT_K);
  ctx.plans.save(run.correlationId, planned);
}

// ===== CLARIFY =====

function refinementDraft(suggestions: readonly string[]): string {
  const first = (suggestions[0] ?? "").trim().replace(/\?+$/, "");
  if (!first) return "Could you rephrase your question with a bit more detail?";
  return `Did you mean: ${first}? Or would you like to rephrase your question?`;
}

/** Returns true when the run exits early with a clarification or refinement ask. */
export async function clarify(ctx: ChatContext, run: PipelineRun): Promise<boolean> {
  const subquestions = run.plan?.subquestions ?? [];
  const comm = communicationDeps(ctx);

  const jurisdiction = needJurisdictionClarification(subquestions, run.state.active);
  if (jurisdiction.needed) {
    const draft = jurisdiction.message ?? "Which health plan or payer are you asking about?";
    const delivered = await sendToUser(comm, run.correlationId, {
      type: "clarification",
      content: draft,
      slots: jurisdiction.missingSlots,
    });
    if (delivered.usage) run.usages.push(delivered.usage);
    run.state = applyDelta(run.state, { openSlots: [...jurisdiction.missingSlots] });
    run.payload = {
      ...buildPayload(run, "clarification", delivered.text),
      open_slots: [...jurisdiction.missingSlots],
      clarification_options: buildClarificationOptions(jurisdiction.missingSlots),
    };
    return true;
  }

  const refinement = needQueryRefinement(subquestions, ctx.config);
  if (refinement.needed) {
    const delivered = await sendToUser(comm, run.correlationId, {
      type: "refinement_ask",
      content: refinementDraft(refinement.suggestions),
      original: run.effectiveMessage,
      suggestions: refinement.suggestions,
    });
    if (delivered.usage) run.usages.push(delivered.usage);
    run.payload = {
      ...buildPayload(run, "refinement_ask", delivered.text),
      refinement_suggestions: [...refinement.suggestions],
    };
    return true;
  }

  return false;
}

// ===== RESOLVE =====

/** Sub-questions run in plan order; `[n]` numbering continues across them. */
export async function resolve(ctx: ChatContext, run: PipelineRun): Promise<void> {
  const subquestions = run.plan?.subquestions ?? [];
  const deps: AgentDeps = {
    llm: ctx.llm,
    search: ctx.search,
    web: ctx.web,
    externalSearchEnabled: ctx.env.EXTERNAL_SEARCH_ENABLED,
    neighborWindow: ctx.config.NEIGHBOR_WINDOW,
  };
  const emit = wrapEmitterForUser(run.emit, ctx.env.CHAT_DEBUG_RETRIEVAL_EMITS);
  const filters = ragFiltersFromActive(run.state.active);
  const preferredDocumentIds = [
    ...new Set(run.lastTurnSources.flatMap((s) => (s.document_id ? [s.document_id] : []))),
  ];

  for (const [i, subquestion] of subquestions.entries()) {
    const entry = run.blueprint[i];
    if (!entry) {
      throw new Error(`No blueprint entry for ${subquestion.id}`);
    }
    const offset = run.sources.length;
    const result = await answerSubquestion(
      {
        subquestion,
        entry,
        filters,
        preferredDocumentIds,
        sourceIndexOffset: offset,
        emit,
        correlationId: run.correlationId,
      },
      deps
    );

    run.answers.push(result.answer);
    run.signals.push(result.signal);
    result.sources.forEach((source, j) => run.sources.push({ ...source, index: offset + j + 1 }));
    if (result.usage) run.usages.push(result.usage);
  }
}

// ===== INTEGRATE =====

export async function integrate(ctx: ChatContext, run: PipelineRun): Promise<void> {
  const plan = run.plan ?? minimalPlan(run.effectiveMessage);
  const comm = communicationDeps(ctx);

  run.emit("Putting it all together...");

  const synthesis = await synthesizeFinalMessage(
    ctx.llm,
    {
      plan,
      answers: run.answers,
      userMessage: run.effectiveMessage,
      jurisdiction: jurisdictionSummary(getJurisdiction(run.state.active)),
      correlationId: run.correlationId,
    },
    async (chunk) => {
      await sendToUser(comm, run.correlationId, { type: "final", content: chunk });
    }
  );
  // Partial streamed text is dropped in favour of the rendered fallback.
  if (synthesis.fallback) {
    await sendToUser(comm, run.correlationId, { type: "final", content: synthesis.message, replace: true });
  }
  if (synthesis.usage) run.usages.push(synthesis.usage);

  run.payload = buildPayload(run, "completed", synthesis.message);
}

// ===== PUBLISH =====

function nextThreadState(run: PipelineRun): ThreadState {
  const firstIntent = run.plan?.subquestions[0]?.questionIntent ?? null;
  return applyDelta(run.state, {
    refinedQuery: run.refinedQuery,
    lastUserIntent: firstIntent,
    lastUpdatedTurnId: run.correlationId,
  });
}

/** Persists the turn, then writes the response, then clears live progress. */
export async function publish(ctx: ChatContext, run: PipelineRun, payload: ResponsePayload): Promise<void> {
  const { persistence } = ctx;
  const threadId = run.threadId;

  const record: TurnRecord = {
    correlationId: run.correlationId,
    threadId,
    question: run.message,
    status: payload.status,
    finalMessage: payload.message,
    sources: payload.sources,
    usageBreakdown: payload.usage_breakdown,
    costUsd: payload.cost_usd,
  };

  if (threadId) {
    await bestEffort<string | null>(run, "saveTurnWithMessages", () => persistence.saveTurnWithMessages(record, run.message, payload.message), null);
    if (payload.status !== "failed") {
      const state = nextThreadState(run);
      await bestEffort(run, "saveState", () => persistence.saveState(threadId, state), undefined);
    }
  } else {
    await bestEffort<string | null>(run, "saveTurn", () => persistence.saveTurn(record), null);
  }

  await bestEffort(
    run,
    "appendProgressEvent",
    async () => {
      for (const line of payload.thinking_log) {
        await persistence.appendProgressEvent(run.correlationId, "thinking", { line });
      }
      await persistence.appendProgressEvent(run.correlationId, "message", { chunk: payload.message });
    },
    undefined
  );

  const written = await ctx.queue.publishResponse(run.correlationId, payload);
  if (!written) {
    logWarn("response_already_published", { correlationId: run.correlationId, stage: "publish" });
  }
  ctx.progress.clear(run.correlationId);
}
