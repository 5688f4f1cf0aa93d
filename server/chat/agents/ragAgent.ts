/**
 * RAG agent: blended retrieval, confidence assembly with web fallback,
 * neighbor expansion, then one LLM call over the numbered passages.
 *
 * Never throws. Retrieval and LLM failures become fallback text; the
 * returned signal reflects what was actually used.
 */

import { chatConfig } from "../chatConfig";
import { applyFallback, expandNeighbors, searchExternal } from "../docAssembly";
import { retrieveBlended } from "../retrieval";
import { getRetrievalBlend } from "../retrievalBlend";
import { answerWithReasoning } from "./reasoningAgent";
import { describeError } from "../../utils/errors";
import { logInfo, logWarn } from "../../utils/logger";
import type { AgentDeps, AgentRequest } from "./types";
import type { AgentResult, AnswerSource, RetrievalChunk, RetrievalSignal, StagedUsage } from "../types";

const RAG_SYSTEM_PROMPT = `You answer healthcare policy questions using ONLY the numbered passages provided.

Rules:
- Cite passages inline with their number in square brackets, e.g. [2].
- Each passage carries guidance on how far to trust it. Follow it.
- External passages are not from our policy materials; hedge when relying on them.
- If the passages do not answer the question, say so plainly.
- Never ask for or use patient-specific details.`;

export const RAG_LLM_FAILURE_ANSWER =
  "I couldn't write an answer from our materials right now. Please try again in a moment.";

function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function toAnswerSource(chunk: RetrievalChunk): AnswerSource {
  return {
    documentId: chunk.documentId,
    documentName: chunk.documentName || chunk.documentId || "document",
    pageNumber: chunk.pageNumber,
    sourceType: chunk.sourceType,
    matchScore: chunk.score,
    confidenceLabel: chunk.confidenceLabel,
    text: preview(chunk.text, chatConfig.SOURCE_PREVIEW_CHARS),
  };
}

export function buildRagContext(chunks: readonly RetrievalChunk[], offset: number): string {
  if (chunks.length === 0) return "(No retrieved context.)";
  return chunks
    .map((chunk, i) => {
      const guidance = chunk.llmGuidance ? ` (${chunk.llmGuidance})` : "";
      return `[${offset + i + 1}]${guidance} ${chunk.text}`;
    })
    .join("\n\n");
}

/** Answer text followed by a "Sources:" block using the global `[n]` numbering. */
export function formatWithSources(answer: string, sources: readonly AnswerSource[], offset: number): string {
  if (sources.length === 0) return answer.trim();
  const lines = [answer.trim(), "", "Sources:"];
  sources.forEach((source, i) => {
    const page = source.pageNumber !== null ? ` (page ${source.pageNumber})` : "";
    lines.push(`  [${offset + i + 1}] ${source.documentName}${page} - ${preview(source.text, 120)}`);
  });
  return lines.join("\n");
}

interface UsableChunks {
  chunks: RetrievalChunk[];
  signal: RetrievalSignal;
}

/**
 * Directives only apply when nothing usable survived assembly. Returns null
 * when the sub-question should be answered by the reasoning agent instead.
 */
async function applyRagFailDirectives(
  request: AgentRequest,
  deps: AgentDeps,
  externalAttempted: boolean
): Promise<UsableChunks | null> {
  const { subquestion, entry, correlationId } = request;

  if (entry.onRagFail.includes("search_google") && !externalAttempted && deps.web.enabled) {
    request.emit("Searching the web for this part.");
    const results = await searchExternal(
      deps.web,
      subquestion.text,
      chatConfig.EXTERNAL_SEARCH_MAX_RESULTS,
      correlationId
    );
    if (results.length > 0) return { chunks: results, signal: "google_only" };
  }

  if (entry.onRagFail.includes("reasoning")) return null;
  return { chunks: [], signal: "no_sources" };
}

export async function runRagAgent(request: AgentRequest, deps: AgentDeps): Promise<AgentResult> {
  const { subquestion, filters, emit, correlationId, sourceIndexOffset } = request;
  const question = subquestion.text;
  const blend = getRetrievalBlend(subquestion.intentScore);

  const retrieved = await retrieveBlended(
    deps.search,
    {
      query: question,
      filters,
      blend,
      preferredDocumentIds: request.preferredDocumentIds,
      topK: request.entry.ragK,
      correlationId,
    },
    emit
  );
  if (retrieved.chunks.length === 0) {
    emit("I didn't find anything specific in our materials.");
  }

  const assembled = await applyFallback(retrieved.chunks, question, {
    web: deps.web,
    allowExternal: deps.externalSearchEnabled && deps.web.enabled,
    emit,
    correlationId,
  });

  let usable: UsableChunks = { chunks: assembled.chunks, signal: assembled.signal };
  if (assembled.chunks.length === 0) {
    const redirected = await applyRagFailDirectives(request, deps, assembled.externalAttempted);
    if (redirected === null) {
      emit("Nothing usable in our materials; answering from general knowledge.");
      const reasoning = await answerWithReasoning(deps.llm, question, correlationId);
      return { answer: reasoning.answer, usage: reasoning.usage, sources: [], signal: "no_sources" };
    }
    usable = redirected;
  }

  const chunks = await expandNeighbors(usable.chunks, deps.search, deps.neighborWindow, correlationId);
  const sources = chunks.map(toAnswerSource);

  emit(`Using ${chunks.length} ${chunks.length === 1 ? "result" : "results"} to answer this part.`);
  emit("Reading what I found and writing an answer...");

  const prompt = `Passages:\n${buildRagContext(chunks, sourceIndexOffset)}\n\nQuestion: ${question}\n\nAnswer:`;
  let answer: string;
  let usage: StagedUsage | null = null;
  try {
    const result = await deps.llm.generate(prompt, {
      stage: "rag",
      system: RAG_SYSTEM_PROMPT,
      temperature: 0.2,
      logContext: { correlationId },
    });
    answer = result.text.trim() || RAG_LLM_FAILURE_ANSWER;
    usage = { ...result.usage, stage: "rag" };
    emit("Done with this part.");
  } catch (error) {
    logWarn("rag_answer_failed", { correlationId, stage: "resolve", error: describeError(error) });
    answer = RAG_LLM_FAILURE_ANSWER;
    emit("I couldn't finish this part.");
  }

  logInfo("rag_answer_built", {
    correlationId,
    stage: "resolve",
    subquestionId: subquestion.id,
    signal: usable.signal,
    chunks: chunks.length,
    degraded: retrieved.degraded,
  });

  return {
    answer: formatWithSources(answer, sources, sourceIndexOffset),
    usage,
    sources,
    signal: usable.signal,
  };
}
