/**
 * Doc assembly: confidence tiers, external-search fallback and neighbor expansion.
 */

import { chatConfig } from "./chatConfig";
import { describeError } from "../utils/errors";
import { logWarn } from "../utils/logger";
import type { SearchCandidate, SearchIndex, WebSkill, WebSnippet } from "../search/types";
import type {
  ConfidenceLabel,
  ConfidenceThresholds,
  RetrievalChunk,
  RetrievalSignal,
  ThinkingEmitter,
} from "./types";

export const DEFAULT_CONFIDENCE_THRESHOLDS: ConfidenceThresholds = {
  abstainMax: chatConfig.CONFIDENCE_THRESHOLDS.abstainMax,
  confidentMin: chatConfig.CONFIDENCE_THRESHOLDS.confidentMin,
};

export const CONFIDENCE_GUIDANCE: Record<ConfidenceLabel, string> = {
  abstain: "Do not send",
  process_with_caution: "Use but reconcile across docs",
  process_confident: "Likely correct; verify no conflicts",
};

export const EXTERNAL_GUIDANCE =
  "External source; use if helpful but hedge; not from authoritative corpus.";

// ===== CONFIDENCE =====

export function confidenceLabelFor(
  score: number,
  thresholds: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS
): ConfidenceLabel {
  if (score < thresholds.abstainMax) return "abstain";
  if (score >= thresholds.confidentMin) return "process_confident";
  return "process_with_caution";
}

/**
 * Label a corpus chunk from its score. Chunks without a score are treated as 0.
 * Returns a new chunk; applying it twice gives the same result.
 */
export function assignConfidence(
  chunk: RetrievalChunk,
  thresholds: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS
): RetrievalChunk {
  const label = confidenceLabelFor(chunk.score ?? 0, thresholds);
  return { ...chunk, confidenceLabel: label, llmGuidance: CONFIDENCE_GUIDANCE[label] };
}

export function bestScore(chunks: readonly RetrievalChunk[]): number {
  return chunks.reduce((best, c) => Math.max(best, c.score ?? 0), 0);
}

// ===== EXTERNAL FALLBACK =====

export function snippetToChunk(snippet: WebSnippet, index: number): RetrievalChunk {
  const title = snippet.title.trim();
  return {
    id: `external:${index + 1}:${snippet.url}`,
    text: title ? `${title}\n${snippet.snippet}`.trim() : snippet.snippet,
    documentId: null,
    documentName: title || snippet.url || "External",
    pageNumber: null,
    paragraphIndex: null,
    sourceType: "external",
    score: null,
    confidenceLabel: null,
    llmGuidance: EXTERNAL_GUIDANCE,
    isNeighbor: false,
  };
}

/**
 * External search with failures treated as no results.
 */
export async function searchExternal(
  web: WebSkill,
  query: string,
  maxResults: number,
  correlationId?: string
): Promise<RetrievalChunk[]> {
  try {
    const snippets = await web.search(query, maxResults);
    return snippets
      .filter((s) => s.snippet.trim() || s.title.trim())
      .slice(0, maxResults)
      .map(snippetToChunk);
  } catch (error) {
    logWarn("external_search_failed", { correlationId, stage: "resolve", error: describeError(error) });
    return [];
  }
}

export interface FallbackOptions {
  web: WebSkill;
  /** When false the fallback never calls external search; branches behave as if it returned nothing. */
  allowExternal: boolean;
  maxResults?: number;
  thresholds?: ConfidenceThresholds;
  emit?: ThinkingEmitter;
  correlationId?: string;
}

export interface FallbackOutcome {
  chunks: RetrievalChunk[];
  signal: RetrievalSignal;
  externalAttempted: boolean;
}

/**
 * best >= confidentMin              -> non-abstain corpus only           (corpus_only)
 * abstainMax <= best < confidentMin -> non-abstain corpus + external      (corpus_plus_google)
 * best < abstainMax                 -> external, else whatever corpus kept (google_only / no_sources)
 */
export async function applyFallback(
  chunks: readonly RetrievalChunk[],
  question: string,
  options: FallbackOptions
): Promise<FallbackOutcome> {
  const thresholds = options.thresholds ?? DEFAULT_CONFIDENCE_THRESHOLDS;
  const maxResults = options.maxResults ?? chatConfig.EXTERNAL_SEARCH_MAX_RESULTS;
  const emit = options.emit;

  const labeled = chunks.map((c) => assignConfidence(c, thresholds));
  const best = bestScore(labeled);
  const kept = labeled.filter((c) => c.confidenceLabel !== "abstain");

  const external = async (): Promise<RetrievalChunk[]> =>
    options.allowExternal ? searchExternal(options.web, question, maxResults, options.correlationId) : [];

  if (best >= thresholds.confidentMin) {
    emit?.("Corpus confidence sufficient; using retrieved docs only.");
    return { chunks: kept, signal: "corpus_only", externalAttempted: false };
  }

  if (best >= thresholds.abstainMax) {
    emit?.("Adding external search to complement corpus...");
    const results = await external();
    return { chunks: [...kept, ...results], signal: "corpus_plus_google", externalAttempted: options.allowExternal };
  }

  emit?.("Low corpus confidence; using external search.");
  const results = await external();
  if (results.length > 0) {
    return { chunks: results, signal: "google_only", externalAttempted: options.allowExternal };
  }
  if (kept.length > 0) {
    return { chunks: kept, signal: "google_only", externalAttempted: options.allowExternal };
  }
  return { chunks: [], signal: "no_sources", externalAttempted: options.allowExternal };
}

// ===== NEIGHBORS =====

/**
 * Append +/- window sibling passages after each corpus chunk, deduped by id.
 * Neighbors inherit the parent's confidence label and carry no score.
 * Lookup failures leave the chunk without neighbors.
 */
export async function expandNeighbors(
  chunks: readonly RetrievalChunk[],
  index: SearchIndex,
  window: number = chatConfig.NEIGHBOR_WINDOW,
  correlationId?: string
): Promise<RetrievalChunk[]> {
  const seen = new Set(chunks.map((c) => c.id));
  const out: RetrievalChunk[] = [];

  for (const chunk of chunks) {
    out.push(chunk);
    if (window <= 0 || chunk.sourceType === "external" || chunk.isNeighbor) continue;
    if (!chunk.documentId || chunk.paragraphIndex === null) continue;

    let siblings: SearchCandidate[];
    try {
      siblings = await index.fetchNeighbors(chunk.documentId, chunk.paragraphIndex, window, chunk.id);
    } catch (error) {
      logWarn("neighbor_expansion_failed", { correlationId, stage: "resolve", error: describeError(error) });
      continue;
    }

    for (const sibling of siblings) {
      if (seen.has(sibling.id)) continue;
      seen.add(sibling.id);
      out.push({
        id: sibling.id,
        text: sibling.text,
        documentId: sibling.documentId,
        documentName: sibling.documentName,
        pageNumber: sibling.pageNumber,
        paragraphIndex: sibling.paragraphIndex,
        sourceType: sibling.sourceType,
        score: null,
        confidenceLabel: chunk.confidenceLabel,
        llmGuidance: chunk.llmGuidance,
        isNeighbor: true,
      });
    }
  }

  return out;
}
