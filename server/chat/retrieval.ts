/**
 * Two-lane corpus retrieval for one sub-question.
 *
 * Hierarchical lane: policy > section > chunk > hierarchical > fact, ordered by
 * (hierarchy rank, -score). Factual lane: plain top-k by similarity with the
 * blend's confidence floor. Hierarchical results come first in the merge and
 * win on duplicate ids.
 */

import { chatConfig } from "./chatConfig";
import { HIERARCHY_ORDER, hierarchyRank } from "../search/sourceTypes";
import { describeError } from "../utils/errors";
import { logWarn } from "../utils/logger";
import type { SearchCandidate, SearchIndex } from "../search/types";
import type { BlendParams, RetrievalChunk, RetrievalFilters, ThinkingEmitter } from "./types";

export interface RetrievalRequest {
  query: string;
  filters: RetrievalFilters;
  blend: BlendParams;
  /** Documents cited in the previous turn; their candidates get `boost`. */
  preferredDocumentIds?: readonly string[];
  boost?: number;
  /** Cap on merged passages; hierarchical results keep their place ahead of factual ones. */
  topK?: number;
  overfetchFactor?: number;
  correlationId?: string;
}

export interface RetrievalOutcome {
  chunks: RetrievalChunk[];
  /** True when at least one lane failed and was treated as empty. */
  degraded: boolean;
}

export function toRetrievalChunk(candidate: SearchCandidate): RetrievalChunk {
  return {
    id: candidate.id,
    text: candidate.text,
    documentId: candidate.documentId,
    documentName: candidate.documentName,
    pageNumber: candidate.pageNumber,
    paragraphIndex: candidate.paragraphIndex,
    sourceType: candidate.sourceType,
    score: candidate.score,
    confidenceLabel: null,
    llmGuidance: null,
    isNeighbor: false,
  };
}

export function sortByHierarchy<T extends Pick<SearchCandidate, "sourceType" | "score">>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => {
    const byRank = hierarchyRank(a.sourceType) - hierarchyRank(b.sourceType);
    return byRank !== 0 ? byRank : b.score - a.score;
  });
}

export async function retrieveHierarchical(
  index: SearchIndex,
  query: string,
  filters: RetrievalFilters,
  n: number,
  overfetchFactor: number = chatConfig.HIERARCHICAL_OVERFETCH_FACTOR
): Promise<SearchCandidate[]> {
  if (n <= 0) return [];

  if (index.supportsSourceTypeFilter) {
    const results = await index.search({ query, filters, k: n, sourceTypes: HIERARCHY_ORDER });
    return sortByHierarchy(results).slice(0, n);
  }

  const superset = await index.search({ query, filters, k: n * Math.max(2, overfetchFactor) });
  const inHierarchy = superset.filter((c) => HIERARCHY_ORDER.includes(c.sourceType));
  return sortByHierarchy(inHierarchy).slice(0, n);
}

export async function retrieveFactual(
  index: SearchIndex,
  query: string,
  filters: RetrievalFilters,
  n: number,
  confidenceMin?: number
): Promise<SearchCandidate[]> {
  if (n <= 0) return [];
  const results = await index.search({ query, filters, k: n, minScore: confidenceMin });
  return results
    .filter((c) => confidenceMin === undefined || c.score >= confidenceMin)
    .sort((a, b) => b.score - a.score)
    .slice(0, n);
}

/** Concatenate lanes and drop repeated ids; the first copy wins. */
export function mergeCandidates(
  hierarchical: readonly RetrievalChunk[],
  factual: readonly RetrievalChunk[]
): RetrievalChunk[] {
  const seen = new Set<string>();
  const merged: RetrievalChunk[] = [];
  for (const chunk of [...hierarchical, ...factual]) {
    if (seen.has(chunk.id)) continue;
    seen.add(chunk.id);
    merged.push(chunk);
  }
  return merged;
}

export function boostPreferredDocuments(
  chunks: readonly RetrievalChunk[],
  preferredDocumentIds: readonly string[],
  boost: number
): RetrievalChunk[] {
  if (preferredDocumentIds.length === 0 || boost <= 0) return [...chunks];
  const preferred = new Set(preferredDocumentIds);
  return chunks.map((chunk) =>
    chunk.documentId && preferred.has(chunk.documentId) && chunk.score !== null
      ? { ...chunk, score: Math.min(1, chunk.score + boost) }
      : chunk
  );
}

async function runLane(
  lane: "hierarchical" | "factual",
  correlationId: string | undefined,
  fn: () => Promise<SearchCandidate[]>
): Promise<{ results: SearchCandidate[]; failed: boolean }> {
  try {
    return { results: await fn(), failed: false };
  } catch (error) {
    logWarn("retrieval_lane_failed", { correlationId, stage: "resolve", lane, error: describeError(error) });
    return { results: [], failed: true };
  }
}

export async function retrieveBlended(
  index: SearchIndex,
  request: RetrievalRequest,
  emit?: ThinkingEmitter
): Promise<RetrievalOutcome> {
  const { query, filters, blend, correlationId } = request;
  const { nHierarchical, nFactual, confidenceMin } = blend;

  emit?.(`Retrieving ${nHierarchical} hierarchical + ${nFactual} factual passages.`);

  const hierarchical = await runLane("hierarchical", correlationId, () =>
    retrieveHierarchical(index, query, filters, nHierarchical, request.overfetchFactor)
  );
  const factual = await runLane("factual", correlationId, () =>
    retrieveFactual(index, query, filters, nFactual, confidenceMin)
  );

  const merged = mergeCandidates(
    hierarchical.results.map(toRetrievalChunk),
    factual.results.map(toRetrievalChunk)
  );
  const boosted = boostPreferredDocuments(
    merged,
    request.preferredDocumentIds ?? [],
    request.boost ?? chatConfig.PREVIOUS_SOURCE_BOOST
  );
  const chunks = request.topK === undefined ? boosted : boosted.slice(0, Math.max(0, request.topK));

  emit?.(`Retrieved ${chunks.length} candidate passages.`);
  return { chunks, degraded: hierarchical.failed || factual.failed };
}
