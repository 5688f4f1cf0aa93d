/**
 * In-process lexical index over a JSON corpus.
 *
 * Score is the cosine similarity of the query and passage token sets:
 *   |Q ∩ D| / sqrt(|Q| * |D|)
 * Used by the co-located topology and by tests.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { SOURCE_TYPES } from "@shared/chatProtocol";
import { RetrievalFailure, describeError } from "../utils/errors";
import type { RetrievalFilters } from "../chat/types";
import type { SearchCandidate, SearchIndex, SearchRequest } from "./types";

const corpusEntrySchema = z.object({
  id: z.string().min(1),
  documentId: z.string().nullable().default(null),
  documentName: z.string().min(1),
  pageNumber: z.number().int().nullable().default(null),
  paragraphIndex: z.number().int().nullable().default(null),
  sourceType: z.enum(SOURCE_TYPES).default("chunk"),
  text: z.string().min(1),
  payer: z.string().nullable().default(null),
  state: z.string().nullable().default(null),
  program: z.string().nullable().default(null),
});

export const corpusSchema = z.array(corpusEntrySchema);

export type CorpusEntry = z.infer<typeof corpusEntrySchema>;
export type CorpusEntryInput = z.input<typeof corpusEntrySchema>;

const STOPWORDS = new Set([
  "a", "an", "the", "and", "or", "of", "to", "in", "on", "for", "with", "by", "at", "is", "are",
  "be", "do", "does", "i", "we", "you", "my", "our", "how", "what", "when", "where", "which",
  "can", "it", "this", "that", "as", "from", "if", "about",
]);

export function tokenize(text: string): Set<string> {
  const tokens = text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length > 1 && !STOPWORDS.has(t));
  return new Set(tokens);
}

function overlapScore(query: Set<string>, passage: Set<string>): number {
  if (query.size === 0 || passage.size === 0) return 0;
  let shared = 0;
  for (const token of query) {
    if (passage.has(token)) shared++;
  }
  return shared / Math.sqrt(query.size * passage.size);
}

function matchesFilter(value: string | null, wanted: string | undefined): boolean {
  if (!wanted || value === null) return true;
  return value.trim().toLowerCase() === wanted.trim().toLowerCase();
}

function matchesFilters(entry: CorpusEntry, filters: RetrievalFilters): boolean {
  return (
    matchesFilter(entry.payer, filters.payer) &&
    matchesFilter(entry.state, filters.state) &&
    matchesFilter(entry.program, filters.program)
  );
}

function toCandidate(entry: CorpusEntry, score: number): SearchCandidate {
  return {
    id: entry.id,
    text: entry.text,
    documentId: entry.documentId,
    documentName: entry.documentName,
    pageNumber: entry.pageNumber,
    paragraphIndex: entry.paragraphIndex,
    sourceType: entry.sourceType,
    score,
  };
}

export class MemorySearchIndex implements SearchIndex {
  readonly supportsSourceTypeFilter = true;
  private readonly entries: CorpusEntry[];
  private readonly tokens = new Map<string, Set<string>>();

  constructor(entries: readonly CorpusEntryInput[]) {
    this.entries = corpusSchema.parse(entries);
    for (const entry of this.entries) {
      this.tokens.set(entry.id, tokenize(entry.text));
    }
  }

  static fromFile(path: string): MemorySearchIndex {
    try {
      const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
      return new MemorySearchIndex(corpusSchema.parse(raw));
    } catch (error) {
      throw new RetrievalFailure(`Could not load corpus from ${path}: ${describeError(error)}`, { cause: error });
    }
  }

  get size(): number {
    return this.entries.length;
  }

  async search(request: SearchRequest): Promise<SearchCandidate[]> {
    const { query, filters, k, sourceTypes, minScore } = request;
    if (k <= 0) return [];
    const queryTokens = tokenize(query);

    const scored: SearchCandidate[] = [];
    for (const entry of this.entries) {
      if (sourceTypes && sourceTypes.length > 0 && !sourceTypes.includes(entry.sourceType)) continue;
      if (!matchesFilters(entry, filters)) continue;
      const score = overlapScore(queryTokens, this.tokens.get(entry.id) ?? new Set());
      if (score <= 0) continue;
      if (minScore !== undefined && score < minScore) continue;
      scored.push(toCandidate(entry, score));
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }

  async fetchByIds(ids: readonly string[]): Promise<SearchCandidate[]> {
    const wanted = new Set(ids);
    return this.entries.filter((e) => wanted.has(e.id)).map((e) => toCandidate(e, 0));
  }

  async fetchNeighbors(
    documentId: string,
    paragraphIndex: number,
    window: number,
    excludeId: string
  ): Promise<SearchCandidate[]> {
    return this.entries
      .filter(
        (e) =>
          e.documentId === documentId &&
          e.id !== excludeId &&
          e.paragraphIndex !== null &&
          Math.abs(e.paragraphIndex - paragraphIndex) <= window
      )
      .sort((a, b) => (a.paragraphIndex ?? 0) - (b.paragraphIndex ?? 0))
      .map((e) => toCandidate(e, 0));
  }
}
