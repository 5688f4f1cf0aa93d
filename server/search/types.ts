import type { RetrievalFilters, SourceType } from "../chat/types";

export interface SearchCandidate {
  id: string;
  text: string;
  documentId: string | null;
  documentName: string;
  pageNumber: number | null;
  paragraphIndex: number | null;
  sourceType: SourceType;
  /** Relevance in [0, 1]. */
  score: number;
}

export interface SearchRequest {
  query: string;
  filters: RetrievalFilters;
  k: number;
  /** Only honored when the index reports supportsSourceTypeFilter. */
  sourceTypes?: readonly SourceType[];
  minScore?: number;
}

/**
 * Lexical/vector search over the policy corpus. Implementations throw
 * RetrievalFailure; callers treat that as zero results.
 */
export interface SearchIndex {
  readonly supportsSourceTypeFilter: boolean;
  search(request: SearchRequest): Promise<SearchCandidate[]>;
  fetchByIds(ids: readonly string[]): Promise<SearchCandidate[]>;
  /** Passages of the same document within +/- window paragraphs, excluding `excludeId`. */
  fetchNeighbors(
    documentId: string,
    paragraphIndex: number,
    window: number,
    excludeId: string
  ): Promise<SearchCandidate[]>;
}

export interface WebSnippet {
  title: string;
  url: string;
  snippet: string;
}

export interface ScrapeResult {
  text: string;
  summary?: string;
}

/** External web search/scrape skill. */
export interface WebSkill {
  readonly enabled: boolean;
  search(query: string, maxResults: number): Promise<WebSnippet[]>;
  scrape(url: string): Promise<ScrapeResult | null>;
}
