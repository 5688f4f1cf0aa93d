/**
 * Postgres full-text search over policy_chunks.
 *
 * Ranking uses ts_rank_cd with normalization 32 (rank / (rank + 1)), so scores
 * fall in [0, 1). Source-type restriction is not pushed down: the retrieval
 * layer over-fetches and sorts by hierarchy itself.
 */

import { and, asc, eq, gte, inArray, lte, ne, or, isNull, sql, desc, type SQL } from "drizzle-orm";
import { schema, type Database } from "../storage/db";
import { RetrievalFailure, describeError } from "../utils/errors";
import { toSourceType } from "./sourceTypes";
import type { RetrievalFilters } from "../chat/types";
import type { SearchCandidate, SearchIndex, SearchRequest } from "./types";
import type { PolicyChunk } from "@shared/schema";

const { policyChunks } = schema;

function toCandidate(row: PolicyChunk, score: number): SearchCandidate {
  return {
    id: row.id,
    text: row.text,
    documentId: row.documentId,
    documentName: row.documentName,
    pageNumber: row.pageNumber,
    paragraphIndex: row.paragraphIndex,
    sourceType: toSourceType(row.sourceType),
    score,
  };
}

function filterConditions(filters: RetrievalFilters): SQL[] {
  const conditions: SQL[] = [];
  const pairs = [
    [policyChunks.payer, filters.payer],
    [policyChunks.state, filters.state],
    [policyChunks.program, filters.program],
  ] as const;
  for (const [column, value] of pairs) {
    if (!value) continue;
    const condition = or(isNull(column), sql`lower(${column}) = lower(${value})`);
    if (condition) conditions.push(condition);
  }
  return conditions;
}

export class PgSearchIndex implements SearchIndex {
  readonly supportsSourceTypeFilter = false;

  constructor(private readonly db: Database) {}

  async search(request: SearchRequest): Promise<SearchCandidate[]> {
    const { query, filters, k, minScore } = request;
    if (k <= 0 || !query.trim()) return [];

    const tsQuery = sql`plainto_tsquery('english', ${query})`;
    const document = sql`to_tsvector('english', ${policyChunks.text})`;
    const rank = sql<number>`ts_rank_cd(${document}, ${tsQuery}, 32)`.mapWith(Number);

    try {
      const rows = await this.db
        .select({ chunk: policyChunks, score: rank })
        .from(policyChunks)
        .where(and(sql`${document} @@ ${tsQuery}`, ...filterConditions(filters)))
        .orderBy(desc(rank))
        .limit(k);

      return rows
        .filter((row) => minScore === undefined || row.score >= minScore)
        .map((row) => toCandidate(row.chunk, row.score));
    } catch (error) {
      throw new RetrievalFailure(`Corpus search failed: ${describeError(error)}`, { cause: error });
    }
  }

  async fetchByIds(ids: readonly string[]): Promise<SearchCandidate[]> {
    if (ids.length === 0) return [];
    try {
      const rows = await this.db
        .select()
        .from(policyChunks)
        .where(inArray(policyChunks.id, [...ids]));
      return rows.map((row) => toCandidate(row, 0));
    } catch (error) {
      throw new RetrievalFailure(`Chunk lookup failed: ${describeError(error)}`, { cause: error });
    }
  }

  async fetchNeighbors(
    documentId: string,
    paragraphIndex: number,
    window: number,
    excludeId: string
  ): Promise<SearchCandidate[]> {
    try {
      const rows = await this.db
        .select()
        .from(policyChunks)
        .where(
          and(
            eq(policyChunks.documentId, documentId),
            ne(policyChunks.id, excludeId),
            gte(policyChunks.paragraphIndex, paragraphIndex - window),
            lte(policyChunks.paragraphIndex, paragraphIndex + window)
          )
        )
        .orderBy(asc(policyChunks.paragraphIndex));
      return rows.map((row) => toCandidate(row, 0));
    } catch (error) {
      throw new RetrievalFailure(`Neighbor lookup failed: ${describeError(error)}`, { cause: error });
    }
  }
}
