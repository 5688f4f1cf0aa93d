import { describe, it, expect } from "vitest";
import {
  boostPreferredDocuments,
  mergeCandidates,
  retrieveBlended,
  retrieveFactual,
  retrieveHierarchical,
  sortByHierarchy,
  toRetrievalChunk,
} from "../retrieval";
import { RetrievalFailure } from "../../utils/errors";
import { candidate, FakeSearchIndex } from "./helpers/fakes";

describe("Two-lane retrieval", () => {
  describe("sortByHierarchy", () => {
    it("should order by source type rank, then by score", () => {
      const sorted = sortByHierarchy([
        candidate({ id: "fact", sourceType: "fact", score: 0.99 }),
        candidate({ id: "chunk-low", sourceType: "chunk", score: 0.4 }),
        candidate({ id: "policy", sourceType: "policy", score: 0.3 }),
        candidate({ id: "chunk-high", sourceType: "chunk", score: 0.8 }),
      ]);
      expect(sorted.map((c) => c.id)).toEqual(["policy", "chunk-high", "chunk-low", "fact"]);
    });
  });

  describe("retrieveHierarchical", () => {
    it("should ask the index to filter by type when it can", async () => {
      const index = new FakeSearchIndex([
        candidate({ id: "ext", sourceType: "external", score: 0.9 }),
        candidate({ id: "sec", sourceType: "section", score: 0.7 }),
        candidate({ id: "pol", sourceType: "policy", score: 0.2 }),
      ]);

      const results = await retrieveHierarchical(index, "appeals", {}, 2);

      expect(index.requests[0].k).toBe(2);
      expect(index.requests[0].sourceTypes).toEqual(["policy", "section", "chunk", "hierarchical", "fact"]);
      expect(results.map((c) => c.id)).toEqual(["pol", "sec"]);
    });

    it("should over-fetch and filter locally when the index cannot filter by type", async () => {
      const index = new FakeSearchIndex(
        [
          candidate({ id: "ext", sourceType: "external", score: 0.95 }),
          candidate({ id: "chunk", sourceType: "chunk", score: 0.9 }),
          candidate({ id: "sec", sourceType: "section", score: 0.5 }),
          candidate({ id: "fact", sourceType: "fact", score: 0.4 }),
        ],
        false
      );

      const results = await retrieveHierarchical(index, "appeals", {}, 2);

      expect(index.requests[0].k).toBe(4);
      expect(index.requests[0].sourceTypes).toBeUndefined();
      expect(results.map((c) => c.id)).toEqual(["sec", "chunk"]);
    });

    it("should not query the index for an empty lane", async () => {
      const index = new FakeSearchIndex([candidate({ id: "a" })]);
      expect(await retrieveHierarchical(index, "appeals", {}, 0)).toEqual([]);
      expect(index.requests).toEqual([]);
    });
  });

  describe("retrieveFactual", () => {
    it("should drop candidates below the confidence floor and sort by score", async () => {
      const index = new FakeSearchIndex([
        candidate({ id: "low", score: 0.6 }),
        candidate({ id: "mid", score: 0.8 }),
        candidate({ id: "high", score: 0.95 }),
      ]);

      const results = await retrieveFactual(index, "phone number", {}, 5, 0.8);

      expect(results.map((c) => c.id)).toEqual(["high", "mid"]);
      expect(index.requests[0].minScore).toBe(0.8);
    });
  });

  describe("mergeCandidates", () => {
    it("should keep the hierarchical copy of a duplicate id", () => {
      const hierarchical = [toRetrievalChunk(candidate({ id: "a", sourceType: "policy", score: 0.7 }))];
      const factual = [
        toRetrievalChunk(candidate({ id: "a", sourceType: "policy", score: 0.9 })),
        toRetrievalChunk(candidate({ id: "b", score: 0.6 })),
      ];

      const merged = mergeCandidates(hierarchical, factual);

      expect(merged.map((c) => [c.id, c.score])).toEqual([
        ["a", 0.7],
        ["b", 0.6],
      ]);
    });
  });

  describe("boostPreferredDocuments", () => {
    it("should raise scores of previously cited documents without passing 1", () => {
      const chunks = [
        toRetrievalChunk(candidate({ id: "a", documentId: "doc-1", score: 0.5 })),
        toRetrievalChunk(candidate({ id: "b", documentId: "doc-1", score: 0.98 })),
        toRetrievalChunk(candidate({ id: "c", documentId: "doc-2", score: 0.5 })),
      ];

      const boosted = boostPreferredDocuments(chunks, ["doc-1"], 0.05);

      expect(boosted[0].score).toBeCloseTo(0.55);
      expect(boosted[1].score).toBe(1);
      expect(boosted[2].score).toBe(0.5);
    });
  });

  describe("retrieveBlended", () => {
    it("should report progress lines with the lane sizes", async () => {
      const index = new FakeSearchIndex([candidate({ id: "a", sourceType: "policy", score: 0.9 })]);
      const lines: string[] = [];

      const outcome = await retrieveBlended(
        index,
        { query: "appeals", filters: {}, blend: { nHierarchical: 4, nFactual: 2, confidenceMin: 0.56 } },
        (line) => lines.push(line)
      );

      expect(outcome.chunks.map((c) => c.id)).toEqual(["a"]);
      expect(outcome.degraded).toBe(false);
      expect(lines).toEqual(["Retrieving 4 hierarchical + 2 factual passages.", "Retrieved 1 candidate passages."]);
    });

    it("should keep at most topK passages in merge order", async () => {
      const index = new FakeSearchIndex([
        candidate({ id: "a", sourceType: "policy", score: 0.9 }),
        candidate({ id: "b", sourceType: "section", score: 0.8 }),
        candidate({ id: "c", sourceType: "chunk", score: 0.7 }),
        candidate({ id: "d", sourceType: "chunk", score: 0.6 }),
      ]);
      const lines: string[] = [];

      const outcome = await retrieveBlended(
        index,
        { query: "appeals", filters: {}, blend: { nHierarchical: 4, nFactual: 2, confidenceMin: 0.5 }, topK: 3 },
        (line) => lines.push(line)
      );

      expect(outcome.chunks.map((c) => c.id)).toEqual(["a", "b", "c"]);
      expect(lines[1]).toBe("Retrieved 3 candidate passages.");
    });

    it("should treat a failing index as an empty, degraded result", async () => {
      const index = new FakeSearchIndex([candidate({ id: "a" })]);
      index.failWith = new RetrievalFailure("connection refused");

      const outcome = await retrieveBlended(index, {
        query: "appeals",
        filters: {},
        blend: { nHierarchical: 5, nFactual: 0, confidenceMin: 0.5 },
      });

      expect(outcome).toEqual({ chunks: [], degraded: true });
    });
  });
});
