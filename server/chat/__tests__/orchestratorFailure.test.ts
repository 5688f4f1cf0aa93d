import { describe, it, expect, vi } from "vitest";
import { runPipeline } from "../orchestrator";
import { defaultThreadState } from "../threadState";
import { pollResponse } from "../../routes/chatRoutes";
import { GENERIC_FAILURE_MESSAGE } from "../../utils/errors";
import { createTestContext } from "./helpers/fakes";

vi.mock("../agents/agentRouter", () => ({
  answerSubquestion: vi.fn().mockRejectedValue(new Error("agent exploded")),
}));

describe("runPipeline failures", () => {
  it("should publish a failed payload with the generic message when a stage throws", async () => {
    const ctx = createTestContext();
    const state = defaultThreadState();
    await ctx.persistence.saveState("thread-e", { ...state, active: { ...state.active, payer: "Acme Health" } });

    const run = await runPipeline(ctx, {
      correlation_id: "corr-e",
      message: "How do I file an appeal?",
      thread_id: "thread-e",
      enqueued_at: "2024-01-01T00:00:00.000Z",
    });

    const polled = await pollResponse(ctx, "corr-e");
    expect(polled).toEqual(run.payload);
    expect(run.payload?.status).toBe("failed");
    expect(run.payload?.message).toBe(GENERIC_FAILURE_MESSAGE);
    expect(run.payload?.sources).toEqual([]);
    expect(run.payload?.source_confidence_strip).toBe("no_sources");
    expect(ctx.persistence.listTurns().map((t) => t.status)).toEqual(["failed"]);
    expect(ctx.progress.has("corr-e")).toBe(false);
  });

  it("should leave the refined query untouched after a failed run", async () => {
    const ctx = createTestContext();
    const state = defaultThreadState();
    await ctx.persistence.saveState("thread-f", { ...state, active: { ...state.active, payer: "Acme Health" } });

    await runPipeline(ctx, {
      correlation_id: "corr-f",
      message: "How do I file an appeal?",
      thread_id: "thread-f",
      enqueued_at: "2024-01-01T00:00:00.000Z",
    });

    expect((await ctx.persistence.getState("thread-f"))?.refinedQuery).toBeNull();
  });
});
