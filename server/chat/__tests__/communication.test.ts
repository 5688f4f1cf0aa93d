import { describe, it, expect } from "vitest";
import { createThinkingEmitter, sendToUser } from "../communication";
import { toUserFacing, wrapEmitterForUser } from "../emitAdapter";
import { ProgressStore } from "../progressStore";
import { FakeLlm, TEST_USAGE } from "./helpers/fakes";

const CORRELATION_ID = "corr-1";

function started(): ProgressStore {
  const progress = new ProgressStore(50, () => 1000);
  progress.start(CORRELATION_ID);
  return progress;
}

describe("sendToUser", () => {
  it("should record thinking lines without calling the LLM", async () => {
    const progress = started();
    const llm = new FakeLlm();

    const delivered = await sendToUser({ progress, llm }, CORRELATION_ID, { type: "thinking", content: "  Looking...  " });

    expect(delivered).toEqual({ text: "Looking...", usage: null });
    expect(progress.snapshot(CORRELATION_ID)?.thinkingLog).toEqual(["Looking..."]);
    expect(llm.calls).toEqual([]);
  });

  it("should deliver the LLM phrasing of a clarification", async () => {
    const progress = started();
    const llm = new FakeLlm({ communication: "Which health plan is this for?" });

    const delivered = await sendToUser({ progress, llm }, CORRELATION_ID, {
      type: "clarification",
      content: "Which health plan or payer are you asking about?",
      slots: ["jurisdiction.payor"],
    });

    expect(delivered).toEqual({
      text: "Which health plan is this for?",
      usage: { ...TEST_USAGE, stage: "communication" },
    });
    expect(progress.snapshot(CORRELATION_ID)?.message).toBe("Which health plan is this for?");
    expect(llm.calls[0].prompt).toContain("We need to know the user's payor before answering");
  });

  it("should keep the draft when the phrasing runs too long", async () => {
    const progress = started();
    const long = Array.from({ length: 25 }, () => "word").join(" ");
    const llm = new FakeLlm({ communication: long });

    const delivered = await sendToUser({ progress, llm }, CORRELATION_ID, {
      type: "refinement_ask",
      content: "Did you mean: appeals? Or would you like to rephrase your question?",
      original: "appeals",
      suggestions: ["appeals"],
    });

    expect(delivered.text).toBe("Did you mean: appeals? Or would you like to rephrase your question?");
    expect(delivered.usage).toEqual({ ...TEST_USAGE, stage: "communication" });
  });

  it("should keep the draft when the LLM fails", async () => {
    const progress = started();
    const delivered = await sendToUser({ progress, llm: new FakeLlm() }, CORRELATION_ID, {
      type: "clarification",
      content: "Which state?",
      slots: ["jurisdiction.state"],
    });

    expect(delivered).toEqual({ text: "Which state?", usage: null });
    expect(progress.snapshot(CORRELATION_ID)?.message).toBe("Which state?");
  });

  it("should append final chunks to the streamed message", async () => {
    const progress = started();
    const deps = { progress, llm: new FakeLlm() };

    await sendToUser(deps, CORRELATION_ID, { type: "final", content: "Part one. " });
    await sendToUser(deps, CORRELATION_ID, { type: "final", content: "Part two." });

    expect(progress.snapshot(CORRELATION_ID)?.message).toBe("Part one. Part two.");
  });

  it("should replace the streamed message when asked", async () => {
    const progress = started();
    const deps = { progress, llm: new FakeLlm() };

    await sendToUser(deps, CORRELATION_ID, { type: "final", content: "Part one. " });
    await sendToUser(deps, CORRELATION_ID, { type: "final", content: "Whole answer.", replace: true });

    expect(progress.snapshot(CORRELATION_ID)?.message).toBe("Whole answer.");
  });
});

describe("createThinkingEmitter", () => {
  it("should report delivered lines and skip blank ones", () => {
    const progress = started();
    const seen: string[] = [];
    const emit = createThinkingEmitter({ progress, llm: new FakeLlm() }, CORRELATION_ID, (line) => seen.push(line));

    emit("Searching our materials...");
    emit("   ");

    expect(seen).toEqual(["Searching our materials..."]);
  });
});

describe("emitAdapter", () => {
  it("should map retrieval lines to user-facing ones", () => {
    expect(toUserFacing("Retrieving 5 hierarchical + 0 factual passages.")).toBe("Searching our materials...");
    expect(toUserFacing("Retrieved 3 candidate passages.")).toBeNull();
    expect(toUserFacing("Using 1 result to answer this part.")).toBe("Using 1 result to answer this part.");
    expect(toUserFacing("Done with this part.")).toBe("Done with this part.");
  });

  it("should pass retrieval lines through unchanged in debug mode", () => {
    expect(toUserFacing("Retrieved 3 candidate passages.", true)).toBe("Retrieved 3 candidate passages.");
  });

  it("should pass raw lines through a debug emitter", () => {
    const lines: string[] = [];
    const emit = wrapEmitterForUser((line) => lines.push(line), true);

    emit("Retrieved 2 candidate passages.");

    expect(lines).toEqual(["Retrieved 2 candidate passages."]);
  });

  it("should drop lines the map suppresses", () => {
    const lines: string[] = [];
    const emit = wrapEmitterForUser((line) => lines.push(line), false);

    emit("Retrieved 2 candidate passages.");
    emit("Low corpus confidence; using external search.");

    expect(lines).toEqual(["Searching the web for additional context."]);
  });
});
