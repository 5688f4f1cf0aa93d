import { describe, it, expect } from "vitest";
import { ProgressStore } from "../progressStore";
import { PlanStore } from "../planStore";
import { minimalPlan } from "../planner";

describe("ProgressStore", () => {
  it("should split multi-line thinking and stamp events with the clock", () => {
    const store = new ProgressStore(10, () => 42);
    store.start("c1");

    store.appendThinking("c1", "First\n\n  Second  ");
    store.appendMessageChunk("c1", "Hello");

    expect(store.read("c1", 0)).toEqual({
      events: [
        { event: "thinking", data: { line: "First", ts: 42 } },
        { event: "thinking", data: { line: "Second", ts: 42 } },
        { event: "message", data: { chunk: "Hello" } },
      ],
      cursor: 3,
    });
    expect(store.snapshot("c1")).toEqual({ thinkingLog: ["First", "Second"], message: "Hello" });
  });

  it("should give each reader only events after its cursor", () => {
    const store = new ProgressStore(10, () => 0);
    store.start("c1");
    store.appendThinking("c1", "one");
    const first = store.read("c1", 0);
    store.appendThinking("c1", "two");

    const second = store.read("c1", first.cursor);

    expect(second.events.map((e) => e.data)).toEqual([{ line: "two", ts: 0 }]);
    expect(second.cursor).toBe(2);
    expect(store.read("c1", second.cursor).events).toEqual([]);
  });

  it("should drop the oldest events when the channel is full", () => {
    const store = new ProgressStore(2, () => 0);
    store.start("c1");
    store.appendThinking("c1", "a\nb\nc");

    const read = store.read("c1", 0);

    expect(read.events.map((e) => e.data)).toEqual([
      { line: "b", ts: 0 },
      { line: "c", ts: 0 },
    ]);
    expect(read.cursor).toBe(3);
    expect(store.snapshot("c1")?.thinkingLog).toEqual(["a", "b", "c"]);
  });

  it("should replace the streamed message and tell readers to do the same", () => {
    const store = new ProgressStore(10, () => 0);
    store.start("c1");
    store.appendMessageChunk("c1", "Partial ");
    store.replaceMessage("c1", "Full answer.");

    expect(store.snapshot("c1")?.message).toBe("Full answer.");
    expect(store.read("c1", 0).events).toEqual([
      { event: "message", data: { chunk: "Partial " } },
      { event: "message", data: { chunk: "Full answer.", replace: true } },
    ]);
  });

  it("should ignore writes after clear", () => {
    const store = new ProgressStore(10, () => 0);
    store.start("c1");
    store.clear("c1");
    store.appendThinking("c1", "late");

    expect(store.has("c1")).toBe(false);
    expect(store.snapshot("c1")).toBeNull();
    expect(store.read("c1", 5)).toEqual({ events: [], cursor: 5 });
  });
});

describe("PlanStore", () => {
  it("should store plans as wire snapshots", () => {
    const store = new PlanStore();
    store.save("c1", minimalPlan("How do I file an appeal?"));

    expect(store.get("c1")).toEqual({
      subquestions: [
        {
          id: "sq1",
          text: "How do I file an appeal?",
          kind: "non_patient",
          question_intent: "canonical",
          intent_score: 0.5,
          on_rag_fail: [],
          capabilities_primary: null,
          requires_jurisdiction: null,
        },
      ],
      thinking_log: [],
    });
    expect(store.get("missing")).toBeNull();
  });

  it("should evict the oldest plan past capacity", () => {
    const store = new PlanStore(2);
    store.save("a", minimalPlan("one"));
    store.save("b", minimalPlan("two"));
    store.save("c", minimalPlan("three"));

    expect(store.get("a")).toBeNull();
    expect(store.get("b")?.subquestions[0].text).toBe("two");
    expect(store.get("c")?.subquestions[0].text).toBe("three");
  });
});
