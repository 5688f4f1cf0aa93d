import { describe, it, expect } from "vitest";
import { heuristicIntent, minimalPlan, parseDecomposition, planMessage, splitOnSeparators } from "../planner";
import { agentFor, buildBlueprint } from "../blueprint";
import { FakeLlm, TEST_USAGE } from "./helpers/fakes";
import type { Plan, SubQuestion } from "../types";

function subquestion(overrides: Partial<SubQuestion>): SubQuestion {
  return {
    id: "sq1",
    text: "What is the appeal deadline?",
    kind: "non_patient",
    questionIntent: "canonical",
    intentScore: 0,
    onRagFail: [],
    capabilitiesPrimary: null,
    requiresJurisdiction: null,
    ...overrides,
  };
}

describe("Planner", () => {
  describe("heuristics", () => {
    it("should split on the configured separators", () => {
      expect(splitOnSeparators("Check eligibility AND file the claim then call", [" and ", " then "])).toEqual([
        "Check eligibility",
        "file the claim",
        "call",
      ]);
    });

    it("should check factual prefixes before canonical ones", () => {
      expect(heuristicIntent("What is the process for appeals?")).toBe("factual");
      expect(heuristicIntent("Explain the appeal levels")).toBe("canonical");
      expect(heuristicIntent("Appeals please")).toBeNull();
    });
  });

  describe("parseDecomposition", () => {
    it("should reject replies without a subquestion list", () => {
      expect(parseDecomposition("I cannot help with that.")).toBeNull();
      expect(parseDecomposition('{"subquestions": []}')).toBeNull();
      expect(parseDecomposition('{"subquestions": [')).toBeNull();
    });

    it("should accept plain strings and map legacy intents", () => {
      const drafts = parseDecomposition(
        '{"subquestions": ["Explain appeals", {"text": "Appeal steps", "question_intent": "procedural"}]}'
      );
      expect(drafts?.map((d) => [d.id, d.intent])).toEqual([
        ["sq1", "canonical"],
        ["sq2", "canonical"],
      ]);
    });
  });

  describe("planMessage", () => {
    it("should fall back to the rule-based split without an LLM", async () => {
      const lines: string[] = [];
      const plan = await planMessage("What is the appeal deadline and how do I submit it?", {
        llm: null,
        emit: (line) => lines.push(line),
      });

      expect(plan.subquestions.map((sq) => [sq.id, sq.text, sq.questionIntent, sq.intentScore])).toEqual([
        ["sq1", "What is the appeal deadline", "factual", 1],
        ["sq2", "how do I submit it?", "canonical", 0],
      ]);
      expect(plan.llmUsage).toBeNull();
      expect(plan.thinkingLog).toEqual([
        "I'm reading your question and breaking it down.",
        "I'm splitting your message into clear parts.",
        '• sq1: "What is the appeal deadline" - I can look this up.',
        '• sq2: "how do I submit it?" - I can look this up.',
        "Nothing personal in there. I can answer from what we have on file.",
        "I'll answer these 2 parts for you.",
      ]);
      expect(lines).toEqual(plan.thinkingLog);
    });

    it("should fall back to rules when the LLM call fails", async () => {
      const plan = await planMessage("Explain prior auth", { llm: new FakeLlm() });
      expect(plan.subquestions).toHaveLength(1);
      expect(plan.subquestions[0].questionIntent).toBe("canonical");
    });

    it("should use fenced LLM JSON and let keywords override the LLM kind", async () => {
      const reply = [
        "```json",
        JSON.stringify({
          subquestions: [
            { id: "a", text: "What did my doctor order?", kind: "non_patient", question_intent: "factual", intent_score: 0.9 },
            { text: "Search for Aetna appeal forms", kind: "non_patient", on_rag_fail: ["web search"] },
          ],
        }),
        "```",
      ].join("\n");
      const llm = new FakeLlm({ planner: reply });

      const plan = await planMessage("What did my doctor order? Search for Aetna appeal forms", { llm });

      const [personal, tool] = plan.subquestions;
      expect(personal).toMatchObject({ id: "a", kind: "patient", questionIntent: "factual", intentScore: 0.9 });
      expect(tool).toMatchObject({
        id: "sq2",
        kind: "tool",
        requiresJurisdiction: false,
        capabilitiesPrimary: "tools",
        onRagFail: ["search_google"],
        intentScore: 0.5,
      });
      expect(plan.llmUsage).toEqual(TEST_USAGE);
      expect(plan.thinkingLog).toContain("I broke your question into 2 parts.");
      expect(plan.thinkingLog).toContain("One part is about your own info; I'll answer the other 1 from our materials.");
    });

    it("should return an empty plan for an empty message", async () => {
      const plan = await planMessage("   ", { llm: null });
      expect(plan.subquestions).toEqual([]);
      expect(plan.thinkingLog).toEqual([
        "I'm reading your question and breaking it down.",
        "You didn't ask anything yet. Please type a question.",
      ]);
    });
  });

  describe("minimalPlan", () => {
    it("should default the text for an empty message", () => {
      expect(minimalPlan("").subquestions[0].text).toBe("What can you help with?");
    });
  });
});

describe("Blueprint", () => {
  it("should route sub-questions to agents", () => {
    expect(agentFor(subquestion({ kind: "patient", capabilitiesPrimary: "rag" }))).toBe("patient_stub");
    expect(agentFor(subquestion({ capabilitiesPrimary: "reasoning" }))).toBe("reasoning");
    expect(agentFor(subquestion({ capabilitiesPrimary: "web" }))).toBe("tool");
    expect(agentFor(subquestion({ kind: "tool" }))).toBe("tool");
    expect(agentFor(subquestion({}))).toBe("RAG");
  });

  it("should give RAG entries the default k and others zero", () => {
    const plan: Plan = {
      subquestions: [
        subquestion({ id: "sq1", questionIntent: "factual", onRagFail: ["search_google"] }),
        subquestion({ id: "sq2", kind: "patient" }),
      ],
      thinkingLog: [],
      llmUsage: null,
    };

    const blueprint = buildBlueprint(plan, 10);

    expect(blueprint).toEqual([
      {
        subquestionId: "sq1",
        text: "What is the appeal deadline?",
        agent: "RAG",
        sensitivity: "medium",
        ragK: 10,
        retrievalConfig: "standard",
        onRagFail: ["search_google"],
      },
      {
        subquestionId: "sq2",
        text: "What is the appeal deadline?",
        agent: "patient_stub",
        sensitivity: "high",
        ragK: 0,
        retrievalConfig: "standard",
        onRagFail: [],
      },
    ]);
    expect(blueprint[0].onRagFail).not.toBe(plan.subquestions[0].onRagFail);
  });
});
