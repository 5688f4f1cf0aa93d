import { describe, it, expect } from "vitest";
import { buildContextPack, routeContext } from "../contextRouter";
import { defaultThreadState } from "../threadState";

const EMPTY_HEADER =
  "Context: payer=-; domain=-; jurisdiction=-; role=-. Open questions: none. Do not use patient-specific details.";

const turns = [
  { userContent: "How do I file an appeal?", assistantContent: "Which health plan?" },
  { userContent: "Aetna", assistantContent: "File within 60 days." },
];

describe("routeContext", () => {
  const state = defaultThreadState();

  it("should start fresh after a payer change or an explicit new topic", () => {
    expect(routeContext("What about Aetna?", state, turns, "payer_change")).toBe("STANDALONE");
    expect(routeContext("Different question: eligibility", state, turns, null)).toBe("STANDALONE");
  });

  it("should carry full context for references and known scope", () => {
    expect(routeContext("Does that apply to claims?", state, turns, null)).toBe("STATEFUL");
    expect(routeContext("Eligibility rules", { ...state, openSlots: ["jurisdiction.payor"] }, turns, null)).toBe(
      "STATEFUL"
    );
    expect(
      routeContext("Eligibility rules", { ...state, active: { ...state.active, payer: "Aetna" } }, turns, null)
    ).toBe("STATEFUL");
  });

  it("should default to light context", () => {
    expect(routeContext("Eligibility rules", state, turns, null)).toBe("LIGHT");
  });
});

describe("buildContextPack", () => {
  const state = defaultThreadState();

  it("should be empty for standalone messages", () => {
    expect(buildContextPack("STANDALONE", state, turns, [])).toBe("");
  });

  it("should include only the most recent turn for light context", () => {
    expect(buildContextPack("LIGHT", state, turns, [])).toBe(
      `${EMPTY_HEADER}\n\nLast turn:\nUser: Aetna\nAssistant: File within 60 days.\n\n`
    );
  });

  it("should list open slots and recent turns for stateful context", () => {
    const pack = buildContextPack("STATEFUL", state, turns, ["jurisdiction.payor"]);
    expect(pack).toBe(
      "Context: payer=-; domain=-; jurisdiction=-; role=-. Open questions: jurisdiction.payor. Do not use patient-specific details.\n\n" +
        "Turn 1:\nUser: How do I file an appeal?\nAssistant: Which health plan?\n\n" +
        "Turn 2:\nUser: Aetna\nAssistant: File within 60 days.\n\n"
    );
  });
});
