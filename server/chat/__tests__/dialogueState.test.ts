/**
 * Dialogue state tests
 *
 * Covers deterministic extraction, decay, the delta merge rules, slot-fill
 * classification and the refined query carried between turns.
 */

import { describe, it, expect } from "vitest";
import { buildRefinedQuery, classifyMessage, computeRefinedQuery } from "../messageClassifier";
import { decayDelta, extractStateDelta, stripPatientIdentifiers } from "../stateExtractor";
import { applyDelta, defaultThreadState, parseThreadState } from "../threadState";
import { getJurisdiction, jurisdictionSummary, ragFiltersFromActive } from "../jurisdiction";
import { detectPayers, detectState } from "../referenceData";
import type { ThreadState } from "../types";

function stateWith(overrides: Partial<ThreadState>, active: Partial<ThreadState["active"]> = {}): ThreadState {
  const base = defaultThreadState();
  return { ...base, ...overrides, active: { ...base.active, ...active } };
}

describe("Reference data", () => {
  it("should return canonical payer names in order of appearance", () => {
    expect(detectPayers("Is UHC or Sunshine Health faster on appeals?")).toEqual(["UnitedHealthcare", "Sunshine Health"]);
  });

  it("should prefer full state names and only read upper-case abbreviations", () => {
    expect(detectState("Florida Medicaid")).toBe("Florida");
    expect(detectState("we are in TX")).toBe("TX");
    expect(detectState("how do i sign in or out")).toBeNull();
  });
});

describe("extractStateDelta", () => {
  it("should capture payer and domain from a question", () => {
    const { delta, resetReason } = extractStateDelta("How do I file an appeal with Aetna?", defaultThreadState());

    expect(resetReason).toBeNull();
    expect(delta).toEqual({
      active: { payer: "Aetna", payers: [], domain: "disputes" },
      turnsSinceActiveSet: 0,
    });
  });

  it("should reset domain and open slots when the payer changes", () => {
    const state = stateWith({ openSlots: ["service_code"] }, { payer: "Aetna", domain: "disputes" });

    const { delta, resetReason } = extractStateDelta("What about Cigna?", state);

    expect(resetReason).toBe("payer_change");
    expect(delta.active).toEqual({ payer: "Cigna", payers: [], domain: null });
    expect(delta.openSlots).toEqual([]);
  });

  it("should record several payers in payers and clear the single payer", () => {
    const { delta, resetReason } = extractStateDelta("Compare Aetna and Cigna timelines", defaultThreadState());

    expect(resetReason).toBe("payer_change");
    expect(delta.active?.payer).toBeNull();
    expect(delta.active?.payers).toEqual(["Aetna", "Cigna"]);
  });

  it("should take a short reply to an open payer slot as the payer name", () => {
    const state = stateWith({ openSlots: ["jurisdiction.payor"] });

    const { delta } = extractStateDelta("Acme Health", state);

    expect(delta).toEqual({
      active: { payer: "Acme Health", payers: [] },
      openSlots: [],
      turnsSinceActiveSet: 0,
    });
  });

  it("should read a state reply to an open payer slot as the state, not the payer", () => {
    const state = stateWith({ openSlots: ["jurisdiction.payor"], refinedQuery: "How do I file an appeal?" });

    const { delta } = extractStateDelta("Florida", state);

    expect(delta).toEqual({ active: { jurisdiction: "Florida" }, turnsSinceActiveSet: 0 });
    expect(applyDelta(state, delta).active.payer).toBeNull();
  });

  it("should read a role or program reply to an open payer slot as that slot", () => {
    const state = stateWith({ openSlots: ["jurisdiction.payor"] });

    expect(extractStateDelta("As a provider", state).delta).toEqual({
      active: { userRole: "provider_office" },
      turnsSinceActiveSet: 0,
    });
    expect(extractStateDelta("Commercial", state).delta).toEqual({
      active: { program: "Commercial" },
      turnsSinceActiveSet: 0,
    });
  });

  it("should not take a question as a payer answer", () => {
    const state = stateWith({ openSlots: ["jurisdiction.payor"] });
    expect(extractStateDelta("what is that?", state).delta).toEqual({});
  });

  it("should close a non-jurisdiction slot when its answer pattern matches", () => {
    const state = stateWith({ openSlots: ["service_code", "date_range"] });
    expect(extractStateDelta("CPT 99213", state).delta.openSlots).toEqual(["date_range"]);
  });

  it("should record the turn id when active fields change", () => {
    const { delta } = extractStateDelta("Florida Medicaid", defaultThreadState(), "turn-7");
    expect(delta.lastUpdatedTurnId).toBe("turn-7");
    expect(delta.active).toEqual({ payer: "Medicaid", payers: [], jurisdiction: "Florida", program: "Medicaid" });
  });
});

describe("stripPatientIdentifiers", () => {
  it("should drop identifier-like values and never copy safety flags", () => {
    const stripped = stripPatientIdentifiers({
      active: { payer: "DOB 01/02/1980" },
      recentEntities: ["MRN 1234567", "Aetna"],
      safety: { patientAllowed: true },
    });

    expect(stripped).toEqual({ active: { payer: null }, recentEntities: ["Aetna"] });
  });
});

describe("decayDelta", () => {
  it("should keep the context alive while slots are open", () => {
    const state = stateWith({ openSlots: ["jurisdiction.payor"], turnsSinceActiveSet: 5 });
    expect(decayDelta(state)).toEqual({ delta: { turnsSinceActiveSet: 0 }, resetReason: null });
  });

  it("should advance the counter below the limit", () => {
    expect(decayDelta(stateWith({ turnsSinceActiveSet: 1 }), 2)).toEqual({
      delta: { turnsSinceActiveSet: 2 },
      resetReason: null,
    });
  });

  it("should clear the active context past the limit", () => {
    const { delta, resetReason } = decayDelta(stateWith({ turnsSinceActiveSet: 2 }, { payer: "Aetna" }), 2);

    expect(resetReason).toBe("decay");
    expect(applyDelta(stateWith({ turnsSinceActiveSet: 2 }, { payer: "Aetna" }), delta).active.payer).toBeNull();
  });
});

describe("applyDelta", () => {
  it("should merge active fields and replace lists without touching the input", () => {
    const state = stateWith({ openSlots: ["jurisdiction.payor"] }, { payer: "Aetna", domain: "claims" });

    const next = applyDelta(state, { active: { domain: "disputes" }, openSlots: [], refinedQuery: "q" });

    expect(next.active.payer).toBe("Aetna");
    expect(next.active.domain).toBe("disputes");
    expect(next.openSlots).toEqual([]);
    expect(next.refinedQuery).toBe("q");
    expect(state.openSlots).toEqual(["jurisdiction.payor"]);
    expect(state.active.domain).toBe("claims");
  });

  it("should return an equal state for an empty delta", () => {
    const state = stateWith({}, { payer: "Aetna" });
    expect(applyDelta(state, {})).toEqual(state);
  });
});

describe("parseThreadState", () => {
  it("should fall back to defaults for malformed fields", () => {
    const state = parseThreadState({
      openSlots: "jurisdiction.payor",
      active: { payer: 5, domain: "bogus", jurisdiction: "Florida" },
      turnsSinceActiveSet: -1,
    });

    expect(state.openSlots).toEqual([]);
    expect(state.active.payer).toBeNull();
    expect(state.active.domain).toBeNull();
    expect(state.active.jurisdiction).toBe("Florida");
    expect(state.turnsSinceActiveSet).toBe(0);
  });

  it("should return the default state for missing rows", () => {
    expect(parseThreadState(null)).toEqual(defaultThreadState());
  });
});

describe("Jurisdiction", () => {
  it("should let flat active fields override the jurisdiction object", () => {
    const j = getJurisdiction({
      payer: "Sunshine Health",
      jurisdiction: "Florida",
      jurisdictionObj: { payor: "Aetna", program: "Medicaid" },
    });

    expect(jurisdictionSummary(j)).toBe("Sunshine Health in Florida (Medicaid)");
  });

  it("should search across payers when several are named", () => {
    expect(ragFiltersFromActive({ payers: ["Aetna", "Cigna"], jurisdiction: "Ohio" })).toEqual({ state: "Ohio" });
  });
});

describe("classifyMessage", () => {
  const refined = "How do I file an appeal?";

  it("should treat a payer reply to an open slot as a slot fill", () => {
    expect(classifyMessage("Sunshine Health", null, ["jurisdiction.payor"], refined)).toBe("slot_fill");
  });

  it("should treat a short affirmation to an open slot as a slot fill", () => {
    expect(classifyMessage("yes", null, ["jurisdiction.payor"], refined)).toBe("slot_fill");
  });

  it("should recover a slot fill from the last assistant question when slots were lost", () => {
    const lastTurn = {
      userContent: refined,
      assistantContent: "Which health plan or payer are you asking about?",
    };
    expect(classifyMessage("Florida Medicaid", lastTurn, [], null)).toBe("slot_fill");
  });

  it("should treat a short fragment after a refined query as a slot fill", () => {
    expect(classifyMessage("in Florida", null, [], refined)).toBe("slot_fill");
  });

  it("should treat a full question as a new question", () => {
    expect(classifyMessage("How do I check eligibility for Aetna?", null, [], refined)).toBe("new_question");
  });

  it("should treat anything else as a new question", () => {
    expect(classifyMessage("Thanks", null, [], null)).toBe("new_question");
    expect(classifyMessage("   ", null, ["jurisdiction.payor"], refined)).toBe("new_question");
  });
});

describe("Refined query", () => {
  it("should append the jurisdiction summary", () => {
    const j = getJurisdiction({ payer: "Sunshine Health", jurisdiction: "Florida", program: "Medicaid" });
    expect(buildRefinedQuery("How do I file an appeal?", j)).toBe(
      "How do I file an appeal? for Sunshine Health in Florida (Medicaid)"
    );
  });

  it("should not append a summary the query already contains", () => {
    const j = getJurisdiction({ payer: "Aetna" });
    expect(buildRefinedQuery("Aetna appeal deadline", j)).toBe("Aetna appeal deadline");
    expect(buildRefinedQuery("  appeal deadline  ", null)).toBe("appeal deadline");
  });

  it("should start a new question from the first planned sub-question", () => {
    const state = stateWith({}, { payer: "Aetna" });
    expect(computeRefinedQuery("new_question", "raw", "old query", state, "What is the appeal deadline?")).toBe(
      "What is the appeal deadline? for Aetna"
    );
  });

  it("should extend the previous refined query on a slot fill", () => {
    const state = stateWith({}, { payer: "Acme Health" });
    expect(computeRefinedQuery("slot_fill", "Acme Health", "How do I file an appeal?", state, null)).toBe(
      "How do I file an appeal? for Acme Health"
    );
  });
});
