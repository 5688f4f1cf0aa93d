import { describe, it, expect } from "vitest";
import {
  buildClarificationOptions,
  needJurisdictionClarification,
  needQueryRefinement,
  PAYER_CLARIFICATION_MESSAGE,
} from "../clarification";
import type { SubQuestion } from "../types";

function sq(text: string, overrides: Partial<SubQuestion> = {}): SubQuestion {
  return {
    id: "sq1",
    text,
    kind: "non_patient",
    questionIntent: "canonical",
    intentScore: 0,
    onRagFail: [],
    capabilitiesPrimary: null,
    requiresJurisdiction: null,
    ...overrides,
  };
}

describe("needJurisdictionClarification", () => {
  const question = sq("How do I file an appeal?");

  it("should ask for the payer when nothing scopes the question", () => {
    expect(needJurisdictionClarification([question], null)).toEqual({
      needed: true,
      missingSlots: ["jurisdiction.payor"],
      message: PAYER_CLARIFICATION_MESSAGE,
    });
  });

  it("should not ask once any jurisdiction field is known", () => {
    expect(needJurisdictionClarification([question], { payer: "Aetna" }).needed).toBe(false);
    expect(needJurisdictionClarification([question], { jurisdiction: "Ohio" }).needed).toBe(false);
    expect(
      needJurisdictionClarification([question], { jurisdictionObj: { regulatoryAgency: "CMS" } }).needed
    ).toBe(false);
  });

  it("should skip patient sub-questions and those marked as not needing jurisdiction", () => {
    expect(needJurisdictionClarification([sq("my records", { kind: "patient" })], null).needed).toBe(false);
    expect(needJurisdictionClarification([sq("What can you do?", { requiresJurisdiction: false })], null).needed).toBe(
      false
    );
  });
});

describe("needQueryRefinement", () => {
  it("should flag a single vague sub-question", () => {
    expect(needQueryRefinement([sq(" Appeals? ")])).toEqual({ needed: true, suggestions: ["Appeals?"] });
  });

  it("should flag likely multi-intent plans with up to three suggestions", () => {
    const plan = [sq("Check eligibility for Aetna"), sq("File a claim with Aetna"), sq("Appeal a denial with Aetna"), sq("Call Aetna")];
    expect(needQueryRefinement(plan)).toEqual({
      needed: true,
      suggestions: ["Check eligibility for Aetna", "File a claim with Aetna", "Appeal a denial with Aetna"],
    });
  });

  it("should flag sub-questions with an ambiguous intent score", () => {
    const ambiguous = sq("Tell me about Aetna appeals", { intentScore: 0.5, questionIntent: null });
    expect(needQueryRefinement([ambiguous])).toEqual({ needed: true, suggestions: ["Tell me about Aetna appeals"] });
  });

  it("should pass clear, specific questions", () => {
    expect(needQueryRefinement([sq("How do I file an appeal?")])).toEqual({ needed: false, suggestions: [] });
    expect(needQueryRefinement([])).toEqual({ needed: false, suggestions: [] });
  });
});

describe("buildClarificationOptions", () => {
  it("should offer the payer list as single-select choices", () => {
    const [option] = buildClarificationOptions(["jurisdiction.payor"]);

    expect(option.slot).toBe("jurisdiction.payor");
    expect(option.label).toBe("Which health plan?");
    expect(option.selection_mode).toBe("single");
    expect(option.choices).toHaveLength(10);
    expect(option.choices[0]).toEqual({ value: "Sunshine Health", label: "Sunshine Health" });
  });

  it("should offer programs and perspectives", () => {
    const [program, perspective] = buildClarificationOptions(["jurisdiction.program", "jurisdiction.perspective"]);

    expect(program.choices.map((c) => c.value)).toEqual(["Medicaid", "Medicare", "Commercial"]);
    expect(perspective.choices.map((c) => c.value)).toEqual(["provider_office", "patient"]);
  });
});
