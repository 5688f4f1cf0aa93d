/**
 * CLARIFY checks: jurisdiction clarification first, then query refinement.
 */

import { chatConfig } from "./chatConfig";
import { getJurisdiction, hasJurisdictionScope } from "./jurisdiction";
import { PAYERS, PROGRAMS, US_STATES } from "./referenceData";
import type { ActiveContext, ClarificationOption, JurisdictionSlot, SubQuestion } from "./types";

export const PAYER_CLARIFICATION_MESSAGE =
  "Which health plan or payer are you asking about? (e.g., Sunshine Health, United Healthcare)";

export interface JurisdictionCheck {
  needed: boolean;
  missingSlots: JurisdictionSlot[];
  message: string | null;
}

export interface RefinementCheck {
  needed: boolean;
  suggestions: string[];
}

const NOT_NEEDED: JurisdictionCheck = { needed: false, missingSlots: [], message: null };

/**
 * Ask for the payer when a non-patient sub-question needs jurisdiction and none
 * of payer, state, program or regulatory agency is known. The payer is always
 * asked first, even when state and program are unknown too.
 */
export function needJurisdictionClarification(
  subquestions: readonly SubQuestion[],
  active: Partial<ActiveContext> | null
): JurisdictionCheck {
  const needing = subquestions.filter(
    (sq) => sq.kind === "non_patient" && sq.requiresJurisdiction !== false
  );
  if (needing.length === 0) return NOT_NEEDED;

  if (hasJurisdictionScope(getJurisdiction(active))) return NOT_NEEDED;

  return {
    needed: true,
    missingSlots: ["jurisdiction.payor"],
    message: PAYER_CLARIFICATION_MESSAGE,
  };
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function needQueryRefinement(
  subquestions: readonly SubQuestion[],
  config: Pick<
    typeof chatConfig,
    "REFINEMENT_VAGUE_MIN_WORDS" | "REFINEMENT_MULTI_INTENT_THRESHOLD" | "REFINEMENT_AMBIGUITY_BAND"
  > = chatConfig
): RefinementCheck {
  if (subquestions.length === 0) return { needed: false, suggestions: [] };

  const first = subquestions[0];
  if (subquestions.length === 1 && wordCount(first.text.trim()) < config.REFINEMENT_VAGUE_MIN_WORDS) {
    return { needed: true, suggestions: [first.text.trim()] };
  }

  if (subquestions.length >= config.REFINEMENT_MULTI_INTENT_THRESHOLD) {
    const suggestions = subquestions
      .slice(0, 3)
      .map((sq) => sq.text.trim())
      .filter(Boolean);
    return { needed: true, suggestions };
  }

  const ambiguous = subquestions.find(
    (sq) => Math.abs(sq.intentScore - 0.5) < config.REFINEMENT_AMBIGUITY_BAND
  );
  if (ambiguous) {
    return { needed: true, suggestions: [ambiguous.text] };
  }

  return { needed: false, suggestions: [] };
}

// ============================================================
// CLARIFICATION OPTIONS
// ============================================================

const SLOT_LABELS: Record<JurisdictionSlot, string> = {
  "jurisdiction.payor": "Which health plan?",
  "jurisdiction.state": "Which state?",
  "jurisdiction.program": "Medicare or Medicaid?",
  "jurisdiction.perspective": "As a provider or patient?",
};

function choicesFor(slot: JurisdictionSlot): ClarificationOption["choices"] {
  switch (slot) {
    case "jurisdiction.payor":
      return PAYERS.map((p) => ({ value: p.canonical, label: p.canonical }));
    case "jurisdiction.state":
      return US_STATES.map((s) => ({ value: s.abbreviation, label: s.name }));
    case "jurisdiction.program":
      return PROGRAMS.map((p) => ({ value: p, label: p }));
    case "jurisdiction.perspective":
      return [
        { value: "provider_office", label: "Provider office" },
        { value: "patient", label: "Patient or member" },
      ];
  }
}

export function buildClarificationOptions(missingSlots: readonly JurisdictionSlot[]): ClarificationOption[] {
  return missingSlots.map((slot): ClarificationOption => ({
    slot,
    label: SLOT_LABELS[slot],
    selection_mode: "single",
    choices: choicesFor(slot),
  }));
}
