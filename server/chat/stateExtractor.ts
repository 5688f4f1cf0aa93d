/**
 * Deterministic state extraction from user text. No LLM calls.
 *
 * The extractor only ever writes whitelisted fields (payer, payers, domain,
 * jurisdiction, program, userRole, openSlots, recentEntities). Patient
 * identifying data (names, DOB, MRN, member ids, SSN) never reaches thread
 * state: every delta passes through stripPatientIdentifiers before it is returned.
 */

import { chatConfig } from "./chatConfig";
import { detectPayers, detectProgram, detectState, detectUserRole } from "./referenceData";
import { isNewQuestionShaped } from "./messageClassifier";
import type { ActiveContext, Domain, ResetReason, StateDelta, ThreadState } from "./types";

const DOMAIN_KEYWORDS: ReadonlyArray<[readonly string[], Domain]> = [
  [["prior auth", "preauth", "pre-auth", "authorization", "prior authorization"], "prior_auth"],
  [["dispute", "appeal", "reconsideration", "grievance"], "disputes"],
  [["eligibility", "coverage", "cob", "co-b", "verified"], "eligibility"],
  [["contact", "phone", "provider relations"], "contacts"],
  [["utilization management", "um ", " utilization review"], "um"],
  [["claims", "denial", "eob", "explanation of benefits", "claim status"], "claims"],
  [["billing", "payment", "reimbursement"], "billing"],
  [["benefits", "benefit"], "benefits"],
];

/** Answer patterns for the non-jurisdiction slots an answer may leave open. */
const SLOT_ANSWER_PATTERNS: Readonly<Record<string, RegExp>> = {
  service_code: /\b(CPT|HCPCS|procedure\s+code)\s*[:\s]*\d+|\b\d{5}(-\d{2})?\b/i,
  plan_type: /\b(plan\s+is|medicaid|medicare|commercial|ppo|hmo)\b/i,
  member_type: /\b(member\s+type|subscriber|dependent)\b/i,
  date_range: /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b|\b(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)\w*\s+\d{1,2},?\s*\d{4}\b/i,
  provider_type: /\b(provider\s+type|npi|facility)\b/i,
};

const AFFIRMATION_ONLY = /^(yes|yeah|yep|no|nope|same|that one|that|ok|okay|sure)[.!]?$/i;

// ===== PATIENT IDENTIFIER FILTER =====

const PII_VALUE_PATTERNS: readonly RegExp[] = [
  /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/, // dates (DOB)
  /\b\d{3}-\d{2}-\d{4}\b/, // SSN
  /\b[A-Z]{0,3}\d{6,}\b/i, // MRN / member id style numbers
  /\b(dob|date of birth|born on)\b/i,
  /\b(mrn|medical record (number|no)|member (id|#|number)|subscriber id|ssn)\b/i,
  /\b(my name is|patient name|name:)\b/i,
];

export function looksLikePatientIdentifier(value: string): boolean {
  return PII_VALUE_PATTERNS.some((pattern) => pattern.test(value));
}

function safeString(value: string | null | undefined): string | null | undefined {
  if (value === null || value === undefined) return value;
  return looksLikePatientIdentifier(value) ? null : value;
}

/**
 * Rebuild a delta from whitelisted fields only, dropping any string value that
 * looks like a patient identifier. Unknown keys on the input are discarded.
 */
export function stripPatientIdentifiers(delta: StateDelta): StateDelta {
  const out: StateDelta = {};

  if (delta.active) {
    const src = delta.active;
    const active: Partial<ActiveContext> = {};
    if (src.payer !== undefined) active.payer = safeString(src.payer) ?? null;
    if (src.payers !== undefined) active.payers = src.payers.filter((p) => !looksLikePatientIdentifier(p));
    if (src.domain !== undefined) active.domain = src.domain;
    if (src.jurisdiction !== undefined) active.jurisdiction = safeString(src.jurisdiction) ?? null;
    if (src.program !== undefined) active.program = safeString(src.program) ?? null;
    if (src.userRole !== undefined) active.userRole = src.userRole;
    if (src.jurisdictionObj !== undefined) {
      const obj = src.jurisdictionObj;
      active.jurisdictionObj = obj && {
        state: safeString(obj.state),
        payor: safeString(obj.payor),
        program: safeString(obj.program),
        perspective: safeString(obj.perspective),
        regulatoryAgency: safeString(obj.regulatoryAgency),
      };
    }
    out.active = active;
  }
  if (delta.openSlots !== undefined) out.openSlots = [...delta.openSlots];
  if (delta.recentEntities !== undefined) {
    out.recentEntities = delta.recentEntities.filter((e) => !looksLikePatientIdentifier(e));
  }
  if (delta.lastUserIntent !== undefined) out.lastUserIntent = delta.lastUserIntent;
  if (delta.lastUpdatedTurnId !== undefined) out.lastUpdatedTurnId = delta.lastUpdatedTurnId;
  if (delta.refinedQuery !== undefined) out.refinedQuery = delta.refinedQuery;
  if (delta.turnsSinceActiveSet !== undefined) out.turnsSinceActiveSet = delta.turnsSinceActiveSet;
  // safety flags are never derived from user text
  return out;
}

// ===== DETECTORS =====

export function detectDomain(text: string): Domain | null {
  const t = text.trim().toLowerCase();
  for (const [keywords, domain] of DOMAIN_KEYWORDS) {
    if (keywords.some((kw) => t.includes(kw))) return domain;
  }
  return null;
}

function wordCount(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

/**
 * A short, non-question reply to an open payer slot is taken as the payer name,
 * even when it is not in the payer lexicon. Replies naming a state, program or
 * role answer those slots instead.
 */
function capturePayerAnswer(text: string): string | null {
  const t = text.trim().replace(/[.!]+$/, "").trim();
  if (!t || wordCount(t) > 5) return null;
  if (t.endsWith("?") || AFFIRMATION_ONLY.test(t) || isNewQuestionShaped(t)) return null;
  if (!/[a-z]/i.test(t)) return null;
  if (looksLikePatientIdentifier(t)) return null;
  if (detectState(t) !== null || detectProgram(t) !== null || detectUserRole(t) !== null) return null;
  return t;
}

function remainingOpenSlots(
  text: string,
  openSlots: readonly string[],
  found: { payer: boolean; state: boolean; program: boolean; role: boolean }
): string[] {
  return openSlots.filter((slot) => {
    switch (slot) {
      case "jurisdiction.payor":
        return !found.payer;
      case "jurisdiction.state":
        return !found.state;
      case "jurisdiction.program":
        return !found.program;
      case "jurisdiction.perspective":
        return !found.role;
      default: {
        const pattern = SLOT_ANSWER_PATTERNS[slot];
        return !(pattern && pattern.test(text));
      }
    }
  });
}

function sameText(a: string | null | undefined, b: string | null | undefined): boolean {
  return (a ?? "").trim().toLowerCase() === (b ?? "").trim().toLowerCase();
}

export interface ExtractionResult {
  delta: StateDelta;
  resetReason: ResetReason | null;
}

/**
 * Extract a state delta from one user message.
 *
 * Payer switch: a payer different from the stored one also clears domain and open slots.
 * Two or more payers set active.payers, clear active.payer, and always reset.
 */
export function extractStateDelta(
  message: string,
  state: ThreadState,
  turnId: string | null = null
): ExtractionResult {
  const text = (message || "").trim();
  const active: Partial<ActiveContext> = {};
  const delta: StateDelta = {};
  let resetReason: ResetReason | null = null;

  if (!text) return { delta, resetReason };

  const existingPayer = state.active.payer;
  const existingDomain = state.active.domain;
  const existingSlots = state.openSlots;

  // 1) Payer(s)
  let payers = detectPayers(text);
  if (payers.length === 0 && existingSlots.includes("jurisdiction.payor")) {
    const captured = capturePayerAnswer(text);
    if (captured) payers = [captured];
  }
  if (payers.length === 1) {
    active.payer = payers[0];
    active.payers = [];
    if (existingPayer && !sameText(existingPayer, payers[0])) {
      resetReason = "payer_change";
      active.domain = null;
      delta.openSlots = [];
    }
  } else if (payers.length > 1) {
    active.payer = null;
    active.payers = payers;
    active.domain = null;
    delta.openSlots = [];
    resetReason = "payer_change";
  }

  // 2) Domain
  const domain = detectDomain(text);
  if (domain) {
    active.domain = domain;
    if (existingDomain && existingDomain !== domain) {
      delta.openSlots = [];
    }
  }

  // 3) State and program
  const stateName = detectState(text);
  if (stateName) active.jurisdiction = stateName;

  const program = detectProgram(text);
  if (program) active.program = program;

  // 4) User role
  const role = detectUserRole(text);
  if (role) active.userRole = role;

  // 5) Open slots answered by this message
  if (delta.openSlots === undefined) {
    const remaining = remainingOpenSlots(text, existingSlots, {
      payer: payers.length > 0,
      state: stateName !== null,
      program: program !== null,
      role: role !== null,
    });
    if (remaining.length !== existingSlots.length) {
      delta.openSlots = remaining;
    }
  }

  if (Object.keys(active).length > 0) {
    delta.active = active;
    delta.turnsSinceActiveSet = 0;
    if (turnId) delta.lastUpdatedTurnId = turnId;
  }

  return { delta: stripPatientIdentifiers(delta), resetReason };
}

/**
 * TTL decay applied before extraction. Open slots keep the context alive;
 * otherwise the turn counter advances and, past the limit, the active
 * payer/domain/jurisdiction are cleared.
 */
export function decayDelta(
  state: ThreadState,
  maxTurns: number = chatConfig.STATE_DECAY_TURNS
): ExtractionResult {
  if (state.openSlots.length > 0) {
    return { delta: { turnsSinceActiveSet: 0 }, resetReason: null };
  }

  const count = state.turnsSinceActiveSet + 1;
  if (count > maxTurns) {
    return {
      delta: {
        active: { payer: null, payers: [], domain: null, jurisdiction: null },
        turnsSinceActiveSet: 0,
      },
      resetReason: "decay",
    };
  }
  return { delta: { turnsSinceActiveSet: count }, resetReason: null };
}
