/**
 * Thread state model and its single mutation path.
 *
 * State is a convenience, not truth: when the user contradicts it, the user wins,
 * and it decays quickly (see stateExtractor.decayDelta).
 */

import { z } from "zod";
import type { ActiveContext, StateDelta, ThreadState } from "./types";

export function emptyActiveContext(): ActiveContext {
  return {
    payer: null,
    payers: [],
    domain: null,
    jurisdiction: null,
    program: null,
    userRole: null,
    jurisdictionObj: null,
  };
}

export function defaultThreadState(): ThreadState {
  return {
    active: emptyActiveContext(),
    openSlots: [],
    recentEntities: [],
    lastUserIntent: null,
    lastUpdatedTurnId: null,
    refinedQuery: null,
    safety: { patientAllowed: false },
    turnsSinceActiveSet: 0,
  };
}

/**
 * Apply a delta. Per-field rules:
 * - active, safety: shallow merge of the delta's keys over the current object
 * - openSlots, recentEntities: full replacement
 * - lastUserIntent, lastUpdatedTurnId, refinedQuery, turnsSinceActiveSet: replaced
 * Returns a new state; the input is not modified.
 */
export function applyDelta(state: ThreadState, delta: StateDelta): ThreadState {
  const next: ThreadState = {
    ...state,
    active: { ...state.active, payers: [...state.active.payers] },
    openSlots: [...state.openSlots],
    recentEntities: [...state.recentEntities],
    safety: { ...state.safety },
  };

  if (delta.active) {
    next.active = { ...next.active, ...delta.active };
  }
  if (delta.openSlots !== undefined) {
    next.openSlots = [...delta.openSlots];
  }
  if (delta.recentEntities !== undefined) {
    next.recentEntities = [...delta.recentEntities];
  }
  if (delta.lastUserIntent !== undefined) {
    next.lastUserIntent = delta.lastUserIntent;
  }
  if (delta.lastUpdatedTurnId !== undefined) {
    next.lastUpdatedTurnId = delta.lastUpdatedTurnId;
  }
  if (delta.refinedQuery !== undefined) {
    next.refinedQuery = delta.refinedQuery;
  }
  if (delta.safety) {
    next.safety = { ...next.safety, ...delta.safety };
  }
  if (delta.turnsSinceActiveSet !== undefined) {
    next.turnsSinceActiveSet = delta.turnsSinceActiveSet;
  }

  return next;
}

export function isEmptyDelta(delta: StateDelta): boolean {
  return Object.keys(delta).length === 0;
}

// ============================================================
// LOADING PERSISTED STATE
// ============================================================

const nullableString = z.string().nullable().catch(null);

const storedActiveSchema = z
  .object({
    payer: nullableString,
    payers: z.array(z.string()).catch([]),
    domain: z
      .enum(["prior_auth", "disputes", "eligibility", "contacts", "um", "claims", "billing", "benefits", "other"])
      .nullable()
      .catch(null),
    jurisdiction: nullableString,
    program: nullableString,
    userRole: z.enum(["provider_office", "patient"]).nullable().catch(null),
    jurisdictionObj: z
      .object({
        state: nullableString.optional(),
        payor: nullableString.optional(),
        program: nullableString.optional(),
        perspective: nullableString.optional(),
        regulatoryAgency: nullableString.optional(),
      })
      .nullable()
      .catch(null),
  })
  .partial();

const storedStateSchema = z
  .object({
    active: storedActiveSchema.catch({}),
    openSlots: z.array(z.string()).catch([]),
    recentEntities: z.array(z.string()).catch([]),
    lastUserIntent: nullableString,
    lastUpdatedTurnId: nullableString,
    refinedQuery: nullableString,
    safety: z.object({ patientAllowed: z.boolean().catch(false) }).partial().catch({}),
    turnsSinceActiveSet: z.number().int().nonnegative().catch(0),
  })
  .partial();

/**
 * Build a ThreadState from whatever the persistence layer returned.
 * Unknown or malformed fields fall back to their defaults.
 */
export function parseThreadState(raw: unknown): ThreadState {
  const base = defaultThreadState();
  if (raw === null || raw === undefined) return base;

  const parsed = storedStateSchema.safeParse(raw);
  if (!parsed.success) return base;
  const stored = parsed.data;
  const storedActive = stored.active ?? {};

  return {
    active: {
      payer: storedActive.payer ?? null,
      payers: storedActive.payers ?? [],
      domain: storedActive.domain ?? null,
      jurisdiction: storedActive.jurisdiction ?? null,
      program: storedActive.program ?? null,
      userRole: storedActive.userRole ?? null,
      jurisdictionObj: storedActive.jurisdictionObj ?? null,
    },
    openSlots: stored.openSlots ?? base.openSlots,
    recentEntities: stored.recentEntities ?? base.recentEntities,
    lastUserIntent: stored.lastUserIntent ?? null,
    lastUpdatedTurnId: stored.lastUpdatedTurnId ?? null,
    refinedQuery: stored.refinedQuery ?? null,
    safety: { patientAllowed: stored.safety?.patientAllowed ?? false },
    turnsSinceActiveSet: stored.turnsSinceActiveSet ?? 0,
  };
}
