/**
 * Jurisdiction: the payer/state/program/perspective combination that scopes
 * which policy documents apply. Resolved from ThreadState.active, where the
 * flat fields (payer, jurisdiction, program, userRole) override jurisdictionObj.
 */

import type { ActiveContext, Jurisdiction, RetrievalFilters } from "./types";

export const EMPTY_JURISDICTION: Jurisdiction = {
  state: null,
  payor: null,
  program: null,
  perspective: null,
  regulatoryAgency: null,
};

function clean(value: string | null | undefined): string | null {
  const trimmed = (value ?? "").trim();
  return trimmed === "" ? null : trimmed;
}

export function getJurisdiction(active: Partial<ActiveContext> | null | undefined): Jurisdiction {
  const a = active ?? {};
  const obj = a.jurisdictionObj ?? {};

  const result: Jurisdiction = {
    state: clean(obj.state),
    payor: clean(obj.payor),
    program: clean(obj.program),
    perspective: clean(obj.perspective),
    regulatoryAgency: clean(obj.regulatoryAgency),
  };

  const payer = clean(a.payer);
  if (payer) result.payor = payer;

  const payers = (a.payers ?? []).map((p) => p.trim()).filter(Boolean);
  if (payers.length > 1) result.payor = payers.join(", ");

  const program = clean(a.program);
  if (program) result.program = program;

  const state = clean(a.jurisdiction);
  if (state) result.state = state;

  if (a.userRole === "provider_office" || a.userRole === "patient") {
    result.perspective = a.userRole;
  }

  return result;
}

/**
 * Display form, e.g. "Sunshine Health in Florida (Medicaid)". Empty when nothing is known.
 */
export function jurisdictionSummary(j: Jurisdiction | null | undefined): string {
  if (!j) return "";
  const parts: string[] = [];
  if (j.payor) parts.push(j.payor);
  if (j.state) parts.push(`in ${j.state}`);
  if (j.program) parts.push(`(${j.program})`);
  return parts.join(" ");
}

export function hasJurisdictionScope(j: Jurisdiction): boolean {
  return Boolean(j.payor || j.state || j.program || j.regulatoryAgency);
}

export function ragFiltersFromActive(active: Partial<ActiveContext> | null | undefined): RetrievalFilters {
  const j = getJurisdiction(active);
  const filters: RetrievalFilters = {};
  // A multi-payer question searches across all payers.
  if (j.payor && (active?.payers ?? []).length <= 1) filters.payer = j.payor;
  if (j.state) filters.state = j.state;
  if (j.program) filters.program = j.program;
  return filters;
}
