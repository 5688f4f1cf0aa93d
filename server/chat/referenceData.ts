/**
 * Payer and state lexicons used by the state extractor, the message classifier
 * and clarification options.
 */

import { z } from "zod";
import payersJson from "@shared/data/payers.json";
import statesJson from "@shared/data/usStates.json";

const payerEntrySchema = z.object({
  canonical: z.string().min(1),
  aliases: z.array(z.string().min(1)).min(1),
});

const stateEntrySchema = z.object({
  name: z.string().min(1),
  abbreviation: z.string().length(2),
});

export type PayerEntry = z.infer<typeof payerEntrySchema>;
export type StateEntry = z.infer<typeof stateEntrySchema>;

export const PAYERS: readonly PayerEntry[] = z.array(payerEntrySchema).parse(payersJson);

export const US_STATES: readonly StateEntry[] = z.array(stateEntrySchema).parse(statesJson);

export const PROGRAMS = ["Medicaid", "Medicare", "Commercial"] as const;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word, case-insensitive match with flexible internal whitespace. */
export function phrasePattern(phrases: readonly string[]): RegExp {
  const alternatives = phrases.map((p) => escapeRegExp(p.trim()).replace(/\s+/g, "\\s+"));
  return new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "i");
}

/**
 * Find the payers named in a message, in order of appearance, as canonical names.
 * Longer aliases win over shorter ones at the same position ("Sunshine Health" over "Sunshine").
 */
export function detectPayers(text: string, payers: readonly PayerEntry[] = PAYERS): string[] {
  const aliases = payers
    .flatMap((entry) => entry.aliases.map((alias) => ({ alias, canonical: entry.canonical })))
    .sort((a, b) => b.alias.length - a.alias.length);

  const claimed: Array<[number, number]> = [];
  const hits: Array<{ position: number; canonical: string }> = [];

  for (const { alias, canonical } of aliases) {
    const pattern = new RegExp(`\\b${escapeRegExp(alias).replace(/\s+/g, "\\s+")}\\b`, "gi");
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      const overlaps = claimed.some(([s, e]) => start < e && end > s);
      if (overlaps) continue;
      claimed.push([start, end]);
      hits.push({ position: start, canonical });
    }
  }

  const ordered = hits.sort((a, b) => a.position - b.position).map((h) => h.canonical);
  return Array.from(new Set(ordered));
}

/**
 * State names match case-insensitively; abbreviations only in upper case,
 * so words like "in", "or" and "me" are not read as states.
 */
export function detectState(text: string, states: readonly StateEntry[] = US_STATES): string | null {
  const byLength = [...states].sort((a, b) => b.name.length - a.name.length);
  for (const state of byLength) {
    const pattern = new RegExp(`\\b${escapeRegExp(state.name).replace(/\s+/g, "\\s+")}\\b`, "i");
    if (pattern.test(text)) return state.name;
  }
  for (const state of states) {
    if (new RegExp(`\\b${state.abbreviation}\\b`).test(text)) return state.abbreviation;
  }
  return null;
}

const PROVIDER_ROLE_PATTERN = phrasePattern([
  "as a provider",
  "our clinic",
  "provider portal",
  "we are a provider",
  "provider office",
]);
const PATIENT_ROLE_PATTERN = phrasePattern([
  "as a member",
  "as a patient",
  "i am a patient",
  "i'm a patient",
  "i am a member",
]);

export function detectUserRole(text: string): "provider_office" | "patient" | null {
  if (PROVIDER_ROLE_PATTERN.test(text)) return "provider_office";
  if (PATIENT_ROLE_PATTERN.test(text)) return "patient";
  return null;
}

export function detectProgram(text: string): string | null {
  for (const program of PROGRAMS) {
    if (new RegExp(`\\b${program}\\b`, "i").test(text)) return program;
  }
  return null;
}
