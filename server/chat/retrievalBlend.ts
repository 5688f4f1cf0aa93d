/**
 * Intent score -> retrieval blend.
 *
 * 0 = canonical/process question: all hierarchical (5 passages).
 * 1 = factual lookup: all factual (10 passages) with a higher confidence floor.
 * Values in between mix both lanes, e.g. 0.2 -> 4 hierarchical + 2 factual.
 */

import { chatConfig } from "./chatConfig";
import type { BlendParams, QuestionIntent } from "./types";

export interface BlendConstants {
  hierarchicalScale: number;
  factualScale: number;
  laneCap: number;
  confidenceBase: number;
  confidenceSlope: number;
}

export const DEFAULT_BLEND_CONSTANTS: BlendConstants = {
  hierarchicalScale: chatConfig.BLEND.HIERARCHICAL_SCALE,
  factualScale: chatConfig.BLEND.FACTUAL_SCALE,
  laneCap: chatConfig.BLEND.LANE_CAP,
  confidenceBase: chatConfig.BLEND.CONFIDENCE_BASE,
  confidenceSlope: chatConfig.BLEND.CONFIDENCE_SLOPE,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Round to the nearest integer; exact halves go to the even neighbour (2.5 -> 2, 3.5 -> 4). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Round to `places` decimals on the exact binary value: 0.515 is stored just
 * above the tie and goes up; an exact tie such as 0.625 goes to the even digit.
 */
export function roundTo(value: number, places: number): number {
  const exact = value.toFixed(60);
  const cut = exact.indexOf(".") + 1 + places;
  if (!/^50*$/.test(exact.slice(cut))) return Number(value.toFixed(places));
  const kept = exact.slice(0, cut);
  return Number(kept.slice(-1)) % 2 === 0 ? Number(kept) : Number(value.toFixed(places));
}

/**
 * Scores outside [0, 1] (or NaN) are clamped first, so the lane counts stay in
 * [0, laneCap] and their sum never exceeds 2 * laneCap. Counts round half to
 * even; the confidence floor is rounded to two decimals.
 */
export function getRetrievalBlend(
  score: number,
  constants: BlendConstants = DEFAULT_BLEND_CONSTANTS
): BlendParams {
  const s = Number.isFinite(score) ? clamp(score, 0, 1) : 0.5;
  const { hierarchicalScale, factualScale, laneCap, confidenceBase, confidenceSlope } = constants;

  return {
    nHierarchical: clamp(roundHalfEven(hierarchicalScale * (1 - s)), 0, laneCap),
    nFactual: clamp(roundHalfEven(factualScale * s), 0, laneCap),
    confidenceMin: clamp(roundTo(confidenceBase + confidenceSlope * s, 2), 0, 1),
  };
}
