import { SOURCE_TYPES } from "@shared/chatProtocol";
import type { SourceType } from "../chat/types";

/** Corpus types ordered from most to least authoritative. */
export const HIERARCHY_ORDER: readonly SourceType[] = ["policy", "section", "chunk", "hierarchical", "fact"];

export function hierarchyRank(sourceType: SourceType): number {
  const rank = HIERARCHY_ORDER.indexOf(sourceType);
  return rank === -1 ? HIERARCHY_ORDER.length : rank;
}

/** Unknown stored values are treated as plain chunks. */
export function toSourceType(value: string | null | undefined): SourceType {
  const normalized = (value ?? "").trim().toLowerCase();
  return SOURCE_TYPES.find((t) => t === normalized) ?? "chunk";
}
