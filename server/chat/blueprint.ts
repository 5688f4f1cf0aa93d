import { chatConfig } from "./chatConfig";
import type { AgentType, BlueprintEntry, Plan, Sensitivity, SubQuestion } from "./types";

export function agentFor(sq: SubQuestion): AgentType {
  const primary = (sq.capabilitiesPrimary ?? "").trim().toLowerCase();
  if (sq.kind === "patient") return "patient_stub";
  if (primary === "reasoning") return "reasoning";
  if (primary === "web" || primary === "tools" || sq.kind === "tool") return "tool";
  return "RAG";
}

export function sensitivityFor(sq: SubQuestion): Sensitivity {
  if (sq.kind === "patient") return "high";
  if (sq.questionIntent === "factual") return "medium";
  return "low";
}

/**
 * One execution directive per sub-question, in plan order. Pure: the plan is
 * read, never modified.
 */
export function buildBlueprint(plan: Plan, ragDefaultK: number = chatConfig.RAG_DEFAULT_K): BlueprintEntry[] {
  return plan.subquestions.map((sq) => {
    const agent = agentFor(sq);
    return {
      subquestionId: sq.id,
      text: sq.text,
      agent,
      sensitivity: sensitivityFor(sq),
      ragK: agent === "RAG" ? ragDefaultK : 0,
      retrievalConfig: "standard",
      onRagFail: [...sq.onRagFail],
    };
  });
}
