import type { PlanSnapshot } from "@shared/chatProtocol";
import type { Plan } from "./types";

export function toPlanSnapshot(plan: Plan): PlanSnapshot {
  return {
    subquestions: plan.subquestions.map((sq) => ({
      id: sq.id,
      text: sq.text,
      kind: sq.kind,
      question_intent: sq.questionIntent,
      intent_score: sq.intentScore,
      on_rag_fail: [...sq.onRagFail],
      capabilities_primary: sq.capabilitiesPrimary,
      requires_jurisdiction: sq.requiresJurisdiction,
    })),
    thinking_log: [...plan.thinkingLog],
  };
}

/** Plans by correlation id. The oldest entry is evicted once `capacity` is reached. */
export class PlanStore {
  private readonly plans = new Map<string, PlanSnapshot>();

  constructor(private readonly capacity: number = 1000) {}

  save(correlationId: string, plan: Plan): void {
    this.plans.delete(correlationId);
    this.plans.set(correlationId, toPlanSnapshot(plan));
    while (this.plans.size > this.capacity) {
      const oldest = this.plans.keys().next();
      if (oldest.done) break;
      this.plans.delete(oldest.value);
    }
  }

  get(correlationId: string): PlanSnapshot | null {
    return this.plans.get(correlationId) ?? null;
  }
}
