import { randomUUID } from "node:crypto";
import type { ResponseSource } from "@shared/chatProtocol";
import type { ConversationTurn, ThreadState } from "../chat/types";
import type { PersistencePort, ProgressEventType, TurnRecord } from "./types";

interface StoredTurn extends TurnRecord {
  id: string;
  userContent: string | null;
  assistantContent: string | null;
}

/** In-process persistence for tests and the no-database mode. */
export class MemoryPersistence implements PersistencePort {
  readonly kind = "memory" as const;

  private readonly threads = new Set<string>();
  private readonly states = new Map<string, ThreadState>();
  private readonly turns: StoredTurn[] = [];
  readonly progressEvents: Array<{ correlationId: string; type: ProgressEventType; data: Record<string, unknown> }> = [];

  async ensureThread(threadId?: string | null): Promise<string> {
    const id = threadId?.trim() || randomUUID();
    this.threads.add(id);
    return id;
  }

  async getState(threadId: string): Promise<ThreadState | null> {
    const state = this.states.get(threadId);
    return state ? structuredClone(state) : null;
  }

  async saveState(threadId: string, state: ThreadState): Promise<void> {
    this.threads.add(threadId);
    this.states.set(threadId, structuredClone(state));
  }

  private turnsOf(threadId: string): StoredTurn[] {
    return this.turns.filter((t) => t.threadId === threadId);
  }

  async getLastTurnMessages(threadId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];
    return this.turnsOf(threadId)
      .filter((t) => t.userContent !== null && t.assistantContent !== null)
      .slice(-limit)
      .map((t) => ({ userContent: t.userContent ?? "", assistantContent: t.assistantContent ?? "" }));
  }

  async getLastTurnSources(threadId: string): Promise<ResponseSource[]> {
    const completed = this.turnsOf(threadId).filter((t) => t.status === "completed");
    const last = completed[completed.length - 1];
    return last ? [...last.sources] : [];
  }

  async saveTurn(record: TurnRecord): Promise<string> {
    const id = randomUUID();
    this.turns.push({ ...record, id, userContent: null, assistantContent: null });
    return id;
  }

  async saveTurnWithMessages(record: TurnRecord, userContent: string, assistantContent: string): Promise<string> {
    const id = randomUUID();
    this.turns.push({ ...record, id, userContent, assistantContent });
    return id;
  }

  async appendMessages(threadId: string, turnId: string, userContent: string, assistantContent: string): Promise<void> {
    const turn = this.turns.find((t) => t.id === turnId);
    if (!turn) return;
    turn.threadId = threadId;
    turn.userContent = userContent;
    turn.assistantContent = assistantContent;
  }

  async appendProgressEvent(correlationId: string, type: ProgressEventType, data: Record<string, unknown>): Promise<void> {
    this.progressEvents.push({ correlationId, type, data });
  }

  /** Stored turn records, oldest first. */
  listTurns(): TurnRecord[] {
    return this.turns.map(({ id: _id, userContent: _u, assistantContent: _a, ...record }) => record);
  }
}
