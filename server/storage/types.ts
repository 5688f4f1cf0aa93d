import type { ResponseSource, ResponseStatus, UsageBreakdownEntry } from "@shared/chatProtocol";
import type { ConversationTurn, ThreadState } from "../chat/types";

export interface TurnRecord {
  correlationId: string;
  threadId: string | null;
  question: string;
  status: ResponseStatus;
  finalMessage: string;
  sources: ResponseSource[];
  usageBreakdown: UsageBreakdownEntry[];
  costUsd: number;
}

export type ProgressEventType = "thinking" | "message";

/**
 * Thread, turn and progress persistence. Implementations throw
 * PersistenceFailure; the pipeline logs it and carries on.
 */
export interface PersistencePort {
  readonly kind: "memory" | "postgres";
  /** Returns the given id (creating the thread if unknown) or a new one. */
  ensureThread(threadId?: string | null): Promise<string>;
  getState(threadId: string): Promise<ThreadState | null>;
  saveState(threadId: string, state: ThreadState): Promise<void>;
  /** Most recent turns, oldest first. */
  getLastTurnMessages(threadId: string, limit: number): Promise<ConversationTurn[]>;
  /** Sources of the most recent completed turn. */
  getLastTurnSources(threadId: string): Promise<ResponseSource[]>;
  saveTurn(record: TurnRecord): Promise<string>;
  saveTurnWithMessages(record: TurnRecord, userContent: string, assistantContent: string): Promise<string>;
  appendMessages(threadId: string, turnId: string, userContent: string, assistantContent: string): Promise<void>;
  appendProgressEvent(correlationId: string, type: ProgressEventType, data: Record<string, unknown>): Promise<void>;
}
