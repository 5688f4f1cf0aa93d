/**
 * Postgres persistence through drizzle-orm over a Neon serverless pool.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  insertChatProgressEventSchema,
  insertChatThreadStateSchema,
  insertChatTurnMessageSchema,
  insertChatTurnSchema,
} from "@shared/schema";
import { responseSourceSchema } from "@shared/chatProtocol";
import { schema, eq, desc, and, inArray } from "./db";
import { parseThreadState } from "../chat/threadState";
import { PersistenceFailure, describeError } from "../utils/errors";
import type { Database } from "./db";
import type { ResponseSource } from "@shared/chatProtocol";
import type { ConversationTurn, ThreadState } from "../chat/types";
import type { PersistencePort, ProgressEventType, TurnRecord } from "./types";

const storedSourcesSchema = z.array(responseSourceSchema).catch([]);

async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof PersistenceFailure) throw error;
    throw new PersistenceFailure(`${operation} failed: ${describeError(error)}`, { cause: error });
  }
}

export class DrizzlePersistence implements PersistencePort {
  readonly kind = "postgres" as const;

  constructor(private readonly db: Database) {}

  ensureThread(threadId?: string | null): Promise<string> {
    return guarded("ensureThread", async () => {
      const id = threadId?.trim() || randomUUID();
      await this.db.insert(schema.chatThreads).values({ id }).onConflictDoNothing();
      return id;
    });
  }

  getState(threadId: string): Promise<ThreadState | null> {
    return guarded("getState", async () => {
      const [row] = await this.db
        .select()
        .from(schema.chatThreadState)
        .where(eq(schema.chatThreadState.threadId, threadId));
      return row ? parseThreadState(row.state) : null;
    });
  }

  saveState(threadId: string, state: ThreadState): Promise<void> {
    return guarded("saveState", async () => {
      const values = insertChatThreadStateSchema.parse({ threadId, state });
      await this.db
        .insert(schema.chatThreadState)
        .values(values)
        .onConflictDoUpdate({
          target: schema.chatThreadState.threadId,
          set: { state: values.state, updatedAt: new Date() },
        });
      await this.db
        .update(schema.chatThreads)
        .set({ updatedAt: new Date() })
        .where(eq(schema.chatThreads.id, threadId));
    });
  }

  getLastTurnMessages(threadId: string, limit: number): Promise<ConversationTurn[]> {
    return guarded("getLastTurnMessages", async () => {
      if (limit <= 0) return [];
      const turns = await this.db
        .select({ id: schema.chatTurns.id })
        .from(schema.chatTurns)
        .where(eq(schema.chatTurns.threadId, threadId))
        .orderBy(desc(schema.chatTurns.createdAt))
        .limit(limit);
      if (turns.length === 0) return [];

      const turnIds = turns.map((t) => t.id);
      const messages = await this.db
        .select()
        .from(schema.chatTurnMessages)
        .where(inArray(schema.chatTurnMessages.turnId, turnIds));

      // turns came back newest first
      return [...turnIds].reverse().flatMap((turnId) => {
        const forTurn = messages.filter((m) => m.turnId === turnId);
        const user = forTurn.find((m) => m.role === "user");
        const assistant = forTurn.find((m) => m.role === "assistant");
        return user && assistant ? [{ userContent: user.content, assistantContent: assistant.content }] : [];
      });
    });
  }

  getLastTurnSources(threadId: string): Promise<ResponseSource[]> {
    return guarded("getLastTurnSources", async () => {
      const [row] = await this.db
        .select({ sources: schema.chatTurns.sources })
        .from(schema.chatTurns)
        .where(and(eq(schema.chatTurns.threadId, threadId), eq(schema.chatTurns.status, "completed")))
        .orderBy(desc(schema.chatTurns.createdAt))
        .limit(1);
      return row ? storedSourcesSchema.parse(row.sources ?? []) : [];
    });
  }

  saveTurn(record: TurnRecord): Promise<string> {
    return guarded("saveTurn", async () => {
      const id = randomUUID();
      const values = insertChatTurnSchema.parse({
        id,
        correlationId: record.correlationId,
        threadId: record.threadId,
        question: record.question,
        status: record.status,
        finalMessage: record.finalMessage,
        sources: record.sources,
        usageBreakdown: record.usageBreakdown,
        costUsd: record.costUsd.toFixed(6),
      });
      await this.db.insert(schema.chatTurns).values(values);
      return id;
    });
  }

  saveTurnWithMessages(record: TurnRecord, userContent: string, assistantContent: string): Promise<string> {
    return guarded("saveTurnWithMessages", async () => {
      const turnId = await this.saveTurn(record);
      if (record.threadId) {
        await this.appendMessages(record.threadId, turnId, userContent, assistantContent);
      }
      return turnId;
    });
  }

  appendMessages(threadId: string, turnId: string, userContent: string, assistantContent: string): Promise<void> {
    return guarded("appendMessages", async () => {
      const rows = [
        insertChatTurnMessageSchema.parse({ turnId, threadId, role: "user", content: userContent }),
        insertChatTurnMessageSchema.parse({ turnId, threadId, role: "assistant", content: assistantContent }),
      ];
      await this.db.insert(schema.chatTurnMessages).values(rows);
    });
  }

  appendProgressEvent(correlationId: string, type: ProgressEventType, data: Record<string, unknown>): Promise<void> {
    return guarded("appendProgressEvent", async () => {
      const values = insertChatProgressEventSchema.parse({ correlationId, eventType: type, data });
      await this.db.insert(schema.chatProgressEvents).values(values);
    });
  }
}
