import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, integer, jsonb, numeric, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================
// CHAT THREADS & STATE
// ============================================================

export const chatThreads = pgTable("chat_threads", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// One row per thread; `state` is the serialized ThreadState
export const chatThreadState = pgTable("chat_thread_state", {
  threadId: varchar("thread_id")
    .primaryKey()
    .references(() => chatThreads.id, { onDelete: "cascade" }),
  state: jsonb("state").notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// ============================================================
// TURNS
// ============================================================

export const chatTurns = pgTable(
  "chat_turns",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    correlationId: text("correlation_id").notNull().unique(),
    threadId: varchar("thread_id").references(() => chatThreads.id, { onDelete: "cascade" }),
    question: text("question").notNull(),
    status: text("status").notNull(), // clarification | refinement_ask | completed | failed
    finalMessage: text("final_message").notNull(),
    sources: jsonb("sources"), // ResponseSource[]
    usageBreakdown: jsonb("usage_breakdown"),
    costUsd: numeric("cost_usd", { precision: 10, scale: 6 }).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    threadIdx: index("chat_turns_thread_idx").on(table.threadId, table.createdAt),
  })
);

export const chatTurnMessages = pgTable("chat_turn_messages", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  turnId: varchar("turn_id")
    .notNull()
    .references(() => chatTurns.id, { onDelete: "cascade" }),
  threadId: varchar("thread_id").references(() => chatThreads.id, { onDelete: "cascade" }),
  role: text("role").notNull(), // user | assistant
  content: text("content").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const chatProgressEvents = pgTable(
  "chat_progress_events",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    correlationId: text("correlation_id").notNull(),
    eventType: text("event_type").notNull(), // thinking | message
    data: jsonb("data").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    correlationIdx: index("chat_progress_events_correlation_idx").on(table.correlationId),
  })
);

// ============================================================
// POLICY CORPUS
// ============================================================

export const policyChunks = pgTable(
  "policy_chunks",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    documentId: text("document_id"),
    documentName: text("document_name").notNull(),
    pageNumber: integer("page_number"),
    paragraphIndex: integer("paragraph_index"),
    sourceType: text("source_type").notNull(), // policy | section | chunk | hierarchical | fact
    text: text("text").notNull(),
    payer: text("payer"),
    state: text("state"),
    program: text("program"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    documentIdx: index("policy_chunks_document_idx").on(table.documentId, table.paragraphIndex),
  })
);

// ============================================================
// INSERT SCHEMAS & TYPES
// ============================================================

export const insertChatThreadStateSchema = createInsertSchema(chatThreadState).omit({
  updatedAt: true,
});

export const insertChatTurnSchema = createInsertSchema(chatTurns).omit({
  createdAt: true,
});

export const insertChatTurnMessageSchema = createInsertSchema(chatTurnMessages).omit({
  id: true,
  createdAt: true,
});

export const insertChatProgressEventSchema = createInsertSchema(chatProgressEvents).omit({
  id: true,
  createdAt: true,
});

export type ChatThread = typeof chatThreads.$inferSelect;

export type ChatThreadStateRow = typeof chatThreadState.$inferSelect;
export type InsertChatThreadState = z.infer<typeof insertChatThreadStateSchema>;

export type ChatTurn = typeof chatTurns.$inferSelect;
export type InsertChatTurn = z.infer<typeof insertChatTurnSchema>;

export type ChatTurnMessage = typeof chatTurnMessages.$inferSelect;
export type InsertChatTurnMessage = z.infer<typeof insertChatTurnMessageSchema>;

export type ChatProgressEvent = typeof chatProgressEvents.$inferSelect;
export type InsertChatProgressEvent = z.infer<typeof insertChatProgressEventSchema>;

// Read-only to the app: there is no insert schema for policy_chunks.
export type PolicyChunk = typeof policyChunks.$inferSelect;
