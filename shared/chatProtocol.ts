import { z } from "zod";

// ============================================================
// ENUMS SHARED BY API, QUEUE AND CLIENTS
// ============================================================

export const RESPONSE_STATUSES = ["clarification", "refinement_ask", "completed", "failed"] as const;
export type ResponseStatus = (typeof RESPONSE_STATUSES)[number];

export const RETRIEVAL_SIGNALS = ["corpus_only", "corpus_plus_google", "google_only", "no_sources"] as const;
export type RetrievalSignal = (typeof RETRIEVAL_SIGNALS)[number];

export const CONFIDENCE_LABELS = ["abstain", "process_with_caution", "process_confident"] as const;
export type ConfidenceLabel = (typeof CONFIDENCE_LABELS)[number];

export const SOURCE_TYPES = ["policy", "section", "chunk", "hierarchical", "fact", "external"] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const SOURCE_CONFIDENCE_BADGES = [
  "approved_authoritative",
  "approved_informational",
  "proceed_with_caution",
  "augmented_with_google",
  "informational_only",
  "no_sources",
] as const;
export type SourceConfidenceBadge = (typeof SOURCE_CONFIDENCE_BADGES)[number];

export const SUBQUESTION_KINDS = ["patient", "non_patient", "tool"] as const;
export const QUESTION_INTENTS = ["factual", "canonical"] as const;
export const RAG_FAIL_DIRECTIVES = ["search_google", "reasoning"] as const;

// ============================================================
// REQUESTS
// ============================================================

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, "Message is required").max(4000),
  thread_id: z.string().trim().min(1).max(128).optional(),
});
export type ChatRequest = z.infer<typeof chatRequestSchema>;

export const queueRequestSchema = z.object({
  correlation_id: z.string().min(1),
  message: z.string(),
  thread_id: z.string().nullable(),
  enqueued_at: z.string(),
});
export type QueueRequest = z.infer<typeof queueRequestSchema>;

// ============================================================
// RESPONSE PAYLOAD
// ============================================================

export const planSubquestionSchema = z.object({
  id: z.string(),
  text: z.string(),
  kind: z.enum(SUBQUESTION_KINDS),
  question_intent: z.enum(QUESTION_INTENTS).nullable(),
  intent_score: z.number(),
  on_rag_fail: z.array(z.enum(RAG_FAIL_DIRECTIVES)),
  capabilities_primary: z.string().nullable(),
  requires_jurisdiction: z.boolean().nullable(),
});

export const planSnapshotSchema = z.object({
  subquestions: z.array(planSubquestionSchema),
  thinking_log: z.array(z.string()),
});
export type PlanSnapshot = z.infer<typeof planSnapshotSchema>;

export const responseSourceSchema = z.object({
  index: z.number().int(),
  document_id: z.string().nullable(),
  document_name: z.string(),
  page_number: z.number().nullable(),
  source_type: z.enum(SOURCE_TYPES),
  match_score: z.number().nullable(),
  confidence_label: z.enum(CONFIDENCE_LABELS).nullable(),
  text: z.string(),
});
export type ResponseSource = z.infer<typeof responseSourceSchema>;

export const usageBreakdownEntrySchema = z.object({
  stage: z.enum(["plan", "rag", "tool", "reasoning", "integrator", "communication"]),
  model: z.string(),
  provider: z.string(),
  input_tokens: z.number().int(),
  output_tokens: z.number().int(),
  cost_usd: z.number(),
});
export type UsageBreakdownEntry = z.infer<typeof usageBreakdownEntrySchema>;

export const clarificationOptionSchema = z.object({
  slot: z.string(),
  label: z.string(),
  selection_mode: z.literal("single"),
  choices: z.array(z.object({ value: z.string(), label: z.string() })),
});
export type ClarificationOption = z.infer<typeof clarificationOptionSchema>;

export const responsePayloadSchema = z.object({
  status: z.enum(RESPONSE_STATUSES),
  message: z.string(),
  plan: planSnapshotSchema.nullable(),
  thinking_log: z.array(z.string()),
  response_source: z.literal("plan"),
  model_used: z.string().nullable(),
  tokens_used: z.object({ input_tokens: z.number().int(), output_tokens: z.number().int() }),
  usage_breakdown: z.array(usageBreakdownEntrySchema),
  cost_usd: z.number(),
  sources: z.array(responseSourceSchema),
  source_confidence_strip: z.enum(SOURCE_CONFIDENCE_BADGES),
  cited_source_indices: z.array(z.number().int()),
  thread_id: z.string().nullable(),
  open_slots: z.array(z.string()).optional(),
  clarification_options: z.array(clarificationOptionSchema).optional(),
  refinement_suggestions: z.array(z.string()).optional(),
});
export type ResponsePayload = z.infer<typeof responsePayloadSchema>;

// ============================================================
// POLL / STREAM
// ============================================================

export type PollResult =
  | { status: "pending" }
  | { status: "processing"; thinking_log: string[]; message: string }
  | ResponsePayload;

export type ProgressEvent =
  | { event: "thinking"; data: { line: string; ts: number } }
  /** `replace` means the chunk supersedes everything streamed so far. */
  | { event: "message"; data: { chunk: string; replace?: boolean } };
