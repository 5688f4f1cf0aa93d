import type {
  ConfidenceLabel,
  RetrievalSignal,
  SourceType,
  SUBQUESTION_KINDS,
  QUESTION_INTENTS,
  RAG_FAIL_DIRECTIVES,
} from "@shared/chatProtocol";

export type {
  ConfidenceLabel,
  RetrievalSignal,
  SourceType,
  ResponseStatus,
  ResponsePayload,
  ResponseSource,
  PlanSnapshot,
  SourceConfidenceBadge,
  ClarificationOption,
  UsageBreakdownEntry,
  PollResult,
  ProgressEvent,
  QueueRequest,
} from "@shared/chatProtocol";

// ============================================================
// DIALOGUE STATE
// ============================================================

export type MessageClassification = "slot_fill" | "new_question";

export type UserRole = "provider_office" | "patient";

export type Domain =
  | "prior_auth"
  | "disputes"
  | "eligibility"
  | "contacts"
  | "um"
  | "claims"
  | "billing"
  | "benefits"
  | "other";

export type JurisdictionSlot =
  | "jurisdiction.payor"
  | "jurisdiction.state"
  | "jurisdiction.program"
  | "jurisdiction.perspective";

export type ResetReason = "payer_change" | "decay";

export interface Jurisdiction {
  state: string | null;
  payor: string | null;
  program: string | null;
  perspective: string | null;
  regulatoryAgency: string | null;
}

export interface ActiveContext {
  payer: string | null;
  /** Set instead of `payer` when a message names two or more payers. */
  payers: string[];
  domain: Domain | null;
  /** State name or two-letter abbreviation. */
  jurisdiction: string | null;
  program: string | null;
  userRole: UserRole | null;
  jurisdictionObj: Partial<Jurisdiction> | null;
}

export interface SafetyFlags {
  patientAllowed: boolean;
}

export interface ThreadState {
  active: ActiveContext;
  openSlots: string[];
  recentEntities: string[];
  lastUserIntent: string | null;
  lastUpdatedTurnId: string | null;
  refinedQuery: string | null;
  safety: SafetyFlags;
  turnsSinceActiveSet: number;
}

/**
 * The only way ThreadState changes. See applyDelta for the per-field rules.
 */
export interface StateDelta {
  active?: Partial<ActiveContext>;
  openSlots?: string[];
  recentEntities?: string[];
  lastUserIntent?: string | null;
  lastUpdatedTurnId?: string | null;
  refinedQuery?: string | null;
  safety?: Partial<SafetyFlags>;
  turnsSinceActiveSet?: number;
}

export interface ConversationTurn {
  userContent: string;
  assistantContent: string;
}

// ============================================================
// PLANNING
// ============================================================

export type SubQuestionKind = (typeof SUBQUESTION_KINDS)[number];
export type QuestionIntent = (typeof QUESTION_INTENTS)[number];
export type RagFailDirective = (typeof RAG_FAIL_DIRECTIVES)[number];

export interface SubQuestion {
  id: string;
  text: string;
  kind: SubQuestionKind;
  questionIntent: QuestionIntent | null;
  /** 0 = canonical/process question, 1 = fact lookup. */
  intentScore: number;
  onRagFail: RagFailDirective[];
  capabilitiesPrimary: string | null;
  /** false excludes the sub-question from the jurisdiction check. */
  requiresJurisdiction: boolean | null;
}

export interface Plan {
  readonly subquestions: readonly SubQuestion[];
  readonly thinkingLog: readonly string[];
  readonly llmUsage: LlmUsage | null;
}

export type AgentType = "RAG" | "patient_stub" | "tool" | "reasoning";

export type Sensitivity = "low" | "medium" | "high";

export interface BlueprintEntry {
  subquestionId: string;
  text: string;
  agent: AgentType;
  sensitivity: Sensitivity;
  ragK: number;
  retrievalConfig: "standard";
  onRagFail: RagFailDirective[];
}

// ============================================================
// RETRIEVAL
// ============================================================

export interface RetrievalChunk {
  id: string;
  text: string;
  documentId: string | null;
  documentName: string;
  pageNumber: number | null;
  paragraphIndex: number | null;
  sourceType: SourceType;
  score: number | null;
  confidenceLabel: ConfidenceLabel | null;
  llmGuidance: string | null;
  isNeighbor: boolean;
}

export interface RetrievalFilters {
  payer?: string;
  state?: string;
  program?: string;
}

export interface BlendParams {
  nHierarchical: number;
  nFactual: number;
  confidenceMin: number;
}

export interface ConfidenceThresholds {
  abstainMax: number;
  confidentMin: number;
}

// ============================================================
// AGENTS AND USAGE
// ============================================================

export interface LlmUsage {
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export type UsageStage = "plan" | "rag" | "tool" | "reasoning" | "integrator" | "communication";

export interface StagedUsage extends LlmUsage {
  stage: UsageStage;
}

export interface AnswerSource {
  documentId: string | null;
  documentName: string;
  pageNumber: number | null;
  sourceType: SourceType;
  matchScore: number | null;
  confidenceLabel: ConfidenceLabel | null;
  text: string;
}

export interface IndexedSource extends AnswerSource {
  index: number;
}

export interface AgentResult {
  answer: string;
  usage: StagedUsage | null;
  sources: AnswerSource[];
  signal: RetrievalSignal;
}

/** Sink for user-facing progress lines. */
export type ThinkingEmitter = (line: string) => void;
