import type { LlmProvider } from "../../llm/types";
import type { SearchIndex, WebSkill } from "../../search/types";
import type { BlueprintEntry, RetrievalFilters, SubQuestion, ThinkingEmitter } from "../types";

/** Collaborators shared by every answering path. */
export interface AgentDeps {
  llm: LlmProvider;
  search: SearchIndex;
  web: WebSkill;
  /** Global switch for fallback web search; explicit user or plan directives bypass it. */
  externalSearchEnabled: boolean;
  neighborWindow: number;
}

export interface AgentRequest {
  subquestion: SubQuestion;
  entry: BlueprintEntry;
  filters: RetrievalFilters;
  /** Document ids cited in the previous turn. */
  preferredDocumentIds: readonly string[];
  /** Sources already collected for earlier sub-questions; `[n]` markers continue after them. */
  sourceIndexOffset: number;
  emit: ThinkingEmitter;
  correlationId?: string;
}
