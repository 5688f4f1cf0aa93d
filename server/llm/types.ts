import type { LlmUsage } from "../chat/types";
import type { ModelStage } from "./modelRegistry";

export interface LlmLogContext {
  correlationId?: string;
  threadId?: string;
}

export interface LlmCallOptions {
  stage: ModelStage;
  system?: string;
  temperature?: number;
  logContext?: LlmLogContext;
}

export interface LlmStreamOptions extends LlmCallOptions {
  /** Called once when the stream has been fully consumed. */
  onUsage?: (usage: LlmUsage) => void;
}

export interface LlmResult {
  text: string;
  usage: LlmUsage;
}

/**
 * Text generation collaborator. Implementations throw LlmFailure
 * (or LlmQuotaExceededError) on any provider error.
 */
export interface LlmProvider {
  generate(prompt: string, options: LlmCallOptions): Promise<LlmResult>;
  streamGenerate(prompt: string, options: LlmStreamOptions): AsyncIterable<string>;
}
