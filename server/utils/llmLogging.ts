/**
 * LLM Call Logging Utilities
 *
 * Structured debug logging for every provider call made by the pipeline:
 * the request (stage, model, truncated prompts), the response (truncated output,
 * token usage, timing) and failures.
 *
 * SAFETY CONSTRAINTS:
 * - Prompts and responses are truncated
 * - Prompts may contain user text, so they go through sanitizeUserContent
 * - No API keys are logged
 */

import { logDebug, truncate, sanitizeUserContent, type LogContext } from "./logger";

export interface LlmLogParams {
  correlationId?: string;
  threadId?: string;
  stage: string;
  model: string;
  systemPrompt?: string;
  userPrompt?: string;
  temperature?: number;
  extra?: Record<string, unknown>;
}

export function logLlmRequest(params: LlmLogParams): void {
  const { correlationId, threadId, stage, model, systemPrompt, userPrompt, temperature, extra } = params;

  const context: LogContext = {
    correlationId,
    threadId,
    stage,
    model,
    temperature,
    ...extra,
  };

  if (systemPrompt) {
    context.systemPrompt = truncate(systemPrompt, 800);
  }
  if (userPrompt) {
    context.userPrompt = sanitizeUserContent(userPrompt, 400);
  }

  logDebug("llm_request", context);
}

export interface LlmResponseLogParams {
  correlationId?: string;
  threadId?: string;
  stage: string;
  model: string;
  responseText?: string;
  durationMs?: number;
  inputTokens?: number;
  outputTokens?: number;
  streamed?: boolean;
}

export function logLlmResponse(params: LlmResponseLogParams): void {
  const { responseText, ...rest } = params;

  const context: LogContext = { ...rest };
  if (responseText) {
    context.responseSnippet = truncate(responseText, 1500);
    context.responseLength = responseText.length;
  }

  logDebug("llm_response", context);
}

export function logLlmError(params: {
  correlationId?: string;
  threadId?: string;
  stage: string;
  model: string;
  error: unknown;
}): void {
  const { correlationId, threadId, stage, model, error } = params;

  logDebug("llm_error", {
    correlationId,
    threadId,
    stage,
    model,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack?.slice(0, 500) : undefined,
  });
}
