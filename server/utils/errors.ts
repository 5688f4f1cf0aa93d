import { logError } from "./logger";

/**
 * Message shown to users whenever a request ends in the failed state.
 * Internal error text never reaches the client.
 */
export const GENERIC_FAILURE_MESSAGE =
  "Something went wrong while answering your question. Please try again in a moment.";

export class ConfigurationError extends Error {
  constructor(message: string = "Required configuration is missing") {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class RetrievalFailure extends Error {
  constructor(message: string = "Retrieval failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalFailure";
  }
}

export class LlmFailure extends Error {
  constructor(message: string = "LLM call failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LlmFailure";
  }
}

export class LlmQuotaExceededError extends LlmFailure {
  constructor(message: string = "LLM quota exceeded") {
    super(message);
    this.name = "LlmQuotaExceededError";
  }
}

export class PersistenceFailure extends Error {
  constructor(message: string = "Persistence write failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceFailure";
  }
}

export class PipelineFailure extends Error {
  readonly stage: string;

  constructor(stage: string, options?: { cause?: unknown }) {
    super(`Pipeline failed during ${stage}`, options);
    this.name = "PipelineFailure";
    this.stage = stage;
  }
}

function readField(value: unknown, key: string): unknown {
  if (typeof value === "object" && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function textOf(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function isQuotaError(error: unknown): boolean {
  if (!error) return false;

  const message = textOf(readField(error, "message")) || String(error);
  const status = readField(error, "status");
  const code = readField(error, "code");
  const nestedError = readField(error, "error");
  const nestedMessage = textOf(readField(nestedError, "message"));

  const hasQuotaInMessage = message.includes("quota") || message.includes("RESOURCE_EXHAUSTED");
  const hasQuotaStatus = status === "RESOURCE_EXHAUSTED" || status === 429;
  const hasQuotaCode = code === 429;

  const hasNestedQuotaCode = readField(nestedError, "code") === 429;
  const hasNestedQuotaStatus = readField(nestedError, "status") === "RESOURCE_EXHAUSTED";
  const hasNestedQuotaMessage =
    nestedMessage.includes("quota") || nestedMessage.includes("RESOURCE_EXHAUSTED");

  return (
    hasQuotaInMessage ||
    hasQuotaStatus ||
    hasQuotaCode ||
    hasNestedQuotaCode ||
    hasNestedQuotaStatus ||
    hasNestedQuotaMessage
  );
}

/**
 * Rethrow a provider error as an LlmFailure (or LlmQuotaExceededError for quota errors).
 */
export function handleLlmError(
  error: unknown,
  context: { correlationId?: string; stage: string }
): never {
  const message = describeError(error);

  if (isQuotaError(error)) {
    logError("llm_quota_exceeded", {
      correlationId: context.correlationId,
      stage: context.stage,
      error: message,
    });
    throw new LlmQuotaExceededError(message);
  }

  if (error instanceof LlmFailure) {
    throw error;
  }
  throw new LlmFailure(message, { cause: error });
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
