/**
 * Gemini implementation of LlmProvider over @google/genai.
 */

import { GoogleGenAI, type GenerateContentResponse } from "@google/genai";
import { handleLlmError, isQuotaError } from "../utils/errors";
import { logLlmError, logLlmRequest, logLlmResponse } from "../utils/llmLogging";
import { getModelForStage, withModelFallback } from "./modelRegistry";
import { getProvider } from "./pricing";
import type { LlmUsage } from "../chat/types";
import type { LlmCallOptions, LlmProvider, LlmResult, LlmStreamOptions } from "./types";

export interface GeminiProviderOptions {
  apiKey: string;
  timeoutMs: number;
  env?: Record<string, string | undefined>;
}

export function extractTokenCounts(response: Pick<GenerateContentResponse, "usageMetadata"> | undefined): {
  inputTokens: number;
  outputTokens: number;
} {
  const usage = response?.usageMetadata;
  return {
    inputTokens: usage?.promptTokenCount || 0,
    outputTokens: usage?.candidatesTokenCount || 0,
  };
}

function toUsage(model: string, counts: { inputTokens: number; outputTokens: number }): LlmUsage {
  const provider = getProvider(model);
  return {
    provider: provider === "unknown" ? "google" : provider,
    model,
    inputTokens: counts.inputTokens,
    outputTokens: counts.outputTokens,
  };
}

export class GeminiProvider implements LlmProvider {
  private readonly ai: GoogleGenAI;
  private readonly timeoutMs: number;
  private readonly env: Record<string, string | undefined>;

  constructor(options: GeminiProviderOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
    this.timeoutMs = options.timeoutMs;
    this.env = options.env ?? process.env;
  }

  async generate(prompt: string, options: LlmCallOptions): Promise<LlmResult> {
    const { stage, system, temperature = 0.2, logContext } = options;
    const primaryModel = getModelForStage(stage, this.env);

    logLlmRequest({
      correlationId: logContext?.correlationId,
      threadId: logContext?.threadId,
      stage,
      model: primaryModel,
      systemPrompt: system,
      userPrompt: prompt,
      temperature,
    });

    const startTime = Date.now();

    try {
      const { result: response, modelUsed } = await withModelFallback(
        (model) =>
          this.ai.models.generateContent({
            model,
            contents: [{ role: "user", parts: [{ text: prompt }] }],
            config: {
              systemInstruction: system,
              temperature,
              httpOptions: { timeout: this.timeoutMs },
            },
          }),
        primaryModel,
        { isRetryable: (error) => !isQuotaError(error) },
        this.env
      );

      const text = response.text || "";
      const usage = toUsage(modelUsed, extractTokenCounts(response));

      logLlmResponse({
        correlationId: logContext?.correlationId,
        threadId: logContext?.threadId,
        stage,
        model: modelUsed,
        responseText: text,
        durationMs: Date.now() - startTime,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
      });

      return { text, usage };
    } catch (error) {
      logLlmError({
        correlationId: logContext?.correlationId,
        threadId: logContext?.threadId,
        stage,
        model: primaryModel,
        error,
      });
      return handleLlmError(error, { correlationId: logContext?.correlationId, stage });
    }
  }

  async *streamGenerate(prompt: string, options: LlmStreamOptions): AsyncIterable<string> {
    const { stage, system, temperature = 0.3, logContext, onUsage } = options;
    const model = getModelForStage(stage, this.env);

    logLlmRequest({
      correlationId: logContext?.correlationId,
      threadId: logContext?.threadId,
      stage,
      model,
      systemPrompt: system,
      userPrompt: prompt,
      temperature,
      extra: { streamed: true },
    });

    const startTime = Date.now();
    let fullText = "";
    let lastChunk: GenerateContentResponse | undefined;

    try {
      const stream = await this.ai.models.generateContentStream({
        model,
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        config: {
          systemInstruction: system,
          temperature,
          httpOptions: { timeout: this.timeoutMs },
        },
      });

      for await (const chunk of stream) {
        lastChunk = chunk;
        const text = chunk.text || "";
        if (text) {
          fullText += text;
          yield text;
        }
      }
    } catch (error) {
      logLlmError({
        correlationId: logContext?.correlationId,
        threadId: logContext?.threadId,
        stage,
        model,
        error,
      });
      handleLlmError(error, { correlationId: logContext?.correlationId, stage });
    }

    const usage = toUsage(model, extractTokenCounts(lastChunk));
    logLlmResponse({
      correlationId: logContext?.correlationId,
      threadId: logContext?.threadId,
      stage,
      model,
      responseText: fullText,
      durationMs: Date.now() - startTime,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      streamed: true,
    });
    onUsage?.(usage);
  }
}
