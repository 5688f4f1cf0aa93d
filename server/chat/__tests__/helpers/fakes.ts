/**
 * In-process stand-ins for the LLM, search and web collaborators.
 */

import { createChatContext, type ChatContext, type ChatContextOverrides } from "../../../appContext";
import { getEnvConfig } from "../../../config/env";
import { MemoryQueue } from "../../../queue/memoryQueue";
import { MemoryPersistence } from "../../../storage/memoryPersistence";
import { LlmFailure } from "../../../utils/errors";
import type { LlmCallOptions, LlmProvider, LlmResult, LlmStreamOptions } from "../../../llm/types";
import type { ModelStage } from "../../../llm/modelRegistry";
import type { ScrapeResult, SearchCandidate, SearchIndex, SearchRequest, WebSkill, WebSnippet } from "../../../search/types";
import type { LlmUsage } from "../../types";

export const TEST_USAGE: LlmUsage = { provider: "google", model: "test-model", inputTokens: 10, outputTokens: 5 };

type Scripted = string | Error | ((prompt: string) => string);

/** Replies per stage; a stage without a script fails like a provider error. */
export class FakeLlm implements LlmProvider {
  readonly calls: Array<{ stage: ModelStage; prompt: string }> = [];

  constructor(private readonly script: Partial<Record<ModelStage, Scripted>> = {}) {}

  private reply(stage: ModelStage, prompt: string): string {
    this.calls.push({ stage, prompt });
    const scripted = this.script[stage];
    if (scripted === undefined) throw new LlmFailure(`no scripted reply for ${stage}`);
    if (scripted instanceof Error) throw scripted;
    return typeof scripted === "function" ? scripted(prompt) : scripted;
  }

  async generate(prompt: string, options: LlmCallOptions): Promise<LlmResult> {
    return { text: this.reply(options.stage, prompt), usage: TEST_USAGE };
  }

  async *streamGenerate(prompt: string, options: LlmStreamOptions): AsyncIterable<string> {
    const text = this.reply(options.stage, prompt);
    const middle = Math.ceil(text.length / 2);
    yield text.slice(0, middle);
    yield text.slice(middle);
    options.onUsage?.(TEST_USAGE);
  }

  stagesCalled(): ModelStage[] {
    return this.calls.map((c) => c.stage);
  }
}

/** Streams `partial` for any stage, then fails mid-reply. */
export class BrokenStreamLlm extends FakeLlm {
  constructor(
    script: Partial<Record<ModelStage, Scripted>>,
    private readonly partial: string
  ) {
    super(script);
  }

  async *streamGenerate(prompt: string, options: LlmStreamOptions): AsyncIterable<string> {
    this.calls.push({ stage: options.stage, prompt });
    yield this.partial;
    throw new LlmFailure("stream dropped");
  }
}

export function candidate(overrides: Partial<SearchCandidate> & Pick<SearchCandidate, "id">): SearchCandidate {
  return {
    text: `Passage ${overrides.id}`,
    documentId: null,
    documentName: "Test Policy",
    pageNumber: null,
    paragraphIndex: null,
    sourceType: "chunk",
    score: 0.5,
    ...overrides,
  };
}

/**
 * Returns its candidates in the given order, honoring k, sourceTypes (when
 * supported) and minScore. Neighbors come from a fixed map keyed by chunk id.
 */
export class FakeSearchIndex implements SearchIndex {
  readonly requests: SearchRequest[] = [];
  failWith: Error | null = null;

  constructor(
    private readonly candidates: SearchCandidate[] = [],
    readonly supportsSourceTypeFilter: boolean = true,
    private readonly neighbors: Record<string, SearchCandidate[]> = {}
  ) {}

  async search(request: SearchRequest): Promise<SearchCandidate[]> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    const { sourceTypes, minScore } = request;
    return this.candidates
      .filter((c) => !this.supportsSourceTypeFilter || !sourceTypes || sourceTypes.includes(c.sourceType))
      .filter((c) => minScore === undefined || c.score >= minScore)
      .slice(0, request.k);
  }

  async fetchByIds(ids: readonly string[]): Promise<SearchCandidate[]> {
    return this.candidates.filter((c) => ids.includes(c.id));
  }

  async fetchNeighbors(
    _documentId: string,
    _paragraphIndex: number,
    _window: number,
    excludeId: string
  ): Promise<SearchCandidate[]> {
    if (this.failWith) throw this.failWith;
    return this.neighbors[excludeId] ?? [];
  }
}

export class FakeWebSkill implements WebSkill {
  readonly queries: string[] = [];
  readonly scraped: string[] = [];
  failWith: Error | null = null;

  constructor(
    private readonly results: WebSnippet[] = [],
    readonly enabled: boolean = true,
    private readonly page: ScrapeResult | null = null
  ) {}

  async search(query: string, maxResults: number): Promise<WebSnippet[]> {
    this.queries.push(query);
    if (this.failWith) throw this.failWith;
    return this.results.slice(0, maxResults);
  }

  async scrape(url: string): Promise<ScrapeResult | null> {
    this.scraped.push(url);
    if (this.failWith) throw this.failWith;
    return this.page;
  }
}

export interface TestContext extends ChatContext {
  persistence: MemoryPersistence;
  queue: MemoryQueue;
}

/** Context over fakes with a fixed clock; no network, database or Redis. */
export function createTestContext(
  overrides: ChatContextOverrides & { env?: Record<string, string> } = {}
): TestContext {
  const { env: envOverrides, ...rest } = overrides;
  const env = getEnvConfig({ GEMINI_API_KEY: "test-key", NODE_ENV: "test", ...envOverrides });
  const persistence = new MemoryPersistence();
  const queue = new MemoryQueue(10);
  const ctx = createChatContext(env, {
    llm: new FakeLlm(),
    search: new FakeSearchIndex(),
    web: new FakeWebSkill(),
    clock: () => 1_700_000_000_000,
    ...rest,
    persistence,
    queue,
  });
  return { ...ctx, persistence, queue };
}
