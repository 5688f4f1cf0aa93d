/**
 * External web search and scrape skill.
 *
 * Search runs a Gemini call with the googleSearch grounding tool and returns
 * the grounding sources as snippets. Scrape fetches the page and converts it to markdown.
 */

import { GoogleGenAI } from "@google/genai";
import TurndownService from "turndown";
import { getModelForStage } from "../llm/modelRegistry";
import { RetrievalFailure, describeError } from "../utils/errors";
import { logDebug } from "../utils/logger";
import type { ScrapeResult, WebSkill, WebSnippet } from "./types";

const SCRAPE_MAX_CHARS = 20_000;

const turndownService = new TurndownService({ headingStyle: "atx", codeBlockStyle: "fenced" });
turndownService.remove(["script", "style", "noscript"]);

/** Converts a scraped page to markdown for the prompt context. */
export function htmlToMarkdown(html: string): string {
  return turndownService.turndown(html).trim();
}

export interface GeminiWebSkillOptions {
  apiKey: string;
  timeoutMs: number;
  env?: Record<string, string | undefined>;
}

export class GeminiWebSkill implements WebSkill {
  readonly enabled = true;
  private readonly ai: GoogleGenAI;

  constructor(private readonly options: GeminiWebSkillOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async search(query: string, maxResults: number): Promise<WebSnippet[]> {
    const model = getModelForStage("tool", this.options.env ?? process.env);
    try {
      const response = await this.ai.models.generateContent({
        model,
        contents: [{ role: "user", parts: [{ text: `Search the web and summarize what you find about: ${query}` }] }],
        config: {
          tools: [{ googleSearch: {} }],
          temperature: 0,
          httpOptions: { timeout: this.options.timeoutMs },
        },
      });

      const grounding = response.candidates?.[0]?.groundingMetadata;
      const chunks = grounding?.groundingChunks ?? [];
      const supports = grounding?.groundingSupports ?? [];

      const snippets: WebSnippet[] = [];
      chunks.forEach((chunk, index) => {
        const url = chunk.web?.uri;
        if (!url) return;
        const text = supports
          .filter((s) => (s.groundingChunkIndices ?? []).includes(index))
          .map((s) => s.segment?.text ?? "")
          .filter(Boolean)
          .join(" ");
        snippets.push({ title: chunk.web?.title || url, url, snippet: text });
      });

      logDebug("web_search_completed", { model, results: snippets.length });
      return snippets.slice(0, maxResults);
    } catch (error) {
      throw new RetrievalFailure(`Web search failed: ${describeError(error)}`, { cause: error });
    }
  }

  async scrape(url: string): Promise<ScrapeResult | null> {
    try {
      const response = await fetch(url, {
        headers: { Accept: "text/html,text/plain" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (!response.ok) {
        logDebug("web_scrape_http_error", { status: response.status });
        return null;
      }
      const body = await response.text();
      const contentType = response.headers.get("content-type") ?? "";
      const text = contentType.includes("html") ? htmlToMarkdown(body) : body.trim();
      return { text: text.slice(0, SCRAPE_MAX_CHARS) };
    } catch (error) {
      throw new RetrievalFailure(`Web scrape failed: ${describeError(error)}`, { cause: error });
    }
  }
}

/** Used when EXTERNAL_SEARCH_ENABLED is false or no API key is configured. */
export class DisabledWebSkill implements WebSkill {
  readonly enabled = false;

  async search(): Promise<WebSnippet[]> {
    return [];
  }

  async scrape(): Promise<ScrapeResult | null> {
    return null;
  }
}
