/**
 * Tool agent: capability answers, explicit web search and URL scraping.
 * Tools run only on an explicit trigger phrase in the sub-question.
 */

import { chatConfig } from "../chatConfig";
import { searchExternal } from "../docAssembly";
import { getCapabilityAnswer } from "./capabilities";
import { toAnswerSource } from "./ragAgent";
import { describeError } from "../../utils/errors";
import { logWarn } from "../../utils/logger";
import type { ScrapeResult } from "../../search/types";
import type { AgentDeps, AgentRequest } from "./types";
import type { AgentResult, AnswerSource } from "../types";

const URL_PATTERN = /https?:\/\/[^\s<>"']+/i;
const SCRAPE_TRIGGERS = ["scrape"];
const SEARCH_TRIGGERS = ["search google for", "search for", "look up", "find information about", "google "];
const SCRAPE_PREVIEW_CHARS = 2000;

export const TOOL_GENERIC_ANSWER =
  "I can search the web, scrape pages, and look up provider info. For a web search, try asking something like 'Search for [topic]' or 'Look up [query]'. For policy questions about appeals, grievances, or prior auth, just ask and I'll look in our materials.";
export const TOOL_SEARCH_FAILED_ANSWER =
  "I tried to search the web but ran into an issue. Please try again or rephrase.";
export const TOOL_SEARCH_EMPTY_ANSWER =
  "I searched the web but didn't find anything useful for that. Try rephrasing the search.";
export const TOOL_SCRAPE_FAILED_ANSWER =
  "I tried to read that page but ran into an issue. The site may be down or block automated access.";
export const TOOL_SCRAPE_NO_URL_ANSWER =
  "I can scrape web pages when you give me a URL. Try: 'Scrape https://example.com' or paste the URL.";

export function extractUrl(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  return match ? match[0] : null;
}

/** Text after the first search trigger, or the whole question when nothing follows it. */
export function extractSearchQuery(question: string): string | null {
  const lower = question.toLowerCase();
  for (const trigger of SEARCH_TRIGGERS) {
    const at = lower.indexOf(trigger);
    if (at >= 0) {
      const rest = question.slice(at + trigger.length).trim().replace(/[?.!]+$/, "");
      return rest || question.trim();
    }
  }
  return null;
}

function result(answer: string, sources: AnswerSource[] = [], signal: AgentResult["signal"] = "no_sources"): AgentResult {
  return { answer, usage: null, sources, signal };
}

async function scrape(url: string, request: AgentRequest, deps: AgentDeps): Promise<AgentResult> {
  request.emit("Reading the page...");
  let scraped: ScrapeResult | null;
  try {
    scraped = await deps.web.scrape(url);
  } catch (error) {
    logWarn("tool_scrape_failed", { correlationId: request.correlationId, stage: "resolve", error: describeError(error) });
    scraped = null;
  }
  if (!scraped) return result(TOOL_SCRAPE_FAILED_ANSWER);

  const text = scraped.text.trim();
  if (!text) {
    return result(`I couldn't extract content from ${url}. The page may be empty or block automated access.`);
  }

  const body = text.length > SCRAPE_PREVIEW_CHARS ? `${text.slice(0, SCRAPE_PREVIEW_CHARS)}...` : text;
  let answer = `Here's the content from ${url}:\n\n${body}`;
  if (scraped.summary) answer += `\n\nSummary: ${scraped.summary}`;

  const source: AnswerSource = {
    documentId: null,
    documentName: url,
    pageNumber: null,
    sourceType: "external",
    matchScore: null,
    confidenceLabel: null,
    text: body.slice(0, chatConfig.SOURCE_PREVIEW_CHARS),
  };
  return result(answer, [source], "google_only");
}

async function webSearch(query: string, request: AgentRequest, deps: AgentDeps): Promise<AgentResult> {
  const { subquestion, correlationId, sourceIndexOffset } = request;
  request.emit("Searching the web...");

  const found = await searchExternal(deps.web, query, chatConfig.EXTERNAL_SEARCH_MAX_RESULTS, correlationId);
  if (found.length === 0) return result(TOOL_SEARCH_EMPTY_ANSWER);

  request.emit(`Found ${found.length} ${found.length === 1 ? "result" : "results"}. Summarizing...`);
  const context = found
    .map((chunk, i) => `[${sourceIndexOffset + i + 1}] ${chunk.documentName}: ${chunk.text.slice(0, 500)}`)
    .join("\n\n");
  const prompt = `Use the following web search results to answer the user's question. Cite sources by number, e.g. [1].\n\nResults:\n${context}\n\nQuestion: ${subquestion.text}\n\nAnswer:`;

  try {
    const { text, usage } = await deps.llm.generate(prompt, {
      stage: "tool",
      logContext: { correlationId },
    });
    return {
      answer: text.trim() || TOOL_SEARCH_EMPTY_ANSWER,
      usage: { ...usage, stage: "tool" },
      sources: found.map(toAnswerSource),
      signal: "google_only",
    };
  } catch (error) {
    logWarn("tool_search_answer_failed", { correlationId, stage: "resolve", error: describeError(error) });
    return result(TOOL_SEARCH_FAILED_ANSWER);
  }
}

export async function runToolAgent(request: AgentRequest, deps: AgentDeps): Promise<AgentResult> {
  const question = request.subquestion.text;

  const capability = getCapabilityAnswer(question);
  if (capability) {
    request.emit("I can answer that from what I know about my capabilities.");
    return result(capability);
  }

  const lower = question.toLowerCase();
  if (SCRAPE_TRIGGERS.some((t) => lower.includes(t))) {
    const url = extractUrl(question);
    return url ? scrape(url, request, deps) : result(TOOL_SCRAPE_NO_URL_ANSWER);
  }

  const query = extractSearchQuery(question);
  if (query && deps.web.enabled) {
    return webSearch(query, request, deps);
  }

  request.emit("This would use a tool. Let me explain what I can do.");
  return result(TOOL_GENERIC_ANSWER);
}
