/**
 * What each answering path can do. Fed to the planner prompt and used by the
 * tool agent to answer "what can you do?" style questions.
 */

export const PATH_CAPABILITIES: Readonly<Record<string, readonly string[]>> = {
  rag: [
    "policy lookup",
    "appeals process",
    "grievances",
    "prior auth",
    "eligibility criteria",
    "contact info",
    "utilization management",
    "claims",
    "benefits",
    "member handbook",
    "web search fallback when corpus confidence is low",
  ],
  patient: [],
  tool: ["web search", "web scrape", "provider data"],
  reasoning: [
    "conceptual explanation",
    "rationale",
    "general how-to without corpus",
    "difference between concepts",
    "what does X mean",
  ],
};

export function capabilitiesForPlanner(): string {
  return Object.entries(PATH_CAPABILITIES)
    .map(([path, caps]) => (caps.length > 0 ? `${path}: ${caps.join(", ")}` : `${path}: (not available)`))
    .join("; ");
}

// Order matters: the first key found in the question wins.
const CAPABILITY_ANSWERS: ReadonlyArray<[string, string]> = [
  [
    "what can you do",
    "I can help with: (1) Policy lookups from payer manuals and contracts: appeals, grievances, prior auth, eligibility, claims, benefits. (2) Web search when our materials don't cover your question. (3) Web scraping when you provide a URL. (4) General explanations and reasoning. I don't have access to your personal health records.",
  ],
  [
    "can you search google",
    "Yes, I can search the web. When our materials don't cover your question, I can look up information from the internet and cite those sources.",
  ],
  [
    "can you search the web",
    "Yes, I can search the web. When our materials don't cover your question, I can look up information from the internet and cite those sources.",
  ],
  [
    "can you scrape",
    "Yes, I can scrape web pages when you give me a URL. I'll extract the content and summarize it for you.",
  ],
];

/** Canned answer when the question asks about our capabilities; otherwise null. */
export function getCapabilityAnswer(question: string): string | null {
  const q = question.trim().toLowerCase();
  for (const [key, answer] of CAPABILITY_ANSWERS) {
    if (q.includes(key)) return answer;
  }
  return null;
}
