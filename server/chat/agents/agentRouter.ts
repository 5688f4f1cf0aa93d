import { runRagAgent } from "./ragAgent";
import { answerWithReasoning } from "./reasoningAgent";
import { runToolAgent } from "./toolAgent";
import { logDebug } from "../../utils/logger";
import type { AgentDeps, AgentRequest } from "./types";
import type { AgentResult } from "../types";

export const PATIENT_STUB_ANSWER = "I don’t have access to your personal records yet.";

function snippet(text: string): string {
  return text.length > 60 ? `${text.slice(0, 60)}...` : text;
}

async function dispatch(request: AgentRequest, deps: AgentDeps): Promise<AgentResult> {
  const { entry, subquestion, emit, correlationId } = request;

  switch (entry.agent) {
    case "patient_stub":
      emit("This part is about your own info. I can't access that yet.");
      return { answer: PATIENT_STUB_ANSWER, usage: null, sources: [], signal: "no_sources" };

    case "reasoning": {
      emit(`Thinking through this: "${snippet(subquestion.text)}"`);
      const { answer, usage } = await answerWithReasoning(deps.llm, subquestion.text, correlationId);
      return { answer, usage, sources: [], signal: "no_sources" };
    }

    case "tool":
      emit(`Checking capabilities: "${snippet(subquestion.text)}"`);
      return runToolAgent(request, deps);

    case "RAG":
      emit(`Answering this part: "${snippet(subquestion.text)}"`);
      return runRagAgent(request, deps);

    default: {
      const unreachable: never = entry.agent;
      throw new Error(`Unknown agent: ${String(unreachable)}`);
    }
  }
}

/** Route one sub-question to its agent; every path returns the same result shape. */
export async function answerSubquestion(request: AgentRequest, deps: AgentDeps): Promise<AgentResult> {
  const result = await dispatch(request, deps);

  logDebug("agent_io", {
    correlationId: request.correlationId,
    stage: "resolve",
    subquestionId: request.subquestion.id,
    agent: request.entry.agent,
    signal: result.signal,
    sources: result.sources.length,
    answerLength: result.answer.length,
  });

  return result;
}
