/**
 * Chat Orchestrator
 *
 * Runs one queued request through the stages in strict sequence and always
 * publishes exactly one terminal payload for its correlation id. Any fault
 * before PUBLISH becomes a `failed` payload with the generic message.
 */

import {
  buildFailedPayload,
  classify,
  clarify,
  createPipelineRun,
  integrate,
  loadState,
  plan,
  publish,
  resolve,
  type PipelineRun,
  type PipelineStage,
} from "./pipelineStages";
import { PipelineFailure, describeError } from "../utils/errors";
import { logDebug, logError, logInfo, sanitizeUserContent } from "../utils/logger";
import type { ChatContext } from "../appContext";
import type { QueueRequest } from "./types";

async function runStage<T>(
  ctx: ChatContext,
  run: PipelineRun,
  stage: PipelineStage,
  fn: () => Promise<T> | T
): Promise<T> {
  const startTime = ctx.clock();
  logDebug("stage_started", { correlationId: run.correlationId, threadId: run.threadId ?? undefined, stage });

  try {
    const result = await fn();
    logInfo("stage_completed", {
      correlationId: run.correlationId,
      threadId: run.threadId ?? undefined,
      stage,
      durationMs: ctx.clock() - startTime,
    });
    return result;
  } catch (error) {
    throw new PipelineFailure(stage, { cause: error });
  }
}

async function publishFailure(ctx: ChatContext, run: PipelineRun): Promise<void> {
  const payload = buildFailedPayload(run);
  run.payload = payload;
  try {
    await publish(ctx, run, payload);
  } catch (error) {
    logError("failure_publish_failed", {
      correlationId: run.correlationId,
      stage: "publish",
      error: describeError(error),
    });
  }
}

/**
 * STATE_LOAD -> CLASSIFY -> PLAN -> CLARIFY -> {early exit | RESOLVE -> INTEGRATE} -> PUBLISH
 */
export async function runPipeline(ctx: ChatContext, request: QueueRequest): Promise<PipelineRun> {
  const run = createPipelineRun(ctx, request);
  const startTime = ctx.clock();

  // In the split topology the API process started progress, not this one.
  if (!ctx.progress.has(run.correlationId)) {
    ctx.progress.start(run.correlationId);
  }

  logInfo("pipeline_started", {
    correlationId: run.correlationId,
    threadId: run.threadId ?? undefined,
    stage: "pipeline",
    question: sanitizeUserContent(run.message),
  });

  try {
    await runStage(ctx, run, "state_load", () => loadState(ctx, run));
    await runStage(ctx, run, "classify", () => classify(run));
    await runStage(ctx, run, "plan", () => plan(ctx, run));

    const exitedEarly = await runStage(ctx, run, "clarify", () => clarify(ctx, run));
    if (!exitedEarly) {
      await runStage(ctx, run, "resolve", () => resolve(ctx, run));
      await runStage(ctx, run, "integrate", () => integrate(ctx, run));
    }

    const payload = run.payload;
    if (!payload) {
      throw new PipelineFailure("integrate");
    }
    await runStage(ctx, run, "publish", () => publish(ctx, run, payload));
  } catch (error) {
    const stage = error instanceof PipelineFailure ? error.stage : "pipeline";
    const cause = error instanceof PipelineFailure && error.cause !== undefined ? error.cause : error;
    logError("pipeline_failed", {
      correlationId: run.correlationId,
      threadId: run.threadId ?? undefined,
      stage,
      error: describeError(cause),
    });
    await publishFailure(ctx, run);
  } finally {
    ctx.progress.clear(run.correlationId);
  }

  logInfo("pipeline_completed", {
    correlationId: run.correlationId,
    threadId: run.threadId ?? undefined,
    stage: "pipeline",
    status: run.payload?.status,
    durationMs: ctx.clock() - startTime,
  });

  return run;
}
