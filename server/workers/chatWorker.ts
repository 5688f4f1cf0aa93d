/**
 * Chat worker: a single sequential consumer. Pulls one request, runs the
 * pipeline to a terminal state, then polls again. Failed runs are published
 * as `failed` and never retried.
 */

import { runPipeline } from "../chat/orchestrator";
import { describeError } from "../utils/errors";
import { logError, logInfo } from "../utils/logger";
import type { ChatContext } from "../appContext";

export interface ChatWorker {
  /** Resolves when the consume loop has exited. */
  readonly done: Promise<void>;
  /** The loop exits after its current bounded wait (or the run in flight). */
  stop(): Promise<void>;
}

export function startChatWorker(ctx: ChatContext): ChatWorker {
  const controller = new AbortController();

  logInfo("chat_worker_started", { queue: ctx.queue.kind });

  const done = ctx.queue
    .consumeRequests(async (request) => {
      await runPipeline(ctx, request);
    }, controller.signal)
    .catch((error: unknown) => {
      logError("chat_worker_crashed", { queue: ctx.queue.kind, error: describeError(error) });
    })
    .finally(() => {
      logInfo("chat_worker_stopped", { queue: ctx.queue.kind });
    });

  return {
    done,
    async stop() {
      controller.abort();
      await done;
    },
  };
}
