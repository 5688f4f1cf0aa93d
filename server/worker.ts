/**
 * Standalone worker for the split topology (QUEUE_TYPE=redis): no HTTP,
 * only the consume loop.
 */

import "dotenv/config";

import { createChatContext } from "./appContext";
import { validateEnv } from "./config/env";
import { startChatWorker } from "./workers/chatWorker";
import { describeError } from "./utils/errors";
import { logError, logInfo } from "./utils/logger";

const env = validateEnv();
const ctx = createChatContext(env);

if (ctx.queue.kind === "memory") {
  logInfo("worker_memory_queue", {
    note: "memory queue is per process; nothing reaches this worker unless it shares a process with the API",
  });
}

const worker = startChatWorker(ctx);

async function shutdown(signal: string): Promise<void> {
  logInfo("shutdown_requested", { signal });
  try {
    await worker.stop();
    await ctx.queue.close();
  } catch (error) {
    logError("shutdown_failed", { error: describeError(error) });
    process.exitCode = 1;
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
