import "dotenv/config";

import { createChatContext } from "./appContext";
import { createApp, startHttpServer } from "./app";
import { validateEnv } from "./config/env";
import { startChatWorker, type ChatWorker } from "./workers/chatWorker";
import { describeError } from "./utils/errors";
import { logError, logInfo } from "./utils/logger";

// Validate environment variables before anything else
const env = validateEnv();
const ctx = createChatContext(env);

let worker: ChatWorker | null = null;
if (ctx.queue.kind === "memory" && env.WORKER_ENABLED) {
  worker = startChatWorker(ctx);
}

const server = startHttpServer(createApp(ctx), env.PORT);

async function shutdown(signal: string): Promise<void> {
  logInfo("shutdown_requested", { signal });
  server.close();
  try {
    await worker?.stop();
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
