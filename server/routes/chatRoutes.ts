import { randomUUID } from "node:crypto";
import { chatRequestSchema } from "@shared/chatProtocol";
import { chatMessageLimiter } from "../middleware/rateLimiter";
import { describeError } from "../utils/errors";
import { logDebug, logError, logInfo, logWarn, sanitizeUserContent } from "../utils/logger";
import { SSE, type SseSink } from "../utils/sse";
import type { Express, Request, Response } from "express";
import type { ChatContext } from "../appContext";
import type { PlanSnapshot, PollResult } from "@shared/chatProtocol";

// ===== HANDLER LOGIC =====

export type AcceptResult =
  | { ok: true; correlationId: string; threadId: string }
  | { ok: false; errors: Record<string, string[] | undefined> };

/**
 * Validates the body, ensures the thread, starts live progress and enqueues.
 * The pipeline runs later on a worker. Over Redis the worker runs in another
 * process with its own progress store, so nothing is started here.
 */
export async function acceptChatRequest(ctx: ChatContext, body: unknown): Promise<AcceptResult> {
  const parsed = chatRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, errors: parsed.error.flatten().fieldErrors };
  }
  const { message, thread_id } = parsed.data;

  let threadId: string;
  try {
    threadId = await ctx.persistence.ensureThread(thread_id);
  } catch (error) {
    threadId = thread_id ?? randomUUID();
    logWarn("ensure_thread_failed", { threadId, error: describeError(error) });
  }

  const correlationId = randomUUID();
  const tracksProgress = ctx.queue.kind === "memory";
  if (tracksProgress) ctx.progress.start(correlationId);
  try {
    await ctx.queue.publishRequest({
      correlation_id: correlationId,
      message,
      thread_id: threadId,
      enqueued_at: new Date(ctx.clock()).toISOString(),
    });
  } catch (error) {
    if (tracksProgress) ctx.progress.clear(correlationId);
    throw error;
  }

  logInfo("chat_request_enqueued", {
    correlationId,
    threadId,
    queue: ctx.queue.kind,
    question: sanitizeUserContent(message),
  });
  return { ok: true, correlationId, threadId };
}

/** Terminal payload if published, else live progress, else pending. */
export async function pollResponse(ctx: ChatContext, correlationId: string): Promise<PollResult> {
  const payload = await ctx.queue.getResponse(correlationId);
  if (payload) return payload;

  const snapshot = ctx.progress.snapshot(correlationId);
  if (snapshot) {
    return { status: "processing", thinking_log: snapshot.thinkingLog, message: snapshot.message };
  }
  return { status: "pending" };
}

export function getPlan(ctx: ChatContext, correlationId: string): PlanSnapshot | null {
  return ctx.plans.get(correlationId);
}

export interface StreamOptions {
  maxDurationMs: number;
  keepaliveMs: number;
  pollIntervalMs: number;
  /** Aborted when the client goes away. */
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Emits new progress events until the terminal payload appears or the
 * lifetime cap runs out. Closing the stream never stops the worker.
 */
export async function streamProgress(
  ctx: ChatContext,
  correlationId: string,
  sink: SseSink,
  options: StreamOptions
): Promise<void> {
  const sse = new SSE(sink);
  const sleep = options.sleep ?? defaultSleep;
  const startTime = ctx.clock();
  let lastKeepalive = startTime;
  let cursor = 0;

  sse.init();

  while (!options.signal?.aborted) {
    const read = ctx.progress.read(correlationId, cursor);
    cursor = read.cursor;
    for (const event of read.events) {
      sse.send(event.event, event.data);
    }

    const payload = await ctx.queue.getResponse(correlationId);
    if (payload) {
      sse.send(payload.status === "failed" ? "error" : "completed", payload);
      sse.close();
      return;
    }

    const now = ctx.clock();
    if (now - startTime >= options.maxDurationMs) {
      logWarn("chat_stream_timeout", { correlationId, durationMs: now - startTime });
      sse.send("error", { message: "timeout" });
      sse.close();
      return;
    }
    if (now - lastKeepalive >= options.keepaliveMs) {
      sse.comment("keepalive");
      lastKeepalive = now;
    }

    await sleep(options.pollIntervalMs);
  }

  logDebug("chat_stream_client_closed", { correlationId });
  sse.close();
}

// ===== ROUTES =====

export function registerChatRoutes(app: Express, ctx: ChatContext): void {
  app.post("/api/chat", chatMessageLimiter, async (req: Request, res: Response) => {
    try {
      const result = await acceptChatRequest(ctx, req.body);
      if (!result.ok) {
        return res.status(400).json({ message: "Invalid request", errors: result.errors });
      }
      return res.status(202).json({ correlation_id: result.correlationId, thread_id: result.threadId });
    } catch (error) {
      logError("chat_request_failed", { error: describeError(error) });
      return res.status(500).json({ message: "Internal Server Error" });
    }
  });

  app.get("/api/chat/response/:correlationId", async (req: Request, res: Response) => {
    try {
      const result = await pollResponse(ctx, req.params.correlationId);
      return res.json(result);
    } catch (error) {
      logError("chat_poll_failed", { correlationId: req.params.correlationId, error: describeError(error) });
      return res.status(500).json({ message: "Internal Server Error" });
    }
  });

  app.get("/api/chat/stream/:correlationId", async (req: Request, res: Response) => {
    const correlationId = req.params.correlationId;
    const disconnect = new AbortController();
    req.on("close", () => disconnect.abort());

    try {
      await streamProgress(ctx, correlationId, res, {
        maxDurationMs: ctx.config.STREAM_MAX_DURATION_MS,
        keepaliveMs: ctx.config.STREAM_KEEPALIVE_MS,
        pollIntervalMs: ctx.config.STREAM_POLL_INTERVAL_MS,
        signal: disconnect.signal,
      });
    } catch (error) {
      logError("chat_stream_failed", { correlationId, error: describeError(error) });
      if (!res.writableEnded) res.end();
    }
  });

  app.get("/api/chat/plan/:correlationId", (req: Request, res: Response) => {
    const snapshot = getPlan(ctx, req.params.correlationId);
    if (!snapshot) {
      return res.status(404).json({ message: "Plan not found" });
    }
    return res.json(snapshot);
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", queue: ctx.queue.kind, storage: ctx.persistence.kind });
  });
}
