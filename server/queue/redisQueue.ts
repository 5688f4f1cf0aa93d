import Redis from "ioredis";
import { queueRequestSchema, responsePayloadSchema } from "@shared/chatProtocol";
import { chatConfig } from "../chat/chatConfig";
import { describeError } from "../utils/errors";
import { logError, logInfo, logWarn } from "../utils/logger";
import type { QueueRequest, ResponsePayload } from "@shared/chatProtocol";
import type { ChatQueue, RequestHandler } from "./types";

export interface RedisQueueOptions {
  url: string;
  requestKey: string;
  responseKeyPrefix: string;
  responseTtlSeconds: number;
  pollTimeoutSeconds?: number;
}

/**
 * Broker-backed queue for separate API and worker processes.
 * Requests: LPUSH / BRPOP on one list. Responses: SET NX EX per correlation id.
 */
export class RedisQueue implements ChatQueue {
  readonly kind = "redis" as const;

  private readonly client: Redis;
  // BRPOP holds its connection; commands from the same process go through `client`.
  private blocking: Redis | null = null;
  private readonly options: Required<RedisQueueOptions>;

  constructor(options: RedisQueueOptions, client?: Redis) {
    this.options = {
      pollTimeoutSeconds: chatConfig.REDIS_QUEUE_POLL_TIMEOUT_SECONDS,
      ...options,
    };
    this.client =
      client ??
      new Redis(options.url, {
        retryStrategy: (times) => Math.min(times * 50, 30_000),
        maxRetriesPerRequest: 3,
        enableReadyCheck: true,
      });

    this.client.on("error", (err: Error) => {
      logError("redis_error", { error: err.message });
    });
    this.client.on("ready", () => {
      logInfo("redis_ready", { requestKey: this.options.requestKey });
    });
  }

  private responseKey(correlationId: string): string {
    return `${this.options.responseKeyPrefix}${correlationId}`;
  }

  async publishRequest(request: QueueRequest): Promise<void> {
    await this.client.lpush(this.options.requestKey, JSON.stringify(request));
  }

  private async pop(): Promise<QueueRequest | null> {
    if (!this.blocking) this.blocking = this.client.duplicate();
    const popped = await this.blocking.brpop(this.options.requestKey, this.options.pollTimeoutSeconds);
    if (!popped) return null;

    const [, raw] = popped;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logWarn("queue_request_unparseable", { error: describeError(error) });
      return null;
    }
    const parsed = queueRequestSchema.safeParse(json);
    if (!parsed.success) {
      logWarn("queue_request_invalid", { issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async consumeRequests(handler: RequestHandler, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let request: QueueRequest | null;
      try {
        request = await this.pop();
      } catch (error) {
        if (signal.aborted) break;
        logError("queue_pop_failed", { error: describeError(error) });
        await new Promise((resolve) => setTimeout(resolve, 1_000));
        continue;
      }
      if (!request) continue;

      try {
        await handler(request);
      } catch (error) {
        logError("queue_handler_failed", {
          correlationId: request.correlation_id,
          error: describeError(error),
        });
      }
    }
  }

  async publishResponse(correlationId: string, payload: ResponsePayload): Promise<boolean> {
    const result = await this.client.set(
      this.responseKey(correlationId),
      JSON.stringify(payload),
      "EX",
      this.options.responseTtlSeconds,
      "NX"
    );
    return result === "OK";
  }

  async getResponse(correlationId: string): Promise<ResponsePayload | null> {
    const raw = await this.client.get(this.responseKey(correlationId));
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logWarn("queue_response_unparseable", { correlationId, error: describeError(error) });
      return null;
    }
    const parsed = responsePayloadSchema.safeParse(json);
    if (!parsed.success) {
      logWarn("queue_response_invalid", { correlationId, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    this.blocking?.disconnect();
    await this.client.quit();
  }
}
