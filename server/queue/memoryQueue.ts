import { chatConfig } from "../chat/chatConfig";
import { describeError } from "../utils/errors";
import { logError } from "../utils/logger";
import type { QueueRequest, ResponsePayload } from "@shared/chatProtocol";
import type { ChatQueue, RequestHandler } from "./types";

type Waiter = (request: QueueRequest | null) => void;

/**
 * Co-located queue: API and worker share one process. Responses are kept up
 * to `responseCapacity`, oldest evicted first.
 */
export class MemoryQueue implements ChatQueue {
  readonly kind = "memory" as const;

  private readonly pending: QueueRequest[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly responses = new Map<string, ResponsePayload>();
  private readonly pollTimeoutMs: number;
  private readonly responseCapacity: number;

  constructor(
    pollTimeoutMs: number = chatConfig.MEMORY_QUEUE_POLL_TIMEOUT_MS,
    responseCapacity: number = chatConfig.MEMORY_QUEUE_RESPONSE_CAPACITY
  ) {
    this.pollTimeoutMs = pollTimeoutMs;
    this.responseCapacity = responseCapacity;
  }

  async publishRequest(request: QueueRequest): Promise<void> {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(request);
      return;
    }
    this.pending.push(request);
  }

  /** Next request, or null after `timeoutMs` with nothing queued. */
  pop(timeoutMs: number = this.pollTimeoutMs): Promise<QueueRequest | null> {
    const next = this.pending.shift();
    if (next) return Promise.resolve(next);

    return new Promise((resolve) => {
      const waiter: Waiter = (request) => {
        clearTimeout(timer);
        resolve(request);
      };
      const timer = setTimeout(() => {
        const at = this.waiters.indexOf(waiter);
        if (at >= 0) this.waiters.splice(at, 1);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  async consumeRequests(handler: RequestHandler, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const request = await this.pop();
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
    if (this.responses.has(correlationId)) return false;
    this.responses.set(correlationId, payload);
    while (this.responses.size > this.responseCapacity) {
      const oldest = this.responses.keys().next();
      if (oldest.done) break;
      this.responses.delete(oldest.value);
    }
    return true;
  }

  async getResponse(correlationId: string): Promise<ResponsePayload | null> {
    return this.responses.get(correlationId) ?? null;
  }

  get size(): number {
    return this.pending.length;
  }

  async close(): Promise<void> {
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }
}
