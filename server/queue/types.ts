import type { QueueRequest, ResponsePayload } from "@shared/chatProtocol";

export type RequestHandler = (request: QueueRequest) => Promise<void>;

/**
 * Request queue plus write-once response store, keyed by correlation id.
 *
 * consumeRequests pops one request at a time and awaits the handler before
 * the next pop. Each pop is a bounded wait so the loop notices `signal`.
 */
export interface ChatQueue {
  readonly kind: "memory" | "redis";
  publishRequest(request: QueueRequest): Promise<void>;
  consumeRequests(handler: RequestHandler, signal: AbortSignal): Promise<void>;
  /** Returns false when a response already exists for the id; the first write wins. */
  publishResponse(correlationId: string, payload: ResponsePayload): Promise<boolean>;
  getResponse(correlationId: string): Promise<ResponsePayload | null>;
  close(): Promise<void>;
}
