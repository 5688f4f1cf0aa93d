/**
 * Server-sent events writer.
 *
 *   event: thinking
 *   data: {"line":"...","ts":1700000000000}
 *
 * Works over anything with the response methods below, so an express
 * Response or a test double.
 */

export interface SseSink {
  setHeader(name: string, value: string): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  flushHeaders?(): void;
}

export class SSE {
  private initialized = false;
  private closed = false;

  constructor(private readonly sink: SseSink) {}

  init(): void {
    if (this.initialized) return;

    this.sink.setHeader("Content-Type", "text/event-stream");
    this.sink.setHeader("Cache-Control", "no-cache, no-transform");
    this.sink.setHeader("Connection", "keep-alive");
    this.sink.setHeader("X-Accel-Buffering", "no");

    // Flush headers immediately
    this.sink.flushHeaders?.();

    this.initialized = true;
  }

  send(event: string, data: unknown): void {
    if (this.closed) return;
    if (!this.initialized) this.init();
    this.sink.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
  }

  /** Comment line; clients ignore it, proxies see traffic. */
  comment(text: string): void {
    if (this.closed) return;
    if (!this.initialized) this.init();
    this.sink.write(`: ${text}\n\n`);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sink.end();
  }
}
