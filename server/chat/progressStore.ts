/**
 * Live progress per correlation id: thinking lines, the message streamed so
 * far, and a bounded channel of events for stream readers.
 *
 * Single writer (the pipeline run), many readers. Each reader keeps its own
 * cursor; when the channel overflows the oldest events are dropped and a
 * reader that fell behind resumes at the oldest event still held.
 */

import { chatConfig } from "./chatConfig";
import type { ProgressEvent } from "@shared/chatProtocol";

export interface ProgressSnapshot {
  thinkingLog: string[];
  message: string;
}

export interface ProgressRead {
  events: ProgressEvent[];
  /** Pass back on the next read. */
  cursor: number;
}

interface ProgressRecord {
  thinking: string[];
  message: string;
  events: ProgressEvent[];
  /** Sequence number of events[0]. */
  firstSeq: number;
}

export class ProgressStore {
  private readonly records = new Map<string, ProgressRecord>();
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(capacity: number = chatConfig.PROGRESS_CHANNEL_CAPACITY, now: () => number = Date.now) {
    this.capacity = Math.max(1, capacity);
    this.now = now;
  }

  start(correlationId: string): void {
    this.records.set(correlationId, { thinking: [], message: "", events: [], firstSeq: 0 });
  }

  has(correlationId: string): boolean {
    return this.records.has(correlationId);
  }

  private push(record: ProgressRecord, event: ProgressEvent): void {
    record.events.push(event);
    const overflow = record.events.length - this.capacity;
    if (overflow > 0) {
      record.events.splice(0, overflow);
      record.firstSeq += overflow;
    }
  }

  /** Multi-line input is split so readers get one event per line. Ignored once cleared. */
  appendThinking(correlationId: string, text: string): void {
    const record = this.records.get(correlationId);
    if (!record) return;
    const lines = text
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
    for (const line of lines) {
      record.thinking.push(line);
      this.push(record, { event: "thinking", data: { line, ts: this.now() } });
    }
  }

  appendMessageChunk(correlationId: string, chunk: string): void {
    const record = this.records.get(correlationId);
    if (!record || !chunk) return;
    record.message += chunk;
    this.push(record, { event: "message", data: { chunk } });
  }

  /** Swaps the streamed message for `text`; readers get it as a replacing chunk. */
  replaceMessage(correlationId: string, text: string): void {
    const record = this.records.get(correlationId);
    if (!record) return;
    record.message = text;
    this.push(record, { event: "message", data: { chunk: text, replace: true } });
  }

  snapshot(correlationId: string): ProgressSnapshot | null {
    const record = this.records.get(correlationId);
    if (!record) return null;
    return { thinkingLog: [...record.thinking], message: record.message };
  }

  read(correlationId: string, cursor: number): ProgressRead {
    const record = this.records.get(correlationId);
    if (!record) return { events: [], cursor };
    const from = Math.max(cursor, record.firstSeq);
    const events = record.events.slice(from - record.firstSeq);
    return { events, cursor: record.firstSeq + record.events.length };
  }

  clear(correlationId: string): void {
    this.records.delete(correlationId);
  }
}
