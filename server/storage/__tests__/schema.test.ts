import { describe, it, expect } from "vitest";
import * as schema from "@shared/schema";

describe("Insert schemas", () => {
  it("should exist only for the tables the app writes", () => {
    expect(Object.keys(schema).filter((name) => name.startsWith("insert")).sort()).toEqual([
      "insertChatProgressEventSchema",
      "insertChatThreadStateSchema",
      "insertChatTurnMessageSchema",
      "insertChatTurnSchema",
    ]);
  });

  it("should accept a turn message without generated columns", () => {
    const row = { turnId: "turn-1", threadId: "thread-1", role: "user", content: "How do I file an appeal?" };
    expect(schema.insertChatTurnMessageSchema.parse(row)).toEqual(row);
  });

  it("should reject a progress event without its correlation id", () => {
    const parsed = schema.insertChatProgressEventSchema.safeParse({ eventType: "thinking", data: { line: "x" } });
    expect(parsed.success).toBe(false);
  });
});
