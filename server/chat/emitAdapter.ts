/**
 * Maps technical retrieval lines to user-facing ones, or drops them.
 * With CHAT_DEBUG_RETRIEVAL_EMITS=1 every line passes through unchanged.
 */

import { logDebug } from "../utils/logger";
import type { ThinkingEmitter } from "./types";

type Replacement = string | null | ((match: RegExpExecArray) => string);

const USER_FRIENDLY_MAP: ReadonlyArray<[RegExp, Replacement]> = [
  [/^Retrieving \d+ hierarchical \+ \d+ factual passages/, "Searching our materials..."],
  [/^Retrieved \d+ candidate passages/, null],
  [/^Corpus confidence sufficient/, "Found strong matches in our materials."],
  [/^Adding external search/, "Adding external sources to complement what we found."],
  [/^Low corpus confidence/, "Searching the web for additional context."],
  [
    /^Using (\d+) results? to answer/,
    (m) => {
      const n = Number(m[1]);
      return `Using ${n} ${n === 1 ? "result" : "results"} to answer this part.`;
    },
  ],
];

/** Null means the line is dropped. Lines that match nothing pass through. */
export function toUserFacing(line: string, debug: boolean = false): string | null {
  const text = line.trim();
  if (!text) return null;
  for (const [pattern, replacement] of USER_FRIENDLY_MAP) {
    const match = pattern.exec(text);
    if (!match) continue;
    if (debug) {
      logDebug("retrieval_emit", { line: text });
      return text;
    }
    if (typeof replacement === "function") return replacement(match);
    return replacement;
  }
  return text;
}

export function wrapEmitterForUser(emit: ThinkingEmitter, debug: boolean = false): ThinkingEmitter {
  return (line) => {
    const mapped = toUserFacing(line, debug);
    if (mapped !== null) emit(mapped);
  };
}
