/**
 * Structured logging for the chat pipeline and its collaborators.
 *
 * All logs are emitted as JSON lines through pino and can be filtered by level.
 *
 * Environment Variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error). Default: "info"
 * - CHAT_DEBUG_LOGGING: Set to "1" or "true" to enable verbose debug logs. Default: disabled
 * - CHAT_LOG_USER_CONTENT: Set to "1" or "true" to log user message text.
 *   Default: disabled (only logs message length)
 *
 * SAFETY CONSTRAINTS:
 * - Never log API keys, connection strings or other secrets
 * - Never log full document bodies (snippets only, truncated)
 * - User message content is redacted by default (only logs length)
 */

import pino, { type Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string;
  correlationId?: string;
  threadId?: string;
  stage?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

function isFlagEnabled(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

const CURRENT_LOG_LEVEL: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

const CHAT_DEBUG_ENABLED = isFlagEnabled(process.env.CHAT_DEBUG_LOGGING);

const LOG_USER_CONTENT_ENABLED = isFlagEnabled(process.env.CHAT_LOG_USER_CONTENT);

const baseLogger: Logger = pino({
  level: CURRENT_LOG_LEVEL,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
  messageKey: "message",
  formatters: {
    level: (label) => ({ level: label }),
  },
});

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(CURRENT_LOG_LEVEL);
}

/**
 * Shared pino instance, for callers that want pino's native API
 * (e.g. the HTTP request logger).
 */
export function getLogger(): Logger {
  return baseLogger;
}

/**
 * Core logging function.
 *
 * @param message - Short event identifier (e.g., "pipeline_stage_completed")
 * @param context - requestId/correlationId/threadId/stage plus any extra fields
 */
export function log(
  level: LogLevel,
  message: string,
  context: LogContext = {}
): void {
  if (!shouldLog(level)) return;
  if (!CHAT_DEBUG_ENABLED && level === "debug") return;

  switch (level) {
    case "error":
      baseLogger.error(context, message);
      break;
    case "warn":
      baseLogger.warn(context, message);
      break;
    case "info":
      baseLogger.info(context, message);
      break;
    case "debug":
      baseLogger.debug(context, message);
      break;
  }
}

export const logDebug = (msg: string, ctx?: LogContext) =>
  log("debug", msg, ctx);

export const logInfo = (msg: string, ctx?: LogContext) =>
  log("info", msg, ctx);

export const logWarn = (msg: string, ctx?: LogContext) =>
  log("warn", msg, ctx);

export const logError = (msg: string, ctx?: LogContext) =>
  log("error", msg, ctx);

/**
 * Truncate long strings so a single log entry stays small.
 */
export function truncate(text: string | undefined | null, maxLen = 1000): string | undefined {
  if (!text) return undefined;
  return text.length > maxLen ? text.slice(0, maxLen) + "…[truncated]" : text;
}

/**
 * Redact user-provided content for logging unless CHAT_LOG_USER_CONTENT is on.
 */
export function sanitizeUserContent(content: string | undefined | null, maxLen = 100): string | undefined {
  if (!content) return undefined;

  if (LOG_USER_CONTENT_ENABLED) {
    return truncate(content, maxLen);
  }

  return `[redacted, length=${content.length}]`;
}

export function isDebugEnabled(): boolean {
  return CHAT_DEBUG_ENABLED && shouldLog("debug");
}
