import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";

/**
 * Rate limiting for chat submission. Each accepted message costs several
 * LLM calls, so the limit is per IP address.
 *
 * Behind a proxy, set app.set("trust proxy", 1) so req.ip is the client.
 */

const keyGenerator = (req: Request): string => req.ip || req.socket.remoteAddress || "unknown";

const rateLimitHandler = (_req: Request, res: Response) => {
  res.status(429).json({
    message: "Too many requests. Please wait a moment before trying again.",
    retryAfter: res.getHeader("Retry-After"),
  });
};

/**
 * Chat message rate limiter
 * 20 messages per minute per IP
 */
export const chatMessageLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator,
  handler: rateLimitHandler,
});
