import { MemoryQueue } from "./memoryQueue";
import { RedisQueue } from "./redisQueue";
import { ConfigurationError } from "../utils/errors";
import type { EnvConfig } from "../config/env";
import type { ChatQueue } from "./types";

export type { ChatQueue, RequestHandler } from "./types";
export { MemoryQueue } from "./memoryQueue";
export { RedisQueue } from "./redisQueue";

export function createQueue(env: EnvConfig): ChatQueue {
  if (env.QUEUE_TYPE === "redis") {
    if (!env.REDIS_URL) {
      throw new ConfigurationError("REDIS_URL is required when QUEUE_TYPE=redis");
    }
    return new RedisQueue({
      url: env.REDIS_URL,
      requestKey: env.REDIS_REQUEST_KEY,
      responseKeyPrefix: env.REDIS_RESPONSE_KEY_PREFIX,
      responseTtlSeconds: env.REDIS_RESPONSE_TTL_SECONDS,
    });
  }
  return new MemoryQueue();
}
