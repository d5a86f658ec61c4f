import RedisStore from "connect-redis";
import { Redis } from "ioredis";
import { env } from "./env.js";
import logger from "./logger.js";

export const SESSION_KEY_PREFIX = "catalog:sess:";

const redis = new Redis(env.REDIS_URL, {
  connectionName: "catalog-sessions",
  // index.ts connects at startup
  lazyConnect: true,
  maxRetriesPerRequest: 3,
  retryStrategy(times: number) {
    const delay = Math.min(times * 200, 3000);
    logger.warn(`Redis reconnecting... attempt ${times}`);
    return delay;
  },
});

redis.on("connect", () => {
  logger.info("Redis connected");
});

redis.on("error", (err: Error) => {
  logger.error("Redis error", { error: err.message });
});

/** Admin sessions expire in Redis together with their cookie. */
export function createSessionStore(ttlSeconds: number = env.SESSION_TTL_SECONDS): RedisStore {
  return new RedisStore({ client: redis, prefix: SESSION_KEY_PREFIX, ttl: ttlSeconds });
}

export function redisStatus(): string {
  return redis.status === "ready" ? "connected" : redis.status;
}

export default redis;
