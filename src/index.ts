import { mkdir } from "node:fs/promises";
import path from "node:path";
import { appOptionsFromEnv, createApp } from "./app.js";
import { env } from "./config/env.js";
import redis, { createSessionStore, redisStatus } from "./config/redis.js";
import logger from "./config/logger.js";

const options = appOptionsFromEnv();

await mkdir(path.join(options.dataDir, "uploads"), { recursive: true });

redis.connect().catch((err: unknown) => {
  logger.error("Redis connection failed", { error: err instanceof Error ? err.message : String(err) });
});

const app = createApp({
  ...options,
  sessionStore: createSessionStore(options.sessionTtlSeconds),
  redisStatus,
});

const server = app.listen(env.PORT, () => {
  logger.info(`Server running on http://localhost:${env.PORT} [${env.NODE_ENV}]`, {
    dataDir: path.resolve(options.dataDir),
  });
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received. Shutting down gracefully...`);

  server.close(() => {
    redis
      .quit()
      .then(() => {
        logger.info("Server closed.");
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error("Redis quit failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  });

  // Force exit after 10s if connections don't close
  setTimeout(() => {
    logger.error("Forcing shutdown...");
    process.exit(1);
  }, 10_000).unref();
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
