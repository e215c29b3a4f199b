import IORedis from "ioredis";
import { Redis } from "@upstash/redis";
import type { Logger } from "../../config/logger";
import type { EnvConfig } from "../../config/env";
import type { SessionStoreAdapter } from "./SessionStore";
import { InMemorySessionStore } from "./InMemorySessionStore";
import { RedisSessionStore } from "./RedisSessionStore";
import type { SessionRedisClient } from "./RedisSessionStore";

type RedisSettings = Pick<
  EnvConfig,
  "REDIS_MODE" | "REDIS_URL" | "UPSTASH_REDIS_REST_URL" | "UPSTASH_REDIS_REST_TOKEN"
>;

function initRestRedisClient(config: RedisSettings, logger: Logger): Redis {
  const url = config.UPSTASH_REDIS_REST_URL;
  const token = config.UPSTASH_REDIS_REST_TOKEN;
  if (!url || !token) {
    logger.error({ event: "REDIS_CONFIG_MISSING", mode: "rest" }, "❌ Upstash REST credentials not found");
    throw new Error("Upstash REST API credentials required");
  }

  const client = new Redis({ url, token });
  logger.info({ event: "REDIS_CLIENT_READY", mode: "rest", url: url.replace(/\/\/.*@/, "//***@") }, "✅ Upstash REST Redis client initialized");
  return client;
}

function initTcpRedisClient(config: RedisSettings, logger: Logger): IORedis {
  const url = config.REDIS_URL;
  if (!url) {
    logger.error({ event: "REDIS_CONFIG_MISSING", mode: "tcp" }, "❌ REDIS_URL not found");
    throw new Error("REDIS_URL required");
  }

  const client = new IORedis(url, {
    family: 4,
    enableAutoPipelining: false,
    maxRetriesPerRequest: 3,
    lazyConnect: true, // Connect on first command
    connectTimeout: 15000,
    commandTimeout: 10000,
  });
  client.on("error", (error: Error) => {
    logger.error({ event: "REDIS_CONNECTION_ERROR", error: error.message }, "🚨 TCP Redis connection error");
  });

  logger.info({ event: "REDIS_CLIENT_READY", mode: "tcp", url: url.replace(/\/\/.*@/, "//***@") }, "✅ TCP Redis client initialized");
  return client;
}

export function createRedisClient(config: RedisSettings, logger: Logger): SessionRedisClient & { ping(): Promise<string> } {
  logger.info({ redisMode: config.REDIS_MODE }, "🚀 Initializing Redis client");
  return config.REDIS_MODE === "rest" ? initRestRedisClient(config, logger) : initTcpRedisClient(config, logger);
}

export function createSessionAdapter(
  config: Pick<EnvConfig, "SESSION_STORE" | "SESSION_IN_MEMORY_LIMIT" | "REDIS_SESSION_PREFIX"> & RedisSettings,
  logger: Logger
): SessionStoreAdapter {
  if (config.SESSION_STORE === "memory") {
    logger.info({ event: "SESSION_STORE_SELECTED", store: "memory", limit: config.SESSION_IN_MEMORY_LIMIT }, "🧠 Using in-memory session store");
    return new InMemorySessionStore(config.SESSION_IN_MEMORY_LIMIT);
  }

  const client = createRedisClient(config, logger);

  // Test the connection immediately
  void client.ping().then((result) => {
    logger.info({ pingResult: result }, "🏓 Redis PING test successful");
  }).catch((error: unknown) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, "🚨 Redis PING test failed");
  });

  logger.info({ event: "SESSION_STORE_SELECTED", store: "redis", prefix: config.REDIS_SESSION_PREFIX }, "🗄️ Using Redis session store");
  return new RedisSessionStore(client, config.REDIS_SESSION_PREFIX);
}
