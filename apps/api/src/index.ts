/**
 * Shortly API Service
 *
 * Main entry point for the URL shortening backend.
 *
 * Endpoints:
 *   POST /encode              - Create new short link
 *   GET  /decode?short_code=  - Look up a short link
 *   GET  /:short_code         - Redirect to original URL
 *   GET  /up, /health         - Liveness
 *   GET  /health/ready        - Readiness (cache + store)
 */

import type { FastifyInstance } from "fastify";
import type Redis from "ioredis";
import { createRedisClient, MemoryCache, RedisCache, type CacheStore } from "@shortly/cache";
import { createPool, ensureSchema, MemoryLinkStore, PostgresLinkStore, type LinkStore } from "@shortly/db";
import { createLogger } from "@shortly/logger";
import { buildApp } from "./app.js";
import { loadConfig, validateConfig, type Config } from "./config.js";
import { CounterAllocator, LinkResolver, LinkShortener } from "./services/index.js";

const logger = createLogger("api");

interface Backends {
  cache: CacheStore;
  store: LinkStore;
  redis?: Redis;
}

// ============================================================================
// Storage
// ============================================================================

async function createBackends(config: Config): Promise<Backends> {
  if (config.storageMode === "memory" || config.redisUrl === null || config.databaseUrl === null) {
    logger.warn("Using in-memory cache and store");
    return { cache: new MemoryCache(), store: new MemoryLinkStore() };
  }

  const redis = createRedisClient({ url: config.redisUrl });
  const pool = createPool({ connectionString: config.databaseUrl });

  await ensureSchema(pool);
  logger.info("Database schema verified");

  return { cache: new RedisCache(redis), store: new PostgresLinkStore(pool), redis };
}

// ============================================================================
// Graceful Shutdown
// ============================================================================

function registerShutdown(fastify: FastifyInstance, backends: Backends): void {
  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");

    try {
      await fastify.close();
      logger.info("Fastify server closed");

      await backends.cache.disconnect();
      logger.info("Cache connection closed");

      await backends.store.close();
      logger.info("Database connection closed");

      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
}

// ============================================================================
// Server Start
// ============================================================================

async function start(): Promise<void> {
  const config = loadConfig();
  validateConfig(config, logger);

  const backends = await createBackends(config);

  const counter = new CounterAllocator(backends.cache);
  await counter.initialize();

  const shortener = new LinkShortener(counter, backends.store, {
    maxAttempts: config.maxAllocationAttempts,
  });
  const resolver = new LinkResolver(backends.cache, backends.store, {
    ttlSeconds: config.cacheTtlSeconds,
  });

  const fastify = await buildApp(
    { shortener, resolver, cache: backends.cache, store: backends.store, rateLimitStore: backends.redis },
    config
  );
  registerShutdown(fastify, backends);

  await fastify.listen({ port: config.port, host: config.host });
  logger.info(`Shortly API running on http://${config.host}:${config.port}`);
}

start().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
