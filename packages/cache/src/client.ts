/**
 * Redis Client Factory
 *
 * Creates and configures Redis client instances using ioredis.
 */

import Redis from "ioredis";
import { createLogger } from "@shortly/logger";

const log = createLogger("redis");

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Command timeout in ms (default: 1000) */
  commandTimeout?: number;
  /** Max retries per request (default: 3) */
  maxRetries?: number;
}

/**
 * Create a configured Redis client
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const {
    url,
    connectTimeout = 5000,
    commandTimeout = 1000,
    maxRetries = 3,
  } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,

    enableReadyCheck: true,
    enableOfflineQueue: false, // Fail fast when disconnected

    // Reconnection strategy
    retryStrategy: (times) => {
      if (times > 5) return null; // Stop retrying after 5 attempts
      return Math.min(times * 100, 2000); // Linear backoff, max 2s
    },
  });

  client.on("connect", () => log.info("Connected"));
  client.on("error", (err: Error) => log.error({ err }, "Redis error"));
  client.on("close", () => log.debug("Connection closed"));

  return client;
}
