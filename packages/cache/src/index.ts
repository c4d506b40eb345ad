/**
 * Cache Package Exports
 *
 * Shared cache tier: the allocation counter and cached link resolutions.
 * RedisCache in deployment, MemoryCache for tests and local runs.
 */

export { RedisCache, type RedisCommands } from "./cache.js";
export { MemoryCache, type MemoryCacheOptions } from "./memory.js";
export { jsonCodec } from "./codec.js";
export { createRedisClient, type RedisClientOptions } from "./client.js";
export type { CacheStore, CacheCodec, FetchOptions, WriteOptions } from "./types.js";
