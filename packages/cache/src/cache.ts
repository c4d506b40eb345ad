/**
 * Redis Cache
 *
 * Shared cache tier backed by Redis. Holds the allocation counter and the
 * cache-aside copies of resolved links.
 *
 * Unlike a best-effort read cache, every Redis failure surfaces as a
 * DependencyError("cache"): the counter lives here, so a silent miss
 * would be indistinguishable from data loss.
 */

import { CounterMissingError, DependencyError, isShortlyError } from "@shortly/shared";
import type { CacheStore, FetchOptions, WriteOptions } from "./types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Redis client interface (minimal subset we need)
 * Allows easy mocking in tests
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<"OK" | null>;
  set(key: string, value: string, nx: "NX"): Promise<"OK" | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<"OK" | null>;
  set(key: string, value: string, secondsToken: "EX", seconds: number, nx: "NX"): Promise<"OK" | null>;
  exists(key: string): Promise<number>;
  eval(script: string, numKeys: number, ...keys: string[]): Promise<unknown>;
  flushdb(): Promise<string>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

// INCR creates missing keys at 0; the counter must never restart that way.
const INCREMENT_IF_EXISTS = `
if redis.call("EXISTS", KEYS[1]) == 1 then
  return redis.call("INCR", KEYS[1])
end
return nil
`;

// =============================================================================
// Implementation
// =============================================================================

export class RedisCache implements CacheStore {
  constructor(private readonly client: RedisCommands) {}

  async exists(key: string): Promise<boolean> {
    const count = await this.run("exists", () => this.client.exists(key));
    return count === 1;
  }

  async read(key: string): Promise<string | null> {
    return this.run("read", () => this.client.get(key));
  }

  async write(key: string, value: string, options: WriteOptions = {}): Promise<boolean> {
    const { ttlSeconds, ifAbsent = false } = options;

    const reply = await this.run("write", () => {
      if (ttlSeconds !== undefined) {
        return ifAbsent
          ? this.client.set(key, value, "EX", ttlSeconds, "NX")
          : this.client.set(key, value, "EX", ttlSeconds);
      }
      return ifAbsent ? this.client.set(key, value, "NX") : this.client.set(key, value);
    });

    return reply === "OK";
  }

  async increment(key: string): Promise<number> {
    const reply = await this.run("increment", () => this.client.eval(INCREMENT_IF_EXISTS, 1, key));

    if (reply === null || reply === undefined) {
      throw new CounterMissingError(key);
    }
    if (typeof reply !== "number") {
      throw new DependencyError("cache", `Unexpected increment reply for "${key}"`);
    }
    return reply;
  }

  async fetch<T>(
    key: string,
    options: FetchOptions<T>,
    compute: () => Promise<T | null>
  ): Promise<T | null> {
    const raw = await this.read(key);
    if (raw !== null) {
      const cached = options.codec.decode(raw);
      if (cached !== null) return cached;
    }

    const value = await compute();
    if (value === null) return null;

    await this.write(key, options.codec.encode(value), { ttlSeconds: options.ttlSeconds });
    return value;
  }

  async clear(): Promise<void> {
    await this.run("clear", () => this.client.flushdb());
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.client.ping();
      return result === "PONG";
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (err) {
      if (isShortlyError(err)) throw err;
      throw new DependencyError("cache", `Cache ${operation} failed`, err);
    }
  }
}
