/**
 * Redis Cache Tests
 *
 * RedisCache against an in-process stand-in for the command subset it uses.
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { z } from "zod";
import { CounterMissingError, DependencyError } from "@shortly/shared";
import { RedisCache, jsonCodec, type RedisCommands } from "../src/index.js";

// =============================================================================
// Test Helpers
// =============================================================================

class FakeRedis implements RedisCommands {
  store = new Map<string, string>();
  setCalls: Array<Array<string | number>> = [];
  evalReply: unknown = undefined;

  async get(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async set(key: string, value: string, ...args: Array<string | number>): Promise<"OK" | null> {
    this.setCalls.push([key, value, ...args]);
    if (args.includes("NX") && this.store.has(key)) return null;
    this.store.set(key, value);
    return "OK";
  }

  async exists(key: string): Promise<number> {
    return this.store.has(key) ? 1 : 0;
  }

  async eval(_script: string, _numKeys: number, ...keys: string[]): Promise<unknown> {
    if (this.evalReply !== undefined) return this.evalReply;

    const [key] = keys;
    const current = this.store.get(key);
    if (current === undefined) return null;

    const next = Number(current) + 1;
    this.store.set(key, String(next));
    return next;
  }

  async flushdb(): Promise<string> {
    this.store.clear();
    return "OK";
  }

  async ping(): Promise<string> {
    return "PONG";
  }

  async quit(): Promise<string> {
    return "OK";
  }
}

class UnreachableRedis implements RedisCommands {
  private fail(): Promise<never> {
    return Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:6379"));
  }

  get(): Promise<string | null> {
    return this.fail();
  }
  set(): Promise<"OK" | null> {
    return this.fail();
  }
  exists(): Promise<number> {
    return this.fail();
  }
  eval(): Promise<unknown> {
    return this.fail();
  }
  flushdb(): Promise<string> {
    return this.fail();
  }
  ping(): Promise<string> {
    return this.fail();
  }
  quit(): Promise<string> {
    return this.fail();
  }
}

const codec = jsonCodec(z.object({ url: z.string() }));

// =============================================================================
// Tests
// =============================================================================

describe("RedisCache", () => {
  let redis: FakeRedis;
  let cache: RedisCache;

  beforeEach(() => {
    redis = new FakeRedis();
    cache = new RedisCache(redis);
  });

  describe("write", () => {
    it("should issue a plain SET without options", async () => {
      await expect(cache.write("k", "v")).resolves.toBe(true);
      expect(redis.setCalls).toEqual([["k", "v"]]);
    });

    it("should pass EX for a TTL", async () => {
      await cache.write("k", "v", { ttlSeconds: 60 });
      expect(redis.setCalls).toEqual([["k", "v", "EX", 60]]);
    });

    it("should pass NX and report an existing key", async () => {
      await expect(cache.write("url_counter", "1000000000", { ifAbsent: true })).resolves.toBe(true);
      await expect(cache.write("url_counter", "5", { ifAbsent: true })).resolves.toBe(false);

      expect(redis.setCalls[1]).toEqual(["url_counter", "5", "NX"]);
      expect(redis.store.get("url_counter")).toBe("1000000000");
    });

    it("should combine EX and NX", async () => {
      await cache.write("k", "v", { ttlSeconds: 5, ifAbsent: true });
      expect(redis.setCalls).toEqual([["k", "v", "EX", 5, "NX"]]);
    });
  });

  describe("increment", () => {
    it("should return the incremented value", async () => {
      redis.store.set("url_counter", "1000000000");

      await expect(cache.increment("url_counter")).resolves.toBe(1_000_000_001);
      await expect(cache.increment("url_counter")).resolves.toBe(1_000_000_002);
    });

    it("should throw CounterMissingError instead of creating the key", async () => {
      await expect(cache.increment("url_counter")).rejects.toBeInstanceOf(CounterMissingError);
      expect(redis.store.has("url_counter")).toBe(false);
    });

    it("should reject a non-numeric reply", async () => {
      redis.evalReply = "OK";
      await expect(cache.increment("url_counter")).rejects.toBeInstanceOf(DependencyError);
    });
  });

  describe("exists / read / clear", () => {
    it("should reflect stored keys", async () => {
      await cache.write("a", "1");

      await expect(cache.exists("a")).resolves.toBe(true);
      await expect(cache.exists("b")).resolves.toBe(false);
      await expect(cache.read("a")).resolves.toBe("1");
      await expect(cache.read("b")).resolves.toBeNull();
    });

    it("should remove every key on clear", async () => {
      await cache.write("a", "1");
      await cache.write("b", "2");
      await cache.clear();

      expect(redis.store.size).toBe(0);
    });
  });

  describe("fetch", () => {
    it("should return a cached value without computing", async () => {
      redis.store.set("link:OGsBFX", JSON.stringify({ url: "https://example.com" }));
      const compute = jest.fn(async () => ({ url: "https://other.example.com" }));

      const value = await cache.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, compute);

      expect(value).toEqual({ url: "https://example.com" });
      expect(compute).not.toHaveBeenCalled();
    });

    it("should compute and store a miss with the TTL", async () => {
      const value = await cache.fetch("link:OGsBFX", { ttlSeconds: 43_200, codec }, async () => ({
        url: "https://example.com",
      }));

      expect(value).toEqual({ url: "https://example.com" });
      expect(redis.setCalls).toEqual([["link:OGsBFX", '{"url":"https://example.com"}', "EX", 43_200]]);
    });

    it("should not store a null result", async () => {
      const value = await cache.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, async () => null);

      expect(value).toBeNull();
      expect(redis.setCalls).toHaveLength(0);
    });

    it("should recompute over an unrecognised entry", async () => {
      redis.store.set("link:OGsBFX", "not json");

      const value = await cache.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, async () => ({
        url: "https://example.com",
      }));

      expect(value).toEqual({ url: "https://example.com" });
      expect(redis.store.get("link:OGsBFX")).toBe('{"url":"https://example.com"}');
    });
  });

  describe("when Redis is unreachable", () => {
    const down = new RedisCache(new UnreachableRedis());

    it("should raise DependencyError for commands", async () => {
      await expect(down.read("k")).rejects.toMatchObject({
        name: "DependencyError",
        dependency: "cache",
        code: "DEPENDENCY_UNAVAILABLE",
      });
      await expect(down.write("k", "v")).rejects.toBeInstanceOf(DependencyError);
      await expect(down.increment("url_counter")).rejects.toBeInstanceOf(DependencyError);
    });

    it("should not run compute when the read fails", async () => {
      const compute = jest.fn(async () => ({ url: "https://example.com" }));

      await expect(down.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, compute)).rejects.toBeInstanceOf(
        DependencyError
      );
      expect(compute).not.toHaveBeenCalled();
    });

    it("should report ping as false", async () => {
      await expect(down.ping()).resolves.toBe(false);
    });
  });
});
