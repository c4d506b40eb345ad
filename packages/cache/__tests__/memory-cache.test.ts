/**
 * In-Memory Cache Tests
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { z } from "zod";
import { CounterMissingError } from "@shortly/shared";
import { MemoryCache, jsonCodec } from "../src/index.js";

describe("MemoryCache", () => {
  let now: number;
  let cache: MemoryCache;

  beforeEach(() => {
    now = 1_700_000_000_000;
    cache = new MemoryCache({ now: () => now });
  });

  describe("write", () => {
    it("should only write absent keys with ifAbsent", async () => {
      await expect(cache.write("url_counter", "1000000000", { ifAbsent: true })).resolves.toBe(true);
      await expect(cache.write("url_counter", "1", { ifAbsent: true })).resolves.toBe(false);
      await expect(cache.read("url_counter")).resolves.toBe("1000000000");
    });

    it("should overwrite without ifAbsent", async () => {
      await cache.write("k", "a");
      await cache.write("k", "b");
      await expect(cache.read("k")).resolves.toBe("b");
    });

    it("should let exactly one of many concurrent initializers win", async () => {
      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) => cache.write("url_counter", String(i), { ifAbsent: true }))
      );

      expect(results.filter(Boolean)).toHaveLength(1);
      await expect(cache.read("url_counter")).resolves.toBe("0");
    });
  });

  describe("TTL", () => {
    it("should expire entries at the deadline", async () => {
      await cache.write("link:OGsBFX", "x", { ttlSeconds: 10 });

      now += 9_999;
      await expect(cache.exists("link:OGsBFX")).resolves.toBe(true);

      now += 1;
      await expect(cache.exists("link:OGsBFX")).resolves.toBe(false);
      await expect(cache.read("link:OGsBFX")).resolves.toBeNull();
    });

    it("should keep entries without a TTL", async () => {
      await cache.write("url_counter", "1000000000");
      now += 365 * 24 * 3600 * 1000;
      await expect(cache.exists("url_counter")).resolves.toBe(true);
    });

    it("should allow ifAbsent over an expired entry", async () => {
      await cache.write("k", "old", { ttlSeconds: 1 });
      now += 1_000;
      await expect(cache.write("k", "new", { ifAbsent: true })).resolves.toBe(true);
    });
  });

  describe("increment", () => {
    it("should throw when the key is absent", async () => {
      await expect(cache.increment("url_counter")).rejects.toBeInstanceOf(CounterMissingError);
      await expect(cache.exists("url_counter")).resolves.toBe(false);
    });

    it("should hand out distinct values under concurrency", async () => {
      await cache.write("url_counter", "1000000000");

      const values = await Promise.all(Array.from({ length: 100 }, () => cache.increment("url_counter")));

      expect(new Set(values).size).toBe(100);
      expect(Math.min(...values)).toBe(1_000_000_001);
      expect(Math.max(...values)).toBe(1_000_000_100);
      await expect(cache.read("url_counter")).resolves.toBe("1000000100");
    });
  });

  describe("fetch", () => {
    const codec = jsonCodec(z.object({ url: z.string() }));

    it("should compute once and serve later reads from cache", async () => {
      const compute = jest.fn(async () => ({ url: "https://example.com" }));

      await cache.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, compute);
      const second = await cache.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, compute);

      expect(second).toEqual({ url: "https://example.com" });
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it("should recompute after the TTL", async () => {
      const compute = jest.fn(async () => ({ url: "https://example.com" }));

      await cache.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, compute);
      now += 60_000;
      await cache.fetch("link:OGsBFX", { ttlSeconds: 60, codec }, compute);

      expect(compute).toHaveBeenCalledTimes(2);
    });

    it("should not cache null", async () => {
      const compute = jest.fn(async (): Promise<{ url: string } | null> => null);

      await cache.fetch("link:R00000", { ttlSeconds: 60, codec }, compute);
      await cache.fetch("link:R00000", { ttlSeconds: 60, codec }, compute);

      expect(compute).toHaveBeenCalledTimes(2);
      await expect(cache.exists("link:R00000")).resolves.toBe(false);
    });
  });

  it("should drop everything on clear", async () => {
    await cache.write("a", "1");
    await cache.write("url_counter", "1000000000");
    await cache.clear();

    await expect(cache.exists("a")).resolves.toBe(false);
    await expect(cache.exists("url_counter")).resolves.toBe(false);
  });
});
