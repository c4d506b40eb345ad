/**
 * In-Memory Cache
 *
 * Map-based CacheStore for tests and single-process development mode.
 * Operations run synchronously inside one event-loop turn, so `ifAbsent`
 * writes and increments are atomic within the process.
 */

import { CounterMissingError, DependencyError } from "@shortly/shared";
import type { CacheStore, FetchOptions, WriteOptions } from "./types.js";

interface Entry {
  value: string;
  /** Epoch ms; null never expires */
  expiresAt: number | null;
}

export interface MemoryCacheOptions {
  /** Clock in epoch ms (default: Date.now) */
  now?: () => number;
}

export class MemoryCache implements CacheStore {
  private entries: Map<string, Entry> = new Map();
  private readonly now: () => number;

  constructor(options: MemoryCacheOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== null;
  }

  async read(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async write(key: string, value: string, options: WriteOptions = {}): Promise<boolean> {
    if (options.ifAbsent && this.live(key) !== null) {
      return false;
    }

    const expiresAt = options.ttlSeconds !== undefined ? this.now() + options.ttlSeconds * 1000 : null;
    this.entries.set(key, { value, expiresAt });
    return true;
  }

  async increment(key: string): Promise<number> {
    const entry = this.live(key);
    if (entry === null) {
      throw new CounterMissingError(key);
    }

    const next = Number.parseInt(entry.value, 10) + 1;
    if (!Number.isSafeInteger(next)) {
      throw new DependencyError("cache", `Value at "${key}" is not an integer`);
    }

    entry.value = String(next);
    return next;
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
    this.entries.clear();
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async disconnect(): Promise<void> {
    this.entries.clear();
  }

  /** Entry for key, dropping it first if expired */
  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }
}
