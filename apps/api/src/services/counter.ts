/**
 * Counter Allocator
 *
 * Hands out unique integers from the shared counter in the cache tier.
 * Uniqueness across processes comes from the cache's atomic increment;
 * nothing here holds a lock.
 */

import type { CacheStore } from "@shortly/cache";
import { createLogger, type Logger } from "@shortly/logger";
import { CounterMissingError, SHORTCODE_CONFIG } from "@shortly/shared";

export interface CounterAllocatorOptions {
  /** Cache key of the counter (default: url_counter) */
  key?: string;
  /** Value written by `initialize` (default: 1_000_000_000) */
  initialValue?: number;
  /** Initialize and retry once when the counter is missing (default: true) */
  autoInitialize?: boolean;
  logger?: Logger;
}

export class CounterAllocator {
  readonly key: string;
  private readonly initialValue: number;
  private readonly autoInitialize: boolean;
  private readonly log: Logger;

  constructor(
    private readonly cache: CacheStore,
    options: CounterAllocatorOptions = {}
  ) {
    this.key = options.key ?? SHORTCODE_CONFIG.COUNTER_KEY;
    this.initialValue = options.initialValue ?? SHORTCODE_CONFIG.INITIAL_COUNTER;
    this.autoInitialize = options.autoInitialize ?? true;
    this.log = options.logger ?? createLogger("counter");
  }

  /**
   * Write the starting value if the counter is absent.
   * @returns whether this call performed the write
   */
  async initialize(): Promise<boolean> {
    const written = await this.cache.write(this.key, String(this.initialValue), { ifAbsent: true });

    if (written) {
      this.log.info({ key: this.key, value: this.initialValue }, "Counter initialized");
    }
    return written;
  }

  /**
   * Atomically increment the counter and return the new value.
   */
  async incrementAndGet(): Promise<number> {
    try {
      return await this.cache.increment(this.key);
    } catch (err) {
      if (!(err instanceof CounterMissingError) || !this.autoInitialize) {
        throw err;
      }

      this.log.warn({ key: this.key }, "Counter missing, initializing");
      await this.initialize();
      return this.cache.increment(this.key);
    }
  }
}
