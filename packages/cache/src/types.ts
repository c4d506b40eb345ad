/**
 * Cache Type Definitions
 *
 * The cache tier holds two kinds of state:
 *   url_counter        - the shared allocation counter (raw integer string)
 *   link:{shortCode}   - resolved links (JSON, TTL-bounded)
 */

/**
 * Options for a plain write
 */
export interface WriteOptions {
  /** Expire after this many seconds (omit for no expiry) */
  ttlSeconds?: number;
  /** Only write when the key is absent (SET NX) */
  ifAbsent?: boolean;
}

/**
 * Typed view of a raw cached string.
 *
 * `decode` returns null for values it does not recognise; the cache
 * treats that as a miss and overwrites the entry.
 */
export interface CacheCodec<T> {
  encode(value: T): string;
  decode(raw: string): T | null;
}

/**
 * Options for a cache-aside fetch
 */
export interface FetchOptions<T> {
  /** Lifetime of a populated entry, from time of population */
  ttlSeconds: number;
  codec: CacheCodec<T>;
}

/**
 * Contract of the shared cache tier.
 *
 * Implementations must make `write(..., { ifAbsent: true })` and
 * `increment` atomic across every client of the same backing store.
 * Backend failures are raised as DependencyError("cache").
 */
export interface CacheStore {
  exists(key: string): Promise<boolean>;
  read(key: string): Promise<string | null>;

  /** @returns false when `ifAbsent` was set and the key already existed */
  write(key: string, value: string, options?: WriteOptions): Promise<boolean>;

  /**
   * Atomically add 1 to an existing integer and return the new value.
   * @throws CounterMissingError when the key is absent
   */
  increment(key: string): Promise<number>;

  /**
   * Cache-aside read: return the cached value, or run `compute`, store a
   * non-null result for `ttlSeconds` and return it. Null results are not
   * cached.
   */
  fetch<T>(key: string, options: FetchOptions<T>, compute: () => Promise<T | null>): Promise<T | null>;

  /** Administrative wipe of every key */
  clear(): Promise<void>;

  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}
