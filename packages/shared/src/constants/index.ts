/**
 * Short Code Configuration Constants
 *
 * Single source of truth for short code allocation parameters.
 * Codes are derived from a shared counter, not generated at random.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Length of every issued short code.
   * Holds for counters in [MIN_COUNTER, MAX_COUNTER].
   */
  LENGTH: 6,

  /**
   * Permuted Base62 alphabet: all of 0-9A-Za-z in a fixed shuffled order,
   * so consecutive counters produce unrelated-looking codes.
   *
   * Changing this invalidates the decodability of every issued code.
   */
  ALPHABET: "RO9zDGxetiA5flHnXvU8M1WmJNqwhK6TaSVQjgPkIsFbc04pL7yoCurBdEZ32Y",

  /** Radix of the positional encoding */
  BASE: 62,

  /** Cache key holding the shared counter */
  COUNTER_KEY: "url_counter",

  /**
   * Starting value written on first initialization.
   * 62^5 < 1e9 < 62^6, so the first codes are already 6 characters long.
   */
  INITIAL_COUNTER: 1_000_000_000,

  /** Smallest counter that encodes to LENGTH symbols (62^5) */
  MIN_COUNTER: 916_132_832,

  /**
   * Largest counter that encodes to LENGTH symbols (62^6 - 1).
   * Past this the code space is exhausted and allocation fails.
   */
  MAX_COUNTER: 56_800_235_583,

  /**
   * Maximum allocate-encode-persist cycles per link.
   * Collisions need a counter value that was already issued, so more
   * than one in a row points at lost counter state, not bad luck.
   */
  MAX_ATTEMPTS: 5,
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,
} as const;

/**
 * Resolution Cache Constants
 */
export const CACHE_CONFIG = {
  /** Namespace for cached links: link:{shortCode} */
  LINK_KEY_PREFIX: "link:",

  /** 12 hours */
  LINK_TTL_SECONDS: 43_200,
} as const;
