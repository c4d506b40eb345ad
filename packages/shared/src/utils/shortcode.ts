/**
 * Short Code Encoding Module
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ RESPONSIBILITIES                                                        │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │ 1. ENCODING    - Counter value → permuted Base62 string                 │
 * │ 2. DECODING    - Inverse, for verification and tooling                  │
 * │ 3. VALIDATION  - Short code shape checks                                │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Strategy: Sequential counter, permuted Base62
 * - Counter starts at 1,000,000,000 → first code is "OGsBFX"
 * - 6 characters for every counter in [62^5, 62^6 - 1]
 * - Uniqueness comes from the counter; the store's unique index is the
 *   final arbiter
 */

import { SHORTCODE_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

// =============================================================================
// SECTION 1: ENCODING
// =============================================================================

/**
 * Encode a non-negative integer with the permuted Base62 alphabet.
 *
 * Most significant symbol first, no padding. Zero maps to the alphabet's
 * first symbol, not to a literal "0".
 *
 * @returns The code, or null for negative, fractional or unsafe input
 *
 * @example
 * ```ts
 * encodeBase62(0)             // "R"
 * encodeBase62(62)            // "OR"
 * encodeBase62(1_000_000_000) // "OGsBFX"
 * encodeBase62(-1)            // null
 * ```
 */
export function encodeBase62(num: number): string | null {
  if (!Number.isSafeInteger(num) || num < 0) {
    return null;
  }

  const { ALPHABET, BASE } = SHORTCODE_CONFIG;

  if (num === 0) {
    return ALPHABET.charAt(0);
  }

  let result = "";
  let n = num;

  while (n > 0) {
    result = ALPHABET.charAt(n % BASE) + result;
    n = Math.floor(n / BASE);
  }

  return result;
}

// =============================================================================
// SECTION 2: DECODING
// =============================================================================

/**
 * Decode a permuted Base62 string back to its integer.
 *
 * @returns The number, or null for empty input, foreign symbols or a value
 *   beyond Number.MAX_SAFE_INTEGER
 *
 * @example
 * ```ts
 * decodeBase62("R")      // 0
 * decodeBase62("ORR")    // 3844
 * decodeBase62("OGsBFX") // 1_000_000_000
 * ```
 */
export function decodeBase62(str: string): number | null {
  if (str.length === 0) {
    return null;
  }

  const { ALPHABET, BASE } = SHORTCODE_CONFIG;
  let result = 0;

  for (const char of str) {
    const index = ALPHABET.indexOf(char);
    if (index === -1) {
      return null;
    }
    result = result * BASE + index;
  }

  return Number.isSafeInteger(result) ? result : null;
}

/**
 * Whether a counter value encodes to exactly SHORTCODE_CONFIG.LENGTH symbols.
 */
export function isWithinCodeSpace(counter: number): boolean {
  return (
    Number.isSafeInteger(counter) &&
    counter >= SHORTCODE_CONFIG.MIN_COUNTER &&
    counter <= SHORTCODE_CONFIG.MAX_COUNTER
  );
}

// =============================================================================
// SECTION 3: VALIDATION
// =============================================================================

/**
 * Validate the shape of a short code before any lookup.
 *
 * Rules:
 * - Exactly LENGTH (6) characters
 * - Every character from the alphabet
 *
 * @example
 * ```ts
 * validateShortCode("OGsBFX")  // { valid: true }
 * validateShortCode("abc")     // { valid: false, error: "..." }
 * ```
 */
export function validateShortCode(code: string): ValidationResult {
  const { LENGTH, ALPHABET } = SHORTCODE_CONFIG;

  if (code.length !== LENGTH) {
    return {
      valid: false,
      error: `Short code must be exactly ${LENGTH} characters`,
    };
  }

  for (const char of code) {
    if (!ALPHABET.includes(char)) {
      return {
        valid: false,
        error: "Short code must contain only alphanumeric characters (a-z, A-Z, 0-9)",
      };
    }
  }

  return { valid: true };
}
