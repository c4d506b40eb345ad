/**
 * Original URL validation.
 *
 * Messages mirror what the HTTP layer returns under `errors.details`.
 */

import { URL_CONFIG } from "../constants/index.js";
import type { ValidationResult } from "./shortcode.js";

export const URL_ERRORS = {
  BLANK: "Original url can't be blank",
  INVALID: "Original url must be a valid URL",
  TOO_LONG: `Original url is too long (maximum is ${URL_CONFIG.MAX_LENGTH} characters)`,
} as const;

/**
 * Validate a URL submitted for shortening.
 *
 * Accepts absolute http/https URLs with a host. Rejects blank input,
 * relative or scheme-less strings ("example.com") and every other scheme,
 * "javascript:" included.
 */
export function validateOriginalUrl(input: unknown): ValidationResult {
  if (typeof input !== "string" || input.trim().length === 0) {
    return { valid: false, error: URL_ERRORS.BLANK };
  }

  if (input.length > URL_CONFIG.MAX_LENGTH) {
    return { valid: false, error: URL_ERRORS.TOO_LONG };
  }

  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch {
    return { valid: false, error: URL_ERRORS.INVALID };
  }

  const allowed: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;
  if (!allowed.includes(parsed.protocol) || parsed.hostname.length === 0) {
    return { valid: false, error: URL_ERRORS.INVALID };
  }

  // URL() trims and percent-encodes whitespace instead of rejecting it
  if (/\s/.test(input)) {
    return { valid: false, error: URL_ERRORS.INVALID };
  }

  return { valid: true };
}
