/**
 * Shared Utility Functions
 *
 * @see ./shortcode.ts for the encoding scheme.
 */

// Encoding
export {
  encodeBase62,
  decodeBase62,
  isWithinCodeSpace,
} from "./shortcode.js";

// Validation
export { validateShortCode } from "./shortcode.js";
export { validateOriginalUrl, URL_ERRORS } from "./url.js";

// Types
export type { ValidationResult } from "./shortcode.js";
