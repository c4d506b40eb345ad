/**
 * @shortly/shared - Shared Package Exports
 *
 * Central export point for shared types, utilities, constants and errors.
 * This is the ONLY public API for the shared package.
 *
 * Short code encoding has ONE implementation: ./utils/shortcode.ts.
 * Import from the package root, never from internal paths:
 *
 * ```ts
 * import { encodeBase62, validateOriginalUrl } from "@shortly/shared";
 * ```
 */

// Types (Link, NewLink, ServiceResult, ReadinessResponse)
export * from "./types/index.js";

// Utilities (Base62 encoding, URL and short code validation)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, URL_CONFIG, CACHE_CONFIG)
export * from "./constants/index.js";

// Errors (ErrorCode and error classes)
export * from "./errors.js";
