/**
 * Shared Type Definitions
 */

import type { ErrorCode } from "../errors.js";

// =============================================================================
// Link Types
// =============================================================================

/**
 * A persisted short link. Immutable once created.
 */
export interface Link {
  /** Store-assigned identifier (64-bit serial, string form) */
  id: string;

  /** Original destination URL */
  originalUrl: string;

  /** Six-symbol code from the permuted Base62 alphabet */
  shortCode: string;

  /** Creation timestamp */
  createdAt: Date;
}

/**
 * Link candidate handed to the durable store
 */
export interface NewLink {
  originalUrl: string;
  shortCode: string;
}

// =============================================================================
// Service Result Types
// =============================================================================

/**
 * Tagged outcome of a core operation.
 *
 * Expected failures travel as values; bugs are thrown.
 */
export type ServiceResult<T, E extends ErrorCode = ErrorCode> =
  | { success: true; data: T }
  | { success: false; errorCode: E; error: string };

// =============================================================================
// Service Health Types
// =============================================================================

/**
 * Individual dependency status
 */
export type DependencyStatus = "ok" | "error";

/**
 * Readiness probe response
 */
export interface ReadinessResponse {
  status: "ok" | "degraded" | "unhealthy";
  checks: {
    cache: DependencyStatus;
    store: DependencyStatus;
  };
  timestamp: string;
}
