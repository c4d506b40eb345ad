/**
 * Error Taxonomy
 *
 * Expected failures of the core carry one of these codes. Classes exist for
 * the conditions that cross a package boundary as exceptions (dependency
 * outages, a missing counter, a lookup miss, an exhausted allocation).
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCode = {
  /** Blank or malformed original URL, malformed short code */
  VALIDATION_FAILED: "VALIDATION_FAILED",
  /** Short code not present in the durable store */
  NOT_FOUND: "NOT_FOUND",
  /** Retry ceiling or code space exhausted */
  ALLOCATION_FAILED: "ALLOCATION_FAILED",
  /** Cache or store unreachable or erroring */
  DEPENDENCY_UNAVAILABLE: "DEPENDENCY_UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Which collaborator failed */
export type Dependency = "cache" | "store";

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class for every error the shortener raises on purpose.
 */
export class ShortlyError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends ShortlyError {
  readonly shortCode: string;

  constructor(shortCode: string) {
    super(ErrorCode.NOT_FOUND, `Couldn't find Link with short_code=${shortCode}`);
    this.shortCode = shortCode;
  }
}

export class FatalAllocationError extends ShortlyError {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(ErrorCode.ALLOCATION_FAILED, message);
    this.attempts = attempts;
  }
}

/**
 * A cache or store failure. Never to be read as "not found".
 */
export class DependencyError extends ShortlyError {
  readonly dependency: Dependency;

  constructor(dependency: Dependency, message: string, cause?: unknown) {
    super(ErrorCode.DEPENDENCY_UNAVAILABLE, message, { cause });
    this.dependency = dependency;
  }
}

/**
 * The counter key is absent at increment time.
 */
export class CounterMissingError extends ShortlyError {
  readonly key: string;

  constructor(key: string) {
    super(ErrorCode.DEPENDENCY_UNAVAILABLE, `Counter "${key}" has not been initialized`);
    this.key = key;
  }
}

/**
 * Narrow an unknown thrown value to an error of this taxonomy.
 */
export function isShortlyError(err: unknown): err is ShortlyError {
  return err instanceof ShortlyError;
}
