/**
 * Link Shortener
 *
 * Turns an original URL into a persisted Link with a fresh 6-symbol code.
 *
 * Each allocation cycle draws a counter value, encodes it and tries to
 * insert. The store's unique index decides collisions; a collision burns
 * the counter value and starts a new cycle, up to `maxAttempts`.
 */

import type { LinkStore } from "@shortly/db";
import { createLogger, type Logger } from "@shortly/logger";
import {
  encodeBase62,
  isShortlyError,
  isWithinCodeSpace,
  validateOriginalUrl,
  ErrorCode,
  FatalAllocationError,
  SHORTCODE_CONFIG,
  URL_ERRORS,
  type Link,
  type ServiceResult,
} from "@shortly/shared";
import type { CounterAllocator } from "./counter.js";
import { fail, ok } from "./result.js";

// ============================================================================
// Types
// ============================================================================

export type CreateLinkResult = ServiceResult<
  Link,
  | typeof ErrorCode.VALIDATION_FAILED
  | typeof ErrorCode.ALLOCATION_FAILED
  | typeof ErrorCode.DEPENDENCY_UNAVAILABLE
>;

export type AttemptOutcome =
  | { kind: "created"; link: Link }
  | { kind: "collision"; shortCode: string }
  | { kind: "fatal"; error: FatalAllocationError };

export interface LinkShortenerOptions {
  /** Allocation cycles before giving up (default: 5) */
  maxAttempts?: number;
  logger?: Logger;
}

// ============================================================================
// Service
// ============================================================================

export class LinkShortener {
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(
    private readonly counter: CounterAllocator,
    private readonly store: LinkStore,
    options: LinkShortenerOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? SHORTCODE_CONFIG.MAX_ATTEMPTS;
    this.log = options.logger ?? createLogger("shortener");
  }

  async createShortenedFor(originalUrl: string): Promise<CreateLinkResult> {
    // Rejected input must not consume a counter value
    const validation = validateOriginalUrl(originalUrl);
    if (!validation.valid) {
      return fail(ErrorCode.VALIDATION_FAILED, validation.error ?? URL_ERRORS.INVALID);
    }

    try {
      for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
        const outcome = await this.allocate(originalUrl, attempt);

        switch (outcome.kind) {
          case "created":
            this.log.info({ shortCode: outcome.link.shortCode, attempt }, "Link created");
            return ok(outcome.link);

          case "collision":
            this.log.warn({ shortCode: outcome.shortCode, attempt }, "Short code collision, retrying");
            break;

          case "fatal":
            this.log.error({ err: outcome.error, attempt }, "Short code allocation failed");
            return fail(ErrorCode.ALLOCATION_FAILED, outcome.error.message);
        }
      }
    } catch (err) {
      if (isShortlyError(err) && err.code === ErrorCode.DEPENDENCY_UNAVAILABLE) {
        this.log.error({ err }, "Dependency unavailable during link creation");
        return fail(ErrorCode.DEPENDENCY_UNAVAILABLE, err.message);
      }
      throw err;
    }

    const exhausted = new FatalAllocationError(
      `Could not allocate a unique short code after ${this.maxAttempts} attempts`,
      this.maxAttempts
    );
    this.log.error({ err: exhausted }, "Short code allocation failed");
    return fail(ErrorCode.ALLOCATION_FAILED, exhausted.message);
  }

  /**
   * One allocation cycle: draw, encode, insert.
   */
  private async allocate(originalUrl: string, attempt: number): Promise<AttemptOutcome> {
    const counter = await this.counter.incrementAndGet();

    const shortCode = isWithinCodeSpace(counter) ? encodeBase62(counter) : null;
    if (shortCode === null) {
      return {
        kind: "fatal",
        error: new FatalAllocationError(`Counter ${counter} is outside the short code space`, attempt),
      };
    }

    const result = await this.store.insert({ originalUrl, shortCode });
    return result.ok ? { kind: "created", link: result.link } : { kind: "collision", shortCode };
  }
}
