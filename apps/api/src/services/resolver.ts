/**
 * Link Resolver
 *
 * Short code to Link lookup, cache-aside over the durable store.
 * Misses are not cached: a code that does not exist yet may be created
 * at any moment.
 */

import { z } from "zod";
import { jsonCodec, type CacheCodec, type CacheStore } from "@shortly/cache";
import type { LinkStore } from "@shortly/db";
import { createLogger, type Logger } from "@shortly/logger";
import {
  isShortlyError,
  validateShortCode,
  CACHE_CONFIG,
  ErrorCode,
  NotFoundError,
  type Link,
  type ServiceResult,
} from "@shortly/shared";
import { fail, ok } from "./result.js";

export type ResolveLinkResult = ServiceResult<
  Link,
  | typeof ErrorCode.VALIDATION_FAILED
  | typeof ErrorCode.NOT_FOUND
  | typeof ErrorCode.DEPENDENCY_UNAVAILABLE
>;

const cachedLinkSchema = z.object({
  id: z.string(),
  originalUrl: z.string(),
  shortCode: z.string(),
  createdAt: z.coerce.date(),
});

export const linkCodec: CacheCodec<Link> = jsonCodec(cachedLinkSchema);

export function linkCacheKey(shortCode: string): string {
  return `${CACHE_CONFIG.LINK_KEY_PREFIX}${shortCode}`;
}

export interface LinkResolverOptions {
  /** Lifetime of a cached resolution (default: 12 hours) */
  ttlSeconds?: number;
  logger?: Logger;
}

export class LinkResolver {
  private readonly ttlSeconds: number;
  private readonly log: Logger;

  constructor(
    private readonly cache: CacheStore,
    private readonly store: LinkStore,
    options: LinkResolverOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? CACHE_CONFIG.LINK_TTL_SECONDS;
    this.log = options.logger ?? createLogger("resolver");
  }

  async resolve(shortCode: string): Promise<ResolveLinkResult> {
    const validation = validateShortCode(shortCode);
    if (!validation.valid) {
      return fail(ErrorCode.VALIDATION_FAILED, validation.error ?? "Invalid short code");
    }

    let link: Link | null;
    try {
      link = await this.cache.fetch(
        linkCacheKey(shortCode),
        { ttlSeconds: this.ttlSeconds, codec: linkCodec },
        async () => {
          const found = await this.store.findByShortCode(shortCode);
          if (found) {
            this.log.debug({ shortCode }, "Cache miss, populated from store");
          }
          return found;
        }
      );
    } catch (err) {
      if (isShortlyError(err) && err.code === ErrorCode.DEPENDENCY_UNAVAILABLE) {
        this.log.error({ err, shortCode }, "Dependency unavailable during resolution");
        return fail(ErrorCode.DEPENDENCY_UNAVAILABLE, err.message);
      }
      throw err;
    }

    if (!link) {
      return fail(ErrorCode.NOT_FOUND, new NotFoundError(shortCode).message);
    }
    return ok(link);
  }
}
