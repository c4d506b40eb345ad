/**
 * Shortly API Services
 *
 * Business logic layer: counter allocation, link creation and resolution.
 */

export { CounterAllocator, type CounterAllocatorOptions } from "./counter.js";
export {
  LinkShortener,
  type AttemptOutcome,
  type CreateLinkResult,
  type LinkShortenerOptions,
} from "./shortener.js";
export {
  LinkResolver,
  linkCacheKey,
  linkCodec,
  type LinkResolverOptions,
  type ResolveLinkResult,
} from "./resolver.js";
