/**
 * Link Routes
 *
 * Endpoints:
 *   POST /encode              - Create a new short link
 *   GET  /decode?short_code=  - Look up a short link
 *   GET  /:short_code         - Redirect to the original URL
 */

import type { FastifyInstance } from "fastify";
import type {} from "@fastify/rate-limit";
import { z } from "zod";
import { ErrorCode, NotFoundError } from "@shortly/shared";
import type { LinkResolver, LinkShortener, ResolveLinkResult } from "../../services/index.js";
import { serializeLink } from "../../serializers/link.js";

export interface LinksRouteOptions {
  shortener: LinkShortener;
  resolver: LinkResolver;
  /** Prefix of every shortened_url, without trailing slash */
  shortUrlBase: string;
  /** Limit on POST /encode per client IP */
  encodeRateLimit: { max: number; timeWindow: number };
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const encodeBodySchema = z.object({ original_url: z.unknown() }).partial();
const decodeQuerySchema = z.object({ short_code: z.string() }).partial();
const redirectParamsSchema = z.object({ short_code: z.string() });

const UNAVAILABLE_MESSAGE = "Service temporarily unavailable, please retry";

function asText(value: unknown): string {
  if (value === undefined || value === null) return "";
  return typeof value === "string" ? value : String(value);
}

// ============================================================================
// Route Registration
// ============================================================================

export async function linksRoutes(fastify: FastifyInstance, options: LinksRouteOptions): Promise<void> {
  const { shortener, resolver, shortUrlBase, encodeRateLimit } = options;

  /**
   * Status and body for a failed lookup. Malformed codes read as unknown.
   */
  function lookupFailure(
    shortCode: string,
    result: Extract<ResolveLinkResult, { success: false }>
  ): { status: 404 | 503; body: { errors: { message: string } } } {
    if (result.errorCode === ErrorCode.DEPENDENCY_UNAVAILABLE) {
      return { status: 503, body: { errors: { message: UNAVAILABLE_MESSAGE } } };
    }
    return { status: 404, body: { errors: { message: new NotFoundError(shortCode).message } } };
  }

  // POST /encode - Create new short link
  fastify.post(
    "/encode",
    { config: { rateLimit: encodeRateLimit } },
    async (request, reply) => {
      const body = encodeBodySchema.safeParse(request.body ?? {});
      const originalUrl = body.success ? asText(body.data.original_url) : "";

      const result = await shortener.createShortenedFor(originalUrl);

      if (!result.success) {
        if (result.errorCode === ErrorCode.VALIDATION_FAILED) {
          return reply.status(422).send({ errors: { resource: "link", details: [result.error] } });
        }
        return reply.status(503).send({ errors: { message: UNAVAILABLE_MESSAGE } });
      }

      return reply.status(201).send({ data: serializeLink(result.data, shortUrlBase) });
    }
  );

  // GET /decode - Look up a short link without redirecting
  fastify.get("/decode", async (request, reply) => {
    const query = decodeQuerySchema.safeParse(request.query);
    const shortCode = query.success ? query.data.short_code ?? "" : "";

    const result = await resolver.resolve(shortCode);
    if (!result.success) {
      const failure = lookupFailure(shortCode, result);
      return reply.status(failure.status).send(failure.body);
    }

    return reply.status(200).send({ data: serializeLink(result.data, shortUrlBase) });
  });

  // GET /:short_code - Redirect to the original URL
  fastify.get("/:short_code", async (request, reply) => {
    const params = redirectParamsSchema.safeParse(request.params);
    const shortCode = params.success ? params.data.short_code : "";

    const result = await resolver.resolve(shortCode);
    if (!result.success) {
      const failure = lookupFailure(shortCode, result);
      return reply.status(failure.status).send(failure.body);
    }

    return reply.redirect(301, result.data.originalUrl);
  });
}
