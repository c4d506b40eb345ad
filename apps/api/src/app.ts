/**
 * Fastify Application Factory
 *
 * Builds the HTTP surface over already-constructed services so that the
 * server entry point and the tests share one wiring.
 */

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import formbody from "@fastify/formbody";
import helmet from "@fastify/helmet";
import rateLimit, { type RateLimitPluginOptions } from "@fastify/rate-limit";
import type Redis from "ioredis";
import type { CacheStore } from "@shortly/cache";
import type { LinkStore } from "@shortly/db";
import type { Config } from "./config.js";
import type { LinkResolver, LinkShortener } from "./services/index.js";
import { healthRoutes } from "./routes/health.js";
import { linksRoutes } from "./routes/links/index.js";

export interface AppDependencies {
  shortener: LinkShortener;
  resolver: LinkResolver;
  cache: Pick<CacheStore, "ping">;
  store: Pick<LinkStore, "ping">;
  /** Shared counter store for rate limiting across processes */
  rateLimitStore?: Redis;
}

export type AppConfig = Pick<
  Config,
  "nodeEnv" | "shortUrlBase" | "rateLimitMax" | "rateLimitWindowMs" | "logLevel"
>;

/**
 * Rate limit plugin options. With a Redis client, counts are shared by every
 * API process; without one they are kept per process.
 */
export function rateLimitOptions(redis?: Redis): RateLimitPluginOptions {
  return {
    global: false,
    redis,
    keyGenerator: (request) => request.ip || "unknown",
    errorResponseBuilder: (request, context) => ({
      statusCode: 429,
      errors: { message: `Rate limit exceeded, retry in ${context.after}` },
    }),
  };
}

export async function buildApp(deps: AppDependencies, config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger:
      config.logLevel === "silent"
        ? false
        : {
            level: config.logLevel,
            transport:
              config.nodeEnv === "development"
                ? { target: "pino-pretty", options: { colorize: true } }
                : undefined,
          },
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    // Rate limit exceeded
    if (error.statusCode === 429) {
      return reply.status(429).send({
        errors: { message: "Too many requests. Please try again later." },
      });
    }

    // Malformed requests (unparseable JSON, unsupported content type)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.info({ err: error }, "Rejected request");
      return reply.status(error.statusCode).send({ errors: { message: error.message } });
    }

    request.log.error({ err: error }, "Request error");
    return reply.status(500).send({ errors: { message: "An unexpected error occurred" } });
  });

  // ==========================================================================
  // Plugins
  // ==========================================================================

  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: config.nodeEnv === "production",
  });

  // POST /encode takes form fields as well as JSON
  await fastify.register(formbody);

  // Per-route limits only; see the encode route
  await fastify.register(rateLimit, rateLimitOptions(deps.rateLimitStore));

  // ==========================================================================
  // Routes
  // ==========================================================================

  await fastify.register(healthRoutes, { cache: deps.cache, store: deps.store });
  await fastify.register(linksRoutes, {
    shortener: deps.shortener,
    resolver: deps.resolver,
    shortUrlBase: config.shortUrlBase,
    encodeRateLimit: { max: config.rateLimitMax, timeWindow: config.rateLimitWindowMs },
  });

  return fastify;
}
