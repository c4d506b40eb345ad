/**
 * Health Check Routes
 *
 * Provides endpoints for liveness and readiness probes.
 */

import type { FastifyInstance } from "fastify";
import type { CacheStore } from "@shortly/cache";
import type { LinkStore } from "@shortly/db";
import type { DependencyStatus, ReadinessResponse } from "@shortly/shared";

export interface HealthRouteOptions {
  cache: Pick<CacheStore, "ping">;
  store: Pick<LinkStore, "ping">;
}

async function probe(check: () => Promise<boolean>): Promise<DependencyStatus> {
  try {
    return (await check()) ? "ok" : "error";
  } catch {
    return "error";
  }
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRouteOptions): Promise<void> {
  const { cache, store } = options;

  // Liveness probe - no dependencies
  const liveness = async () => ({ status: "ok", timestamp: new Date().toISOString() });
  fastify.get("/up", liveness);
  fastify.get("/health", liveness);

  // Readiness probe - checks dependencies
  fastify.get("/health/ready", async (request, reply) => {
    const [cacheStatus, storeStatus] = await Promise.all([
      probe(() => cache.ping()),
      probe(() => store.ping()),
    ]);

    const healthyCount = [cacheStatus, storeStatus].filter((status) => status === "ok").length;
    const status: ReadinessResponse["status"] =
      healthyCount === 2 ? "ok" : healthyCount === 1 ? "degraded" : "unhealthy";

    const body: ReadinessResponse = {
      status,
      checks: { cache: cacheStatus, store: storeStatus },
      timestamp: new Date().toISOString(),
    };

    return reply.status(status === "ok" ? 200 : 503).send(body);
  });
}
