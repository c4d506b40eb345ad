/**
 * Test Helpers
 *
 * In-process wiring of the services over MemoryCache and MemoryLinkStore.
 */

import { MemoryCache } from "@shortly/cache";
import { MemoryLinkStore } from "@shortly/db";
import { createLogger, type Logger } from "@shortly/logger";
import { CounterAllocator, LinkResolver, LinkShortener } from "../src/services/index.js";

export const CREATED_AT = new Date("2024-05-01T12:00:00.000Z");

export interface LogLine {
  level: string;
  msg: string;
  [field: string]: unknown;
}

/**
 * Logger that keeps parsed JSON lines in memory
 */
export function captureLogger(name = "test"): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger(name, {
    level: "debug",
    destination: {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    },
  });
  return { logger, lines };
}

export interface TestContextOptions {
  now?: () => number;
  maxAttempts?: number;
  autoInitialize?: boolean;
  ttlSeconds?: number;
}

export function createTestContext(options: TestContextOptions = {}) {
  const { logger, lines } = captureLogger();

  const cache = new MemoryCache({ now: options.now });
  const store = new MemoryLinkStore({ now: () => CREATED_AT });
  const counter = new CounterAllocator(cache, { autoInitialize: options.autoInitialize, logger });
  const shortener = new LinkShortener(counter, store, { maxAttempts: options.maxAttempts, logger });
  const resolver = new LinkResolver(cache, store, { ttlSeconds: options.ttlSeconds, logger });

  return { cache, store, counter, shortener, resolver, logger, lines };
}
