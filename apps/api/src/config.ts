/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 * Fails fast on startup if required vars are missing.
 */

import type { Logger } from "@shortly/logger";
import { CACHE_CONFIG, SHORTCODE_CONFIG } from "@shortly/shared";

export type StorageMode = "redis-postgres" | "memory";
export type ConfigLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface Config {
  nodeEnv: string;
  port: number;
  host: string;

  /** redis-postgres in deployment; memory keeps everything in-process */
  storageMode: StorageMode;
  redisUrl: string | null;
  databaseUrl: string | null;

  /** Prefix of every shortened_url */
  shortUrlBase: string;
  cacheTtlSeconds: number;
  maxAllocationAttempts: number;

  rateLimitMax: number;
  rateLimitWindowMs: number;

  logLevel: ConfigLogLevel;
}

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

const LOG_LEVELS: readonly ConfigLogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function parseLogLevel(level: string): ConfigLogLevel {
  const normalized = level.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? "info";
}

function parseStorageMode(value: string): StorageMode {
  if (value === "redis-postgres" || value === "memory") return value;
  throw new Error(`Invalid STORAGE_MODE "${value}" (expected "redis-postgres" or "memory")`);
}

function parseBaseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid SHORT_URL_BASE "${value}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`SHORT_URL_BASE must be an http(s) URL, got "${value}"`);
  }
  return value.replace(/\/+$/, "");
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing or malformed
 */
export function loadConfig(env: Env = process.env): Config {
  const storageMode = parseStorageMode(optional(env, "STORAGE_MODE", "redis-postgres"));
  const external = storageMode === "redis-postgres";

  return {
    nodeEnv: optional(env, "NODE_ENV", "development"),
    port: optionalInt(env, "PORT", 3000),
    host: optional(env, "HOST", "0.0.0.0"),

    storageMode,
    redisUrl: external ? required(env, "REDIS_URL") : null,
    databaseUrl: external ? required(env, "DATABASE_URL") : null,

    shortUrlBase: parseBaseUrl(optional(env, "SHORT_URL_BASE", "http://localhost:3000")),
    cacheTtlSeconds: optionalInt(env, "CACHE_TTL_SECONDS", CACHE_CONFIG.LINK_TTL_SECONDS),
    maxAllocationAttempts: optionalInt(env, "MAX_ALLOCATION_ATTEMPTS", SHORTCODE_CONFIG.MAX_ATTEMPTS),

    rateLimitMax: optionalInt(env, "RATE_LIMIT_MAX", 20),
    rateLimitWindowMs: optionalInt(env, "RATE_LIMIT_WINDOW_MS", 5 * 60 * 1000),

    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings.
 *
 * @returns the warnings logged
 */
export function validateConfig(config: Config, log: Pick<Logger, "warn">): string[] {
  const warnings: string[] = [];

  if (config.cacheTtlSeconds < 60) {
    warnings.push(`CACHE_TTL_SECONDS=${config.cacheTtlSeconds}s is short. This may cause high DB load.`);
  }

  if (config.maxAllocationAttempts < 1) {
    warnings.push(`MAX_ALLOCATION_ATTEMPTS=${config.maxAllocationAttempts} allows no allocation attempts.`);
  } else if (config.maxAllocationAttempts > 10) {
    warnings.push(
      `MAX_ALLOCATION_ATTEMPTS=${config.maxAllocationAttempts} is high. Repeated collisions point at a counter reset.`
    );
  }

  if (config.storageMode === "memory" && config.nodeEnv === "production") {
    warnings.push("STORAGE_MODE=memory in production. Links will not survive a restart.");
  }

  for (const warning of warnings) {
    log.warn(warning);
  }
  return warnings;
}
