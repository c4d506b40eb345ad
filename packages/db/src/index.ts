/**
 * @shortly/db - Durable Link Storage
 *
 * Usage:
 * ```ts
 * import { createPool, PostgresLinkStore, ensureSchema } from "@shortly/db";
 *
 * const pool = createPool({ connectionString: process.env.DATABASE_URL });
 * await ensureSchema(pool);
 * const store = new PostgresLinkStore(pool);
 * ```
 */

export { PostgresLinkStore } from "./links.js";
export { MemoryLinkStore, type MemoryLinkStoreOptions } from "./memory.js";
export { createPool, type PoolOptions } from "./client.js";
export { ensureSchema, SCHEMA_PATH } from "./schema.js";
export type { InsertResult, LinkStore, Queryable } from "./types.js";
