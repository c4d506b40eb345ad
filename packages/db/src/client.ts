/**
 * PostgreSQL Pool Factory
 */

import { Pool } from "pg";
import { createLogger } from "@shortly/logger";

const log = createLogger("db");

export interface PoolOptions {
  /** PostgreSQL connection string */
  connectionString: string;
  /** Maximum connections in pool (default: 10) */
  max?: number;
  /** Statement and client-side query timeout in ms (default: 5000) */
  queryTimeout?: number;
}

export function createPool(options: PoolOptions): Pool {
  const { connectionString, max = 10, queryTimeout = 5000 } = options;

  const pool = new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30000, // Close idle connections after 30s
    connectionTimeoutMillis: 2000,
    statement_timeout: queryTimeout,
    query_timeout: queryTimeout,
  });

  // Idle clients emit errors when the server drops them
  pool.on("error", (err) => log.error({ err }, "Idle client error"));

  return pool;
}
