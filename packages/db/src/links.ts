/**
 * PostgreSQL Link Store
 *
 * Raw SQL against the `links` table. The unique index on `short_code` is
 * what turns a concurrent duplicate into `duplicate_short_code`.
 */

import { z } from "zod";
import { DependencyError, type Link, type NewLink } from "@shortly/shared";
import type { InsertResult, LinkStore, Queryable } from "./types.js";

// =============================================================================
// SQL Queries
// =============================================================================

const INSERT_QUERY = `
  INSERT INTO links (original_url, short_code)
  VALUES ($1, $2)
  RETURNING id, original_url, short_code, created_at
`;

const LOOKUP_QUERY = `
  SELECT id, original_url, short_code, created_at
  FROM links
  WHERE short_code = $1
  LIMIT 1
`;

const HEALTH_QUERY = "SELECT 1";

/** PostgreSQL unique_violation */
const UNIQUE_VIOLATION = "23505";

// =============================================================================
// Row Mapping
// =============================================================================

// bigserial arrives as a string from pg
const linkRowSchema = z.object({
  id: z.union([z.string(), z.number(), z.bigint()]).transform(String),
  original_url: z.string(),
  short_code: z.string(),
  created_at: z.coerce.date(),
});

function toLink(row: unknown): Link {
  const parsed = linkRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new DependencyError("store", "Unexpected row shape from links table", parsed.error);
  }

  const { id, original_url, short_code, created_at } = parsed.data;
  return { id, originalUrl: original_url, shortCode: short_code, createdAt: created_at };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

// =============================================================================
// Implementation
// =============================================================================

export class PostgresLinkStore implements LinkStore {
  constructor(private readonly pool: Queryable) {}

  async insert(link: NewLink): Promise<InsertResult> {
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query(INSERT_QUERY, [link.originalUrl, link.shortCode]));
    } catch (err) {
      if (isUniqueViolation(err)) {
        return { ok: false, reason: "duplicate_short_code" };
      }
      throw new DependencyError("store", "Link insert failed", err);
    }

    return { ok: true, link: toLink(rows[0]) };
  }

  async findByShortCode(shortCode: string): Promise<Link | null> {
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query(LOOKUP_QUERY, [shortCode]));
    } catch (err) {
      throw new DependencyError("store", "Link lookup failed", err);
    }

    return rows.length > 0 ? toLink(rows[0]) : null;
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query(HEALTH_QUERY);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
