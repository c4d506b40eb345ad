/**
 * Durable Store Type Definitions
 */

import type { Link, NewLink } from "@shortly/shared";

export type InsertResult =
  | { ok: true; link: Link }
  | { ok: false; reason: "duplicate_short_code" };

/**
 * System of record for links.
 *
 * Uniqueness of `shortCode` is enforced by the store itself and is the
 * final arbiter of collisions. Backend failures are raised as
 * DependencyError("store"); a duplicate is an expected outcome, not an error.
 */
export interface LinkStore {
  insert(link: NewLink): Promise<InsertResult>;
  findByShortCode(shortCode: string): Promise<Link | null>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Minimal pg.Pool interface (what we actually use)
 * Allows mocking without a running database
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}
