/**
 * PostgreSQL Link Store Tests
 *
 * Uses a recorded stand-in for pg.Pool; no database is contacted.
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { DependencyError } from "@shortly/shared";
import { PostgresLinkStore, ensureSchema, type Queryable } from "../src/index.js";

// =============================================================================
// Test Helpers
// =============================================================================

type Reply = { rows: unknown[] } | Error;

class FakePool implements Queryable {
  calls: Array<{ text: string; values?: unknown[] }> = [];
  replies: Reply[] = [];
  ended = false;

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.calls.push({ text, values });
    const reply = this.replies.shift() ?? { rows: [] };
    if (reply instanceof Error) throw reply;
    return reply;
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

function pgError(code: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code });
}

const createdAt = new Date("2024-05-01T12:00:00.000Z");

const row = {
  id: "42",
  original_url: "https://example.com/page",
  short_code: "OGsBFX",
  created_at: createdAt,
};

// =============================================================================
// Tests
// =============================================================================

describe("PostgresLinkStore", () => {
  let pool: FakePool;
  let store: PostgresLinkStore;

  beforeEach(() => {
    pool = new FakePool();
    store = new PostgresLinkStore(pool);
  });

  describe("insert", () => {
    it("should insert with positional parameters and map the returned row", async () => {
      pool.replies.push({ rows: [row] });

      const result = await store.insert({ originalUrl: "https://example.com/page", shortCode: "OGsBFX" });

      expect(result).toEqual({
        ok: true,
        link: { id: "42", originalUrl: "https://example.com/page", shortCode: "OGsBFX", createdAt },
      });
      expect(pool.calls[0]?.text).toContain("INSERT INTO links");
      expect(pool.calls[0]?.values).toEqual(["https://example.com/page", "OGsBFX"]);
    });

    it("should stringify numeric ids", async () => {
      pool.replies.push({ rows: [{ ...row, id: 7 }] });

      const result = await store.insert({ originalUrl: row.original_url, shortCode: row.short_code });

      expect(result.ok && result.link.id).toBe("7");
    });

    it("should report a unique violation as a duplicate", async () => {
      pool.replies.push(pgError("23505"));

      await expect(store.insert({ originalUrl: row.original_url, shortCode: "OGsBFX" })).resolves.toEqual({
        ok: false,
        reason: "duplicate_short_code",
      });
    });

    it("should raise DependencyError for other failures", async () => {
      pool.replies.push(pgError("57P01"));

      await expect(store.insert({ originalUrl: row.original_url, shortCode: "OGsBFX" })).rejects.toMatchObject({
        dependency: "store",
        code: "DEPENDENCY_UNAVAILABLE",
      });
    });
  });

  describe("findByShortCode", () => {
    it("should return the mapped link", async () => {
      pool.replies.push({ rows: [{ ...row, created_at: "2024-05-01T12:00:00.000Z" }] });

      const link = await store.findByShortCode("OGsBFX");

      expect(link).toEqual({
        id: "42",
        originalUrl: "https://example.com/page",
        shortCode: "OGsBFX",
        createdAt,
      });
      expect(pool.calls[0]?.values).toEqual(["OGsBFX"]);
    });

    it("should return null when no row matches", async () => {
      await expect(store.findByShortCode("YYYYYY")).resolves.toBeNull();
    });

    it("should not read a connection failure as not found", async () => {
      pool.replies.push(new Error("connect ECONNREFUSED 127.0.0.1:5432"));

      await expect(store.findByShortCode("OGsBFX")).rejects.toBeInstanceOf(DependencyError);
    });

    it("should reject rows of an unexpected shape", async () => {
      pool.replies.push({ rows: [{ id: "1", short_code: "OGsBFX" }] });

      await expect(store.findByShortCode("OGsBFX")).rejects.toBeInstanceOf(DependencyError);
    });
  });

  describe("ping / close", () => {
    it("should report reachability", async () => {
      await expect(store.ping()).resolves.toBe(true);

      pool.replies.push(new Error("timeout"));
      await expect(store.ping()).resolves.toBe(false);
    });

    it("should end the pool", async () => {
      await store.close();
      expect(pool.ended).toBe(true);
    });
  });
});

describe("ensureSchema", () => {
  it("should apply the bundled schema file", async () => {
    const pool = new FakePool();

    await ensureSchema(pool);

    expect(pool.calls).toHaveLength(1);
    expect(pool.calls[0]?.text).toContain("CREATE TABLE IF NOT EXISTS links");
    expect(pool.calls[0]?.text).toContain("CREATE UNIQUE INDEX IF NOT EXISTS index_links_on_short_code");
  });
});
