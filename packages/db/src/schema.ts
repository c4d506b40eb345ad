import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Queryable } from "./types.js";

export const SCHEMA_PATH = path.resolve(__dirname, "../sql/schema.sql");

/**
 * Create the links table and its unique index if missing.
 */
export async function ensureSchema(db: Pick<Queryable, "query">, schemaPath = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, "utf8");
  await db.query(sql);
}
