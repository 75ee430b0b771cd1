/**
 * @fileoverview Schema bootstrap
 *
 * `db/schema.sql` is idempotent (`IF NOT EXISTS`) and is applied on every
 * server start.
 *
 * @module db/migrate
 */

import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import { pool } from "./client"

export const SCHEMA_SQL_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url))

export async function readSchemaSql(): Promise<string> {
  return readFile(SCHEMA_SQL_PATH, "utf-8")
}

/**
 * Create any missing tables and indexes.
 */
export async function initDb(): Promise<void> {
  const ddl = await readSchemaSql()
  // Without parameters node-postgres uses the simple protocol, which accepts
  // several statements in one call.
  await pool.query(ddl)
}
