/**
 * PostgreSQL Database Client
 *
 * Drizzle ORM over a node-postgres connection pool. The pool connects lazily,
 * so importing this module does not open a connection.
 *
 * @example
 * ```typescript
 * import { db } from "@/db/client"
 *
 * const rows = await db
 *   .select()
 *   .from(regulations)
 *   .where(eq(regulations.status, "processed"))
 * ```
 *
 * @module db/client
 */

import { Pool } from "pg"
import { drizzle } from "drizzle-orm/node-postgres"
import { getConfig } from "@/lib/config"
import * as schema from "./schema"

export const pool = new Pool({ connectionString: getConfig().databaseUrl })

export const db = drizzle(pool, { schema })

/**
 * Type representing the Drizzle database client instance.
 */
export type Database = typeof db
