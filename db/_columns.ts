/**
 * Shared column definitions reused across tables.
 */
import { timestamp, uuid } from "drizzle-orm/pg-core"

export const primaryId = {
  id: uuid("id").primaryKey().defaultRandom(),
}

export const createdAt = {
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
}
