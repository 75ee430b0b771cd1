import {
  pgTable,
  text,
  uuid,
  integer,
  boolean,
  index,
  timestamp,
} from "drizzle-orm/pg-core"
import { primaryId, createdAt } from "../_columns"

/** Web pages watched for regulatory changes */
export const monitorSources = pgTable("monitor_sources", {
  ...primaryId,
  name: text("name").notNull(),
  url: text("url").notNull(),
  jurisdiction: text("jurisdiction").notNull().default("global"),
  regulationType: text("regulation_type").notNull().default("general"),
  enabled: boolean("enabled").notNull().default(true),
  dueDays: integer("due_days"),
  ...createdAt,
})

/** One row per observed change of a source's content */
export const sourceVersions = pgTable(
  "source_versions",
  {
    ...primaryId,
    sourceId: uuid("source_id")
      .notNull()
      .references(() => monitorSources.id, { onDelete: "cascade" }),
    fetchedAt: timestamp("fetched_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    hash: text("hash").notNull(),
    title: text("title"),
    snippet: text("snippet"),
    regulationId: uuid("regulation_id"),
  },
  (table) => [index("idx_source_versions_source").on(table.sourceId, table.fetchedAt)]
)

export type MonitorSource = typeof monitorSources.$inferSelect
export type NewMonitorSource = typeof monitorSources.$inferInsert
export type SourceVersion = typeof sourceVersions.$inferSelect
export type NewSourceVersion = typeof sourceVersions.$inferInsert
