import { pgTable, text, uuid, integer, index } from "drizzle-orm/pg-core"
import { primaryId, createdAt } from "../_columns"
import { regulations } from "./regulations"

export const REPORT_FORMATS = ["pdf", "xlsx"] as const

export type ReportFormat = (typeof REPORT_FORMATS)[number]

export const reports = pgTable(
  "reports",
  {
    ...primaryId,
    regulationId: uuid("regulation_id")
      .notNull()
      .references(() => regulations.id, { onDelete: "cascade" }),
    format: text("format").$type<ReportFormat>().notNull(),
    filePath: text("file_path").notNull(),
    fileSize: integer("file_size"),
    ...createdAt,
  },
  (table) => [index("idx_reports_regulation").on(table.regulationId, table.createdAt)]
)

export type Report = typeof reports.$inferSelect
export type NewReport = typeof reports.$inferInsert
