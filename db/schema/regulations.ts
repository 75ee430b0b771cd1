import {
  pgTable,
  text,
  uuid,
  index,
  jsonb,
  timestamp,
} from "drizzle-orm/pg-core"
import type { RegulationAnalysis } from "@/agents/types"
import type { TokenUsage } from "@/lib/ai/budget"
import { primaryId } from "../_columns"
import { monitorSources } from "./monitoring"

/**
 * Regulation processing status.
 *
 * ```
 * processing → processed
 *            ↘ error
 * ```
 */
export const REGULATION_STATUSES = ["processing", "processed", "error"] as const

export type RegulationStatus = (typeof REGULATION_STATUSES)[number]

export const regulations = pgTable(
  "regulations",
  {
    ...primaryId,
    fileName: text("file_name").notNull(),
    /** Upload location on disk; cleared once the text has been extracted */
    filePath: text("file_path").notNull().default(""),
    mimeType: text("mime_type"),
    regulationType: text("regulation_type").notNull().default("general"),
    jurisdiction: text("jurisdiction").notNull().default("global"),
    effectiveDate: text("effective_date"),
    extractedText: text("extracted_text"),
    analysisResult: jsonb("analysis_result").$type<RegulationAnalysis>(),
    tokenUsage: jsonb("token_usage").$type<TokenUsage>(),
    status: text("status").$type<RegulationStatus>().notNull().default("processing"),
    errorMessage: text("error_message"),
    sourceId: uuid("source_id").references(() => monitorSources.id, {
      onDelete: "set null",
    }),
    uploadDate: timestamp("upload_date", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow()
      .$onUpdate(() => new Date()),
  },
  (table) => [
    index("idx_regulations_status").on(table.status),
    index("idx_regulations_upload_date").on(table.uploadDate),
  ]
)

export type Regulation = typeof regulations.$inferSelect
export type NewRegulation = typeof regulations.$inferInsert
