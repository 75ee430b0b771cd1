import { pgTable, uuid, index, jsonb } from "drizzle-orm/pg-core"
import type { ComplianceResult } from "@/agents/types"
import type { TokenUsage } from "@/lib/ai/budget"
import { primaryId, createdAt } from "../_columns"
import { regulations } from "./regulations"

export const complianceChecks = pgTable(
  "compliance_checks",
  {
    ...primaryId,
    regulationId: uuid("regulation_id")
      .notNull()
      .references(() => regulations.id, { onDelete: "cascade" }),
    policies: jsonb("policies").$type<string[]>().notNull().default([]),
    specificRequirements: jsonb("specific_requirements").$type<string[]>(),
    result: jsonb("result").$type<ComplianceResult>().notNull(),
    tokenUsage: jsonb("token_usage").$type<TokenUsage>(),
    ...createdAt,
  },
  (table) => [index("idx_checks_regulation").on(table.regulationId, table.createdAt)]
)

export type ComplianceCheck = typeof complianceChecks.$inferSelect
export type NewComplianceCheck = typeof complianceChecks.$inferInsert
