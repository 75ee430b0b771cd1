/**
 * @fileoverview Report persistence
 * @module db/queries/reports
 */

import { and, desc, eq } from "drizzle-orm"
import { db } from "../client"
import { reports, type NewReport, type Report, type ReportFormat } from "../schema/reports"
import { isUuid } from "./utils"

export async function createReport(values: NewReport): Promise<Report> {
  const [report] = await db.insert(reports).values(values).returning()
  return report
}

export async function getReportById(reportId: string): Promise<Report | null> {
  if (!isUuid(reportId)) return null

  const [report] = await db.select().from(reports).where(eq(reports.id, reportId)).limit(1)
  return report ?? null
}

/**
 * All reports, newest first.
 */
export async function listReports(): Promise<Report[]> {
  return db.select().from(reports).orderBy(desc(reports.createdAt))
}

/**
 * Most recent report of a regulation in the given format.
 */
export async function getLatestReport(
  regulationId: string,
  format: ReportFormat
): Promise<Report | null> {
  if (!isUuid(regulationId)) return null

  const [report] = await db
    .select()
    .from(reports)
    .where(and(eq(reports.regulationId, regulationId), eq(reports.format, format)))
    .orderBy(desc(reports.createdAt))
    .limit(1)

  return report ?? null
}
