/**
 * @fileoverview Report generation service
 *
 * Loads a regulation with its checks, renders the report, writes the file
 * to storage and records it.
 *
 * @module lib/reports/generate
 */

import { getChecksForRegulation, getLatestReport, getRegulationById, createReport } from '@/db/queries'
import type { Report } from '@/db/schema/reports'
import { NotFoundError } from '@/lib/errors'
import { fmt, logger } from '@/lib/logger'
import { fileExists, saveReport } from '@/lib/storage'
import { buildReportContent } from './content'
import { renderPdfReport } from './pdf-renderer'
import { renderXlsxReport } from './xlsx-renderer'
import { DEFAULT_REPORT_OPTIONS, type ReportFormat, type ReportOptions } from './types'

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/** `report_<regulationId>_<YYYYMMDD_HHMMSS_mmm>.<ext>`, UTC */
export function reportFileName(regulationId: string, format: ReportFormat, date: Date): string {
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
    String(date.getUTCMilliseconds()).padStart(3, '0')
  return `report_${regulationId}_${stamp}.${format}`
}

/** File name offered to the browser */
export function downloadFileName(id: string, format: ReportFormat): string {
  return `compliance_report_${id}.${format}`
}

export async function generateRegulationReport(
  regulationId: string,
  format: ReportFormat,
  options: ReportOptions = DEFAULT_REPORT_OPTIONS,
  now: Date = new Date()
): Promise<Report> {
  const regulation = await getRegulationById(regulationId)
  if (!regulation) throw new NotFoundError('Regulation not found')

  const checks = await getChecksForRegulation(regulation.id)
  const content = buildReportContent(regulation, checks, options, now)

  const bytes = format === 'pdf' ? await renderPdfReport(content) : await renderXlsxReport(content)
  const saved = await saveReport(reportFileName(regulation.id, format, now), bytes)

  console.log(
    `[reports] ${format} report for ${regulation.id}: ${checks.length} checks, ${saved.size} bytes`
  )
  logger.info(fmt`Generated ${format} report for ${regulation.id}`, { bytes: saved.size })

  return createReport({
    regulationId: regulation.id,
    format,
    filePath: saved.path,
    fileSize: saved.size,
  })
}

/**
 * The latest report of a regulation whose file is still on disk, or a newly
 * generated one.
 */
export async function getOrCreateReport(
  regulationId: string,
  format: ReportFormat
): Promise<Report> {
  const existing = await getLatestReport(regulationId, format)
  if (existing && (await fileExists(existing.filePath))) return existing

  return generateRegulationReport(regulationId, format)
}
