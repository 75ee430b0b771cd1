/**
 * @fileoverview Report generation and download
 * @module app/routes/reports
 */

import { Router } from "express"
import { z } from "zod"
import { getReportById, listReports } from "@/db/queries/reports"
import { REPORT_FORMATS } from "@/db/schema/reports"
import { FileReply, listPayload, reply } from "@/lib/api-utils"
import { createHandler } from "@/lib/api/handler"
import {
  pipe,
  withBody,
  withParams,
  withQuery,
  withRequest,
  type Middleware,
} from "@/lib/api/middleware"
import { BadRequestError, NotFoundError } from "@/lib/errors"
import {
  downloadFileName,
  generateRegulationReport,
  getOrCreateReport,
} from "@/lib/reports/generate"
import { REPORT_CONTENT_TYPES, type ReportFormat, type ReportOptions } from "@/lib/reports/types"
import { fileExists } from "@/lib/storage"
import { serializeReport } from "../serializers"

export const UNSUPPORTED_FORMAT_MESSAGE = "Unsupported format. Use 'pdf' or 'xlsx'."

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value)
}

const formatQuery = z.object({
  format: z.string().default("pdf"),
})

/** Query middleware that rejects unknown formats with a readable message */
const withFormat: Middleware<{ format: ReportFormat }> = async (ctx) => {
  const { query } = await withQuery(formatQuery)(ctx)
  const format = query.format.toLowerCase()
  if (!isReportFormat(format)) throw new BadRequestError(UNSUPPORTED_FORMAT_MESSAGE)
  return { format }
}

export const reportRequest = z.object({
  regulation_id: z.string(),
  include_recommendations: z.boolean().default(true),
  include_gap_analysis: z.boolean().default(true),
  include_policy_mapping: z.boolean().default(true),
})

type ReportRequest = z.infer<typeof reportRequest>

function toReportOptions(body: ReportRequest): ReportOptions {
  return {
    includeRecommendations: body.include_recommendations,
    includeGapAnalysis: body.include_gap_analysis,
    includePolicyMapping: body.include_policy_mapping,
  }
}

export const reportsRouter = Router()

/**
 * POST /generate_report?format=pdf|xlsx
 */
reportsRouter.post(
  "/generate_report",
  createHandler(pipe(withFormat, withBody(reportRequest)), async ({ format, body }) => {
    const report = await generateRegulationReport(
      body.regulation_id,
      format,
      toReportOptions(body)
    )
    return reply({ report_id: report.id, file_path: report.filePath }, "Report generated")
  })
)

/**
 * GET /download_report/:reportId
 */
reportsRouter.get(
  "/download_report/:reportId",
  createHandler(withParams(z.object({ reportId: z.string() })), async ({ params }) => {
    const report = await getReportById(params.reportId)
    if (!report) throw new NotFoundError("Report not found")
    if (!(await fileExists(report.filePath))) throw new NotFoundError("File not found")

    return new FileReply(
      { path: report.filePath },
      REPORT_CONTENT_TYPES[report.format],
      downloadFileName(report.id, report.format)
    )
  })
)

/**
 * GET /report/:regulationId?format=pdf|xlsx
 * Latest report of the regulation, generated on demand.
 */
reportsRouter.get(
  "/report/:regulationId",
  createHandler(
    pipe(withFormat, withParams(z.object({ regulationId: z.string() }))),
    async ({ format, params }) => {
      const report = await getOrCreateReport(params.regulationId, format)

      return new FileReply(
        { path: report.filePath },
        REPORT_CONTENT_TYPES[format],
        downloadFileName(params.regulationId, format)
      )
    }
  )
)

/**
 * POST /generate_professional_report
 * Always PDF; responds with the file itself.
 */
reportsRouter.post(
  "/generate_professional_report",
  createHandler(withBody(reportRequest), async ({ body }) => {
    const report = await generateRegulationReport(body.regulation_id, "pdf", toReportOptions(body))

    return new FileReply(
      { path: report.filePath },
      REPORT_CONTENT_TYPES.pdf,
      downloadFileName(report.id, "pdf")
    )
  })
)

/**
 * GET /reports
 */
reportsRouter.get(
  "/reports",
  createHandler(withRequest, async () => {
    const reports = await listReports()
    return listPayload(reports.map(serializeReport))
  })
)
