/**
 * @fileoverview Browser client for the compliance API
 *
 * Every JSON endpoint answers with the `{ success, message, data }` envelope.
 * Failures are raised as {@link ApiError} carrying the server's message.
 *
 * @module web/lib/api-client
 */

import type {
  MonitorSourceResponse,
  RegulationResponse,
  ReportResponse,
} from "@/app/serializers"
import type { ApiResponse, ListPayload } from "@/lib/api-utils"
import type { ComplianceResult } from "@/agents/types"
import type { ReportFormat } from "@/lib/reports/types"

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string
  ) {
    super(message)
    this.name = "ApiError"
  }
}

export interface UploadFields {
  regulationType: string
  jurisdiction: string
  effectiveDate?: string
}

export type ComplianceCheckResponse = ComplianceResult & { check_id: string }

export interface MonitorSourceInput {
  name: string
  url: string
  jurisdiction?: string
  regulation_type?: string
  due_days?: number
}

async function errorFrom(res: Response): Promise<ApiError> {
  if (res.headers.get("content-type")?.includes("application/json")) {
    const body: ApiResponse = await res.json()
    if (!body.success) return new ApiError(body.error.message, res.status, body.error.code)
  }
  return new ApiError(res.statusText || `Request failed (${res.status})`, res.status)
}

async function request<T>(path: string, init?: RequestInit): Promise<{ data: T; message: string }> {
  const res = await fetch(path, init)
  if (!res.ok) throw await errorFrom(res)

  const body: ApiResponse<T> = await res.json()
  if (!body.success) throw new ApiError(body.error.message, res.status, body.error.code)
  return { data: body.data, message: body.message }
}

function postJson<T>(path: string, payload: unknown) {
  return request<T>(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  })
}

export function uploadRegulation(file: File, fields: UploadFields) {
  const form = new FormData()
  form.append("file", file)
  form.append("regulation_type", fields.regulationType)
  form.append("jurisdiction", fields.jurisdiction)
  if (fields.effectiveDate) form.append("effective_date", fields.effectiveDate)

  return request<{ regulation_id: string; status: "processing" }>("/upload_regulation", {
    method: "POST",
    body: form,
  })
}

export async function getRegulation(regulationId: string): Promise<RegulationResponse> {
  const { data } = await request<RegulationResponse>(
    `/regulations/${encodeURIComponent(regulationId)}`
  )
  return data
}

export async function listRegulations(): Promise<RegulationResponse[]> {
  const { data } = await request<ListPayload<RegulationResponse>>("/regulations")
  return data.items
}

export async function checkCompliance(
  regulationId: string,
  companyPolicies: string[]
): Promise<ComplianceCheckResponse> {
  const { data } = await postJson<ComplianceCheckResponse>("/check_compliance", {
    regulation_id: regulationId,
    company_policies: companyPolicies,
  })
  return data
}

export async function generateReport(
  regulationId: string,
  format: ReportFormat,
  includeRecommendations: boolean
): Promise<{ report_id: string; file_path: string }> {
  const { data } = await postJson<{ report_id: string; file_path: string }>(
    `/generate_report?format=${format}`,
    { regulation_id: regulationId, include_recommendations: includeRecommendations }
  )
  return data
}

/** Generates a PDF and returns the file itself */
export async function generateProfessionalReport(
  regulationId: string,
  includeRecommendations: boolean
): Promise<Blob> {
  const res = await fetch("/generate_professional_report", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      regulation_id: regulationId,
      include_recommendations: includeRecommendations,
    }),
  })
  if (!res.ok) throw await errorFrom(res)
  return res.blob()
}

export function downloadReportUrl(reportId: string): string {
  return `/download_report/${encodeURIComponent(reportId)}`
}

export async function listReports(): Promise<ReportResponse[]> {
  const { data } = await request<ListPayload<ReportResponse>>("/reports")
  return data.items
}

export async function listMonitorSources(): Promise<MonitorSourceResponse[]> {
  const { data } = await request<ListPayload<MonitorSourceResponse>>("/monitor/sources")
  return data.items
}

export async function addMonitorSource(input: MonitorSourceInput): Promise<string> {
  const { data } = await postJson<{ id: string }>("/monitor/sources", input)
  return data.id
}

export async function runMonitor(): Promise<{ changes: number; checked: number }> {
  const { data } = await request<{ changes: number; checked: number }>("/monitor/run", {
    method: "POST",
  })
  return data
}
