/**
 * @fileoverview Wire format of stored records
 *
 * The HTTP API speaks snake_case; rows are camelCase.
 *
 * @module app/serializers
 */

import type { ComplianceCheck } from "@/db/schema/compliance-checks"
import type { MonitorSource } from "@/db/schema/monitoring"
import type { Regulation } from "@/db/schema/regulations"
import type { Report } from "@/db/schema/reports"

export function serializeRegulation(regulation: Regulation) {
  return {
    id: regulation.id,
    filename: regulation.fileName,
    file_path: regulation.filePath,
    mime_type: regulation.mimeType,
    regulation_type: regulation.regulationType,
    jurisdiction: regulation.jurisdiction,
    effective_date: regulation.effectiveDate,
    extracted_text: regulation.extractedText,
    analysis_result: regulation.analysisResult,
    token_usage: regulation.tokenUsage,
    status: regulation.status,
    error_message: regulation.errorMessage,
    source_id: regulation.sourceId,
    upload_date: regulation.uploadDate.toISOString(),
    updated_at: regulation.updatedAt.toISOString(),
  }
}

export type RegulationResponse = ReturnType<typeof serializeRegulation>

export function serializeComplianceCheck(check: ComplianceCheck) {
  return {
    id: check.id,
    regulation_id: check.regulationId,
    policies: check.policies,
    specific_requirements: check.specificRequirements,
    result: check.result,
    token_usage: check.tokenUsage,
    created_at: check.createdAt.toISOString(),
  }
}

export function serializeReport(report: Report) {
  return {
    id: report.id,
    regulation_id: report.regulationId,
    format: report.format,
    file_path: report.filePath,
    file_size: report.fileSize,
    created_at: report.createdAt.toISOString(),
  }
}

export function serializeMonitorSource(source: MonitorSource) {
  return {
    id: source.id,
    name: source.name,
    url: source.url,
    enabled: source.enabled,
    jurisdiction: source.jurisdiction,
    regulation_type: source.regulationType,
    due_days: source.dueDays,
    created_at: source.createdAt.toISOString(),
  }
}

export type ReportResponse = ReturnType<typeof serializeReport>
export type MonitorSourceResponse = ReturnType<typeof serializeMonitorSource>
