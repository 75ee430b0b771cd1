/**
 * @fileoverview Report model types
 *
 * `ReportContent` is format-independent; the PDF and XLSX renderers only
 * lay it out.
 *
 * @module lib/reports/types
 */

import type { ComplianceCheck } from '@/db/schema/compliance-checks'
import type { Regulation } from '@/db/schema/regulations'
import type { ReportFormat } from '@/db/schema/reports'

export type { ReportFormat }

export const REPORT_CONTENT_TYPES: Record<ReportFormat, string> = {
  pdf: 'application/pdf',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
}

export interface ReportOptions {
  includeRecommendations: boolean
  includeGapAnalysis: boolean
  includePolicyMapping: boolean
}

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  includeRecommendations: true,
  includeGapAnalysis: true,
  includePolicyMapping: true,
}

export type ReportRegulation = Pick<
  Regulation,
  | 'id'
  | 'fileName'
  | 'regulationType'
  | 'jurisdiction'
  | 'effectiveDate'
  | 'uploadDate'
  | 'analysisResult'
>

export type ReportCheck = Pick<ComplianceCheck, 'id' | 'result' | 'policies' | 'createdAt'>

export interface ReportCheckSummary {
  id: string
  /** null when the stored score is not numeric */
  score: number | null
  status: string
  /** "<requirement>: <description>", empty unless gap analysis is included */
  gaps: string[]
  /** Empty unless policy mapping is included */
  policies: string[]
}

export interface ReportGapRow {
  checkId: string
  requirement: string
  gap: string
  impact: string
  effort: string
}

export interface ReportSectionSummary {
  name: string
  status: string
  score: number
}

export interface ReportContent {
  title: string
  /** ISO timestamp without milliseconds, e.g. 2026-10-18T09:30:00Z */
  generatedAt: string
  regulation: {
    id: string
    fileName: string
    regulationType: string
    jurisdiction: string
    effectiveDate: string | null
    uploadDate: string
  }
  executiveSummary: string[]
  overview: {
    documentOverview: string | null
    detectedFramework: string | null
    keyRequirements: string[]
    obligations: string[]
  } | null
  checks: ReportCheckSummary[]
  /** Gap table rows for spreadsheets; empty unless gap analysis is included */
  gapRows: ReportGapRow[]
  bestScore: number | null
  /** From the most recent check that has a detailed assessment */
  latestAssessment: {
    framework: string | null
    sections: ReportSectionSummary[]
  } | null
  /** null when recommendations are excluded */
  recommendations: string[] | null
  tailoredSuggestions: string[]
  options: ReportOptions
}
