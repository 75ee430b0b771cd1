/**
 * @fileoverview Report content builder
 *
 * Collects everything a compliance report shows from a regulation and its
 * checks. Lists are capped so a report stays readable however verbose the
 * model was.
 *
 * @module lib/reports/content
 */

import { dedupeStrings } from '@/agents/compliance-result'
import { hasDetailedAssessment, type ComplianceAssessment } from '@/agents/types'
import type {
  ReportCheck,
  ReportContent,
  ReportGapRow,
  ReportOptions,
  ReportRegulation,
} from './types'

export const REPORT_LIMITS = {
  keyRequirements: 8,
  obligations: 6,
  gapsPerCheck: 10,
  sections: 12,
  recommendations: 20,
  tailoredSuggestions: 15,
  tailoredSections: 10,
  tailoredGapsPerSection: 3,
  tailoredRecommendationsPerGap: 2,
} as const

export const NO_RECOMMENDATIONS_TEXT = 'No specific recommendations available at this time.'

/** ISO 8601 in UTC without milliseconds */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

function numericScore(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

function latestDetailedAssessment(checks: ReportCheck[]): ComplianceAssessment | null {
  for (let i = checks.length - 1; i >= 0; i--) {
    const detailed = checks[i].result.detailed_analysis
    if (hasDetailedAssessment(detailed)) return detailed
  }
  return null
}

/**
 * Recommendations in priority order: each check's own list, its model top
 * list and section gap recommendations, then the regulation's recommended
 * actions.
 */
function collectRecommendations(
  regulation: ReportRegulation,
  checks: ReportCheck[]
): string[] {
  const candidates: string[] = []

  for (const check of checks) {
    candidates.push(...check.result.recommendations)
    const detailed = check.result.detailed_analysis
    if (hasDetailedAssessment(detailed)) {
      candidates.push(...detailed.top_recommendations)
      for (const section of detailed.sections) {
        for (const gap of section.gaps) {
          candidates.push(...gap.recommendations)
        }
      }
    }
  }

  candidates.push(...(regulation.analysisResult?.recommended_actions ?? []))

  return dedupeStrings(candidates, REPORT_LIMITS.recommendations)
}

function withPlaceholder(recommendations: string[]): string[] {
  return recommendations.length > 0 ? recommendations : [NO_RECOMMENDATIONS_TEXT]
}

function collectTailoredSuggestions(assessment: ComplianceAssessment | null): string[] {
  if (!assessment) return []

  const candidates = assessment.sections
    .slice(0, REPORT_LIMITS.tailoredSections)
    .flatMap((section) =>
      section.gaps
        .slice(0, REPORT_LIMITS.tailoredGapsPerSection)
        .flatMap((gap) => gap.recommendations.slice(0, REPORT_LIMITS.tailoredRecommendationsPerGap))
    )

  return dedupeStrings(candidates, REPORT_LIMITS.tailoredSuggestions)
}

/**
 * Builds the report model for a regulation and its checks.
 *
 * @param checks - in chronological order
 */
export function buildReportContent(
  regulation: ReportRegulation,
  checks: ReportCheck[],
  options: ReportOptions,
  generatedAt: Date = new Date()
): ReportContent {
  const analysis = regulation.analysisResult

  const summaryLines = analysis?.regulation_summary
    ? analysis.regulation_summary.split('\n').map((line) => line.trim()).filter(Boolean)
    : []

  const overview = analysis
    ? {
        documentOverview: analysis.document_overview || null,
        detectedFramework: analysis.detected_framework || null,
        keyRequirements: analysis.key_requirements
          .map((requirement) => requirement.description)
          .filter(Boolean)
          .slice(0, REPORT_LIMITS.keyRequirements),
        obligations: analysis.compliance_obligations
          .filter(Boolean)
          .slice(0, REPORT_LIMITS.obligations),
      }
    : null

  const gapRows: ReportGapRow[] = []
  const checkSummaries = checks.map((check) => {
    const { result } = check

    if (options.includeGapAnalysis) {
      for (const gap of result.gaps) {
        gapRows.push({
          checkId: check.id,
          requirement: gap.requirement,
          gap: gap.gap_description,
          impact: gap.impact_level,
          effort: gap.remediation_effort,
        })
      }
    }

    return {
      id: check.id,
      score: numericScore(result.compliance_score),
      status: result.overall_status || 'unknown',
      gaps: options.includeGapAnalysis
        ? result.gaps
            .slice(0, REPORT_LIMITS.gapsPerCheck)
            .map((gap) => `${gap.requirement}: ${gap.gap_description}`)
        : [],
      policies: options.includePolicyMapping ? check.policies : [],
    }
  })

  const scores = checkSummaries
    .map((summary) => summary.score)
    .filter((score): score is number => score !== null)
  const bestScore = scores.length > 0 ? Math.max(...scores) : null

  const latest = latestDetailedAssessment(checks)

  return {
    title: 'Compliance Report',
    generatedAt: formatTimestamp(generatedAt),
    regulation: {
      id: regulation.id,
      fileName: regulation.fileName,
      regulationType: regulation.regulationType,
      jurisdiction: regulation.jurisdiction,
      effectiveDate: regulation.effectiveDate,
      uploadDate: formatTimestamp(regulation.uploadDate),
    },
    executiveSummary: summaryLines.length > 0 ? summaryLines : ['N/A'],
    overview,
    checks: checkSummaries,
    gapRows,
    bestScore,
    latestAssessment: latest
      ? {
          framework: latest.detected_framework || null,
          sections: latest.sections.slice(0, REPORT_LIMITS.sections).map((section) => ({
            name: section.name,
            status: section.status,
            score: section.score,
          })),
        }
      : null,
    recommendations: options.includeRecommendations
      ? withPlaceholder(collectRecommendations(regulation, checks))
      : null,
    tailoredSuggestions: collectTailoredSuggestions(latest),
    options,
  }
}
