/**
 * @fileoverview Compliance result normalisation
 *
 * The checker model answers with a section-by-section assessment. Clients
 * and reports consume a flat result: overall verdict, gap list and
 * recommendations. This module converts one into the other.
 *
 * @module agents/compliance-result
 */

import type {
  ComplianceAssessment,
  ComplianceGap,
  ComplianceResult,
} from './types'

// ============================================================================
// Constants
// ============================================================================

/** Recommendations used when neither the model nor its gaps give any */
export const DEFAULT_RECOMMENDATIONS = {
  gdpr: [
    'Implement a data subject rights management system',
    'Conduct Data Protection Impact Assessments (DPIAs)',
    'Establish breach notification procedures',
    'Review and update privacy notices',
    'Implement data minimization practices',
  ],
  hipaa: [
    'Implement PHI access controls and audit logs',
    'Conduct regular risk assessments',
    'Establish Business Associate Agreements (BAAs)',
    'Provide workforce HIPAA training',
    'Implement incident response procedures',
  ],
  general: [
    'Conduct a comprehensive compliance review',
    'Develop an action plan with timelines',
    'Assign compliance responsibilities',
    'Implement regular monitoring and reporting',
    'Establish training programs',
  ],
} as const

const FALLBACK_SCORE = 60
const FALLBACK_SUMMARY_LENGTH = 300

// ============================================================================
// Helpers
// ============================================================================

export function defaultRecommendationsFor(regulationType: string): string[] {
  const type = regulationType.toLowerCase()
  if (type.includes('gdpr')) return [...DEFAULT_RECOMMENDATIONS.gdpr]
  if (type.includes('hipaa')) return [...DEFAULT_RECOMMENDATIONS.hipaa]
  return [...DEFAULT_RECOMMENDATIONS.general]
}

/**
 * Trim, drop empties and keep the first occurrence of each entry.
 */
export function dedupeStrings(values: Iterable<string>, limit = Infinity): string[] {
  const seen = new Set<string>()
  const result: string[] = []
  for (const value of values) {
    const trimmed = value.trim()
    if (!trimmed || seen.has(trimmed)) continue
    seen.add(trimmed)
    result.push(trimmed)
    if (result.length >= limit) break
  }
  return result
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0
  return Math.min(100, Math.max(0, Math.round(score * 10) / 10))
}

/**
 * Assessment used when the model answered outside the schema.
 */
export function fallbackAssessment(
  rawText: string,
  hints: { regulationType: string; jurisdiction: string }
): ComplianceAssessment {
  return {
    regulation: {
      name: hints.regulationType,
      jurisdiction: hints.jurisdiction,
      type: hints.regulationType,
    },
    overall: {
      status: 'partially_compliant',
      score: FALLBACK_SCORE,
      summary: rawText.slice(0, FALLBACK_SUMMARY_LENGTH),
    },
    sections: [],
    top_recommendations: [],
    detected_framework: 'unknown',
    assumptions: [],
  }
}

// ============================================================================
// Normalisation
// ============================================================================

/**
 * Flattens a section-by-section assessment into the API result.
 *
 * Gap ids default to `<section>-<n>` (1-based within the section).
 * Recommendations are the model's top list as given; when it is empty they
 * fall back to the gaps' de-duplicated recommendations, then to framework
 * defaults.
 */
export function normalizeAssessment(
  assessment: ComplianceAssessment,
  regulationType: string
): ComplianceResult {
  const gaps: ComplianceGap[] = assessment.sections.flatMap((section) =>
    section.gaps.map((gap, index) => ({
      gap_id: gap.gap_id?.trim() || `${section.name || 'SEC'}-${index + 1}`,
      requirement: section.name || 'Unknown',
      current_state: 'unknown',
      gap_description: gap.description,
      impact_level: gap.risk_level ?? 'medium',
      remediation_effort: 'medium',
      recommended_actions: gap.recommendations,
    }))
  )

  let recommendations = [...assessment.top_recommendations]
  if (recommendations.length === 0) {
    recommendations = dedupeStrings(gaps.flatMap((gap) => gap.recommended_actions))
  }
  if (recommendations.length === 0) {
    recommendations = defaultRecommendationsFor(regulationType)
  }

  return {
    overall_status: assessment.overall.status,
    compliance_score: clampScore(assessment.overall.score),
    gaps,
    recommendations,
    detailed_analysis: assessment,
  }
}
