import { describe, it, expect } from 'vitest'
import {
  clampScore,
  dedupeStrings,
  defaultRecommendationsFor,
  DEFAULT_RECOMMENDATIONS,
  normalizeAssessment,
} from './compliance-result'
import type { ComplianceAssessment } from './types'
import { SAMPLE_ASSESSMENT } from './testing/fixtures'

function assessment(overrides: Partial<ComplianceAssessment>): ComplianceAssessment {
  return { ...SAMPLE_ASSESSMENT, ...overrides }
}

describe('normalizeAssessment', () => {
  it('passes the top recommendations through unchanged', () => {
    const top = ['Appoint a DPO', ' Appoint a DPO ', 'Appoint a DPO']
    const result = normalizeAssessment(assessment({ top_recommendations: top }), 'GDPR')

    expect(result.recommendations).toEqual(['Appoint a DPO', ' Appoint a DPO ', 'Appoint a DPO'])
  })

  it('derives recommendations from gaps when the model gives no top list', () => {
    const result = normalizeAssessment(assessment({ top_recommendations: [] }), 'GDPR')

    expect(result.recommendations).toEqual([
      'Adopt a 72-hour authority notification procedure',
      'Maintain a breach register',
    ])
  })

  it('uses framework defaults when there are no recommendations at all', () => {
    const result = normalizeAssessment(
      assessment({ top_recommendations: [], sections: [] }),
      'EU GDPR'
    )

    expect(result.gaps).toEqual([])
    expect(result.recommendations).toEqual([...DEFAULT_RECOMMENDATIONS.gdpr])
  })

  it('names unnamed sections and defaults gap fields', () => {
    const result = normalizeAssessment(
      assessment({
        sections: [
          {
            name: '',
            status: 'non_compliant',
            score: 0,
            gaps: [
              {
                gap_id: '  ',
                description: 'Missing policy',
                risk_level: null,
                evidence: null,
                recommendations: [],
              },
            ],
          },
        ],
      }),
      'general'
    )

    expect(result.gaps).toEqual([
      {
        gap_id: 'SEC-1',
        requirement: 'Unknown',
        current_state: 'unknown',
        gap_description: 'Missing policy',
        impact_level: 'medium',
        remediation_effort: 'medium',
        recommended_actions: [],
      },
    ])
  })

  it('clamps the score into 0-100', () => {
    const over = normalizeAssessment(
      assessment({ overall: { status: 'compliant', score: 130, summary: '' } }),
      'general'
    )
    expect(over.compliance_score).toBe(100)
  })
})

describe('helpers', () => {
  it('dedupeStrings trims, drops blanks and respects the limit', () => {
    expect(dedupeStrings([' a ', 'b', 'a', '', 'c'], 2)).toEqual(['a', 'b'])
  })

  it('clampScore handles non-finite values and rounds to one decimal', () => {
    expect(clampScore(Number.NaN)).toBe(0)
    expect(clampScore(-5)).toBe(0)
    expect(clampScore(72.46)).toBe(72.5)
  })

  it('defaultRecommendationsFor picks the general list for unknown frameworks', () => {
    expect(defaultRecommendationsFor('SOX')).toEqual([...DEFAULT_RECOMMENDATIONS.general])
    expect(defaultRecommendationsFor('hipaa-security')).toEqual([...DEFAULT_RECOMMENDATIONS.hipaa])
  })
})
