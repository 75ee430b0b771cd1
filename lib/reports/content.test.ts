import { describe, it, expect } from 'vitest'
import { SAMPLE_REGULATION_ANALYSIS } from '@/agents/testing/fixtures'
import { buildReportContent, formatTimestamp, NO_RECOMMENDATIONS_TEXT, REPORT_LIMITS } from './content'
import {
  DETAILED_CHECK,
  FALLBACK_CHECK,
  GENERATED_AT,
  REPORT_REGULATION,
} from './testing/fixtures'
import { DEFAULT_REPORT_OPTIONS } from './types'

const NOTIFY = 'Adopt a 72-hour authority notification procedure'

describe('formatTimestamp', () => {
  it('drops milliseconds', () => {
    expect(formatTimestamp(GENERATED_AT)).toBe('2026-10-18T09:30:00Z')
  })
})

describe('buildReportContent', () => {
  const content = buildReportContent(
    REPORT_REGULATION,
    [DETAILED_CHECK, FALLBACK_CHECK],
    DEFAULT_REPORT_OPTIONS,
    GENERATED_AT
  )

  it('describes the regulation', () => {
    expect(content.title).toBe('Compliance Report')
    expect(content.generatedAt).toBe('2026-10-18T09:30:00Z')
    expect(content.regulation).toEqual({
      id: REPORT_REGULATION.id,
      fileName: 'data-protection.txt',
      regulationType: 'gdpr',
      jurisdiction: 'EU',
      effectiveDate: '2027-01-01',
      uploadDate: '2026-01-02T03:04:05Z',
    })
  })

  it('splits the summary into lines and collects the overview', () => {
    expect(content.executiveSummary).toEqual([
      'Data protection regulation covering record keeping and breach notification.',
      'Applies to all processors of resident data.',
    ])
    expect(content.overview).toEqual({
      documentOverview: 'A four-article data protection regulation.',
      detectedFramework: 'GDPR',
      keyRequirements: [
        'Maintain a record of processing activities',
        'Notify breaches to the authority within 72 hours',
      ],
      obligations: ['Keep processing records', 'Notify breaches within 72 hours'],
    })
  })

  it('summarises each check with its gaps and policies', () => {
    expect(content.checks).toEqual([
      {
        id: 'check-1',
        score: 55,
        status: 'partially_compliant',
        gaps: [
          'Breach notification: Incidents are reported internally within a week, not to the authority within 72 hours',
          'Breach notification: No breach register',
        ],
        policies: DETAILED_CHECK.policies,
      },
      { id: 'check-2', score: 60, status: 'partially_compliant', gaps: [], policies: [] },
    ])
    expect(content.gapRows).toHaveLength(2)
    expect(content.gapRows[1]).toEqual({
      checkId: 'check-1',
      requirement: 'Breach notification',
      gap: 'No breach register',
      impact: 'medium',
      effort: 'medium',
    })
    expect(content.bestScore).toBe(60)
  })

  it('takes sections from the latest check with a detailed assessment', () => {
    expect(content.latestAssessment).toEqual({
      framework: 'GDPR',
      sections: [
        { name: 'Records of processing', status: 'compliant', score: 90 },
        { name: 'Breach notification', status: 'non_compliant', score: 20 },
      ],
    })
  })

  it('merges recommendations in priority order without duplicates', () => {
    expect(content.recommendations).toEqual([
      NOTIFY,
      'Maintain a breach register',
      'Review policies annually',
      'Appoint a data protection officer',
      'Create a breach response plan',
    ])
    expect(content.tailoredSuggestions).toEqual([NOTIFY, 'Maintain a breach register'])
  })

  it('leaves out excluded sections', () => {
    const trimmed = buildReportContent(
      REPORT_REGULATION,
      [DETAILED_CHECK],
      { includeRecommendations: false, includeGapAnalysis: false, includePolicyMapping: false },
      GENERATED_AT
    )

    expect(trimmed.checks[0].gaps).toEqual([])
    expect(trimmed.checks[0].policies).toEqual([])
    expect(trimmed.gapRows).toEqual([])
    expect(trimmed.recommendations).toBeNull()
  })

  it('handles a regulation without analysis or checks', () => {
    const empty = buildReportContent(
      { ...REPORT_REGULATION, analysisResult: null },
      [],
      DEFAULT_REPORT_OPTIONS,
      GENERATED_AT
    )

    expect(empty.executiveSummary).toEqual(['N/A'])
    expect(empty.overview).toBeNull()
    expect(empty.bestScore).toBeNull()
    expect(empty.latestAssessment).toBeNull()
    expect(empty.recommendations).toEqual([NO_RECOMMENDATIONS_TEXT])
    expect(empty.tailoredSuggestions).toEqual([])
  })

  it('caps long lists', () => {
    const requirements = Array.from({ length: 12 }, (_, i) => ({
      id: `R-${i}`,
      description: `Requirement ${i}`,
      category: 'general',
      priority: 'low' as const,
    }))
    const capped = buildReportContent(
      {
        ...REPORT_REGULATION,
        analysisResult: {
          ...SAMPLE_REGULATION_ANALYSIS,
          key_requirements: requirements,
          compliance_obligations: requirements.map((r) => r.description),
          recommended_actions: Array.from({ length: 30 }, (_, i) => `Action ${i}`),
        },
      },
      [],
      DEFAULT_REPORT_OPTIONS,
      GENERATED_AT
    )

    expect(capped.overview?.keyRequirements).toHaveLength(REPORT_LIMITS.keyRequirements)
    expect(capped.overview?.obligations).toHaveLength(REPORT_LIMITS.obligations)
    expect(capped.recommendations).toHaveLength(REPORT_LIMITS.recommendations)
    expect(capped.recommendations?.[19]).toBe('Action 19')
  })
})
