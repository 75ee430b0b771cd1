import {
  SAMPLE_COMPLIANCE_RESULT,
  SAMPLE_POLICIES,
  SAMPLE_REGULATION_ANALYSIS,
} from '@/agents/testing/fixtures'
import type { ReportCheck, ReportRegulation } from '../types'

export const REPORT_REGULATION: ReportRegulation = {
  id: '11111111-1111-4111-8111-111111111111',
  fileName: 'data-protection.txt',
  regulationType: 'gdpr',
  jurisdiction: 'EU',
  effectiveDate: '2027-01-01',
  uploadDate: new Date('2026-01-02T03:04:05.678Z'),
  analysisResult: SAMPLE_REGULATION_ANALYSIS,
}

/** Check with a detailed assessment */
export const DETAILED_CHECK: ReportCheck = {
  id: 'check-1',
  result: SAMPLE_COMPLIANCE_RESULT,
  policies: SAMPLE_POLICIES,
  createdAt: new Date('2026-01-03T10:00:00.000Z'),
}

/** Later check whose model answer could not be parsed */
export const FALLBACK_CHECK: ReportCheck = {
  id: 'check-2',
  result: {
    overall_status: 'partially_compliant',
    compliance_score: 60,
    gaps: [],
    recommendations: ['Review policies annually'],
    detailed_analysis: { error: 'Model response did not match the expected format' },
  },
  policies: [],
  createdAt: new Date('2026-01-04T10:00:00.000Z'),
}

export const GENERATED_AT = new Date('2026-10-18T09:30:00.123Z')
