import { z } from 'zod'

// ============================================================================
// Shared enums
// ============================================================================

export const PRIORITY_LEVELS = ['high', 'medium', 'low'] as const

export type PriorityLevel = (typeof PRIORITY_LEVELS)[number]

export const priorityLevelSchema = z.enum(PRIORITY_LEVELS)

/** Overall compliance verdicts */
export const COMPLIANCE_STATUSES = [
  'compliant',
  'partially_compliant',
  'non_compliant',
] as const

export type ComplianceStatus = (typeof COMPLIANCE_STATUSES)[number]

export const complianceStatusSchema = z.enum(COMPLIANCE_STATUSES)

// ============================================================================
// Regulation analysis (regulation analyst output)
// ============================================================================

export const keyRequirementSchema = z.object({
  id: z.string().describe('Short identifier, e.g. "REQ-1" or the article number'),
  description: z.string(),
  category: z.string().describe('Topic such as data protection, reporting, security'),
  priority: priorityLevelSchema,
})

export type KeyRequirement = z.infer<typeof keyRequirementSchema>

export const regulationAnalysisSchema = z.object({
  regulation_summary: z.string(),
  key_requirements: z.array(keyRequirementSchema),
  compliance_obligations: z.array(z.string()),
  risk_assessment: z.object({ overall_risk: priorityLevelSchema }),
  implementation_timeline: z.string().nullable(),
  affected_departments: z.array(z.string()),
  penalties_and_enforcement: z.string().nullable(),
  recommended_actions: z.array(z.string()),
  detected_framework: z
    .string()
    .describe('Recognised framework such as GDPR, HIPAA, SOX, PCI DSS, or "general"'),
  document_overview: z.string(),
})

export type RegulationAnalysis = z.infer<typeof regulationAnalysisSchema>

// ============================================================================
// Compliance assessment (compliance checker raw output)
// ============================================================================

export const assessmentGapSchema = z.object({
  gap_id: z.string().nullable(),
  description: z.string(),
  risk_level: priorityLevelSchema.nullable(),
  evidence: z.string().nullable(),
  recommendations: z.array(z.string()),
})

export type AssessmentGap = z.infer<typeof assessmentGapSchema>

export const assessmentSectionSchema = z.object({
  name: z.string(),
  status: complianceStatusSchema,
  score: z.number(),
  gaps: z.array(assessmentGapSchema),
})

export type AssessmentSection = z.infer<typeof assessmentSectionSchema>

export const complianceAssessmentSchema = z.object({
  regulation: z.object({
    name: z.string(),
    jurisdiction: z.string().nullable(),
    type: z.string(),
  }),
  overall: z.object({
    status: complianceStatusSchema,
    score: z.number().describe('0-100'),
    summary: z.string(),
  }),
  sections: z.array(assessmentSectionSchema),
  top_recommendations: z.array(z.string()),
  detected_framework: z.string(),
  assumptions: z.array(z.string()),
})

export type ComplianceAssessment = z.infer<typeof complianceAssessmentSchema>

// ============================================================================
// Normalised compliance result (what the API returns and stores)
// ============================================================================

export interface ComplianceGap {
  gap_id: string
  requirement: string
  current_state: string
  gap_description: string
  impact_level: PriorityLevel
  remediation_effort: PriorityLevel
  recommended_actions: string[]
}

export interface ComplianceResult {
  overall_status: ComplianceStatus
  /** 0-100 */
  compliance_score: number
  gaps: ComplianceGap[]
  recommendations: string[]
  detailed_analysis: ComplianceAssessment | { error: string }
}

export function hasDetailedAssessment(
  analysis: ComplianceResult['detailed_analysis'] | null | undefined
): analysis is ComplianceAssessment {
  return analysis != null && 'sections' in analysis
}

// ============================================================================
// Token usage
// ============================================================================

export interface AgentTokenUsage {
  inputTokens: number
  outputTokens: number
}
