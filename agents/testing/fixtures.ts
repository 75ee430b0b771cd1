import type {
  ComplianceAssessment,
  ComplianceResult,
  RegulationAnalysis,
} from '../types'

// ============================================================================
// Sample Regulation Text
// ============================================================================

export const SAMPLE_REGULATION_TEXT =
  'Article 1. Scope. This regulation applies to every organisation that processes ' +
  'personal data of residents.\n' +
  'Article 2. Records. Controllers shall maintain a record of processing activities.\n' +
  'Article 3. Breach notification. A personal data breach shall be notified to the ' +
  'supervisory authority within 72 hours of becoming aware of it.\n' +
  'Article 4. Penalties. Infringements are subject to fines of up to 4% of annual turnover.'

export const SAMPLE_POLICIES = [
  'We keep an inventory of all systems that store customer data.',
  'Security incidents are reported to the CISO within one week.',
]

// ============================================================================
// Sample Agent Outputs
// ============================================================================

export const SAMPLE_REGULATION_ANALYSIS: RegulationAnalysis = {
  regulation_summary:
    'Data protection regulation covering record keeping and breach notification.\nApplies to all processors of resident data.',
  key_requirements: [
    {
      id: 'Art. 2',
      description: 'Maintain a record of processing activities',
      category: 'governance',
      priority: 'high',
    },
    {
      id: 'Art. 3',
      description: 'Notify breaches to the authority within 72 hours',
      category: 'incident response',
      priority: 'high',
    },
  ],
  compliance_obligations: ['Keep processing records', 'Notify breaches within 72 hours'],
  risk_assessment: { overall_risk: 'high' },
  implementation_timeline: null,
  affected_departments: ['Legal', 'Security'],
  penalties_and_enforcement: 'Fines of up to 4% of annual turnover',
  recommended_actions: ['Appoint a data protection officer', 'Create a breach response plan'],
  detected_framework: 'GDPR',
  document_overview: 'A four-article data protection regulation.',
}

export const SAMPLE_ASSESSMENT: ComplianceAssessment = {
  regulation: { name: 'Data Protection Regulation', jurisdiction: 'EU', type: 'GDPR' },
  overall: {
    status: 'partially_compliant',
    score: 55,
    summary: 'Records are kept but breach notification is too slow.',
  },
  sections: [
    {
      name: 'Records of processing',
      status: 'compliant',
      score: 90,
      gaps: [],
    },
    {
      name: 'Breach notification',
      status: 'non_compliant',
      score: 20,
      gaps: [
        {
          gap_id: 'BN-1',
          description: 'Incidents are reported internally within a week, not to the authority within 72 hours',
          risk_level: 'high',
          evidence: 'reported to the CISO within one week',
          recommendations: ['Adopt a 72-hour authority notification procedure'],
        },
        {
          gap_id: null,
          description: 'No breach register',
          risk_level: null,
          evidence: null,
          recommendations: ['Maintain a breach register', 'Adopt a 72-hour authority notification procedure'],
        },
      ],
    },
  ],
  top_recommendations: ['Adopt a 72-hour authority notification procedure'],
  detected_framework: 'GDPR',
  assumptions: ['Internal reporting is the only incident procedure'],
}

export const SAMPLE_COMPLIANCE_RESULT: ComplianceResult = {
  overall_status: 'partially_compliant',
  compliance_score: 55,
  gaps: [
    {
      gap_id: 'BN-1',
      requirement: 'Breach notification',
      current_state: 'unknown',
      gap_description:
        'Incidents are reported internally within a week, not to the authority within 72 hours',
      impact_level: 'high',
      remediation_effort: 'medium',
      recommended_actions: ['Adopt a 72-hour authority notification procedure'],
    },
    {
      gap_id: 'Breach notification-2',
      requirement: 'Breach notification',
      current_state: 'unknown',
      gap_description: 'No breach register',
      impact_level: 'medium',
      remediation_effort: 'medium',
      recommended_actions: [
        'Maintain a breach register',
        'Adopt a 72-hour authority notification procedure',
      ],
    },
  ],
  recommendations: ['Adopt a 72-hour authority notification procedure'],
  detailed_analysis: SAMPLE_ASSESSMENT,
}
