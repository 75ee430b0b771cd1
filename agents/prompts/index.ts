export * from './regulation-analyst'
export * from './compliance-checker'

/** Disclaimer printed on generated reports */
export const COMPLIANCE_DISCLAIMER =
  'This assessment is AI-generated and does not constitute legal advice. ' +
  'Consult a qualified compliance professional before relying on it.'
