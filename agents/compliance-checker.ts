/**
 * @fileoverview Compliance Checker Agent
 *
 * Scores freeform policy statements against an analysed regulation and
 * returns the normalised compliance result (verdict, score, gaps,
 * recommendations, detailed assessment).
 *
 * @module agents/compliance-checker
 */

import { generateText, Output, NoObjectGeneratedError } from 'ai'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { AnalysisFailedError } from '@/lib/errors'
import {
  complianceAssessmentSchema,
  type AgentTokenUsage,
  type ComplianceAssessment,
  type ComplianceResult,
  type RegulationAnalysis,
} from './types'
import {
  CHECKER_TEXT_LIMIT,
  COMPLIANCE_CHECKER_SYSTEM_PROMPT,
  NO_POLICIES_PLACEHOLDER,
  createComplianceCheckerPrompt,
} from './prompts'
import { fallbackAssessment, normalizeAssessment } from './compliance-result'

// ============================================================================
// Types
// ============================================================================

export interface ComplianceCheckerInput {
  regulationText: string
  companyPolicies: string[]
  /** Stored analysis of the regulation, used for the framework hint */
  regulationAnalysis: RegulationAnalysis | null
  regulationType: string | null
  jurisdiction: string | null
  specificRequirements?: string[]
  budgetTracker?: BudgetTracker
}

export interface ComplianceCheckerOutput {
  result: ComplianceResult
  usedFallback: boolean
  tokenUsage: AgentTokenUsage
}

/**
 * Framework hint: what the analyst detected, else the type given at upload.
 */
export function resolveHints(input: {
  regulationAnalysis: RegulationAnalysis | null
  regulationType: string | null
  jurisdiction: string | null
}): { regulationType: string; jurisdiction: string } {
  return {
    regulationType:
      input.regulationAnalysis?.detected_framework?.trim() ||
      input.regulationType?.trim() ||
      'general',
    jurisdiction: input.jurisdiction?.trim() || 'unknown',
  }
}

// ============================================================================
// Agent
// ============================================================================

/**
 * Runs a compliance check.
 *
 * @throws AnalysisFailedError - the model call itself failed
 * @throws ServiceUnavailableError - no model is configured
 */
export async function runComplianceChecker(
  input: ComplianceCheckerInput
): Promise<ComplianceCheckerOutput> {
  const hints = resolveHints(input)
  const policiesText =
    input.companyPolicies.length > 0 ? input.companyPolicies.join('\n') : NO_POLICIES_PLACEHOLDER

  const prompt = createComplianceCheckerPrompt({
    regulationText: input.regulationText.slice(0, CHECKER_TEXT_LIMIT),
    policiesText,
    regulationType: hints.regulationType,
    jurisdiction: hints.jurisdiction,
    specificRequirements: input.specificRequirements,
  })
  const model = getAgentModel('complianceChecker')

  let assessment: ComplianceAssessment
  let usedFallback = false
  let tokenUsage: AgentTokenUsage

  try {
    const { output, usage } = await generateText({
      model,
      system: COMPLIANCE_CHECKER_SYSTEM_PROMPT,
      prompt,
      output: Output.object({ schema: complianceAssessmentSchema }),
      ...GENERATION_CONFIG,
    })
    assessment = output
    tokenUsage = {
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
    }
  } catch (error) {
    if (NoObjectGeneratedError.isInstance(error)) {
      console.warn('[ComplianceChecker] Model output did not match schema, using fallback', {
        cause: error.cause,
        text: error.text?.slice(0, 200),
      })
      assessment = fallbackAssessment(error.text ?? '', hints)
      usedFallback = true
      tokenUsage = {
        inputTokens: error.usage?.inputTokens ?? 0,
        outputTokens: error.usage?.outputTokens ?? 0,
      }
    } else {
      console.error('[ComplianceChecker] Model call failed', {
        message: error instanceof Error ? error.message : String(error),
      })
      throw new AnalysisFailedError('Analysis failed', [
        {
          field: 'compliance_check',
          message: error instanceof Error ? error.message : 'Model request failed',
        },
      ])
    }
  }

  input.budgetTracker?.record('complianceChecker', tokenUsage.inputTokens, tokenUsage.outputTokens)

  return {
    result: normalizeAssessment(assessment, hints.regulationType),
    usedFallback,
    tokenUsage,
  }
}
