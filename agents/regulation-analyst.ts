/**
 * @fileoverview Regulation Analyst Agent
 *
 * Turns the extracted text of an uploaded regulation into structured
 * obligations: summary, key requirements, obligations, risk, timeline,
 * departments, penalties, recommended actions and the detected framework.
 *
 * @module agents/regulation-analyst
 */

import { generateText, Output, NoObjectGeneratedError } from 'ai'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { AnalysisFailedError } from '@/lib/errors'
import { regulationAnalysisSchema, type AgentTokenUsage, type RegulationAnalysis } from './types'
import {
  ANALYST_TEXT_LIMIT,
  REGULATION_ANALYST_SYSTEM_PROMPT,
  createRegulationAnalystPrompt,
} from './prompts'

// ============================================================================
// Types
// ============================================================================

export interface RegulationAnalystInput {
  text: string
  regulationType: string
  jurisdiction: string
  budgetTracker?: BudgetTracker
  /** Model and budget entry to use; the monitor runs on the fast tier */
  agent?: 'regulationAnalyst' | 'monitorAnalyst'
}

export interface RegulationAnalystOutput {
  analysis: RegulationAnalysis
  /** True when the model answered but not in the expected shape */
  usedFallback: boolean
  tokenUsage: AgentTokenUsage
}

// ============================================================================
// Fallback
// ============================================================================

const FALLBACK_SUMMARY_LENGTH = 500

/**
 * Analysis built from an unparseable model answer. The raw answer becomes
 * the summary so the user still sees what the model said.
 */
export function fallbackRegulationAnalysis(
  rawText: string,
  regulationType: string,
  jurisdiction: string
): RegulationAnalysis {
  const summary =
    rawText.length > FALLBACK_SUMMARY_LENGTH
      ? `${rawText.slice(0, FALLBACK_SUMMARY_LENGTH)}...`
      : rawText

  return {
    regulation_summary: summary,
    key_requirements: [],
    compliance_obligations: [],
    risk_assessment: { overall_risk: 'medium' },
    implementation_timeline: null,
    affected_departments: [],
    penalties_and_enforcement: null,
    recommended_actions: [],
    detected_framework: regulationType,
    document_overview: `Document analysis for ${regulationType} regulation in ${jurisdiction}`,
  }
}

// ============================================================================
// Agent
// ============================================================================

/**
 * Analyses a regulation document.
 *
 * Only the first 15 000 characters are sent to the model.
 *
 * @throws AnalysisFailedError - the model call itself failed
 * @throws ServiceUnavailableError - no model is configured
 */
export async function runRegulationAnalyst(
  input: RegulationAnalystInput
): Promise<RegulationAnalystOutput> {
  const { text, regulationType, jurisdiction, budgetTracker } = input
  const agent = input.agent ?? 'regulationAnalyst'

  const prompt = createRegulationAnalystPrompt({
    text: text.slice(0, ANALYST_TEXT_LIMIT),
    regulationType,
    jurisdiction,
  })
  const model = getAgentModel(agent)

  let analysis: RegulationAnalysis
  let usedFallback = false
  let tokenUsage: AgentTokenUsage

  try {
    const { output, usage } = await generateText({
      model,
      system: REGULATION_ANALYST_SYSTEM_PROMPT,
      prompt,
      output: Output.object({ schema: regulationAnalysisSchema }),
      ...GENERATION_CONFIG,
    })
    analysis = output
    tokenUsage = {
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
    }
  } catch (error) {
    if (NoObjectGeneratedError.isInstance(error)) {
      console.warn('[RegulationAnalyst] Model output did not match schema, using fallback', {
        cause: error.cause,
        text: error.text?.slice(0, 200),
      })
      analysis = fallbackRegulationAnalysis(error.text ?? '', regulationType, jurisdiction)
      usedFallback = true
      tokenUsage = {
        inputTokens: error.usage?.inputTokens ?? 0,
        outputTokens: error.usage?.outputTokens ?? 0,
      }
    } else {
      console.error('[RegulationAnalyst] Model call failed', {
        message: error instanceof Error ? error.message : String(error),
      })
      throw new AnalysisFailedError('Analysis failed', [
        {
          field: 'regulation',
          message: error instanceof Error ? error.message : 'Model request failed',
        },
      ])
    }
  }

  budgetTracker?.record(agent, tokenUsage.inputTokens, tokenUsage.outputTokens)
  if (budgetTracker?.isExceeded) {
    console.warn('[RegulationAnalyst] Token budget exceeded', budgetTracker.getUsage().total)
  }

  return { analysis, usedFallback, tokenUsage }
}
