import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { getConfig } from '@/lib/config'
import { ServiceUnavailableError } from '@/lib/errors'

/** Model tiers, overridable through AI_MODEL / AI_MODEL_FAST */
export function getModels() {
  const { models } = getConfig()
  return {
    fast: models.fast,
    analysis: models.analysis,
  } as const
}

export type ModelTier = keyof ReturnType<typeof getModels>

/** Per-agent model tier. Monitored pages are re-analysed on every change. */
export const AGENT_MODELS = {
  regulationAnalyst: 'analysis',
  complianceChecker: 'analysis',
  monitorAnalyst: 'fast',
} as const satisfies Record<string, ModelTier>

export type AgentType = keyof typeof AGENT_MODELS

/** True when a Gemini API key is configured */
export function isAgentReady(): boolean {
  return Boolean(getConfig().geminiApiKey)
}

/**
 * Get model instance for an agent.
 *
 * @throws ServiceUnavailableError when no API key is configured
 */
export function getAgentModel(agent: AgentType) {
  const { geminiApiKey } = getConfig()
  if (!geminiApiKey) {
    throw new ServiceUnavailableError('Compliance model is not configured (GEMINI_API_KEY)')
  }

  const google = createGoogleGenerativeAI({ apiKey: geminiApiKey })
  return google(getModels()[AGENT_MODELS[agent]])
}

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0.2,
  maxOutputTokens: 8192,
} as const
