import { AGENT_MODELS, type AgentType, type ModelTier } from './config'

/** Token budget for one model-backed operation (analysis or check) */
export const OPERATION_TOKEN_BUDGET = 60_000

/** USD per 1M tokens (Gemini 2.5 Pro and Flash list prices, prompts under 200K) */
export const TIER_PRICING: Record<ModelTier, { input: number; output: number }> = {
  analysis: { input: 1.25, output: 10.0 },
  fast: { input: 0.3, output: 2.5 },
}

export interface TokenUsage {
  input: number
  output: number
  total: number
  estimatedCost: number
}

export interface AggregatedUsage {
  byAgent: Partial<Record<AgentType, TokenUsage>>
  total: TokenUsage
}

/** Estimated cost of one call, rounded to 1/100 of a cent */
export function estimateCost(agent: AgentType, input: number, output: number): number {
  const pricing = TIER_PRICING[AGENT_MODELS[agent]]
  const cost = (input * pricing.input + output * pricing.output) / 1_000_000
  return Math.round(cost * 10_000) / 10_000
}

function emptyUsage(): TokenUsage {
  return { input: 0, output: 0, total: 0, estimatedCost: 0 }
}

/**
 * Token usage of one analysis, compliance check or monitor run. Stored on
 * the resulting row as `tokenUsage`.
 */
export class BudgetTracker {
  private readonly usage = new Map<AgentType, TokenUsage>()

  constructor(private readonly maxTokens: number = OPERATION_TOKEN_BUDGET) {}

  record(agent: AgentType, input: number, output: number): void {
    const current = this.usage.get(agent) ?? emptyUsage()
    this.usage.set(agent, {
      input: current.input + input,
      output: current.output + output,
      total: current.total + input + output,
      estimatedCost: current.estimatedCost + estimateCost(agent, input, output),
    })
  }

  get totalTokens(): number {
    return this.getUsage().total.total
  }

  get isExceeded(): boolean {
    return this.totalTokens >= this.maxTokens
  }

  getUsage(): AggregatedUsage {
    const byAgent: Partial<Record<AgentType, TokenUsage>> = {}
    const total = emptyUsage()

    for (const [agent, usage] of this.usage) {
      byAgent[agent] = usage
      total.input += usage.input
      total.output += usage.output
      total.total += usage.total
      total.estimatedCost += usage.estimatedCost
    }

    return { byAgent, total }
  }
}
