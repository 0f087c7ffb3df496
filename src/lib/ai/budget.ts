import type { AgentType } from './config'

/** Pricing per 1M tokens (blended gateway rates) */
export const PRICING = {
  input: 1.0,
  output: 5.0,
} as const

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

/** Token usage accounting for a single compliance review run */
export class BudgetTracker {
  private usage: Map<AgentType, TokenUsage> = new Map()

  /** Record usage from an agent call */
  record(agent: AgentType, input: number, output: number): void {
    const existing = this.usage.get(agent) ?? { input: 0, output: 0, total: 0, estimatedCost: 0 }
    const cost = this.calculateCost(input, output)

    this.usage.set(agent, {
      input: existing.input + input,
      output: existing.output + output,
      total: existing.total + input + output,
      estimatedCost: existing.estimatedCost + cost,
    })
  }

  /** Get total tokens used */
  get totalTokens(): number {
    return Array.from(this.usage.values()).reduce((sum, u) => sum + u.total, 0)
  }

  /** Get aggregated usage report */
  getUsage(): AggregatedUsage {
    const values = Array.from(this.usage.values())
    const byAgent: Partial<Record<AgentType, TokenUsage>> = {}
    for (const [agent, usage] of this.usage) {
      byAgent[agent] = usage
    }
    const total = {
      input: values.reduce((sum, u) => sum + u.input, 0),
      output: values.reduce((sum, u) => sum + u.output, 0),
      total: this.totalTokens,
      estimatedCost: values.reduce((sum, u) => sum + u.estimatedCost, 0),
    }
    return { byAgent, total }
  }

  private calculateCost(input: number, output: number): number {
    const inputCost = (input / 1_000_000) * PRICING.input
    const outputCost = (output / 1_000_000) * PRICING.output
    return Math.round((inputCost + outputCost) * 10000) / 10000
  }
}
