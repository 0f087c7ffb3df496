import { describe, it, expect, beforeEach } from 'vitest'
import { BudgetTracker } from './budget'

describe('BudgetTracker', () => {
  let tracker: BudgetTracker

  beforeEach(() => {
    tracker = new BudgetTracker()
  })

  it('starts with zero tokens used', () => {
    expect(tracker.totalTokens).toBe(0)
    expect(tracker.getUsage()).toEqual({
      byAgent: {},
      total: { input: 0, output: 0, total: 0, estimatedCost: 0 },
    })
  })

  it('accumulates usage for the same agent', () => {
    tracker.record('checklistFilter', 1000, 500)
    tracker.record('checklistFilter', 2000, 1000)
    expect(tracker.totalTokens).toBe(4500)
    const filter = tracker.getUsage().byAgent.checklistFilter
    expect(filter).toMatchObject({ input: 3000, output: 1500, total: 4500 })
    expect(filter?.estimatedCost).toBeCloseTo(0.0105, 6)
  })

  it('tracks usage per agent', () => {
    tracker.record('classifier', 1000, 500)
    tracker.record('redFlagDetector', 2000, 1000)
    const usage = tracker.getUsage()
    expect(usage.byAgent.classifier?.total).toBe(1500)
    expect(usage.byAgent.redFlagDetector?.total).toBe(3000)
    expect(usage.byAgent.missingItems).toBeUndefined()
    expect(usage.total.input).toBe(3000)
    expect(usage.total.output).toBe(1500)
    expect(usage.total.total).toBe(4500)
  })

  it('estimates cost from token pricing', () => {
    tracker.record('classifier', 1_000_000, 1_000_000)
    expect(tracker.getUsage().total.estimatedCost).toBe(6)
  })
})
