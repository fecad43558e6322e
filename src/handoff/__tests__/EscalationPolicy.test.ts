import { describe, it, expect } from 'vitest'
import { compareCandidates, decideRoute, type CandidateScore } from '../EscalationPolicy.js'

const thresholds = { highValueThreshold: 10_000, confidenceFloor: 0.6 }

describe('decideRoute', () => {
  it('picks the highest score', () => {
    const candidates: CandidateScore[] = [
      { agentId: 'a', score: 0.6, load: 0 },
      { agentId: 'b', score: 0.9, load: 5 },
    ]

    expect(decideRoute({}, candidates, thresholds)).toEqual({ route: 'agent', targetAgent: 'b', score: 0.9 })
  })

  it('breaks score ties by lower load', () => {
    const candidates: CandidateScore[] = [
      { agentId: 'a', score: 0.8, load: 3 },
      { agentId: 'b', score: 0.8, load: 1 },
    ]

    expect(decideRoute({}, candidates, thresholds)).toMatchObject({ route: 'agent', targetAgent: 'b' })
  })

  it('breaks full ties by the lower identifier on every call', () => {
    const forward: CandidateScore[] = [
      { agentId: 'agent-b', score: 0.8, load: 2 },
      { agentId: 'agent-a', score: 0.8, load: 2 },
    ]
    const reversed = [...forward].reverse()

    for (let i = 0; i < 5; i++) {
      expect(decideRoute({}, forward, thresholds)).toMatchObject({ targetAgent: 'agent-a' })
      expect(decideRoute({}, reversed, thresholds)).toMatchObject({ targetAgent: 'agent-a' })
    }
  })

  it('escalates high-value leads with low automation confidence', () => {
    const decision = decideRoute(
      { predictedValue: 25_000, automationConfidence: 0.4 },
      [{ agentId: 'a', score: 1, load: 0 }],
      thresholds,
    )

    expect(decision).toEqual({
      route: 'human',
      reason: 'High-value lead (predicted value 25000) with automation confidence 0.4 below 0.6',
      recommendedActions: [
        'Review the lead profile and recent interactions',
        'Contact the lead directly with a tailored offer',
      ],
    })
  })

  it('requires both conditions to escalate', () => {
    const candidates: CandidateScore[] = [{ agentId: 'a', score: 1, load: 0 }]

    expect(decideRoute({ predictedValue: 10_000, automationConfidence: 0.1 }, candidates, thresholds).route).toBe('agent')
    expect(decideRoute({ predictedValue: 50_000, automationConfidence: 0.6 }, candidates, thresholds).route).toBe('agent')
    expect(decideRoute({ predictedValue: 50_000 }, candidates, thresholds).route).toBe('agent')
  })

  it('routes to a human when no candidate exists', () => {
    expect(decideRoute({}, [], thresholds)).toMatchObject({
      route: 'human',
      reason: 'No agent available for the requested target',
    })
  })
})

describe('compareCandidates', () => {
  it('orders by score, load, then identifier', () => {
    const sorted = [
      { agentId: 'c', score: 0.5, load: 0 },
      { agentId: 'b', score: 0.9, load: 1 },
      { agentId: 'a', score: 0.9, load: 1 },
      { agentId: 'd', score: 0.9, load: 0 },
    ].sort(compareCandidates)

    expect(sorted.map(c => c.agentId)).toEqual(['d', 'a', 'b', 'c'])
  })
})
