import { describe, it, expect } from 'vitest'
import { InvalidStateError, NotFoundError, UnavailableError } from '../../shared/error.js'
import type { EscalationTicket, Priority } from '../../types/handoff.js'
import { HumanEscalationQueue } from '../HumanEscalationQueue.js'

function ticket(ticketId: string, priority: Priority = 'medium'): EscalationTicket {
  return {
    ticketId,
    leadId: 'L1',
    reason: 'Needs a human',
    recommendedActions: [],
    state: 'open',
    priority,
    createdAt: '2026-03-01T10:00:00.000Z',
  }
}

describe('HumanEscalationQueue', () => {
  it('lists waiting tickets by priority then arrival', () => {
    const queue = new HumanEscalationQueue()
    queue.enqueue(ticket('t1', 'low'))
    queue.enqueue(ticket('t2', 'high'))
    queue.enqueue(ticket('t3', 'high'))

    expect(queue.waiting().map(t => t.ticketId)).toEqual(['t2', 't3', 't1'])
    expect(queue.size()).toBe(3)
  })

  it('claims and resolves tickets', () => {
    const queue = new HumanEscalationQueue()
    queue.enqueue(ticket('t1'))

    const claimed = queue.claim('t1', 'operator-1')
    const resolved = queue.resolve('t1', 'operator-1', 'Called the lead')

    expect(claimed).toMatchObject({ state: 'claimed', claimedBy: 'operator-1' })
    expect(resolved).toMatchObject({ state: 'resolved', resolvedBy: 'operator-1', resolution: 'Called the lead' })
    expect(queue.size()).toBe(0)
    expect(queue.get('t1')?.state).toBe('resolved')
    expect(() => queue.claim('t1', 'operator-2')).toThrow(InvalidStateError)
  })

  it('fails fast when full and on unknown tickets', () => {
    const queue = new HumanEscalationQueue({ capacity: 1 })
    queue.enqueue(ticket('t1'))

    expect(() => queue.enqueue(ticket('t2'))).toThrow(UnavailableError)
    expect(() => queue.claim('missing', 'operator-1')).toThrow(NotFoundError)
  })

  it('discards tickets that were never committed', () => {
    const queue = new HumanEscalationQueue()
    queue.enqueue(ticket('t1'))

    queue.discard('t1')

    expect(queue.get('t1')).toBeNull()
    expect(queue.waiting()).toEqual([])
  })
})
