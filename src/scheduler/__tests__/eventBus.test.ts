/**
 * EventBus 测试
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createEventBus, type EventBus } from '../eventBus.js'

type TestEvents = {
  'lead.processed': { leadId: string }
  'agent.status': { agentId: string; load: number }
}

describe('EventBus', () => {
  let bus: EventBus<TestEvents>

  beforeEach(() => {
    bus = createEventBus<TestEvents>({ deliveryAttempts: 3 })
  })

  it('on() should register handler and receive events', async () => {
    const handler = vi.fn()
    bus.on('lead.processed', handler)

    await bus.emit('lead.processed', { leadId: 'L1' })

    expect(handler).toHaveBeenCalledWith({ leadId: 'L1' })
    expect(handler).toHaveBeenCalledTimes(1)
  })

  it('on() should return unsubscribe function', async () => {
    const handler = vi.fn()
    const unsubscribe = bus.on('lead.processed', handler)

    await bus.emit('lead.processed', { leadId: 'L1' })
    unsubscribe()
    await bus.emit('lead.processed', { leadId: 'L2' })

    expect(handler).toHaveBeenCalledTimes(1)
    expect(bus.listenerCount('lead.processed')).toBe(0)
  })

  it('emit() should handle no registered handlers', async () => {
    await expect(bus.emit('agent.status', { agentId: 'a', load: 0 })).resolves.toBeUndefined()
  })

  it('once() should fire a single time', async () => {
    const handler = vi.fn()
    bus.once('agent.status', handler)

    await bus.emit('agent.status', { agentId: 'a', load: 1 })
    await bus.emit('agent.status', { agentId: 'a', load: 2 })

    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler).toHaveBeenCalledWith({ agentId: 'a', load: 1 })
  })

  it('should redeliver to a failing listener until it succeeds', async () => {
    let calls = 0
    const flaky = vi.fn(() => {
      calls++
      if (calls < 3) throw new Error('listener offline')
    })
    const steady = vi.fn()
    bus.on('lead.processed', flaky)
    bus.on('lead.processed', steady)

    await bus.emit('lead.processed', { leadId: 'L1' })

    expect(flaky).toHaveBeenCalledTimes(3)
    expect(steady).toHaveBeenCalledTimes(1)
  })

  it('should not throw to the emitter after attempts are exhausted', async () => {
    const broken = vi.fn(async () => {
      throw new Error('always fails')
    })
    bus.on('lead.processed', broken)

    await expect(bus.emit('lead.processed', { leadId: 'L1' })).resolves.toBeUndefined()
    expect(broken).toHaveBeenCalledTimes(3)
  })

  it('clear() removes listeners for one event or all', async () => {
    bus.on('lead.processed', vi.fn())
    bus.on('agent.status', vi.fn())

    bus.clear('lead.processed')
    expect(bus.listenerCount('lead.processed')).toBe(0)
    expect(bus.listenerCount('agent.status')).toBe(1)

    bus.clear()
    expect(bus.listenerCount('agent.status')).toBe(0)
  })
})
