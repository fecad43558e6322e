import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createTestHandoff, type TestHandoff } from '../../../tests/helpers/relay.js'
import { createServer, startServer, type RunningServer } from '../createServer.js'
import { createRpcRouter } from '../rpcRouter.js'

describe('createServer', () => {
  let t: TestHandoff
  let running: RunningServer

  beforeEach(async () => {
    t = createTestHandoff()
    const router = createRpcRouter({
      memory: t.memory,
      coordinator: t.coordinator,
      directory: t.directory,
      events: t.events,
    })
    running = await startServer(createServer({ router }), { port: 0, host: '127.0.0.1' })
  })

  afterEach(async () => {
    await running.close()
  })

  function rpc(body: unknown, headers: Record<string, string> = { 'x-agent-id': 'a1', 'x-agent-permissions': '*' }) {
    return fetch(`${running.url}/rpc`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: JSON.stringify(body),
    })
  }

  it('answers health checks', async () => {
    const res = await fetch(`${running.url}/health`)

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: 'ok', methods: expect.arrayContaining(['agent.handoff']) })
  })

  it('requires caller headers', async () => {
    const res = await rpc({ id: 1, method: 'memory.status' }, { 'x-agent-id': 'a1' })

    expect(res.status).toBe(401)
    expect(await res.json()).toEqual({ error: 'Missing x-agent-id or x-agent-permissions header' })
  })

  it('returns method results as JSON', async () => {
    const payload = { kind: 'scratchpad', agentId: 'a1', notes: { step: 1 } }
    await rpc({ id: 'p', method: 'memory.short_term.put', params: { key: 'pad', payload, ttlSeconds: 30 } })

    const res = await rpc({ id: 'g', method: 'memory.short_term.get', params: { key: 'pad' } })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ id: 'g', result: { payload } })
  })

  it('maps errors to HTTP statuses', async () => {
    const denied = await rpc(
      { id: 1, method: 'memory.status' },
      { 'x-agent-id': 'a1', 'x-agent-permissions': 'memory.short_term, agent.*' },
    )
    const unknown = await rpc({ id: 2, method: 'memory.nothing' })
    const invalid = await rpc({ id: 3, method: 'memory.long_term.get', params: { key: '' } })

    expect(denied.status).toBe(403)
    expect(await denied.json()).toMatchObject({ id: 1, error: { code: -32001 } })
    expect(unknown.status).toBe(404)
    expect(invalid.status).toBe(400)
  })

  it('streams query results as NDJSON', async () => {
    await t.memory.recordInteraction({ leadId: 'L1', conversationId: 'c1', agentId: 'a1' })
    await t.memory.recordInteraction({ leadId: 'L1', conversationId: 'c2', agentId: 'a1' })

    const res = await rpc({ id: 7, method: 'memory.short_term.query', params: { criteria: { leadId: 'L1' } } })
    const lines = (await res.text()).trim().split('\n').map(line => JSON.parse(line))

    expect(res.headers.get('content-type')).toContain('application/x-ndjson')
    expect(lines).toHaveLength(3)
    expect(lines.slice(0, 2).map(line => line.item.key).sort()).toEqual(['c1', 'c2'])
    expect(lines[2]).toEqual({ id: 7, done: true, count: 2 })
  })

  it('streams bus events to a subscriber as NDJSON', async () => {
    const failure = {
      handoffId: 'h9',
      leadId: 'L1',
      conversationId: 'c1',
      targetAgent: 'engager-1',
      attempts: 3,
      reason: 'Inbox of engager-1 is full (capacity 1)',
    }
    const pending = rpc({ id: 9, method: 'events.subscribe', params: { events: ['handoff.failed'], limit: 1 } })
    await vi.waitFor(() => expect(t.events.listenerCount('handoff.failed')).toBe(1))

    await t.events.emit('handoff.failed', failure)
    const res = await pending
    const lines = (await res.text()).trim().split('\n').map(line => JSON.parse(line))

    expect(lines).toEqual([
      { id: 9, item: { event: 'handoff.failed', payload: failure } },
      { id: 9, done: true, count: 1 },
    ])
    expect(t.events.listenerCount('handoff.failed')).toBe(0)
  })
})
