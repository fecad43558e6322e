import { describe, it, expect, vi } from 'vitest'
import { InMemoryShortTermStore } from '../../store/ShortTermStore.js'
import {
  CancelledError,
  HandoffFailedError,
  InvalidStateError,
  NotFoundError,
  OwnershipError,
  UnavailableError,
  ValidationError,
} from '../../shared/error.js'
import type { MemoryRecord } from '../../memory/types.js'
import type { HandoffEnvelope } from '../../types/handoff.js'
import { AgentDirectory } from '../AgentDirectory.js'
import { createTestHandoff, type TestHandoff } from '../../../tests/helpers/relay.js'

const request = (handoffId: string, sourceAgent: string, targetAgent: string, extra: Record<string, unknown> = {}) => ({
  handoffId,
  leadId: 'L1',
  conversationId: 'c1',
  sourceAgent,
  targetAgent,
  ...extra,
})

/** triage-1 持有、已分诊的会话 c1 */
async function triagedConversation(t: TestHandoff): Promise<void> {
  await t.directory.register({ agentId: 'triage-1', role: 'triage' })
  await t.directory.register({ agentId: 'engager-1', role: 'engagement', score: 0.8 })
  await t.directory.register({ agentId: 'closer-1', role: 'closing' })
  await t.memory.recordInteraction({ leadId: 'L1', conversationId: 'c1', agentId: 'triage-1' })
  await t.coordinator.openConversation({ conversationId: 'c1', leadId: 'L1', ownerAgent: 'triage-1' })
  await t.coordinator.transition('c1', 'triaged', 'triage-1')
}

async function engagedConversation(t: TestHandoff): Promise<void> {
  await triagedConversation(t)
  await t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))
}

class FlakyWriteShortTermStore extends InMemoryShortTermStore {
  failWrites = false

  override async write(record: MemoryRecord<'short_term'>): Promise<void> {
    if (this.failWrites) throw new Error('disk full')
    return super.write(record)
  }
}

/** 下一次投递前触发回调并以超时失败 */
class InterruptingDirectory extends AgentDirectory {
  interrupt: (() => void) | null = null

  override async deliver(agentId: string, envelope: HandoffEnvelope): Promise<void> {
    const interrupt = this.interrupt
    if (interrupt) {
      this.interrupt = null
      interrupt()
      throw new Error('ETIMEDOUT')
    }
    return super.deliver(agentId, envelope)
  }
}

describe('HandoffCoordinator.requestHandoff', () => {
  it('moves a triaged conversation to the best agent of the target role', async () => {
    const t = createTestHandoff()
    const completed = vi.fn()
    t.events.on('handoff.completed', completed)
    await triagedConversation(t)

    const result = await t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))

    expect(result).toEqual({
      handoffId: 'h1',
      accepted: true,
      newState: 'engaged',
      owner: 'engager-1',
      route: 'agent',
      targetAgent: 'engager-1',
      deliveryAttempts: 1,
    })
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'engaged', owner: 'engager-1' })
    expect(t.directory.pending('engager-1').map(e => e.handoffId)).toEqual(['h1'])
    expect(completed).toHaveBeenCalledWith({
      handoffId: 'h1',
      leadId: 'L1',
      conversationId: 'c1',
      route: 'agent',
      owner: 'engager-1',
      newState: 'engaged',
    })
  })

  it('hands the short-term context to the new owner', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    const context = await t.memory.getConversation('c1')

    expect(context?.currentAgent).toBe('engager-1')
    expect(context?.history.at(-1)).toMatchObject({
      type: 'handoff',
      agentId: 'triage-1',
      data: { handoffId: 'h1', from: 'triage-1', to: 'engager-1' },
    })
    await expect(
      t.memory.recordInteraction({ leadId: 'L1', conversationId: 'c1', agentId: 'triage-1' }),
    ).rejects.toBeInstanceOf(OwnershipError)
  })

  it('writes an audit record to long-term memory', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    const audit = await t.memory.get('long_term', 'handoff:h1')

    expect(audit?.payload).toEqual({
      kind: 'handoff_record',
      record: {
        handoffId: 'h1',
        leadId: 'L1',
        conversationId: 'c1',
        sourceAgent: 'triage-1',
        targetAgent: 'engager-1',
        route: 'agent',
        newState: 'engaged',
        deliveryStatus: 'delivered',
        createdAt: '2026-03-01T10:00:00.000Z',
      },
    })
    expect(audit?.tags).toEqual(['lead:L1', 'handoff'])
  })

  it('returns the first result when a handoff is replayed', async () => {
    const t = createTestHandoff()
    await triagedConversation(t)
    const first = await t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))

    const replay = await t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))

    expect(replay).toEqual(first)
    expect(t.coordinator.getConversation('c1')?.transitions).toHaveLength(2)
    expect(t.directory.pending('engager-1')).toHaveLength(1)
  })

  it('supports A → B → A chains without leaving engaged', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    await t.coordinator.requestHandoff(request('h2', 'engager-1', 'closer-1'))
    const back = await t.coordinator.requestHandoff(request('h3', 'closer-1', 'engager-1'))

    expect(back).toMatchObject({ newState: 'engaged', owner: 'engager-1' })
    const entry = t.coordinator.getConversation('c1')
    expect(entry?.transitions.map(tr => `${tr.from}→${tr.to}:${tr.owner}`)).toEqual([
      'created→triaged:triage-1',
      'triaged→engaged:engager-1',
      'engaged→engaged:closer-1',
      'engaged→engaged:engager-1',
    ])
  })

  it('rejects callers that do not own the conversation', async () => {
    const t = createTestHandoff()
    await triagedConversation(t)

    await expect(t.coordinator.requestHandoff(request('h1', 'engager-1', 'closer-1'))).rejects.toBeInstanceOf(
      OwnershipError,
    )
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'triaged', owner: 'triage-1' })
  })

  it('rejects malformed requests and unknown conversations', async () => {
    const t = createTestHandoff()

    await expect(t.coordinator.requestHandoff({ leadId: 'L1' })).rejects.toBeInstanceOf(ValidationError)
    await expect(t.coordinator.requestHandoff(request('h1', 'a', 'b'))).rejects.toBeInstanceOf(NotFoundError)
  })

  it('routes high-value, low-confidence leads to the human queue', async () => {
    const t = createTestHandoff()
    const escalations = vi.fn()
    t.events.on('escalation.created', escalations)
    await engagedConversation(t)

    const result = await t.coordinator.requestHandoff(
      request('h2', 'engager-1', 'closing', { context: { predictedValue: 50_000, automationConfidence: 0.3 } }),
    )

    expect(result).toMatchObject({ route: 'human', owner: 'human', newState: 'escalated' })
    expect(result.targetAgent).toBeUndefined()
    const [ticket] = t.humanQueue.waiting()
    expect(ticket).toMatchObject({ ticketId: result.ticketId, handoffId: 'h2', leadId: 'L1', conversationId: 'c1' })
    expect(escalations).toHaveBeenCalledTimes(1)
    expect((await t.memory.getConversation('c1'))?.currentAgent).toBe('human')
  })

  it('refuses a human route before the conversation is engaged', async () => {
    const t = createTestHandoff()
    await triagedConversation(t)

    await expect(
      t.coordinator.requestHandoff(
        request('h1', 'triage-1', 'engagement', { context: { predictedValue: 50_000, automationConfidence: 0.3 } }),
      ),
    ).rejects.toBeInstanceOf(InvalidStateError)
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'triaged', owner: 'triage-1' })
    expect(t.humanQueue.size()).toBe(0)
  })

  it('names the missing target when a triaged conversation has nowhere to go', async () => {
    const t = createTestHandoff()
    await triagedConversation(t)

    const attempt = t.coordinator.requestHandoff(request('h1', 'triage-1', 'nurture'))

    await expect(attempt).rejects.toBeInstanceOf(UnavailableError)
    await expect(attempt).rejects.toThrow('No agent available for nurture')
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'triaged', owner: 'triage-1' })
    expect(t.humanQueue.size()).toBe(0)
  })

  it('sends an engaged conversation with no matching agent to the human queue', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    const result = await t.coordinator.requestHandoff(request('h2', 'engager-1', 'nurture'))

    expect(result).toMatchObject({ route: 'human', owner: 'human', newState: 'escalated' })
    expect(t.humanQueue.waiting().map(ticket => ticket.reason)).toEqual(['No agent available for the requested target'])
  })

  it('commits nothing when the context update fails', async () => {
    const shortTerm = new FlakyWriteShortTermStore()
    const t = createTestHandoff({ stores: { short_term: shortTerm } })
    await triagedConversation(t)
    shortTerm.failWrites = true

    await expect(t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))).rejects.toThrow('disk full')
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'triaged', owner: 'triage-1' })
    expect(t.directory.pending('engager-1')).toEqual([])

    shortTerm.failWrites = false
    const retried = await t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))
    expect(retried.owner).toBe('engager-1')
  })
})

describe('HandoffCoordinator delivery failures', () => {
  async function failedHandoff(t: TestHandoff): Promise<HandoffFailedError> {
    await triagedConversation(t)
    await t.directory.deliver('engager-1', {
      handoffId: 'backlog',
      leadId: 'L9',
      conversationId: 'c9',
      fromAgent: 'triage-1',
      priority: 'low',
      snapshot: {},
      createdAt: '2026-03-01T09:00:00.000Z',
    })
    const error = await t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement')).catch((e: unknown) => e)
    if (!(error instanceof HandoffFailedError)) throw new Error('expected the handoff to fail')
    return error
  }

  it('parks the conversation after exhausting delivery retries', async () => {
    const t = createTestHandoff({ handoff: { inboxCapacity: 1 } })
    const failed = vi.fn()
    t.events.on('handoff.failed', failed)

    const error = await failedHandoff(t)

    expect(error.message).toBe(
      'Handoff h1 to engager-1 failed after 3 attempts: Inbox of engager-1 is full (capacity 1)',
    )
    expect(error.context).toEqual({ handoffId: 'h1', leadId: 'L1', conversationId: 'c1' })
    expect(t.coordinator.getConversation('c1')?.handoffFailed).toEqual({
      handoffId: 'h1',
      reason: 'Inbox of engager-1 is full (capacity 1)',
      attempts: 3,
      at: '2026-03-01T10:00:00.000Z',
    })
    expect(t.coordinator.listFailedHandoffs().map(entry => entry.conversationId)).toEqual(['c1'])
    expect(failed).toHaveBeenCalledWith({
      handoffId: 'h1',
      leadId: 'L1',
      conversationId: 'c1',
      targetAgent: 'engager-1',
      attempts: 3,
      reason: 'Inbox of engager-1 is full (capacity 1)',
    })
    const audit = (await t.memory.get('long_term', 'handoff:h1'))?.payload
    expect(audit?.kind === 'handoff_record' ? audit.record.deliveryStatus : null).toBe('failed')
  })

  it('replays the failure and blocks transitions until remediated', async () => {
    const t = createTestHandoff({ handoff: { inboxCapacity: 1 } })
    const error = await failedHandoff(t)

    await expect(t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))).rejects.toBe(error)
    await expect(t.coordinator.transition('c1', 'closed', 'engager-1')).rejects.toBeInstanceOf(InvalidStateError)

    await t.directory.register({ agentId: 'engager-2', role: 'engagement' })
    const remediated = await t.coordinator.remediateHandoffFailure('c1', { assignTo: 'engager-2' })

    expect(remediated.handoffFailed).toBeUndefined()
    expect(remediated).toMatchObject({ state: 'engaged', owner: 'engager-2' })
    expect(t.coordinator.listFailedHandoffs()).toEqual([])
    expect((await t.memory.getConversation('c1'))?.currentAgent).toBe('engager-2')
    await expect(t.coordinator.remediateHandoffFailure('c1', { assignTo: 'engager-2' })).rejects.toBeInstanceOf(
      InvalidStateError,
    )
  })

  it('resumes delivery after a cancelled attempt', async () => {
    const t = createTestHandoff({ directory: ({ events }) => new InterruptingDirectory({ events }) })
    await triagedConversation(t)
    const controller = new AbortController()
    if (t.directory instanceof InterruptingDirectory) {
      t.directory.interrupt = () => controller.abort()
    }

    await expect(
      t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'), { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError)
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'engaged', owner: 'engager-1' })
    expect(t.directory.pending('engager-1')).toEqual([])

    const resumed = await t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))

    expect(resumed).toMatchObject({ owner: 'engager-1', deliveryAttempts: 1 })
    expect(t.directory.pending('engager-1').map(e => e.handoffId)).toEqual(['h1'])
    expect(t.coordinator.getConversation('c1')?.transitions).toHaveLength(2)
  })
})

describe('HandoffCoordinator escalation', () => {
  it('opens a standalone ticket for a lead', async () => {
    const t = createTestHandoff()

    const ticket = await t.coordinator.escalate({ leadId: 'L7', agentId: 'triage-1', reason: 'Legal question' })

    expect(ticket).toMatchObject({ leadId: 'L7', reason: 'Legal question', state: 'open', priority: 'high' })
    expect(ticket.conversationId).toBeUndefined()
    expect(t.coordinator.getTicket(ticket.ticketId)?.state).toBe('open')
  })

  it('escalates an engaged conversation and resumes it after resolution', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    const ticket = await t.coordinator.escalate({
      leadId: 'L1',
      agentId: 'engager-1',
      conversationId: 'c1',
      reason: 'Asked for a custom discount',
      recommendedActions: ['Approve or decline the discount'],
    })
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'escalated', owner: 'human' })
    await expect(t.coordinator.transition('c1', 'closed', 'engager-1')).rejects.toBeInstanceOf(InvalidStateError)

    const resolved = await t.coordinator.resolveEscalation(ticket.ticketId, {
      assignTo: 'closer-1',
      resolvedBy: 'operator-1',
      notes: 'Approved 10%',
    })

    expect(resolved.ticket).toMatchObject({ state: 'resolved', resolvedBy: 'operator-1', resolution: 'Approved 10%' })
    expect(resolved.conversation).toMatchObject({ state: 'engaged', owner: 'closer-1' })
    expect((await t.memory.getConversation('c1'))?.currentAgent).toBe('closer-1')
    await expect(
      t.coordinator.resolveEscalation(ticket.ticketId, { assignTo: 'closer-1', resolvedBy: 'operator-1' }),
    ).rejects.toBeInstanceOf(InvalidStateError)
  })

  it('refuses to escalate on behalf of another agent', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    await expect(
      t.coordinator.escalate({ leadId: 'L1', agentId: 'triage-1', conversationId: 'c1', reason: 'x' }),
    ).rejects.toBeInstanceOf(OwnershipError)
    expect(t.humanQueue.size()).toBe(0)
  })
})

describe('HandoffCoordinator.transition', () => {
  it('closing marks the short-term context completed', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    const entry = await t.coordinator.transition('c1', 'closed', 'engager-1')

    expect(entry.state).toBe('closed')
    expect((await t.memory.getConversation('c1'))?.status).toBe('completed')
  })

  it('leaves the state unchanged on illegal transitions', async () => {
    const t = createTestHandoff()
    await triagedConversation(t)

    for (const to of ['created', 'triaged', 'closed'] as const) {
      await expect(t.coordinator.transition('c1', to, 'triage-1')).rejects.toBeInstanceOf(InvalidStateError)
    }
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'triaged', owner: 'triage-1' })
    expect(t.coordinator.getConversation('c1')?.transitions).toHaveLength(1)
  })

  it('openConversation is idempotent for the same owner', async () => {
    const t = createTestHandoff()
    const input = { conversationId: 'c5', leadId: 'L5', ownerAgent: 'triage-1' }

    const first = await t.coordinator.openConversation(input)
    const second = await t.coordinator.openConversation(input)

    expect(second).toEqual(first)
    await expect(t.coordinator.openConversation({ ...input, ownerAgent: 'triage-2' })).rejects.toBeInstanceOf(
      InvalidStateError,
    )
  })
})

describe('HandoffCoordinator conversation ownership', () => {
  it('keeps memory writes with the registered owner', async () => {
    const t = createTestHandoff()
    await triagedConversation(t)
    const context = await t.memory.getConversation('c1')
    if (!context) throw new Error('conversation missing')

    await expect(
      t.memory.put('short_term', 'c1', { kind: 'conversation', context: { ...context, currentAgent: 'engager-1' } }, {
        keepTtl: true,
      }),
    ).rejects.toThrow('Conversation c1 is owned by triage-1, not engager-1')
    await expect(
      t.memory.recordInteraction({ leadId: 'L1', conversationId: 'c1', agentId: 'engager-1' }),
    ).rejects.toBeInstanceOf(OwnershipError)
    expect((await t.memory.getConversation('c1'))?.currentAgent).toBe('triage-1')
  })

  it('still names the registered owner once the context has expired', async () => {
    const t = createTestHandoff()
    await engagedConversation(t)

    t.time.advance(3_601_000)
    expect(await t.memory.getConversation('c1')).toBeNull()

    await expect(
      t.memory.recordInteraction({ leadId: 'L1', conversationId: 'c1', agentId: 'triage-1' }),
    ).rejects.toThrow('Conversation c1 is owned by engager-1, not triage-1')

    const revived = await t.memory.recordInteraction({ leadId: 'L1', conversationId: 'c1', agentId: 'engager-1' })
    expect(revived.payload.kind === 'conversation' && revived.payload.context.currentAgent).toBe('engager-1')
  })
})

describe('HandoffCoordinator retention', () => {
  it('refuses a handoff replayed after its result left the replay window', async () => {
    const t = createTestHandoff({ handoff: { replayWindow: 1 } })
    await engagedConversation(t)
    await t.coordinator.requestHandoff(request('h2', 'engager-1', 'closer-1'))

    await expect(t.coordinator.requestHandoff(request('h1', 'triage-1', 'engagement'))).rejects.toThrow(
      'Handoff h1 was already applied and has left the replay window',
    )
    expect(t.coordinator.getConversation('c1')).toMatchObject({ state: 'engaged', owner: 'closer-1' })
    expect(await t.coordinator.requestHandoff(request('h2', 'engager-1', 'closer-1'))).toMatchObject({
      handoffId: 'h2',
      owner: 'closer-1',
    })
  })

  it('forgets the oldest closed conversations beyond the retention', async () => {
    const t = createTestHandoff({ handoff: { closedRetention: 1 } })
    await engagedConversation(t)
    await t.memory.recordInteraction({ leadId: 'L2', conversationId: 'c2', agentId: 'triage-1' })
    await t.coordinator.openConversation({ conversationId: 'c2', leadId: 'L2', ownerAgent: 'triage-1' })
    await t.coordinator.transition('c2', 'triaged', 'triage-1')
    await t.coordinator.requestHandoff(request('h2', 'triage-1', 'engagement', { leadId: 'L2', conversationId: 'c2' }))

    await t.coordinator.transition('c1', 'closed', 'engager-1')
    expect(t.coordinator.getConversation('c1')?.state).toBe('closed')

    await t.coordinator.transition('c2', 'closed', 'engager-1')

    expect(t.coordinator.getConversation('c1')).toBeNull()
    expect(t.coordinator.getConversation('c2')?.state).toBe('closed')
    await expect(t.coordinator.transition('c1', 'engaged', 'engager-1')).rejects.toBeInstanceOf(NotFoundError)
  })
})
