/**
 * 交接协调器
 *
 * - 会话注册表：状态机 + 持有者 + 追加写入的迁移日志
 * - requestHandoff：幂等（同 handoffId 重放返回首个结果），持有 lead 锁全程
 * - 先更新短期上下文的 currentAgent，再提交注册表；任一步失败都不留下部分状态
 * - 投递失败重试耗尽 → handoffFailed 子状态，需要 remediateHandoffFailure 人工处理
 * - 投递中途取消：已提交的迁移保留，同 handoffId 重放会继续投递
 */

import type { EscalationConfig, HandoffConfig } from '../config/schema.js'
import type { MemoryManager } from '../memory/MemoryManager.js'
import { memoryKeys, type ConversationEvent, type HandoffAuditRecord } from '../memory/types.js'
import { createEventBus, type EventBus } from '../scheduler/eventBus.js'
import {
  HandoffFailedError,
  InvalidStateError,
  NotFoundError,
  OwnershipError,
  UnavailableError,
  ValidationError,
} from '../shared/error.js'
import { systemClock, type Clock } from '../shared/formatTime.js'
import { generatePrefixedId } from '../shared/generateId.js'
import { KeyedLock, lockKeys } from '../shared/keyedLock.js'
import { createLogger, logError } from '../shared/logger.js'
import { err, fromPromise, ok, unwrap, type Result } from '../shared/result.js'
import { withRetry } from '../shared/retryStrategy.js'
import type { RelayEvents } from '../types/events.js'
import {
  HUMAN_OWNER,
  handoffRequestSchema,
  type ConversationEntry,
  type ConversationState,
  type EscalationTicket,
  type HandoffEnvelope,
  type HandoffRequest,
  type HandoffResult,
  type Priority,
} from '../types/handoff.js'
import type { AgentDirectory } from './AgentDirectory.js'
import { assertTransition, canTransition, stateAfterAgentHandoff } from './conversationState.js'
import { decideRoute } from './EscalationPolicy.js'
import type { HumanEscalationQueue } from './HumanEscalationQueue.js'

const logger = createLogger('handoff')

export interface HandoffCoordinatorOptions {
  memory: MemoryManager
  directory: AgentDirectory
  humanQueue: HumanEscalationQueue
  handoff: HandoffConfig
  escalation: EscalationConfig
  events?: EventBus<RelayEvents>
  /** 默认与 MemoryManager 共用，保证整合与交接在同一 lead 上互斥 */
  locks?: KeyedLock
  clock?: Clock
}

export interface SignalOptions {
  signal?: AbortSignal
}

export interface OpenConversationInput extends SignalOptions {
  conversationId: string
  leadId: string
  ownerAgent: string
}

export interface TransitionOptions extends SignalOptions {
  /** 迁移到 escalated 时写入工单的原因 */
  reason?: string
}

export interface EscalateInput extends SignalOptions {
  leadId: string
  agentId: string
  reason: string
  conversationId?: string
  recommendedActions?: string[]
  priority?: Priority
}

export interface ResolveEscalationInput extends SignalOptions {
  assignTo: string
  resolvedBy: string
  notes?: string
}

export interface ResolvedEscalation {
  ticket: EscalationTicket
  conversation: ConversationEntry | null
}

export interface RemediationInput extends SignalOptions {
  assignTo: string
  remediatedBy?: string
}

/** 已提交、待投递的交接 */
interface PendingDelivery {
  request: HandoffRequest
  result: HandoffResult
  ticket?: EscalationTicket
}

interface StateChange {
  to: ConversationState
  owner: string
  by: string
  handoffId?: string
  ticketId?: string
}

interface ContextNote {
  actor: string
  type: ConversationEvent['type']
  action: string
  data: Record<string, unknown>
}

export class HandoffCoordinator {
  private readonly memory: MemoryManager
  private readonly directory: AgentDirectory
  private readonly humanQueue: HumanEscalationQueue
  private readonly handoffConfig: HandoffConfig
  private readonly escalationConfig: EscalationConfig
  private readonly events: EventBus<RelayEvents>
  private readonly locks: KeyedLock
  private readonly clock: Clock

  private readonly conversations = new Map<string, ConversationEntry>()
  private readonly results = new Map<string, Result<HandoffResult>>()
  private readonly pending = new Map<string, PendingDelivery>()
  /** 按关闭顺序排列，超出 closedRetention 时从头淘汰 */
  private readonly closedOrder: string[] = []

  constructor(options: HandoffCoordinatorOptions) {
    this.memory = options.memory
    this.directory = options.directory
    this.humanQueue = options.humanQueue
    this.handoffConfig = options.handoff
    this.escalationConfig = options.escalation
    this.events = options.events ?? createEventBus<RelayEvents>()
    this.locks = options.locks ?? options.memory.locks
    this.clock = options.clock ?? systemClock
    this.memory.useOwnershipLookup(conversationId => this.conversations.get(conversationId)?.owner ?? null)
  }

  private now(): string {
    return this.clock().toISOString()
  }

  // ── Queries ──

  getConversation(conversationId: string): ConversationEntry | null {
    const entry = this.conversations.get(conversationId)
    return entry ? structuredClone(entry) : null
  }

  getTicket(ticketId: string): EscalationTicket | null {
    return this.humanQueue.get(ticketId)
  }

  /** 停在 handoffFailed 子状态、等待人工处理的会话 */
  listFailedHandoffs(): ConversationEntry[] {
    return [...this.conversations.values()].filter(entry => entry.handoffFailed).map(entry => structuredClone(entry))
  }

  // ── Conversation lifecycle ──

  async openConversation(input: OpenConversationInput): Promise<ConversationEntry> {
    const { conversationId, leadId, ownerAgent, signal } = input
    if (!conversationId || !leadId || !ownerAgent) {
      throw new ValidationError('conversationId, leadId and ownerAgent are required')
    }

    return this.withConversation(
      leadId,
      conversationId,
      async () => {
        const existing = this.conversations.get(conversationId)
        if (existing) {
          if (existing.leadId === leadId && existing.owner === ownerAgent && existing.state === 'created') {
            return structuredClone(existing)
          }
          throw new InvalidStateError(`Conversation ${conversationId} is already open`, {
            context: { leadId, conversationId, state: existing.state },
          })
        }

        const context = await this.memory.getConversation(conversationId, { signal })
        if (context && context.leadId !== leadId) {
          throw new ValidationError(`Conversation ${conversationId} belongs to lead ${context.leadId}`)
        }
        if (context && context.currentAgent !== ownerAgent) {
          throw new OwnershipError(`Conversation ${conversationId} is owned by ${context.currentAgent}`, {
            context: { leadId, conversationId },
          })
        }

        const at = this.now()
        const entry: ConversationEntry = {
          conversationId,
          leadId,
          state: 'created',
          owner: ownerAgent,
          transitions: [],
          createdAt: at,
          updatedAt: at,
        }
        this.conversations.set(conversationId, entry)
        logger.debug(`Opened conversation ${conversationId} for lead ${leadId} (owner ${ownerAgent})`)
        return structuredClone(entry)
      },
      signal,
    )
  }

  /**
   * 当前持有者推进状态。迁移到 escalated 时创建工单；离开 escalated 只能通过 resolveEscalation。
   */
  async transition(
    conversationId: string,
    to: ConversationState,
    agentId: string,
    options: TransitionOptions = {},
  ): Promise<ConversationEntry> {
    const { leadId } = this.requireEntry(conversationId)

    return this.withConversation(
      leadId,
      conversationId,
      async () => {
        const entry = this.requireEntry(conversationId)
        const context = { leadId, conversationId }
        this.assertNotParked(entry)
        if (entry.state === 'escalated') {
          throw new InvalidStateError(`Conversation ${conversationId} is escalated`, {
            context,
            suggestion: 'Resume it through resolveEscalation',
          })
        }
        this.assertOwner(entry, agentId)

        if (to === 'escalated') {
          await this.escalateLocked(entry, {
            leadId,
            agentId,
            conversationId,
            reason: options.reason ?? `Escalated by ${agentId}`,
            signal: options.signal,
          })
          return structuredClone(entry)
        }

        assertTransition(entry.state, to, context)
        if (to === 'closed') {
          await this.updateContext(
            conversationId,
            { actor: agentId, type: 'outcome', action: 'conversation_closed', data: {} },
            options.signal,
            { status: 'completed' },
          )
        }
        this.commit(entry, { to, owner: entry.owner, by: agentId })
        logger.debug(`Conversation ${conversationId}: ${entry.transitions.at(-1)?.from ?? '?'} → ${to}`)
        return structuredClone(entry)
      },
      options.signal,
    )
  }

  // ── Handoff ──

  /**
   * 交接会话。同一 handoffId 只生效一次，重放返回首次的结果（或抛出首次的错误）。
   */
  async requestHandoff(input: unknown, options: SignalOptions = {}): Promise<HandoffResult> {
    const request = this.parseRequest(input)
    const { signal } = options

    return this.locks.run(
      lockKeys.lead(request.leadId),
      async () => {
        const replay = this.results.get(request.handoffId)
        if (replay) {
          logger.debug(`Replaying handoff ${request.handoffId}`)
          return unwrap(replay)
        }

        let pending = this.pending.get(request.handoffId)
        if (pending) {
          logger.info(`Resuming delivery of handoff ${request.handoffId}`)
        } else {
          // 结果已淘汰出重放窗口时，审计记录仍能识别重复请求
          if (await this.memory.get('long_term', memoryKeys.handoff(request.handoffId), { signal })) {
            throw new InvalidStateError(
              `Handoff ${request.handoffId} was already applied and has left the replay window`,
              { context: { handoffId: request.handoffId, leadId: request.leadId }, suggestion: 'Use a new handoffId' },
            )
          }
          pending = await this.locks.run(
            lockKeys.conversation(request.conversationId),
            () => this.commitHandoff(request, signal),
            signal,
          )
        }
        return this.deliver(pending, signal)
      },
      signal,
    )
  }

  private parseRequest(input: unknown): HandoffRequest {
    const parsed = handoffRequestSchema.safeParse(input)
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid handoff request',
        parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      )
    }
    return parsed.data
  }

  private async commitHandoff(request: HandoffRequest, signal?: AbortSignal): Promise<PendingDelivery> {
    const { handoffId, leadId, conversationId, sourceAgent } = request
    const context = { handoffId, leadId, conversationId }

    const entry = this.requireEntry(conversationId)
    if (entry.leadId !== leadId) {
      throw new ValidationError(`Conversation ${conversationId} belongs to lead ${entry.leadId}`, [], { context })
    }
    this.assertNotParked(entry)
    this.assertOwner(entry, sourceAgent)

    const candidates = this.directory.candidatesFor(request.targetAgent, sourceAgent)
    // 没有候选时只能转人工，而 engaged 之前不能升级
    if (candidates.length === 0 && !canTransition(entry.state, 'escalated')) {
      throw new UnavailableError(`No agent available for ${request.targetAgent}`, {
        context,
        suggestion: 'Register an agent with that id or role, then retry',
      })
    }
    const decision = decideRoute(request.context, candidates, this.escalationConfig)
    const at = this.now()

    let newState: ConversationState
    let owner: string
    let ticket: EscalationTicket | undefined
    if (decision.route === 'agent') {
      if (decision.targetAgent === sourceAgent) {
        throw new ValidationError(`Agent ${sourceAgent} cannot hand off to itself`, [], { context })
      }
      newState = stateAfterAgentHandoff(entry.state, context)
      owner = decision.targetAgent
    } else {
      assertTransition(entry.state, 'escalated', context)
      newState = 'escalated'
      owner = HUMAN_OWNER
      ticket = {
        ticketId: generatePrefixedId('ticket'),
        leadId,
        conversationId,
        reason: decision.reason,
        recommendedActions: decision.recommendedActions,
        state: 'open',
        priority: request.priority,
        createdAt: at,
        handoffId,
      }
    }

    await this.updateContext(
      conversationId,
      {
        actor: sourceAgent,
        type: decision.route === 'agent' ? 'handoff' : 'escalation',
        action: decision.route === 'agent' ? 'handoff' : 'escalate',
        data: { handoffId, from: sourceAgent, to: owner },
      },
      signal,
      { currentAgent: owner },
    )
    this.commit(entry, { to: newState, owner, by: sourceAgent, handoffId, ticketId: ticket?.ticketId })

    const pending: PendingDelivery = {
      request,
      ticket,
      result: {
        handoffId,
        accepted: true,
        newState,
        owner,
        route: decision.route,
        targetAgent: decision.route === 'agent' ? decision.targetAgent : undefined,
        ticketId: ticket?.ticketId,
        deliveryAttempts: 0,
      },
    }
    this.pending.set(handoffId, pending)
    logger.info(`Handoff ${handoffId}: ${conversationId} ${sourceAgent} → ${owner} (${newState})`)
    return pending
  }

  private async deliver(pending: PendingDelivery, signal?: AbortSignal): Promise<HandoffResult> {
    const { request, result, ticket } = pending
    const envelope: HandoffEnvelope = {
      handoffId: request.handoffId,
      leadId: request.leadId,
      conversationId: request.conversationId,
      fromAgent: request.sourceAgent,
      priority: request.priority,
      snapshot: request.context,
      createdAt: request.createdAt ?? this.now(),
    }

    const outcome = await withRetry(
      async () => {
        if (ticket) {
          this.humanQueue.enqueue(ticket)
        } else {
          await this.directory.deliver(result.owner, envelope)
        }
      },
      {
        config: this.handoffConfig.deliveryRetry,
        signal,
        onRetry: decision => logger.warn(`Delivery of handoff ${request.handoffId} failed: ${decision.reason}`),
      },
    )

    this.pending.delete(request.handoffId)

    if (!outcome.success) {
      const reason = outcome.error.message
      const entry = this.conversations.get(request.conversationId)
      if (entry) {
        entry.handoffFailed = { handoffId: request.handoffId, reason, attempts: outcome.attempts, at: this.now() }
        entry.updatedAt = this.now()
      }
      const error = new HandoffFailedError(
        `Handoff ${request.handoffId} to ${result.owner} failed after ${outcome.attempts} attempts: ${reason}`,
        {
          cause: outcome.error.originalError,
          context: { handoffId: request.handoffId, leadId: request.leadId, conversationId: request.conversationId },
        },
      )
      this.rememberResult(request.handoffId, err(error))
      logError(logger, 'Handoff delivery failed', error, { handoffId: request.handoffId, leadId: request.leadId })

      await this.audit(request, result, 'failed')
      await this.events.emit('handoff.failed', {
        handoffId: request.handoffId,
        leadId: request.leadId,
        conversationId: request.conversationId,
        targetAgent: result.owner,
        attempts: outcome.attempts,
        reason,
      })
      throw error
    }

    const delivered: HandoffResult = { ...result, deliveryAttempts: outcome.attempts }
    this.rememberResult(request.handoffId, ok(delivered))

    await this.audit(request, delivered, 'delivered')
    await this.events.emit('handoff.completed', {
      handoffId: request.handoffId,
      leadId: request.leadId,
      conversationId: request.conversationId,
      route: delivered.route,
      owner: delivered.owner,
      newState: delivered.newState,
    })
    if (ticket) {
      await this.events.emit('escalation.created', {
        ticketId: ticket.ticketId,
        leadId: ticket.leadId,
        conversationId: ticket.conversationId,
        reason: ticket.reason,
        handoffId: ticket.handoffId,
      })
    }
    return delivered
  }

  /** 审计记录写入长期记忆；写入失败只记日志，不影响已完成的交接 */
  private async audit(
    request: HandoffRequest,
    result: HandoffResult,
    deliveryStatus: HandoffAuditRecord['deliveryStatus'],
  ): Promise<void> {
    const record: HandoffAuditRecord = {
      handoffId: request.handoffId,
      leadId: request.leadId,
      conversationId: request.conversationId,
      sourceAgent: request.sourceAgent,
      targetAgent: result.owner,
      route: result.route,
      newState: result.newState,
      deliveryStatus,
      ticketId: result.ticketId,
      createdAt: this.now(),
    }
    const written = await fromPromise(
      this.memory.put('long_term', memoryKeys.handoff(request.handoffId), { kind: 'handoff_record', record }),
    )
    if (!written.ok) {
      logError(logger, 'Failed to write handoff audit record', written.error, {
        handoffId: request.handoffId,
        leadId: request.leadId,
      })
    }
  }

  // ── Escalation ──

  /**
   * 创建人工工单。带 conversationId 时会话迁移到 escalated，持有者变为 human。
   */
  async escalate(input: EscalateInput): Promise<EscalationTicket> {
    if (!input.leadId || !input.agentId || !input.reason) {
      throw new ValidationError('leadId, agentId and reason are required')
    }
    const { conversationId } = input
    if (!conversationId) {
      const ticket = this.newTicket(input)
      this.humanQueue.enqueue(ticket)
      await this.publishEscalation(ticket)
      return ticket
    }

    return this.withConversation(
      input.leadId,
      conversationId,
      async () => {
        const entry = this.requireEntry(conversationId)
        if (entry.leadId !== input.leadId) {
          throw new ValidationError(`Conversation ${conversationId} belongs to lead ${entry.leadId}`)
        }
        this.assertNotParked(entry)
        this.assertOwner(entry, input.agentId)
        return this.escalateLocked(entry, input)
      },
      input.signal,
    )
  }

  private async escalateLocked(entry: ConversationEntry, input: EscalateInput): Promise<EscalationTicket> {
    assertTransition(entry.state, 'escalated', { leadId: entry.leadId, conversationId: entry.conversationId })

    const ticket = this.newTicket({ ...input, conversationId: entry.conversationId })
    this.humanQueue.enqueue(ticket)
    const updated = await fromPromise(
      this.updateContext(
        entry.conversationId,
        { actor: input.agentId, type: 'escalation', action: 'escalate', data: { ticketId: ticket.ticketId } },
        input.signal,
        { currentAgent: HUMAN_OWNER },
      ),
    )
    if (!updated.ok) {
      this.humanQueue.discard(ticket.ticketId)
      throw updated.error
    }

    this.commit(entry, { to: 'escalated', owner: HUMAN_OWNER, by: input.agentId, ticketId: ticket.ticketId })
    await this.publishEscalation(ticket)
    return ticket
  }

  /** 等待认领的工单，按认领顺序 */
  waitingEscalations(): EscalationTicket[] {
    return this.humanQueue.waiting()
  }

  claimEscalation(ticketId: string, claimedBy: string): EscalationTicket {
    const ticket = this.humanQueue.claim(ticketId, claimedBy)
    logger.info(`Ticket ${ticketId} claimed by ${claimedBy}`)
    return ticket
  }

  /** 人工处理完成，会话交给指定 agent 并回到 engaged */
  async resolveEscalation(ticketId: string, input: ResolveEscalationInput): Promise<ResolvedEscalation> {
    const ticket = this.humanQueue.get(ticketId)
    if (!ticket) throw new NotFoundError('Escalation ticket', ticketId)
    if (ticket.state === 'resolved') {
      throw new InvalidStateError(`Ticket ${ticketId} is already resolved`, { context: { ticketId } })
    }

    const { conversationId } = ticket
    if (!conversationId) {
      return { ticket: this.humanQueue.resolve(ticketId, input.resolvedBy, input.notes), conversation: null }
    }
    this.requireAgent(input.assignTo)

    return this.withConversation(
      ticket.leadId,
      conversationId,
      async () => {
        const entry = this.requireEntry(conversationId)
        if (entry.state !== 'escalated') {
          throw new InvalidStateError(`Conversation ${conversationId} is not escalated`, {
            context: { ticketId, conversationId, state: entry.state },
          })
        }
        assertTransition(entry.state, 'engaged', { ticketId, conversationId })

        await this.updateContext(
          conversationId,
          {
            actor: input.resolvedBy,
            type: 'escalation',
            action: 'escalation_resolved',
            data: { ticketId, ...(input.notes !== undefined && { notes: input.notes }) },
          },
          input.signal,
          { currentAgent: input.assignTo },
        )
        this.commit(entry, { to: 'engaged', owner: input.assignTo, by: input.resolvedBy, ticketId })
        const resolved = this.humanQueue.resolve(ticketId, input.resolvedBy, input.notes)
        logger.info(`Ticket ${ticketId} resolved by ${input.resolvedBy}; ${conversationId} assigned to ${input.assignTo}`)
        return { ticket: resolved, conversation: structuredClone(entry) }
      },
      input.signal,
    )
  }

  /**
   * 处理停在 handoffFailed 的会话：清除失败标记并交给指定 agent
   */
  async remediateHandoffFailure(conversationId: string, input: RemediationInput): Promise<ConversationEntry> {
    const { leadId } = this.requireEntry(conversationId)
    this.requireAgent(input.assignTo)
    const remediatedBy = input.remediatedBy ?? 'operator'

    return this.withConversation(
      leadId,
      conversationId,
      async () => {
        const entry = this.requireEntry(conversationId)
        const failure = entry.handoffFailed
        if (!failure) {
          throw new InvalidStateError(`Conversation ${conversationId} has no failed handoff`, {
            context: { leadId, conversationId },
          })
        }

        const to: ConversationState = entry.state === 'escalated' ? 'engaged' : entry.state
        if (to !== entry.state) assertTransition(entry.state, to, { leadId, conversationId })

        await this.updateContext(
          conversationId,
          {
            actor: remediatedBy,
            type: 'handoff',
            action: 'handoff_remediated',
            data: { handoffId: failure.handoffId, to: input.assignTo },
          },
          input.signal,
          { currentAgent: input.assignTo },
        )
        delete entry.handoffFailed
        this.commit(entry, { to, owner: input.assignTo, by: remediatedBy, handoffId: failure.handoffId })
        logger.info(`Remediated failed handoff ${failure.handoffId}; ${conversationId} assigned to ${input.assignTo}`)
        return structuredClone(entry)
      },
      input.signal,
    )
  }

  // ── Helpers ──

  private withConversation<T>(
    leadId: string,
    conversationId: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    return this.locks.run(
      lockKeys.lead(leadId),
      () => this.locks.run(lockKeys.conversation(conversationId), fn, signal),
      signal,
    )
  }

  private requireEntry(conversationId: string): ConversationEntry {
    const entry = this.conversations.get(conversationId)
    if (!entry) throw new NotFoundError('Conversation', conversationId)
    return entry
  }

  private requireAgent(agentId: string): void {
    if (!this.directory.get(agentId)) throw new NotFoundError('Agent', agentId)
  }

  private assertOwner(entry: ConversationEntry, agentId: string): void {
    if (entry.owner !== agentId) {
      throw new OwnershipError(`Conversation ${entry.conversationId} is owned by ${entry.owner}, not ${agentId}`, {
        context: { leadId: entry.leadId, conversationId: entry.conversationId },
      })
    }
  }

  private assertNotParked(entry: ConversationEntry): void {
    if (entry.handoffFailed) {
      throw new InvalidStateError(
        `Conversation ${entry.conversationId} is parked after failed handoff ${entry.handoffFailed.handoffId}`,
        {
          context: { leadId: entry.leadId, conversationId: entry.conversationId },
          suggestion: 'Call remediateHandoffFailure',
        },
      )
    }
  }

  private commit(entry: ConversationEntry, change: StateChange): void {
    const at = this.now()
    entry.transitions.push({
      from: entry.state,
      to: change.to,
      owner: change.owner,
      by: change.by,
      at,
      ...(change.handoffId !== undefined && { handoffId: change.handoffId }),
      ...(change.ticketId !== undefined && { ticketId: change.ticketId }),
    })
    entry.state = change.to
    entry.owner = change.owner
    entry.updatedAt = at
    if (change.to === 'closed') this.retire(entry.conversationId)
  }

  /** Map 保持插入顺序，最早的结果最先淘汰 */
  private rememberResult(handoffId: string, result: Result<HandoffResult>): void {
    this.results.set(handoffId, result)
    for (const oldest of this.results.keys()) {
      if (this.results.size <= this.handoffConfig.replayWindow) break
      this.results.delete(oldest)
    }
  }

  private retire(conversationId: string): void {
    this.closedOrder.push(conversationId)
    while (this.closedOrder.length > this.handoffConfig.closedRetention) {
      const forgotten = this.closedOrder.shift()
      if (forgotten === undefined) break
      this.conversations.delete(forgotten)
      logger.debug(`Forgot closed conversation ${forgotten}`)
    }
  }

  /** 在短期上下文上追加事件并应用字段变更；上下文不存在时跳过 */
  private async updateContext(
    conversationId: string,
    note: ContextNote,
    signal: AbortSignal | undefined,
    changes: { currentAgent?: string; status?: 'active' | 'completed' },
  ): Promise<void> {
    const at = this.now()
    await this.memory.update(
      'short_term',
      conversationId,
      payload => {
        if (payload.kind !== 'conversation') return payload
        const { context } = payload
        return {
          kind: 'conversation',
          context: {
            ...context,
            ...changes,
            history: [
              ...context.history,
              {
                eventId: generatePrefixedId('evt'),
                type: note.type,
                agentId: note.actor,
                action: note.action,
                at,
                data: note.data,
              },
            ],
          },
        }
      },
      { signal },
    )
  }

  private newTicket(input: EscalateInput): EscalationTicket {
    return {
      ticketId: generatePrefixedId('ticket'),
      leadId: input.leadId,
      conversationId: input.conversationId,
      reason: input.reason,
      recommendedActions: input.recommendedActions ?? [],
      state: 'open',
      priority: input.priority ?? 'high',
      createdAt: this.now(),
    }
  }

  private publishEscalation(ticket: EscalationTicket): Promise<void> {
    return this.events.emit('escalation.created', {
      ticketId: ticket.ticketId,
      leadId: ticket.leadId,
      conversationId: ticket.conversationId,
      reason: ticket.reason,
    })
  }
}
