/**
 * Agent 目录与收件箱
 *
 * 每个注册的 agent 持有一个有界优先级收件箱，负载 = 收件箱积压。
 * 状态变化通过 agent.status 事件通知。
 */

import { createEventBus, type EventBus } from '../scheduler/eventBus.js'
import { createQueue, type Queue } from '../scheduler/queue.js'
import { UnavailableError, ValidationError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import type { AgentDescriptor, AgentStatus } from '../types/agent.js'
import type { RelayEvents } from '../types/events.js'
import type { HandoffEnvelope } from '../types/handoff.js'
import type { CandidateScore } from './EscalationPolicy.js'

const logger = createLogger('agent-directory')

const DEFAULT_SCORE = 0.5

export interface AgentRegistration {
  agentId: string
  role: string
  score?: number
}

export interface AgentDirectoryOptions {
  inboxCapacity?: number
  events?: EventBus<RelayEvents>
}

interface AgentEntry {
  descriptor: AgentDescriptor
  status: AgentStatus
  inbox: Queue<HandoffEnvelope>
}

export interface AgentSnapshot extends AgentDescriptor {
  status: AgentStatus
  load: number
}

export class AgentDirectory {
  private readonly agents = new Map<string, AgentEntry>()
  private readonly inboxCapacity: number
  private readonly events: EventBus<RelayEvents>

  constructor(options: AgentDirectoryOptions = {}) {
    this.inboxCapacity = options.inboxCapacity ?? 100
    this.events = options.events ?? createEventBus<RelayEvents>()
  }

  async register(registration: AgentRegistration): Promise<AgentSnapshot> {
    const score = registration.score ?? DEFAULT_SCORE
    if (!registration.agentId || !registration.role) {
      throw new ValidationError('agentId and role are required')
    }
    if (score < 0 || score > 1) {
      throw new ValidationError(`Agent score must be within [0, 1], got ${score}`)
    }

    const existing = this.agents.get(registration.agentId)
    const entry: AgentEntry = {
      descriptor: { agentId: registration.agentId, role: registration.role, score },
      status: existing?.status ?? 'registered',
      inbox:
        existing?.inbox ?? createQueue<HandoffEnvelope>({ capacity: this.inboxCapacity, name: `Inbox of ${registration.agentId}` }),
    }
    this.agents.set(registration.agentId, entry)
    logger.debug(`Registered agent ${registration.agentId} (${registration.role})`)
    await this.publish(entry)
    return this.snapshot(entry)
  }

  async unregister(agentId: string): Promise<boolean> {
    const entry = this.agents.get(agentId)
    if (!entry) return false
    this.agents.delete(agentId)
    entry.status = 'unregistered'
    await this.publish(entry)
    return true
  }

  get(agentId: string): AgentSnapshot | null {
    const entry = this.agents.get(agentId)
    return entry ? this.snapshot(entry) : null
  }

  list(): AgentSnapshot[] {
    return Array.from(this.agents.values(), entry => this.snapshot(entry))
  }

  load(agentId: string): number {
    return this.agents.get(agentId)?.inbox.size() ?? 0
  }

  /**
   * 目标可以是 agentId（只返回该 agent）或角色名（返回该角色下除 exclude 外的全部 agent）
   */
  candidatesFor(target: string, exclude?: string): CandidateScore[] {
    const direct = this.agents.get(target)
    const entries = direct
      ? [direct]
      : [...this.agents.values()].filter(entry => entry.descriptor.role === target && entry.descriptor.agentId !== exclude)
    return entries.map(entry => ({
      agentId: entry.descriptor.agentId,
      score: entry.descriptor.score,
      load: entry.inbox.size(),
    }))
  }

  /** 投递到收件箱；agent 不在线或收件箱已满时抛出 UnavailableError（可重试） */
  async deliver(agentId: string, envelope: HandoffEnvelope): Promise<void> {
    const entry = this.agents.get(agentId)
    if (!entry) {
      throw new UnavailableError(`Agent ${agentId} is not registered`, {
        context: { agentId, handoffId: envelope.handoffId },
      })
    }
    entry.inbox.enqueue(envelope.handoffId, envelope, envelope.priority)
    entry.status = 'busy'
    await this.publish(entry)
  }

  /** 取出下一条交接，收件箱清空后状态变为 idle */
  async receive(agentId: string): Promise<HandoffEnvelope | null> {
    const entry = this.agents.get(agentId)
    if (!entry) return null
    const item = entry.inbox.dequeue()
    if (entry.inbox.isEmpty() && entry.status !== 'idle') {
      entry.status = 'idle'
      await this.publish(entry)
    }
    return item?.data ?? null
  }

  /** 收件箱内容（按出队顺序），不移除 */
  pending(agentId: string): HandoffEnvelope[] {
    return this.agents.get(agentId)?.inbox.all().map(item => item.data) ?? []
  }

  private snapshot(entry: AgentEntry): AgentSnapshot {
    return { ...entry.descriptor, status: entry.status, load: entry.inbox.size() }
  }

  private publish(entry: AgentEntry): Promise<void> {
    return this.events.emit('agent.status', {
      agentId: entry.descriptor.agentId,
      status: entry.status,
      load: entry.inbox.size(),
    })
  }
}
