/**
 * 异步事件通知
 * 至少投递一次，消费方需要容忍重复
 */

import type { ConsolidationSummary } from '../memory/types.js'
import type { AgentStatus } from './agent.js'
import type { ConversationState } from './handoff.js'

export type RelayEvents = {
  'lead.processed': {
    leadId: string
    conversationId: string
    rfmScore: number
    totalInteractions: number
  }
  'agent.status': {
    agentId: string
    status: AgentStatus
    load: number
  }
  'handoff.failed': {
    handoffId: string
    leadId: string
    conversationId: string
    targetAgent: string
    attempts: number
    reason: string
  }
  'handoff.completed': {
    handoffId: string
    leadId: string
    conversationId: string
    route: 'agent' | 'human'
    owner: string
    newState: ConversationState
  }
  'escalation.created': {
    ticketId: string
    leadId: string
    conversationId?: string
    reason: string
    handoffId?: string
  }
  'consolidation.completed': {
    summary: ConsolidationSummary
  }
}

export type RelayEventName = keyof RelayEvents

export const RELAY_EVENT_NAMES = [
  'lead.processed',
  'agent.status',
  'handoff.failed',
  'handoff.completed',
  'escalation.created',
  'consolidation.completed',
] as const satisfies readonly RelayEventName[]

/** 事件流中的一条通知 */
export interface RelayEventMessage {
  event: RelayEventName
  payload: RelayEvents[RelayEventName]
}
