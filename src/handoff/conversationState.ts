/**
 * 会话状态机
 *
 * created → triaged → engaged → {escalated | closed}，escalated → engaged（人工处理后）
 * 只允许沿这张图迁移，其他请求一律 InvalidStateError，状态不变
 */

import { InvalidStateError } from '../shared/error.js'
import type { ConversationState } from '../types/handoff.js'

/** 每个状态允许的下一个状态 */
export const TRANSITIONS: Readonly<Record<ConversationState, readonly ConversationState[]>> = {
  created: ['triaged'],
  triaged: ['engaged'],
  engaged: ['escalated', 'closed'],
  escalated: ['engaged'],
  closed: [],
}

export function canTransition(from: ConversationState, to: ConversationState): boolean {
  return TRANSITIONS[from].includes(to)
}

export function assertTransition(
  from: ConversationState,
  to: ConversationState,
  context: Record<string, unknown> = {},
): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateError(`Illegal transition ${from} → ${to}`, { context: { ...context, from, to } })
  }
}

export function isTerminalState(state: ConversationState): boolean {
  return TRANSITIONS[state].length === 0
}

/**
 * 交接给 agent 后的状态
 * engaged 之间的交接只转移持有者（A→B→A 链），不产生迁移
 */
export function stateAfterAgentHandoff(from: ConversationState, context: Record<string, unknown> = {}): ConversationState {
  switch (from) {
    case 'created':
      return 'triaged'
    case 'triaged':
      return 'engaged'
    case 'engaged':
      return 'engaged'
    case 'escalated':
    case 'closed':
      throw new InvalidStateError(`Cannot hand off a conversation in state ${from}`, {
        context: { ...context, from },
        suggestion: from === 'escalated' ? 'Resolve the escalation ticket first' : undefined,
      })
  }
}
