/**
 * @entry lead-relay
 *
 * 多 agent 线索流水线的分层共享记忆与交接协调
 */

export * from './shared/index.js'
export * from './config/index.js'
export * from './store/index.js'
export * from './memory/index.js'
export * from './scheduler/index.js'
export * from './handoff/index.js'
export * from './server/index.js'

export type {
  Priority,
  ConversationState,
  ConversationEntry,
  TransitionRecord,
  HandoffFailure,
  HandoffSnapshot,
  HandoffRequest,
  HandoffRequestInput,
  HandoffResult,
  HandoffEnvelope,
  EscalationTicket,
  TicketState,
} from './types/handoff.js'
export { CONVERSATION_STATES, HUMAN_OWNER, handoffRequestSchema, handoffSnapshotSchema } from './types/handoff.js'
export type { CallerIdentity, AgentStatus, AgentDescriptor } from './types/agent.js'
export type { RelayEvents, RelayEventName, RelayEventMessage } from './types/events.js'
export { RELAY_EVENT_NAMES } from './types/events.js'

export { createLeadRelay, type LeadRelay, type LeadRelayOverrides } from './runtime.js'
