/**
 * 会话状态机与交接相关类型
 */

import { z } from 'zod'

export type Priority = 'low' | 'medium' | 'high'

export const CONVERSATION_STATES = ['created', 'triaged', 'engaged', 'escalated', 'closed'] as const
export type ConversationState = (typeof CONVERSATION_STATES)[number]

/** 升级给人工后会话的持有者 */
export const HUMAN_OWNER = 'human'

export interface TransitionRecord {
  from: ConversationState
  to: ConversationState
  /** 迁移后的持有者 */
  owner: string
  by: string
  at: string
  handoffId?: string
  ticketId?: string
}

/** 投递重试耗尽后的终态子状态，需要外部处理 */
export interface HandoffFailure {
  handoffId: string
  reason: string
  attempts: number
  at: string
}

export interface ConversationEntry {
  conversationId: string
  leadId: string
  state: ConversationState
  owner: string
  handoffFailed?: HandoffFailure
  /** 追加写入的迁移日志，按 id 引用交接与工单，不持有对象指针 */
  transitions: TransitionRecord[]
  createdAt: string
  updatedAt: string
}

export const handoffSnapshotSchema = z
  .object({
    interactionCount: z.number().int().nonnegative().optional(),
    lastOutcomeScore: z.number().min(0).max(1).optional(),
    /** 预测成交价值 */
    predictedValue: z.number().nonnegative().optional(),
    /** 自动化处理成功的预测概率 */
    automationConfidence: z.number().min(0).max(1).optional(),
    summary: z.string().optional(),
    attributes: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
  })
  .strict()
export type HandoffSnapshot = z.infer<typeof handoffSnapshotSchema>

export const handoffRequestSchema = z
  .object({
    handoffId: z.string().min(1),
    leadId: z.string().min(1),
    conversationId: z.string().min(1),
    sourceAgent: z.string().min(1),
    /** 目标 agent id 或角色名 */
    targetAgent: z.string().min(1),
    context: handoffSnapshotSchema.default({}),
    priority: z.enum(['low', 'medium', 'high']).default('medium'),
    createdAt: z.string().datetime().optional(),
  })
  .strict()
export type HandoffRequestInput = z.input<typeof handoffRequestSchema>
export type HandoffRequest = z.output<typeof handoffRequestSchema>

export interface HandoffResult {
  handoffId: string
  accepted: boolean
  newState: ConversationState
  owner: string
  route: 'agent' | 'human'
  targetAgent?: string
  ticketId?: string
  deliveryAttempts: number
}

/** 投递到 agent 收件箱或人工队列的载荷 */
export interface HandoffEnvelope {
  handoffId: string
  leadId: string
  conversationId: string
  fromAgent: string
  priority: Priority
  snapshot: HandoffSnapshot
  createdAt: string
}

export type TicketState = 'open' | 'claimed' | 'resolved'

export interface EscalationTicket {
  ticketId: string
  leadId: string
  conversationId?: string
  reason: string
  recommendedActions: string[]
  state: TicketState
  priority: Priority
  createdAt: string
  handoffId?: string
  claimedBy?: string
  resolvedBy?: string
  resolution?: string
}
