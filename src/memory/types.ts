/**
 * Memory system types
 *
 * 每个层级的载荷都是封闭的标签变体集合，由 zod 在 MemoryManager 边界校验；
 * 未知字段或未知 kind 一律拒绝。
 */

import { z } from 'zod'

export const TIERS = ['short_term', 'long_term', 'episodic', 'semantic'] as const
export type Tier = (typeof TIERS)[number]

export function isTier(value: string): value is Tier {
  return (TIERS as readonly string[]).includes(value)
}

// ============ Conversation (short-term) ============

export const preferenceValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])
export type PreferenceValue = z.infer<typeof preferenceValueSchema>

const attributeValueSchema = z.union([z.string(), z.number(), z.boolean()])

export const conversationEventSchema = z
  .object({
    eventId: z.string().min(1),
    type: z.enum(['agent_action', 'message', 'handoff', 'escalation', 'outcome']),
    agentId: z.string().min(1),
    action: z.string().min(1).optional(),
    /** 本事件涉及的概念名 */
    concepts: z.array(z.string().min(1)).optional(),
    at: z.string().datetime(),
    data: z.record(z.string(), z.unknown()).optional(),
  })
  .strict()
export type ConversationEvent = z.infer<typeof conversationEventSchema>
export type ConversationEventType = ConversationEvent['type']

export const conceptRefSchema = z
  .object({
    name: z.string().min(1),
    category: z.string().min(1),
  })
  .strict()
export type ConceptRef = z.infer<typeof conceptRefSchema>

export const conversationContextSchema = z
  .object({
    leadId: z.string().min(1),
    conversationId: z.string().min(1),
    currentAgent: z.string().min(1),
    interactionCount: z.number().int().nonnegative(),
    lastOutcomeScore: z.number().min(0).max(1),
    scenarioTag: z.string().min(1),
    status: z.enum(['active', 'completed']),
    preferences: z.record(z.string(), preferenceValueSchema),
    /** leadSource / interactionType / outcome 等线索属性 */
    attributes: z.record(z.string(), attributeValueSchema),
    concepts: z.array(conceptRefSchema),
    /** 追加写入的有序事件日志 */
    history: z.array(conversationEventSchema),
  })
  .strict()
export type ConversationContext = z.infer<typeof conversationContextSchema>

export const shortTermPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('conversation'), context: conversationContextSchema }).strict(),
  z
    .object({
      kind: z.literal('scratchpad'),
      agentId: z.string().min(1),
      notes: z.record(z.string(), z.unknown()),
    })
    .strict(),
])
export type ShortTermPayload = z.infer<typeof shortTermPayloadSchema>

// ============ Lead profile / audit (long-term) ============

export const interactionSummarySchema = z
  .object({
    conversationId: z.string().min(1),
    interactionCount: z.number().int().nonnegative(),
    outcomeScore: z.number().min(0).max(1),
    scenarioTag: z.string().min(1),
    summary: z.string(),
    recordedAt: z.string().datetime(),
  })
  .strict()
export type InteractionSummary = z.infer<typeof interactionSummarySchema>

export const leadProfileSchema = z
  .object({
    leadId: z.string().min(1),
    preferences: z.record(z.string(), preferenceValueSchema),
    rfmScore: z.number().min(0).max(1),
    interactionSummaries: z.array(interactionSummarySchema),
    /** conversationId → 已并入画像的交互次数，用于幂等合并 */
    foldedInteractions: z.record(z.string(), z.number().int().nonnegative()),
    totalInteractions: z.number().int().nonnegative(),
    updatedAt: z.string().datetime(),
  })
  .strict()
export type LeadProfile = z.infer<typeof leadProfileSchema>

export const handoffAuditRecordSchema = z
  .object({
    handoffId: z.string().min(1),
    leadId: z.string().min(1),
    conversationId: z.string().min(1),
    sourceAgent: z.string().min(1),
    targetAgent: z.string().min(1),
    route: z.enum(['agent', 'human']),
    newState: z.string().min(1),
    deliveryStatus: z.enum(['delivered', 'failed']),
    ticketId: z.string().optional(),
    createdAt: z.string().datetime(),
  })
  .strict()
export type HandoffAuditRecord = z.infer<typeof handoffAuditRecordSchema>

export const longTermPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('lead_profile'), profile: leadProfileSchema }).strict(),
  z.object({ kind: z.literal('handoff_record'), record: handoffAuditRecordSchema }).strict(),
])
export type LongTermPayload = z.infer<typeof longTermPayloadSchema>

// ============ Episodes ============

export const episodeSchema = z
  .object({
    episodeId: z.string().min(1),
    scenarioTag: z.string().min(1),
    contextFingerprint: z.array(z.number().finite()).min(1),
    actionSequence: z.array(z.string()),
    outcomeScore: z.number().min(0).max(1),
    metadata: z
      .object({
        leadId: z.string().min(1),
        conversationId: z.string().min(1),
        agentIds: z.array(z.string()),
      })
      .strict(),
  })
  .strict()
export type Episode = z.infer<typeof episodeSchema>

export const episodicPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('episode'), episode: episodeSchema }).strict(),
])
export type EpisodicPayload = z.infer<typeof episodicPayloadSchema>

// ============ Concept graph (semantic) ============

export const conceptNodeSchema = conceptRefSchema
export type ConceptNode = ConceptRef

export const conceptEdgeSchema = z
  .object({
    fromConcept: z.string().min(1),
    toConcept: z.string().min(1),
    relationType: z.string().min(1),
    strength: z.number().min(0).max(1),
    observations: z.number().int().nonnegative(),
    /** 已观测过的会话，保证同一会话只强化一次 */
    sourceConversations: z.array(z.string()),
    updatedAt: z.string().datetime(),
  })
  .strict()
export type ConceptEdge = z.infer<typeof conceptEdgeSchema>

export const semanticPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('concept'), node: conceptNodeSchema }).strict(),
  z.object({ kind: z.literal('edge'), edge: conceptEdgeSchema }).strict(),
])
export type SemanticPayload = z.infer<typeof semanticPayloadSchema>

// ============ Records ============

export interface TierPayloadMap {
  short_term: ShortTermPayload
  long_term: LongTermPayload
  episodic: EpisodicPayload
  semantic: SemanticPayload
}

/** 层级 → 载荷 schema，按层级索引时保留对应的载荷类型 */
export const payloadSchemas: { [K in Tier]: z.ZodType<TierPayloadMap[K], z.ZodTypeDef, unknown> } = {
  short_term: shortTermPayloadSchema,
  long_term: longTermPayloadSchema,
  episodic: episodicPayloadSchema,
  semantic: semanticPayloadSchema,
}

export interface MemoryRecord<T extends Tier = Tier> {
  tier: T
  key: string
  payload: TierPayloadMap[T]
  createdAt: string
  lastAccessedAt: string
  /** 短期记录必填 */
  expiresAt?: string
  tags: string[]
}

/** 查询结果：记录 + 层级相关的相关度（时间戳毫秒 / 相似度 / 遍历深度） */
export interface QueryHit<T extends Tier = Tier> {
  record: MemoryRecord<T>
  relevance: number
}

// ============ Keys ============

export const memoryKeys = {
  profile: (leadId: string) => `profile:${leadId}`,
  handoff: (handoffId: string) => `handoff:${handoffId}`,
  episode: (conversationId: string) => `ep-${conversationId}`,
  concept: (name: string) => `concept:${name}`,
  edge: (from: string, relationType: string, to: string) => `edge:${from}->${relationType}->${to}`,
}

export type AnyPayload = TierPayloadMap[Tier]

/**
 * 载荷决定的规范 key；返回 null 表示该变体允许任意 key
 */
export function canonicalKey(payload: AnyPayload): string | null {
  switch (payload.kind) {
    case 'conversation':
      return payload.context.conversationId
    case 'scratchpad':
      return null
    case 'lead_profile':
      return memoryKeys.profile(payload.profile.leadId)
    case 'handoff_record':
      return memoryKeys.handoff(payload.record.handoffId)
    case 'episode':
      return payload.episode.episodeId
    case 'concept':
      return memoryKeys.concept(payload.node.name)
    case 'edge':
      return memoryKeys.edge(payload.edge.fromConcept, payload.edge.relationType, payload.edge.toConcept)
  }
}

// ============ Query criteria ============

export interface ShortTermCriteria {
  leadId?: string
  tag?: string
  limit?: number
}

export interface LongTermCriteria {
  kind?: LongTermPayload['kind']
  leadId?: string
  tag?: string
  minRfmScore?: number
  limit?: number
}

export interface EpisodicCriteria {
  fingerprint: number[]
  limit?: number
  minSimilarity?: number
  scenarioTag?: string
  leadId?: string
}

export interface SemanticCriteria {
  from: string
  maxDepth?: number
  relationTypes?: string[]
}

export interface TierCriteriaMap {
  short_term: ShortTermCriteria
  long_term: LongTermCriteria
  episodic: EpisodicCriteria
  semantic: SemanticCriteria
}

// ============ Consolidation summary ============

export const CONSOLIDATION_RULES = ['short_to_long', 'outcome_to_episodic', 'relation_to_semantic'] as const
export type ConsolidationRule = (typeof CONSOLIDATION_RULES)[number]

export interface RuleCounts {
  migrated: number
  skipped: number
  failed: number
}

export interface ConsolidationError {
  rule: ConsolidationRule
  key: string
  message: string
}

export interface ConsolidationSummary extends RuleCounts {
  byRule: Record<ConsolidationRule, RuleCounts>
  errors: ConsolidationError[]
  expiredPurged: number
  startedAt: string
  finishedAt: string
}
