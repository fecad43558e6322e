import { z } from 'zod'
import { getErrorMessage } from '../shared/assertError.js'
import { intervalToCron } from '../shared/formatTime.js'

export const retryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().nonnegative().default(1000),
  maxDelayMs: z.number().nonnegative().default(60_000),
  backoffMultiplier: z.number().min(1).default(2),
  /** 0 表示无抖动，退避间隔可预测 */
  jitterFactor: z.number().min(0).max(1).default(0),
})

const unitInterval = z.number().min(0).max(1)

/** 各合并阈值独立可调 */
export const thresholdsConfigSchema = z.object({
  /** 短期 → 长期：交互次数下限 */
  longTermInteractions: z.number().int().min(1).default(5),
  /** 成功结果 → 情景记忆：结果分下限 */
  episodicOutcome: unitInterval.default(0.8),
  /** 概念关联 → 语义图谱：关联强度下限 */
  semanticStrength: unitInterval.default(0.7),
  /** 同场景指纹相似度达到此值视为重复情景 */
  duplicateEpisodeSimilarity: unitInterval.default(0.95),
  /** 情景检索默认相似度下限 */
  episodicQuerySimilarity: unitInterval.default(0.7),
})

export const memoryConfigSchema = z.object({
  thresholds: thresholdsConfigSchema.default({}),
  /** 边强度指数移动平均系数 */
  emaAlpha: z.number().gt(0).max(1).default(0.3),
  fingerprintDimension: z.number().int().min(2).default(32),
  defaultShortTermTtlSeconds: z.number().int().positive().default(3600),
  semanticMaxDepth: z.number().int().min(1).default(2),
  storeRetry: retryConfigSchema.default({}),
  longTerm: z
    .object({
      backend: z.enum(['memory', 'file']).default('memory'),
      /** file 后端的存储目录；缺省位于数据目录下 */
      location: z.string().optional(),
    })
    .default({}),
  /** 语义图谱种子文件（JSON），启动时载入 */
  semanticSeedFile: z.string().optional(),
})

export const consolidationConfigSchema = z.object({
  /** 间隔字符串，如 30s / 5m / 1h */
  interval: z
    .string()
    .regex(/^\d+[smhd]$/, 'interval must look like 30s, 5m, 1h or 1d')
    .superRefine((interval, ctx) => {
      try {
        intervalToCron(interval)
      } catch (e) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: getErrorMessage(e) })
      }
    })
    .default('5m'),
  enabled: z.boolean().default(true),
})

export const handoffConfigSchema = z.object({
  deliveryRetry: retryConfigSchema.default({}),
  inboxCapacity: z.number().int().positive().default(100),
  humanQueueCapacity: z.number().int().positive().default(500),
  /** 保留多少个已完成交接的结果用于幂等重放，超出后淘汰最早的 */
  replayWindow: z.number().int().positive().default(10_000),
  /** 已关闭会话保留在内存中供查询的数量 */
  closedRetention: z.number().int().nonnegative().default(1_000),
})

export const escalationConfigSchema = z.object({
  highValueThreshold: z.number().nonnegative().default(10_000),
  confidenceFloor: unitInterval.default(0.6),
})

export const eventsConfigSchema = z.object({
  /** 每个监听器的最大投递次数（至少一次语义） */
  deliveryAttempts: z.number().int().min(1).default(3),
})

export const serverConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(3000),
  host: z.string().default('localhost'),
})

export const configSchema = z.object({
  memory: memoryConfigSchema.default({}),
  consolidation: consolidationConfigSchema.default({}),
  handoff: handoffConfigSchema.default({}),
  escalation: escalationConfigSchema.default({}),
  events: eventsConfigSchema.default({}),
  server: serverConfigSchema.default({}),
})

export type RetrySettings = z.infer<typeof retryConfigSchema>
export type ThresholdsConfig = z.infer<typeof thresholdsConfigSchema>
export type MemoryConfig = z.infer<typeof memoryConfigSchema>
export type ConsolidationConfig = z.infer<typeof consolidationConfigSchema>
export type HandoffConfig = z.infer<typeof handoffConfigSchema>
export type EscalationConfig = z.infer<typeof escalationConfigSchema>
export type EventsConfig = z.infer<typeof eventsConfigSchema>
export type ServerConfig = z.infer<typeof serverConfigSchema>
export type Config = z.infer<typeof configSchema>
