/**
 * 升级策略引擎
 *
 * 纯函数：(会话快照, 候选 agent 评分, 阈值) → 路由到 agent 或升级给人工。
 * 默认策略：预测价值超过高价值阈值 且 自动化成功率低于置信下限 → 人工。
 * 同分候选按负载升序、再按 agentId 升序决出，结果确定。
 */

import type { EscalationConfig } from '../config/schema.js'
import type { HandoffSnapshot } from '../types/handoff.js'

export interface CandidateScore {
  agentId: string
  score: number
  /** 当前收件箱积压 */
  load: number
}

export type RoutingDecision =
  | { route: 'agent'; targetAgent: string; score: number }
  | { route: 'human'; reason: string; recommendedActions: string[] }

export type EscalationThresholds = EscalationConfig

const HIGH_VALUE_ACTIONS = [
  'Review the lead profile and recent interactions',
  'Contact the lead directly with a tailored offer',
]

const NO_CANDIDATE_ACTIONS = ['Assign an available agent or handle the lead manually']

/** 比较两个候选：分高者优先，其次负载低者，最后 agentId 字典序小者 */
export function compareCandidates(a: CandidateScore, b: CandidateScore): number {
  if (a.score !== b.score) return b.score - a.score
  if (a.load !== b.load) return a.load - b.load
  if (a.agentId === b.agentId) return 0
  return a.agentId < b.agentId ? -1 : 1
}

export function isHighValueLowConfidence(snapshot: HandoffSnapshot, thresholds: EscalationThresholds): boolean {
  const { predictedValue, automationConfidence } = snapshot
  if (predictedValue === undefined || automationConfidence === undefined) return false
  return predictedValue > thresholds.highValueThreshold && automationConfidence < thresholds.confidenceFloor
}

export function decideRoute(
  snapshot: HandoffSnapshot,
  candidates: readonly CandidateScore[],
  thresholds: EscalationThresholds,
): RoutingDecision {
  if (isHighValueLowConfidence(snapshot, thresholds)) {
    return {
      route: 'human',
      reason:
        `High-value lead (predicted value ${snapshot.predictedValue ?? 0}) with automation confidence ` +
        `${snapshot.automationConfidence ?? 0} below ${thresholds.confidenceFloor}`,
      recommendedActions: [...HIGH_VALUE_ACTIONS],
    }
  }

  const [best] = [...candidates].sort(compareCandidates)
  if (!best) {
    return { route: 'human', reason: 'No agent available for the requested target', recommendedActions: [...NO_CANDIDATE_ACTIONS] }
  }
  return { route: 'agent', targetAgent: best.agentId, score: best.score }
}
