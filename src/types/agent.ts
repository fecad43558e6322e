/**
 * Agent 身份与状态类型
 */

/** 已由边界鉴权组件验证过的调用方身份 */
export interface CallerIdentity {
  agentId: string
  /** 权限范围，如 memory.short_term / agent.handoff / memory.* / * */
  permissions: string[]
}

export type AgentStatus = 'registered' | 'idle' | 'busy' | 'unregistered'

export interface AgentDescriptor {
  agentId: string
  /** 角色，如 triage / engagement / optimization */
  role: string
  /** 基线候选分 0-1 */
  score: number
}
