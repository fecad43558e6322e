/**
 * @entry Handoff 交接模块
 *
 * 能力分组：
 * - 状态机: TRANSITIONS/canTransition/assertTransition/stateAfterAgentHandoff
 * - 升级策略: decideRoute/compareCandidates（纯函数）
 * - Agent 目录: AgentDirectory（有界收件箱 + agent.status 事件）
 * - 人工队列: HumanEscalationQueue
 * - 协调器: HandoffCoordinator（幂等交接、升级、失败处理）
 */

export {
  TRANSITIONS,
  canTransition,
  assertTransition,
  isTerminalState,
  stateAfterAgentHandoff,
} from './conversationState.js'

export {
  type CandidateScore,
  type RoutingDecision,
  type EscalationThresholds,
  compareCandidates,
  isHighValueLowConfidence,
  decideRoute,
} from './EscalationPolicy.js'

export {
  type AgentRegistration,
  type AgentDirectoryOptions,
  type AgentSnapshot,
  AgentDirectory,
} from './AgentDirectory.js'

export { HumanEscalationQueue } from './HumanEscalationQueue.js'

export {
  type HandoffCoordinatorOptions,
  type SignalOptions,
  type OpenConversationInput,
  type TransitionOptions,
  type EscalateInput,
  type ResolveEscalationInput,
  type ResolvedEscalation,
  type RemediationInput,
  HandoffCoordinator,
} from './HandoffCoordinator.js'
