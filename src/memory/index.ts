/**
 * @entry Memory 记忆模块
 *
 * 四层记忆（短期 / 长期 / 情景 / 语义）的统一入口
 *
 * 主要 API:
 * - MemoryManager: put / get / update / query / recordInteraction / consolidate
 * - 载荷 schema 与 key 约定: payloadSchemas / memoryKeys
 * - 合并规则辅助: foldConversation / buildEpisode / conceptPairs / strengthenEdge
 * - 指纹: computeFingerprint
 */

export * from './types.js'

export {
  MemoryManager,
  type MemoryManagerOptions,
  type PutOptions,
  type ReadOptions,
  type InteractionInput,
  type SimilarEpisode,
  type MemoryStatus,
} from './MemoryManager.js'

// Short-term → long-term
export {
  foldConversation,
  mergePreferences,
  summarizeInteraction,
  computeRfmScore,
  emptyProfile,
} from './foldLeadProfile.js'

// Outcome → episodic
export { buildEpisode, episodeTags } from './extractEpisode.js'
export { computeFingerprint, contextFeatures, agentActions, fnv1a } from './fingerprint.js'

// Relation → semantic
export {
  collectConcepts,
  conceptPairs,
  applyEma,
  strengthenEdge,
  CO_OCCURRENCE_RELATION,
  type ConceptPair,
} from './associationEngine.js'
