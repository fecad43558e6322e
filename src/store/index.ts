/**
 * @entry Store 层级存储模块
 *
 * - 能力契约: ShortTermTierStore / LongTermTierStore / EpisodicTierStore / SemanticTierStore
 * - 进程内实现 + 长期记忆的 JSON 文件后端
 * - createTierStores: 按配置组装
 */

export type {
  TierStoreStatus,
  KeyedTierStore,
  ShortTermTierStore,
  LongTermTierStore,
  EpisodicTierStore,
  SemanticTierStore,
  NearestOptions,
  ScoredRecord,
  TraverseOptions,
  TraversalHit,
  TierStores,
  JsonWriteOptions,
} from './types.js'

export { InMemoryTierStore } from './InMemoryTierStore.js'
export { InMemoryShortTermStore, isExpired } from './ShortTermStore.js'
export { InMemoryLongTermStore, FileLongTermStore, matchesLongTermCriteria } from './LongTermStore.js'
export { InMemoryEpisodicStore } from './EpisodicStore.js'
export { InMemorySemanticStore, SYMMETRIC_RELATIONS, UNCATEGORIZED } from './SemanticStore.js'
export { FileStore, type FileStoreOptions } from './GenericFileStore.js'
export { readJson, writeJson, ensureDir } from './readWriteJson.js'
export { cosineSimilarity, normalize } from './vectorMath.js'
export { seedKnowledgeSchema, loadSeedFile, seedSemanticStore, type SeedKnowledge } from './seedKnowledge.js'
export { createTierStores, createLongTermStore } from './createTierStores.js'
export { getDataDir, getLongTermDir } from './paths.js'
