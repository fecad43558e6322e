/**
 * 层级存储能力契约
 *
 * 四个层级各自满足不同的访问契约，MemoryManager 只依赖这里的接口，
 * 不假设任何具体存储技术。所有方法都是挂起点（返回 Promise）。
 */

import type {
  ConceptEdge,
  LongTermCriteria,
  MemoryRecord,
  Tier,
} from '../memory/types.js'

export interface TierStoreStatus {
  tier: Tier
  backend: string
  records: number
  healthy: boolean
}

/** 所有层级共有的键值读写 */
export interface KeyedTierStore<T extends Tier> {
  readonly tier: T
  read(key: string): Promise<MemoryRecord<T> | null>
  /** 写入或覆盖 */
  write(record: MemoryRecord<T>): Promise<void>
  delete(key: string): Promise<boolean>
  /** 只更新 lastAccessedAt，不影响载荷 */
  touch(key: string, at: string): Promise<void>
  status(): Promise<TierStoreStatus>
}

/** 短期：键值 + TTL。过期判断由调用方按自己的时钟执行 */
export interface ShortTermTierStore extends KeyedTierStore<'short_term'> {
  scan(): Promise<MemoryRecord<'short_term'>[]>
  purgeExpired(nowIso: string): Promise<number>
}

/** 长期：键值 + 结构化谓词查询 */
export interface LongTermTierStore extends KeyedTierStore<'long_term'> {
  find(criteria: LongTermCriteria): Promise<MemoryRecord<'long_term'>[]>
}

export interface NearestOptions {
  limit: number
  minSimilarity: number
  scenarioTag?: string
  leadId?: string
}

export interface ScoredRecord<T extends Tier> {
  record: MemoryRecord<T>
  similarity: number
}

/** 情景：固定维度指纹上的最近邻查询（余弦相似度） */
export interface EpisodicTierStore extends KeyedTierStore<'episodic'> {
  readonly dimension: number
  nearest(fingerprint: number[], options: NearestOptions): Promise<ScoredRecord<'episodic'>[]>
  list(): Promise<MemoryRecord<'episodic'>[]>
}

export interface TraverseOptions {
  maxDepth: number
  relationTypes?: string[]
}

export interface TraversalHit {
  record: MemoryRecord<'semantic'>
  depth: number
  /** 从起点到该概念经过的关系类型 */
  path: string[]
}

/** 语义：节点/边 upsert + 有界深度遍历 */
export interface SemanticTierStore extends KeyedTierStore<'semantic'> {
  traverse(from: string, options: TraverseOptions): Promise<TraversalHit[]>
  shortestPath(from: string, to: string): Promise<string[] | null>
  edgesOf(concept: string): Promise<ConceptEdge[]>
}

export interface TierStores {
  short_term: ShortTermTierStore
  long_term: LongTermTierStore
  episodic: EpisodicTierStore
  semantic: SemanticTierStore
}

// ============ JSON 读写工具类型 ============

export interface JsonWriteOptions {
  /** 缩进空格数，默认 2 */
  indent?: number
  /** 是否原子写入（先写临时文件再 rename），默认 true */
  atomic?: boolean
}
