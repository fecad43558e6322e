/**
 * 情景记忆存储：固定维度指纹 + 余弦最近邻
 */

import { ValidationError } from '../shared/error.js'
import type { MemoryRecord } from '../memory/types.js'
import { InMemoryTierStore } from './InMemoryTierStore.js'
import { cosineSimilarity } from './vectorMath.js'
import type { EpisodicTierStore, NearestOptions, ScoredRecord, TierStoreStatus } from './types.js'

export class InMemoryEpisodicStore extends InMemoryTierStore<'episodic'> implements EpisodicTierStore {
  constructor(readonly dimension: number) {
    super('episodic')
  }

  override async write(record: MemoryRecord<'episodic'>): Promise<void> {
    const length = record.payload.episode.contextFingerprint.length
    if (length !== this.dimension) {
      throw new ValidationError(`Fingerprint has dimension ${length}, expected ${this.dimension}`, [], {
        context: { tier: this.tier, key: record.key },
      })
    }
    await super.write(record)
  }

  async nearest(fingerprint: number[], options: NearestOptions): Promise<ScoredRecord<'episodic'>[]> {
    const scored: ScoredRecord<'episodic'>[] = []
    for (const record of this.snapshot()) {
      const { episode } = record.payload
      if (options.scenarioTag && episode.scenarioTag !== options.scenarioTag) continue
      if (options.leadId && episode.metadata.leadId !== options.leadId) continue
      const similarity = cosineSimilarity(fingerprint, episode.contextFingerprint)
      if (similarity >= options.minSimilarity) {
        scored.push({ record, similarity })
      }
    }
    scored.sort((a, b) => b.similarity - a.similarity || a.record.key.localeCompare(b.record.key))
    return scored.slice(0, options.limit)
  }

  async list(): Promise<MemoryRecord<'episodic'>[]> {
    return this.snapshot()
  }

  override async status(): Promise<TierStoreStatus> {
    const base = await super.status()
    return { ...base, backend: `memory:cosine/${this.dimension}` }
  }
}
