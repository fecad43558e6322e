/**
 * 长期记忆存储：键值 + 结构化谓词查询
 *
 * - InMemoryLongTermStore: 进程内实现
 * - FileLongTermStore: 基于 FileStore 的 JSON 文件实现，每个 key 一个文件
 */

import { z } from 'zod'
import { longTermPayloadSchema, type LongTermCriteria, type MemoryRecord } from '../memory/types.js'
import { FileStore } from './GenericFileStore.js'
import { InMemoryTierStore } from './InMemoryTierStore.js'
import type { LongTermTierStore, TierStoreStatus } from './types.js'

type LongTermRecord = MemoryRecord<'long_term'>

const longTermRecordSchema = z.object({
  tier: z.literal('long_term'),
  key: z.string().min(1),
  payload: longTermPayloadSchema,
  createdAt: z.string(),
  lastAccessedAt: z.string(),
  expiresAt: z.string().optional(),
  tags: z.array(z.string()),
})

function leadIdOf(record: LongTermRecord): string {
  const { payload } = record
  return payload.kind === 'lead_profile' ? payload.profile.leadId : payload.record.leadId
}

export function matchesLongTermCriteria(record: LongTermRecord, criteria: LongTermCriteria): boolean {
  const { payload } = record
  if (criteria.kind && payload.kind !== criteria.kind) return false
  if (criteria.leadId && leadIdOf(record) !== criteria.leadId) return false
  if (criteria.tag && !record.tags.includes(criteria.tag)) return false
  if (criteria.minRfmScore !== undefined) {
    if (payload.kind !== 'lead_profile') return false
    if (payload.profile.rfmScore < criteria.minRfmScore) return false
  }
  return true
}

export class InMemoryLongTermStore extends InMemoryTierStore<'long_term'> implements LongTermTierStore {
  constructor() {
    super('long_term')
  }

  async find(criteria: LongTermCriteria): Promise<LongTermRecord[]> {
    return this.snapshot().filter(record => matchesLongTermCriteria(record, criteria))
  }
}

export class FileLongTermStore implements LongTermTierStore {
  readonly tier = 'long_term' as const
  private readonly files: FileStore<LongTermRecord>

  constructor(dir: string) {
    this.files = new FileStore({ dir, schema: longTermRecordSchema })
  }

  async read(key: string): Promise<LongTermRecord | null> {
    return this.files.get(key)
  }

  async write(record: LongTermRecord): Promise<void> {
    await this.files.set(record.key, record)
  }

  async delete(key: string): Promise<boolean> {
    return this.files.delete(key)
  }

  async touch(key: string, at: string): Promise<void> {
    await this.files.update(key, record => ({ ...record, lastAccessedAt: at }))
  }

  async find(criteria: LongTermCriteria): Promise<LongTermRecord[]> {
    return this.files.query(record => matchesLongTermCriteria(record, criteria))
  }

  async status(): Promise<TierStoreStatus> {
    return { tier: this.tier, backend: `file:${this.files.getDir()}`, records: await this.files.count(), healthy: true }
  }
}
