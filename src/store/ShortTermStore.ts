/**
 * 短期记忆存储：键值 + TTL
 */

import type { MemoryRecord } from '../memory/types.js'
import { InMemoryTierStore } from './InMemoryTierStore.js'
import type { ShortTermTierStore } from './types.js'

export function isExpired(record: MemoryRecord, nowMs: number): boolean {
  return record.expiresAt !== undefined && Date.parse(record.expiresAt) <= nowMs
}

export class InMemoryShortTermStore extends InMemoryTierStore<'short_term'> implements ShortTermTierStore {
  constructor() {
    super('short_term')
  }

  async scan(): Promise<MemoryRecord<'short_term'>[]> {
    return this.snapshot()
  }

  async purgeExpired(nowIso: string): Promise<number> {
    const nowMs = Date.parse(nowIso)
    let purged = 0
    for (const [key, record] of this.records) {
      if (isExpired(record, nowMs)) {
        this.records.delete(key)
        purged++
      }
    }
    return purged
  }
}
