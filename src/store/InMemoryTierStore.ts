/**
 * 进程内层级存储基类
 * 读写都做深拷贝，调用方拿到的对象与存储内部互不影响
 */

import type { MemoryRecord, Tier } from '../memory/types.js'
import type { KeyedTierStore, TierStoreStatus } from './types.js'

export abstract class InMemoryTierStore<T extends Tier> implements KeyedTierStore<T> {
  protected readonly records = new Map<string, MemoryRecord<T>>()

  constructor(readonly tier: T) {}

  async read(key: string): Promise<MemoryRecord<T> | null> {
    const record = this.records.get(key)
    return record ? structuredClone(record) : null
  }

  async write(record: MemoryRecord<T>): Promise<void> {
    this.records.set(record.key, structuredClone(record))
  }

  async delete(key: string): Promise<boolean> {
    return this.records.delete(key)
  }

  async touch(key: string, at: string): Promise<void> {
    const record = this.records.get(key)
    if (record) record.lastAccessedAt = at
  }

  async status(): Promise<TierStoreStatus> {
    return { tier: this.tier, backend: 'memory', records: this.records.size, healthy: true }
  }

  protected snapshot(): MemoryRecord<T>[] {
    return Array.from(this.records.values(), record => structuredClone(record))
  }
}
