/**
 * 按 key 串行化的进程内锁
 *
 * 同一 key 的调用按到达顺序依次执行，不同 key 互不阻塞。
 * 排队中的调用可被取消，取消不会打乱后续调用的顺序。
 */

import { raceAbort, throwIfAborted } from './abort.js'

export class KeyedLock {
  private tails = new Map<string, Promise<void>>()

  async run<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    throwIfAborted(signal)

    const previous = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    try {
      await raceAbort(previous, signal)
      return await fn()
    } finally {
      release()
      // 取消的等待者也要等前驱结束后才能清理，否则新来者会越过仍在执行的前驱
      void tail.then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key)
      })
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }

  /** 当前持有或等待中的 key 数量 */
  get size(): number {
    return this.tails.size
  }
}

export const lockKeys = {
  lead: (leadId: string) => `lead:${leadId}`,
  conversation: (conversationId: string) => `conversation:${conversationId}`,
  record: (tier: string, key: string) => `record:${tier}:${key}`,
}
