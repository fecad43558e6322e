/**
 * 有界优先级队列
 * Agent 收件箱和人工队列共用：high > medium > low，同优先级先进先出
 */

import { type Result, ok, err } from '../shared/result.js'
import { AppError, NotFoundError, UnavailableError } from '../shared/error.js'
import type { Priority } from '../types/handoff.js'

export interface QueueItem<T> {
  id: string
  data: T
  priority: Priority
  /** 入队序号，同优先级按它排序 */
  sequence: number
  attempts: number
}

const PRIORITY_WEIGHTS: Record<Priority, number> = {
  high: 3,
  medium: 2,
  low: 1,
}

export interface QueueOptions {
  /** 容量上限，满时入队失败 */
  capacity?: number
  /** 出错信息中使用的队列名 */
  name?: string
}

export interface Queue<T> {
  readonly capacity: number
  // 入队，已存在的 id 原位替换；队列已满时抛出 UnavailableError
  enqueue(id: string, data: T, priority?: Priority): void
  // 出队（获取最高优先级条目）
  dequeue(): QueueItem<T> | null
  // 查看队首但不移除
  peek(): QueueItem<T> | null
  get(id: string): QueueItem<T> | null
  remove(id: string): boolean
  updatePriority(id: string, priority: Priority): Result<void, AppError>
  incrementAttempts(id: string): void
  size(): number
  isEmpty(): boolean
  isFull(): boolean
  clear(): void
  // 按出队顺序返回全部条目
  all(): QueueItem<T>[]
  filter(predicate: (item: QueueItem<T>) => boolean): QueueItem<T>[]
}

function compareItems<T>(a: QueueItem<T>, b: QueueItem<T>): number {
  const weightDiff = PRIORITY_WEIGHTS[b.priority] - PRIORITY_WEIGHTS[a.priority]
  return weightDiff !== 0 ? weightDiff : a.sequence - b.sequence
}

export function createQueue<T>(options: QueueOptions = {}): Queue<T> {
  const capacity = options.capacity ?? Number.POSITIVE_INFINITY
  const name = options.name ?? 'queue'
  const items = new Map<string, QueueItem<T>>()
  let sequence = 0

  function getNextItem(): QueueItem<T> | null {
    let best: QueueItem<T> | null = null
    for (const item of items.values()) {
      if (!best || compareItems(item, best) < 0) best = item
    }
    return best
  }

  return {
    capacity,

    enqueue(id: string, data: T, priority: Priority = 'medium'): void {
      const existing = items.get(id)
      if (existing) {
        existing.data = data
        existing.priority = priority
        return
      }
      if (items.size >= capacity) {
        throw new UnavailableError(`${name} is full (capacity ${capacity})`, { context: { queue: name, id } })
      }
      items.set(id, { id, data, priority, sequence: sequence++, attempts: 0 })
    },

    dequeue(): QueueItem<T> | null {
      const item = getNextItem()
      if (item) items.delete(item.id)
      return item
    },

    peek(): QueueItem<T> | null {
      return getNextItem()
    },

    get(id: string): QueueItem<T> | null {
      return items.get(id) ?? null
    },

    remove(id: string): boolean {
      return items.delete(id)
    },

    updatePriority(id: string, priority: Priority): Result<void, AppError> {
      const item = items.get(id)
      if (!item) {
        return err(new NotFoundError('Queue item', id))
      }
      item.priority = priority
      return ok(undefined)
    },

    incrementAttempts(id: string): void {
      const item = items.get(id)
      if (item) item.attempts++
    },

    size(): number {
      return items.size
    },

    isEmpty(): boolean {
      return items.size === 0
    },

    isFull(): boolean {
      return items.size >= capacity
    },

    clear(): void {
      items.clear()
    },

    all(): QueueItem<T>[] {
      return Array.from(items.values()).sort(compareItems)
    },

    filter(predicate: (item: QueueItem<T>) => boolean): QueueItem<T>[] {
      return Array.from(items.values()).filter(predicate)
    },
  }
}
