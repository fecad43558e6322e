/**
 * 事件总线 → 异步流
 *
 * 订阅在开始迭代时建立、结束时解除；缓冲区有上限，溢出时丢弃最旧的通知。
 * 达到 limit 或 signal 取消时流结束。
 */

import type { EventBus } from '../scheduler/eventBus.js'
import { createLogger } from '../shared/logger.js'
import { RELAY_EVENT_NAMES, type RelayEventMessage, type RelayEventName, type RelayEvents } from '../types/events.js'

const logger = createLogger('event-stream')

const DEFAULT_BUFFER_SIZE = 1000

export interface EventStreamOptions {
  /** 为空时订阅全部事件 */
  names?: readonly RelayEventName[]
  limit?: number
  signal?: AbortSignal
  bufferSize?: number
}

export async function* streamEvents(
  bus: EventBus<RelayEvents>,
  options: EventStreamOptions = {},
): AsyncGenerator<RelayEventMessage> {
  const { signal, limit } = options
  const names = options.names && options.names.length > 0 ? options.names : RELAY_EVENT_NAMES
  const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE
  const buffer: RelayEventMessage[] = []
  let wake: (() => void) | null = null

  const notify = () => {
    const resume = wake
    wake = null
    resume?.()
  }

  const unsubscribe = names.map(name =>
    bus.on(name, payload => {
      if (buffer.length >= bufferSize) {
        const dropped = buffer.shift()
        logger.warn(`Event stream buffer full, dropped ${dropped?.event ?? 'event'}`)
      }
      buffer.push({ event: name, payload })
      notify()
    }),
  )
  signal?.addEventListener('abort', notify)

  let delivered = 0
  try {
    while (!signal?.aborted && (limit === undefined || delivered < limit)) {
      const next = buffer.shift()
      if (next) {
        delivered++
        yield next
        continue
      }
      await new Promise<void>(resolve => {
        wake = resolve
      })
    }
  } finally {
    for (const off of unsubscribe) off()
    signal?.removeEventListener('abort', notify)
  }
}
