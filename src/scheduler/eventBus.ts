/**
 * 事件总线
 * 类型化的发布订阅，用于模块间解耦通信
 *
 * 每个监听器至少投递一次：失败时重投，直到成功或达到 deliveryAttempts。
 * 监听器的失败只记录日志，不会抛给发布方。消费方需要容忍重复投递。
 */

import { createLogger, logError } from '../shared/logger.js'
import { sleep } from '../shared/abort.js'

const logger = createLogger('event-bus')

export type EventHandler<T> = (payload: T) => void | Promise<void>

export interface EventBus<Events extends object> {
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void
  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void
  once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void
  /** 等待所有监听器投递完成（或用尽重投次数） */
  emit<K extends keyof Events>(event: K, payload: Events[K]): Promise<void>
  listenerCount(event: keyof Events): number
  clear(event?: keyof Events): void
}

export interface EventBusOptions {
  /** 每个监听器的最大投递次数，默认 3 */
  deliveryAttempts?: number
  /** 重投间隔，默认 0 */
  retryDelayMs?: number
}

type HandlerRegistry<Events extends object> = { [K in keyof Events]?: Set<EventHandler<Events[K]>> }

export function createEventBus<Events extends object>(options: EventBusOptions = {}): EventBus<Events> {
  const deliveryAttempts = Math.max(1, options.deliveryAttempts ?? 3)
  const retryDelayMs = options.retryDelayMs ?? 0
  const handlers: HandlerRegistry<Events> = {}

  async function deliver<K extends keyof Events>(
    event: K,
    handler: EventHandler<Events[K]>,
    payload: Events[K]
  ): Promise<void> {
    for (let attempt = 1; attempt <= deliveryAttempts; attempt++) {
      try {
        await handler(payload)
        return
      } catch (error) {
        if (attempt === deliveryAttempts) {
          logError(logger, `Listener for ${String(event)} failed after ${attempt} attempts`, error, { attempt })
          return
        }
        logger.debug(`Listener for ${String(event)} failed (attempt ${attempt}/${deliveryAttempts}), redelivering`)
        if (retryDelayMs > 0) await sleep(retryDelayMs)
      }
    }
  }

  const bus: EventBus<Events> = {
    on(event, handler) {
      let set = handlers[event]
      if (!set) {
        set = new Set()
        handlers[event] = set
      }
      set.add(handler)
      return () => bus.off(event, handler)
    },

    off(event, handler) {
      handlers[event]?.delete(handler)
    },

    once(event, handler) {
      const wrapper: typeof handler = async payload => {
        bus.off(event, wrapper)
        await handler(payload)
      }
      return bus.on(event, wrapper)
    },

    async emit(event, payload) {
      const set = handlers[event]
      if (!set || set.size === 0) return
      await Promise.all(Array.from(set, handler => deliver(event, handler, payload)))
    },

    listenerCount(event) {
      return handlers[event]?.size ?? 0
    },

    clear(event) {
      if (event !== undefined) {
        delete handlers[event]
      } else {
        for (const key of Object.keys(handlers)) {
          Reflect.deleteProperty(handlers, key)
        }
      }
    },
  }

  return bus
}
