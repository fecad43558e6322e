/**
 * 取消信号辅助
 * 所有挂起点（存储调用、投递、退避等待、排队等锁）都经由这里响应 AbortSignal
 */

import { CancelledError } from './error.js'

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(reasonOf(signal))
  }
}

function reasonOf(signal: AbortSignal): string {
  return signal.reason instanceof Error ? signal.reason.message : 'Operation cancelled'
}

/** 可取消的等待 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(reasonOf(signal)))
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(new CancelledError(signal ? reasonOf(signal) : undefined))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/** 在 promise 与取消信号之间竞争，取消时立即拒绝（promise 本身继续运行） */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  if (signal.aborted) return Promise.reject(new CancelledError(reasonOf(signal)))
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError(reasonOf(signal)))
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}
