/**
 * Result 类型 - 显式化成功/失败结果
 * 需要保存并重放的结果（幂等交接、各规则的合并结果）用它承载
 */

import { AppError } from './error.js'

export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

// 解包 - 失败时抛出错误
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}

// 将 Promise 包装为 Result，错误统一为 AppError
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, AppError>> {
  try {
    return ok(await promise)
  } catch (e) {
    return err(AppError.from(e))
  }
}
