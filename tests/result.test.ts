/**
 * Result 类型单元测试
 */

import { describe, it, expect } from 'vitest'
import { ok, err, unwrap, fromPromise } from '../src/shared/result.js'
import { AppError, UnavailableError } from '../src/shared/error.js'

describe('Result 构造函数', () => {
  it('ok 应创建成功结果', () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 })
    expect(ok(null)).toEqual({ ok: true, value: null })
  })

  it('err 应创建失败结果', () => {
    const error = new UnavailableError('store down')
    expect(err(error)).toEqual({ ok: false, error })
  })
})

describe('unwrap', () => {
  it('unwrap 应返回值或抛出保存的错误', () => {
    const error = new UnavailableError('store down')

    expect(unwrap(ok('value'))).toBe('value')
    expect(() => unwrap(err(error))).toThrow(error)
  })
})

describe('fromPromise', () => {
  it('应包装成功的 Promise', async () => {
    expect(await fromPromise(Promise.resolve(7))).toEqual({ ok: true, value: 7 })
  })

  it('应把任意拒绝值规范化为 AppError', async () => {
    const result = await fromPromise(Promise.reject(new Error('disk full')))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AppError)
      expect(result.error.code).toBe('ERR_UNKNOWN')
      expect(result.error.message).toBe('disk full')
    }
  })

  it('应保留已有的 AppError', async () => {
    const error = new UnavailableError('store down')

    const result = await fromPromise(Promise.reject(error))

    expect(result).toEqual({ ok: false, error })
  })
})
