/**
 * 重试策略
 * 指数退避 + 可选 jitter + 错误分类，全程可取消
 */

import { createLogger } from './logger.js'
import { getErrorMessage } from './assertError.js'
import { AppError, CancelledError } from './error.js'
import { sleep, throwIfAborted } from './abort.js'

const logger = createLogger('retry')

// ============ 错误分类 ============

export type RetryErrorCategory =
  | 'transient' // 暂时性错误，应该重试（存储不可达、投递超时等）
  | 'permanent' // 永久性错误，不应重试（校验失败、状态冲突）

export interface ClassifiedError {
  category: RetryErrorCategory
  message: string
  originalError: unknown
  retryable: boolean
}

const TRANSIENT_MARKERS = [
  'timeout',
  'timed out',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'network',
  '503',
  '502',
  'temporarily unavailable',
  'connection reset',
  'epipe',
  'etimedout',
]

/**
 * 错误分类器
 * AppError 按自身类别判断；其他错误按消息判断是否像传输层故障
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = getErrorMessage(error)

  if (error instanceof AppError) {
    return {
      category: error.retryable ? 'transient' : 'permanent',
      message,
      originalError: error,
      retryable: error.retryable,
    }
  }

  const lowerMessage = message.toLowerCase()
  const transient = TRANSIENT_MARKERS.some(marker => lowerMessage.includes(marker))
  return {
    category: transient ? 'transient' : 'permanent',
    message,
    originalError: error,
    retryable: transient,
  }
}

// ============ 重试配置 ============

export interface RetryConfig {
  maxAttempts: number // 最大尝试次数（含首次）
  baseDelayMs: number // 基础延迟（毫秒）
  maxDelayMs: number // 最大延迟（毫秒）
  backoffMultiplier: number // 退避乘数
  jitterFactor: number // 抖动因子 (0-1)
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0,
}

/**
 * 计算第 attempt 次失败后的等待时间
 * baseDelay * multiplier^(attempt-1)，再叠加 jitter
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt - 1)
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs)
  const jitter = (Math.random() * 2 - 1) * config.jitterFactor * cappedDelay
  return Math.max(0, Math.round(cappedDelay + jitter))
}

export interface RetryDecision {
  shouldRetry: boolean
  delayMs: number
  reason: string
  attempt: number
}

export function shouldRetry(
  error: unknown,
  attempt: number,
  config: RetryConfig,
  classify: (error: unknown) => ClassifiedError = classifyError
): RetryDecision {
  const classified = classify(error)
  if (!classified.retryable) {
    return {
      shouldRetry: false,
      delayMs: 0,
      reason: `Error is not retryable (${classified.category}): ${classified.message.slice(0, 100)}`,
      attempt,
    }
  }
  if (attempt >= config.maxAttempts) {
    return {
      shouldRetry: false,
      delayMs: 0,
      reason: `Max attempts reached (${attempt}/${config.maxAttempts})`,
      attempt,
    }
  }
  return {
    shouldRetry: true,
    delayMs: calculateRetryDelay(attempt, config),
    reason: `Retrying ${classified.category} error (attempt ${attempt + 1}/${config.maxAttempts})`,
    attempt,
  }
}

// ============ 重试执行器 ============

export type RetryResult<T> =
  | { success: true; value: T; attempts: number; totalDelayMs: number }
  | { success: false; error: ClassifiedError; attempts: number; totalDelayMs: number }

export interface RetryOptions {
  config?: Partial<RetryConfig>
  signal?: AbortSignal
  onRetry?: (decision: RetryDecision, error: unknown) => void
  /** 替换默认的错误分类 */
  classify?: (error: unknown) => ClassifiedError
}

/**
 * 带重试的执行函数
 * 取消信号在每次尝试前和退避等待中生效，取消时抛出 CancelledError
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.config }
  const classify = options.classify ?? classifyError
  let attempt = 1
  let totalDelayMs = 0

  while (true) {
    throwIfAborted(options.signal)
    try {
      const value = await operation(attempt)
      return { success: true, value, attempts: attempt, totalDelayMs }
    } catch (error) {
      if (error instanceof CancelledError) throw error

      const decision = shouldRetry(error, attempt, config, classify)
      logger.debug(
        `Attempt ${attempt} failed: ${decision.reason}`,
        decision.shouldRetry ? `Retrying in ${decision.delayMs}ms` : 'Not retrying'
      )

      if (!decision.shouldRetry) {
        return { success: false, error: classify(error), attempts: attempt, totalDelayMs }
      }

      options.onRetry?.(decision, error)
      await sleep(decision.delayMs, options.signal)
      totalDelayMs += decision.delayMs
      attempt++
    }
  }
}
