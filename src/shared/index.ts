/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: ok/err/unwrap/fromPromise
 * - AppError 及领域错误（Validation/NotFound/Ownership/InvalidState/Unavailable/HandoffFailed/...）
 * - Logger: createLogger/setLogLevel/setLogMode/logError/createErrorLogger
 * - 重试: withRetry/classifyError/calculateRetryDelay
 * - 取消: sleep/throwIfAborted/raceAbort
 * - 锁: KeyedLock/lockKeys
 * - 时间: formatDuration/parseInterval/intervalToCron
 */

export { type Result, ok, err, unwrap, fromPromise } from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  type AppErrorOptions,
  AppError,
  ValidationError,
  NotFoundError,
  OwnershipError,
  InvalidStateError,
  UnavailableError,
  HandoffFailedError,
  PermissionError,
  CancelledError,
  MethodNotFoundError,
  assertNever,
} from './error.js'

export {
  type LogLevel,
  type LogMode,
  type Logger,
  type ErrorContext,
  createLogger,
  setLogLevel,
  getLogLevel,
  setLogMode,
  logError,
  createErrorLogger,
} from './logger.js'

export {
  type RetryConfig,
  type RetryResult,
  type RetryOptions,
  type RetryDecision,
  type ClassifiedError,
  DEFAULT_RETRY_CONFIG,
  classifyError,
  calculateRetryDelay,
  shouldRetry,
  withRetry,
} from './retryStrategy.js'

export { sleep, throwIfAborted, raceAbort } from './abort.js'
export { KeyedLock, lockKeys } from './keyedLock.js'
export { getErrorMessage } from './assertError.js'
export { generateId, generatePrefixedId } from './generateId.js'
export {
  type Clock,
  type Interval,
  type IntervalUnit,
  systemClock,
  formatDuration,
  parseInterval,
  intervalToCron,
} from './formatTime.js'
