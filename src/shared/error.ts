/**
 * 统一错误处理系统
 * 错误分类、关联上下文、RPC 错误码和修复建议
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'VALIDATION' // 输入格式错误，立即拒绝
  | 'NOT_FOUND' // 记录不存在
  | 'OWNERSHIP' // 调用方不持有会话
  | 'STATE' // 非法状态迁移
  | 'UNAVAILABLE' // 暂时性基础设施故障
  | 'HANDOFF' // 交接投递终态失败
  | 'PERMISSION' // 权限不足
  | 'CANCELLED' // 调用方取消
  | 'CONFIG' // 配置错误
  | 'UNKNOWN'

export type ErrorCode =
  | 'ERR_VALIDATION'
  | 'ERR_NOT_FOUND'
  | 'ERR_OWNERSHIP'
  | 'ERR_INVALID_STATE'
  | 'ERR_UNAVAILABLE'
  | 'ERR_HANDOFF_FAILED'
  | 'ERR_PERMISSION'
  | 'ERR_CANCELLED'
  | 'ERR_CONFIG'
  | 'ERR_METHOD_NOT_FOUND'
  | 'ERR_UNKNOWN'

export interface AppErrorOptions {
  cause?: unknown
  suggestion?: string
  /** 关联 ID（handoffId / leadId / tier / key ...） */
  context?: Record<string, unknown>
}

// JSON-RPC 风格错误码
const RPC_CODES: Record<ErrorCode, number> = {
  ERR_METHOD_NOT_FOUND: -32601,
  ERR_VALIDATION: -32602,
  ERR_UNKNOWN: -32603,
  ERR_CONFIG: -32603,
  ERR_PERMISSION: -32001,
  ERR_NOT_FOUND: -32004,
  ERR_OWNERSHIP: -32010,
  ERR_INVALID_STATE: -32011,
  ERR_UNAVAILABLE: -32020,
  ERR_HANDOFF_FAILED: -32030,
  ERR_CANCELLED: -32040,
}

const categoryLabels: Record<ErrorCategory, string> = {
  VALIDATION: 'Validation',
  NOT_FOUND: 'Not found',
  OWNERSHIP: 'Ownership',
  STATE: 'State',
  UNAVAILABLE: 'Unavailable',
  HANDOFF: 'Handoff',
  PERMISSION: 'Permission',
  CANCELLED: 'Cancelled',
  CONFIG: 'Config',
  UNKNOWN: 'Unknown',
}

const categoryColors: Record<ErrorCategory, (s: string) => string> = {
  VALIDATION: chalk.yellow,
  NOT_FOUND: chalk.gray,
  OWNERSHIP: chalk.magenta,
  STATE: chalk.magenta,
  UNAVAILABLE: chalk.red,
  HANDOFF: chalk.red,
  PERMISSION: chalk.red,
  CANCELLED: chalk.gray,
  CONFIG: chalk.yellow,
  UNKNOWN: chalk.white,
}

// ============ 统一错误类 ============

export class AppError extends Error {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly suggestion?: string
  readonly context: Record<string, unknown>

  constructor(code: ErrorCode, message: string, category: ErrorCategory = 'UNKNOWN', options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'AppError'
    this.code = code
    this.category = category
    this.suggestion = options.suggestion
    this.context = options.context ?? {}
  }

  /** 只有暂时性故障可以重试 */
  get retryable(): boolean {
    return this.category === 'UNAVAILABLE'
  }

  get rpcCode(): number {
    return RPC_CODES[this.code]
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const colorFn = categoryColors[this.category]
    const lines = [
      '',
      `${chalk.red('✗')} ${chalk.bold('Error')} [${colorFn(categoryLabels[this.category])}]`,
      chalk.dim(`  code: ${this.code}`),
      `  ${this.message}`,
    ]
    const contextEntries = Object.entries(this.context)
    if (contextEntries.length > 0) {
      lines.push(chalk.dim(`  ${contextEntries.map(([k, v]) => `${k}=${String(v)}`).join(' ')}`))
    }
    if (this.suggestion) {
      lines.push(chalk.cyan('  suggestion:'), `${chalk.dim('    →')} ${this.suggestion}`)
    }
    lines.push('')
    return lines.join('\n')
  }

  /** 将任意抛出值规范化为 AppError */
  static from(error: unknown): AppError {
    if (error instanceof AppError) return error
    return new AppError('ERR_UNKNOWN', getErrorMessage(error), 'UNKNOWN', { cause: error })
  }
}

// ============ 领域错误 ============

export class ValidationError extends AppError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = [], options: AppErrorOptions = {}) {
    super('ERR_VALIDATION', message, 'VALIDATION', options)
    this.name = 'ValidationError'
    this.issues = issues
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string, options: AppErrorOptions = {}) {
    super('ERR_NOT_FOUND', `${entity} not found: ${id}`, 'NOT_FOUND', options)
    this.name = 'NotFoundError'
  }
}

export class OwnershipError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ERR_OWNERSHIP', message, 'OWNERSHIP', {
      suggestion: 'Reload the conversation and retry as its current owner',
      ...options,
    })
    this.name = 'OwnershipError'
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ERR_INVALID_STATE', message, 'STATE', options)
    this.name = 'InvalidStateError'
  }
}

export class UnavailableError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ERR_UNAVAILABLE', message, 'UNAVAILABLE', options)
    this.name = 'UnavailableError'
  }
}

export class HandoffFailedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ERR_HANDOFF_FAILED', message, 'HANDOFF', {
      suggestion: 'Inspect the target inbox and call remediateHandoffFailure',
      ...options,
    })
    this.name = 'HandoffFailedError'
  }
}

export class PermissionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ERR_PERMISSION', message, 'PERMISSION', options)
    this.name = 'PermissionError'
  }
}

export class CancelledError extends AppError {
  constructor(message: string = 'Operation cancelled', options: AppErrorOptions = {}) {
    super('ERR_CANCELLED', message, 'CANCELLED', options)
    this.name = 'CancelledError'
  }
}

export class MethodNotFoundError extends AppError {
  constructor(method: string) {
    super('ERR_METHOD_NOT_FOUND', `Method not found: ${method}`, 'VALIDATION')
    this.name = 'MethodNotFoundError'
  }
}

/**
 * 穷尽检查辅助函数
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${String(value)}`)
}
