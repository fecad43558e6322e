/**
 * 统一日志系统
 *
 * - 分级日志（debug/info/warn/error）
 * - 前台/后台模式切换（后台模式输出 scope）
 * - 带关联 ID 的错误日志（handoffId / leadId）
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

type EmitLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<EmitLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<EmitLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ 全局状态 ============

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

function initLogMode(): LogMode {
  if (process.env.LEAD_RELAY_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
let currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

export function setLogMode(mode: LogMode): void {
  currentMode = mode
}

function shouldLog(level: EmitLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function clock(): string {
  const d = new Date()
  const pad = (n: number) => n.toString().padStart(2, '0')
  return chalk.dim(`${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`)
}

function formatMessage(level: EmitLevel, scope: string, message: string, mode: LogMode): string {
  const label = LEVEL_COLORS[level](LEVEL_LABELS[level])
  if (mode === 'foreground' || !scope) {
    return `${clock()} ${label} ${message}`
  }
  return `${clock()} ${label} ${chalk.cyan(`[${scope}]`)} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  /** 设置此 logger 的输出模式 */
  setMode(mode: LogMode): void
  getMode(): LogMode
}

export function createLogger(scope: string = ''): Logger {
  // 每个 logger 可以有自己的模式，默认跟随全局
  let localMode: LogMode | null = null

  function write(level: EmitLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return
    const output = formatMessage(level, scope, message, localMode ?? currentMode)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message, ...args) {
      write('debug', message, args)
    },
    info(message, ...args) {
      write('info', message, args)
    },
    warn(message, ...args) {
      write('warn', message, args)
    },
    error(message, ...args) {
      write('error', message, args)
    },
    setMode(mode) {
      localMode = mode
    },
    getMode() {
      return localMode ?? currentMode
    },
  }
}

// ============ 错误日志增强 ============

/** 终态失败的关联信息，足以在没有其他上下文时复原现场 */
export interface ErrorContext {
  handoffId?: string
  leadId?: string
  conversationId?: string
  tier?: string
  key?: string
  attempt?: number
  [key: string]: unknown
}

/**
 * 记录带上下文的错误日志
 *
 * @example
 * logError(logger, 'Handoff delivery exhausted', err, {
 *   handoffId: 'h-1',
 *   leadId: 'L1',
 *   attempt: 3,
 * })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: unknown,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : String(error)
  const errorStack = error instanceof Error ? error.stack : undefined

  const data: Record<string, unknown> = {}
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) data[key] = value
    }
  }

  // 截取前几行堆栈避免过长
  if (errorStack) {
    data.stack = errorStack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(`${message}: ${errorMessage}`, data)
  } else {
    loggerInstance.error(`${message}: ${errorMessage}`)
  }
}

/**
 * 绑定上下文的错误日志函数
 *
 * @example
 * const logHandoffError = createErrorLogger(logger, { handoffId, leadId })
 * logHandoffError('Delivery failed', error)
 */
export function createErrorLogger(
  loggerInstance: Logger,
  baseContext: ErrorContext
): (message: string, error: unknown, extra?: ErrorContext) => void {
  return (message, error, extra) => {
    logError(loggerInstance, message, error, { ...baseContext, ...extra })
  }
}
