/**
 * 时间处理工具
 * 时钟注入、耗时格式化与调度间隔换算
 */

/** 可注入的时钟，测试中替换为固定时间 */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()

// 格式化持续时间
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`
}

export type IntervalUnit = 's' | 'm' | 'h' | 'd'

export interface Interval {
  value: number
  unit: IntervalUnit
}

const INTERVAL_PATTERN = /^(\d+)([smhd])$/

function isIntervalUnit(unit: string): unit is IntervalUnit {
  return unit === 's' || unit === 'm' || unit === 'h' || unit === 'd'
}

// 解析时间间隔字符串（如 "5m", "1h", "1d"）
export function parseInterval(interval: string): Interval {
  const match = INTERVAL_PATTERN.exec(interval)
  if (!match?.[1] || !match[2] || !isIntervalUnit(match[2])) {
    throw new Error(`Invalid interval format: ${interval}`)
  }
  return { value: parseInt(match[1], 10), unit: match[2] }
}

/**
 * cron 的步长在每个周期边界重置（`*\/45` 分钟会在 :00 和 :45 触发），
 * 只有能整除上一级周期的值才是等间隔
 */
const UNIT_PERIOD: Record<Exclude<IntervalUnit, 'd'>, number> = { s: 60, m: 60, h: 24 }

// 将间隔转换为 cron 表达式（node-cron 支持秒字段）
export function intervalToCron(interval: string): string {
  const { value, unit } = parseInterval(interval)
  if (value <= 0) throw new Error(`Interval must be positive: ${interval}`)

  switch (unit) {
    case 's':
    case 'm':
    case 'h': {
      const period = UNIT_PERIOD[unit]
      if (period % value !== 0) {
        throw new Error(`Interval ${interval} does not evenly divide ${period}${unit}`)
      }
      if (unit === 's') return `*/${value} * * * * *`
      if (unit === 'm') return `*/${value} * * * *`
      return `0 */${value} * * *`
    }
    case 'd':
      if (value !== 1) throw new Error(`Day intervals other than 1d are not supported: ${interval}`)
      return '0 0 * * *'
  }
}
