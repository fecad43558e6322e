/**
 * ID 生成工具
 */

import { randomUUID } from 'crypto'

export function generateId(): string {
  return randomUUID()
}

// 带前缀的短 ID，如 ticket-1a2b3c4d
export function generatePrefixedId(prefix: string): string {
  return `${prefix}-${randomUUID().slice(0, 8)}`
}
