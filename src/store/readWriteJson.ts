/**
 * JSON 文件读写工具
 *
 * 读取时用 zod schema 做运行时校验，损坏的文件抛错而不是当作缺失；写入默认原子化。
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import type { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { ValidationError } from '../shared/error.js'
import type { JsonWriteOptions } from './types.js'

const logger = createLogger('json-io')

/**
 * 同步读取 JSON 文件
 *
 * @returns 校验通过的对象；文件不存在返回 null
 * @throws ValidationError 文件存在但无法解析或未通过校验，调用方不能把损坏的记录当作缺失
 */
export function readJson<T>(filepath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!existsSync(filepath)) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(filepath, 'utf-8'))
  } catch (e) {
    logger.warn(`Failed to parse JSON: ${filepath} (${getErrorMessage(e)})`)
    throw new ValidationError(`Corrupt JSON file: ${filepath}`, [getErrorMessage(e)], {
      cause: e,
      context: { filepath },
    })
  }

  const result = schema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    logger.warn(`JSON validation failed: ${filepath}`, issues)
    throw new ValidationError(`Invalid JSON file: ${filepath}`, issues, { context: { filepath } })
  }
  return result.data
}

/**
 * 同步写入 JSON 文件
 * 默认先写临时文件再 rename，防止写入中断导致数据损坏
 */
export function writeJson(filepath: string, data: unknown, options?: JsonWriteOptions): void {
  const indent = options?.indent ?? 2
  const atomic = options?.atomic ?? true
  const content = JSON.stringify(data, null, indent)

  ensureDir(dirname(filepath))

  if (atomic) {
    const tempPath = `${filepath}.tmp`
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, filepath)
  } else {
    writeFileSync(filepath, content, 'utf-8')
  }
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
