/**
 * 统一存储路径常量
 *
 * 数据目录优先级：
 * 1. 环境变量 LEAD_RELAY_DATA_DIR
 * 2. 默认值 .lead-relay-data
 */

import { isAbsolute, join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.lead-relay-data'

export function getDataDir(): string {
  const envDir = process.env.LEAD_RELAY_DATA_DIR
  if (envDir) {
    return isAbsolute(envDir) ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

/** 文件后端的长期记忆目录 */
export function getLongTermDir(dataDir: string = getDataDir()): string {
  return join(dataDir, 'long-term')
}
