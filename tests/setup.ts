/**
 * Vitest 全局设置
 * 所有测试结束后清理临时数据目录
 *
 * LEAD_RELAY_DATA_DIR 由 vitest.config.ts 指向临时目录
 */

import { rmSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { afterAll } from 'vitest'

const DATA_DIR = process.env.LEAD_RELAY_DATA_DIR || join(tmpdir(), 'lead-relay-test-data')

// 安全检查：拒绝清理非临时目录
const isSafeDir = DATA_DIR.startsWith(tmpdir()) || DATA_DIR.includes('lead-relay-test')

afterAll(() => {
  if (!isSafeDir) {
    console.warn(`[setup] Refusing to clean non-temp data dir: ${DATA_DIR}`)
    return
  }
  if (existsSync(DATA_DIR)) {
    rmSync(DATA_DIR, { recursive: true, force: true })
  }
})
