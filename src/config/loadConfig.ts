import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { ValidationError } from '../shared/error.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.lead-relay.yaml'

type RawConfig = Record<string, unknown>

let cachedConfig: Config | null = null

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录与 home 目录相同时，不重复加载
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 加载配置
 * 查找顺序：~/.lead-relay.yaml → 项目目录 → 环境变量覆盖
 * 文件格式错误时告警并回退默认配置
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)
  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

/**
 * 解析 YAML 文件，空文件或只有注释时返回空对象
 */
async function parseYamlFile(filePath: string): Promise<RawConfig> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    logger.warn(`Ignoring non-mapping config file: ${filePath}`)
    return {}
  }
  return parsed
}

/**
 * 合并配置对象：嵌套对象递归合并，数组和标量直接覆盖
 */
function deepMergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const existing = result[key]
    result[key] = isRecord(val) && isRecord(existing) ? deepMergeConfig(existing, val) : val
  }
  return result
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name]
  if (raw === undefined || raw === '') return undefined
  const value = Number(raw)
  if (Number.isNaN(value)) {
    logger.warn(`Ignoring non-numeric ${name}=${raw}`)
    return undefined
  }
  return value
}

/**
 * 应用环境变量覆盖，覆盖后的结果重新经过 schema 校验
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env
  const overlay: RawConfig = {}

  if (env.LEAD_RELAY_CONSOLIDATION_INTERVAL) {
    overlay.consolidation = { interval: env.LEAD_RELAY_CONSOLIDATION_INTERVAL }
  }

  const highValueThreshold = numberFromEnv('LEAD_RELAY_HIGH_VALUE_THRESHOLD')
  const confidenceFloor = numberFromEnv('LEAD_RELAY_CONFIDENCE_FLOOR')
  if (highValueThreshold !== undefined || confidenceFloor !== undefined) {
    overlay.escalation = { highValueThreshold, confidenceFloor }
  }

  const port = numberFromEnv('LEAD_RELAY_SERVER_PORT')
  if (port !== undefined) {
    overlay.server = { port }
  }

  if (env.LEAD_RELAY_LONG_TERM_BACKEND) {
    overlay.memory = { longTerm: { backend: env.LEAD_RELAY_LONG_TERM_BACKEND } }
  }

  if (Object.keys(overlay).length === 0) return config

  const result = configSchema.safeParse(deepMergeConfig(config, overlay))
  if (!result.success) {
    throw new ValidationError(
      'Invalid LEAD_RELAY_* environment override',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      { suggestion: 'Check the LEAD_RELAY_* variables in your environment' }
    )
  }
  return result.data
}

/**
 * 获取默认配置
 */
export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

/**
 * 清除配置缓存
 */
export function clearConfigCache(): void {
  cachedConfig = null
}
