/**
 * loadConfig tests
 * 配置加载、缓存、回退与环境变量覆盖
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const TEST_DIR = join(tmpdir(), `lead-relay-config-test-${Date.now()}`)
const HOME_DIR = join(TEST_DIR, 'home')
const PROJECT_DIR = join(TEST_DIR, 'project')

// 隔离用户真实的 ~/.lead-relay.yaml
vi.mock('os', async importOriginal => {
  const os = await importOriginal<typeof import('os')>()
  return { ...os, homedir: () => HOME_DIR }
})

const { loadConfig, getDefaultConfig, clearConfigCache, applyEnvOverrides, CONFIG_FILENAME } =
  await import('../loadConfig.js')

beforeEach(() => {
  clearConfigCache()
  mkdirSync(HOME_DIR, { recursive: true })
  mkdirSync(PROJECT_DIR, { recursive: true })
})

afterEach(() => {
  clearConfigCache()
  vi.unstubAllEnvs()
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('loadConfig', () => {
  it('should return defaults when no config file exists', async () => {
    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should load values from the project YAML file', async () => {
    writeFileSync(
      join(PROJECT_DIR, CONFIG_FILENAME),
      `
memory:
  thresholds:
    episodicOutcome: 0.85
consolidation:
  interval: 1m
`
    )
    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.memory.thresholds.episodicOutcome).toBe(0.85)
    expect(config.memory.thresholds.longTermInteractions).toBe(5)
    expect(config.consolidation.interval).toBe('1m')
  })

  it('should merge the project file over the global file', async () => {
    writeFileSync(
      join(HOME_DIR, CONFIG_FILENAME),
      `
escalation:
  highValueThreshold: 5000
  confidenceFloor: 0.5
`
    )
    writeFileSync(
      join(PROJECT_DIR, CONFIG_FILENAME),
      `
escalation:
  confidenceFloor: 0.7
`
    )
    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.escalation).toEqual({ highValueThreshold: 5000, confidenceFloor: 0.7 })
  })

  it('should fall back to defaults on invalid files', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'server:\n  port: not-a-port\n')
    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.server.port).toBe(3000)
  })

  it('should treat an empty file as defaults', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), '# nothing here\n')
    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should cache the loaded config', async () => {
    const first = await loadConfig({ cwd: PROJECT_DIR })
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'server:\n  port: 4000\n')
    const second = await loadConfig({ cwd: PROJECT_DIR })
    expect(second).toBe(first)
  })
})

describe('applyEnvOverrides', () => {
  it('should override escalation thresholds and interval', () => {
    vi.stubEnv('LEAD_RELAY_HIGH_VALUE_THRESHOLD', '2500')
    vi.stubEnv('LEAD_RELAY_CONSOLIDATION_INTERVAL', '30s')
    const config = applyEnvOverrides(getDefaultConfig())
    expect(config.escalation.highValueThreshold).toBe(2500)
    expect(config.escalation.confidenceFloor).toBe(0.6)
    expect(config.consolidation.interval).toBe('30s')
  })

  it('should ignore non-numeric numbers', () => {
    vi.stubEnv('LEAD_RELAY_SERVER_PORT', 'abc')
    expect(applyEnvOverrides(getDefaultConfig()).server.port).toBe(3000)
  })

  it('should reject invalid overrides', () => {
    vi.stubEnv('LEAD_RELAY_LONG_TERM_BACKEND', 'postgres')
    expect(() => applyEnvOverrides(getDefaultConfig())).toThrow('Invalid LEAD_RELAY_* environment override')
  })
})
