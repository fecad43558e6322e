/**
 * readWriteJson 测试
 *
 * 覆盖:
 * - readJson: 读取、缺失文件、损坏文件抛错、schema 校验
 * - writeJson: 原子写入、目录自动创建
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, existsSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { z } from 'zod'
import { readJson, writeJson, ensureDir } from '../src/store/readWriteJson.js'
import { ValidationError } from '../src/shared/error.js'

const profileSchema = z.object({ leadId: z.string(), rfmScore: z.number() }).strict()

let testDir: string

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'lead-relay-rw-test-'))
})

afterEach(() => {
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true })
  }
})

describe('readJson', () => {
  it('should read a file that matches the schema', () => {
    const filepath = join(testDir, 'profile.json')
    writeFileSync(filepath, JSON.stringify({ leadId: 'L1', rfmScore: 0.5 }))

    expect(readJson(filepath, profileSchema)).toEqual({ leadId: 'L1', rfmScore: 0.5 })
  })

  it('should return null for a missing file', () => {
    expect(readJson(join(testDir, 'missing.json'), profileSchema)).toBeNull()
  })

  it('should throw on invalid JSON instead of reporting the file as missing', () => {
    const filepath = join(testDir, 'broken.json')
    writeFileSync(filepath, '{ not json')

    expect(() => readJson(filepath, profileSchema)).toThrow(`Corrupt JSON file: ${filepath}`)
  })

  it('should list schema issues when the content is rejected', () => {
    const filepath = join(testDir, 'extra.json')
    writeFileSync(filepath, JSON.stringify({ leadId: 'L1', rfmScore: 'high' }))

    let caught: unknown
    try {
      readJson(filepath, profileSchema)
    } catch (e) {
      caught = e
    }

    expect(caught).toBeInstanceOf(ValidationError)
    expect(caught).toMatchObject({
      message: `Invalid JSON file: ${filepath}`,
      issues: ['rfmScore: Expected number, received string'],
    })
  })
})

describe('writeJson', () => {
  it('should create parent directories and leave no temp file', () => {
    const filepath = join(testDir, 'nested', 'deep', 'profile.json')

    writeJson(filepath, { leadId: 'L2', rfmScore: 1 })

    expect(readFileSync(filepath, 'utf-8')).toBe('{\n  "leadId": "L2",\n  "rfmScore": 1\n}')
    expect(existsSync(`${filepath}.tmp`)).toBe(false)
  })

  it('should honour the indent option', () => {
    const filepath = join(testDir, 'compact.json')

    writeJson(filepath, { a: 1 }, { indent: 0, atomic: false })

    expect(readFileSync(filepath, 'utf-8')).toBe('{"a":1}')
  })
})

describe('ensureDir', () => {
  it('should be a no-op for an existing directory', () => {
    ensureDir(testDir)
    ensureDir(join(testDir, 'a', 'b'))

    expect(existsSync(join(testDir, 'a', 'b'))).toBe(true)
  })
})
