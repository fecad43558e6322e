/**
 * 泛型文件存储类
 *
 * 每个实体一个 JSON 文件，读取时经 zod schema 校验，写入原子化。
 * key 经 encodeURIComponent 转为文件名，允许包含 `:` `>` 等字符。
 */

import { existsSync, readdirSync, unlinkSync } from 'fs'
import { join } from 'path'
import type { z } from 'zod'
import { readJson, writeJson, ensureDir } from './readWriteJson.js'

export interface FileStoreOptions<T> {
  /** 存储目录 */
  dir: string
  /** 实体 schema，读取时校验 */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  /** 文件扩展名，默认 .json */
  ext?: string
}

/**
 * @example
 * ```ts
 * const store = new FileStore({ dir: 'data/profiles', schema: profileSchema })
 * await store.set('profile:L1', profile)
 * const hot = await store.query(p => p.rfmScore > 0.8)
 * ```
 */
export class FileStore<T> {
  private readonly dir: string
  private readonly ext: string
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>

  constructor(options: FileStoreOptions<T>) {
    this.dir = options.dir
    this.ext = options.ext ?? '.json'
    this.schema = options.schema
    ensureDir(this.dir)
  }

  getDir(): string {
    return this.dir
  }

  private getDataPath(id: string): string {
    return join(this.dir, `${encodeURIComponent(id)}${this.ext}`)
  }

  /** 列出所有实体 ID */
  listSync(): string[] {
    if (!existsSync(this.dir)) return []
    return readdirSync(this.dir)
      .filter(f => f.endsWith(this.ext))
      .map(f => decodeURIComponent(f.slice(0, -this.ext.length)))
  }

  async get(id: string): Promise<T | null> {
    return readJson(this.getDataPath(id), this.schema)
  }

  async set(id: string, data: T): Promise<void> {
    writeJson(this.getDataPath(id), data)
  }

  async delete(id: string): Promise<boolean> {
    const filepath = this.getDataPath(id)
    if (!existsSync(filepath)) return false
    unlinkSync(filepath)
    return true
  }

  async exists(id: string): Promise<boolean> {
    return existsSync(this.getDataPath(id))
  }

  async getAll(): Promise<T[]> {
    const results: T[] = []
    for (const id of this.listSync()) {
      const data = await this.get(id)
      if (data !== null) results.push(data)
    }
    return results
  }

  async query(predicate: (item: T) => boolean): Promise<T[]> {
    const items = await this.getAll()
    return items.filter(predicate)
  }

  /**
   * 读取-修改-写回
   * @returns 是否存在并已更新
   */
  async update(id: string, mutate: (existing: T) => T): Promise<boolean> {
    const existing = await this.get(id)
    if (existing === null) return false
    await this.set(id, mutate(existing))
    return true
  }

  async count(): Promise<number> {
    return this.listSync().length
  }
}
