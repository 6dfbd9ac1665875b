import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import type { z } from 'zod'

import type { Logger } from './types.js'

/**
 * File-backed string-keyed map, validated with a zod schema on load.
 *
 * Keys are stored as given; callers normalize usernames before use.
 * Any string is a key, `__proto__` included.
 */
export class JsonStore<T> {
  private map = new Map<string, T>()

  constructor(
    private readonly path: string,
    private readonly valueSchema: z.ZodType<T>,
    private readonly logger: Logger
  ) {}

  /** Loads persisted state and ensures the data directory exists. */
  async init(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })

    let raw: string
    try {
      raw = await readFile(this.path, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) {
        this.map = new Map()
        return
      }
      throw error
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      this.logger.warn('store.load_failed', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error)
      })
      this.map = new Map()
      return
    }

    // JSON.parse keeps `__proto__` as an own key; a zod record would drop it.
    if (!isJsonObject(parsed)) {
      this.logger.warn('store.load_failed', { path: this.path, error: 'Expected a JSON object' })
      this.map = new Map()
      return
    }

    const map = new Map<string, T>()
    for (const [key, value] of Object.entries(parsed)) {
      const result = this.valueSchema.safeParse(value)
      if (!result.success) {
        this.logger.warn('store.load_failed', { path: this.path, key, error: result.error.message })
        this.map = new Map()
        return
      }
      map.set(key, result.data)
    }
    this.map = map
  }

  get(key: string): T | undefined {
    return this.map.get(key)
  }

  has(key: string): boolean {
    return this.map.has(key)
  }

  /** Returns a copy of all entries in insertion order. */
  entries(): Array<[string, T]> {
    return [...this.map.entries()]
  }

  size(): number {
    return this.map.size
  }

  /** Upserts a value and persists to disk atomically. */
  async set(key: string, value: T): Promise<void> {
    this.map.set(key, value)
    await this.persist()
  }

  /** Deletes a key and persists if it existed. */
  async delete(key: string): Promise<boolean> {
    if (!this.map.delete(key)) return false
    await this.persist()
    return true
  }

  private async persist(): Promise<void> {
    const tmp = `${this.path}.tmp`
    await writeFile(tmp, JSON.stringify(Object.fromEntries(this.map), null, 2), 'utf-8')
    await rename(tmp, this.path)
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}
