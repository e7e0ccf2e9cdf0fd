/**
 * Filesystem-based Input Cache for CLI
 *
 * Stores one JSON record per category. Records never expire.
 *
 * Directory structure:
 * ```
 * ~/.cache/coverletter-me/inputs/
 * ├── Resume.json
 * ├── Cover_Letter.json
 * ├── Job_description.json
 * ├── Additional_prompt.json
 * └── API_key.json
 * ```
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { CacheWriteError } from '../errors'
import { type CachedEntry, INPUT_CATEGORIES, type InputCategory } from '../types'
import { categoryRecordKey } from './key'
import type { CacheRecord, InputCache } from './types'

/**
 * Default cache directory (~/.cache/coverletter-me).
 */
export function getDefaultCacheDir(): string {
  return join(homedir(), '.cache', 'coverletter-me')
}

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = getDefaultCacheDir()
  if (cacheDir.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/coverletter-me/`
    )
  }
}

function isCacheRecord(data: unknown): data is CacheRecord {
  if (typeof data !== 'object' || data === null) return false
  const value: unknown = Reflect.get(data, 'value')
  const cachedAt: unknown = Reflect.get(data, 'cachedAt')
  return (typeof value === 'string' || value === null) && typeof cachedAt === 'number'
}

export class FilesystemInputCache implements InputCache {
  constructor(private readonly cacheDir: string) {
    guardAgainstUserCache(cacheDir)
  }

  async get(category: InputCategory): Promise<string | null> {
    return this.readRecord(category)?.value ?? null
  }

  async put(category: InputCategory, value: string | null): Promise<void> {
    const path = this.getRecordPath(category)
    const record: CacheRecord = { value, cachedAt: Date.now() }

    try {
      mkdirSync(this.inputsDir, { recursive: true })
      writeFileSync(path, JSON.stringify(record, null, 2))
    } catch (error) {
      throw new CacheWriteError(path, error)
    }
  }

  async list(): Promise<CachedEntry[]> {
    const entries: CachedEntry[] = []
    for (const category of INPUT_CATEGORIES) {
      const record = this.readRecord(category)
      if (record && record.value !== null) {
        entries.push({ category, value: record.value, cachedAt: record.cachedAt })
      }
    }
    return entries
  }

  /**
   * Get the file path for a category's record.
   */
  getRecordPath(category: InputCategory): string {
    return join(this.inputsDir, `${categoryRecordKey(category)}.json`)
  }

  private get inputsDir(): string {
    return join(this.cacheDir, 'inputs')
  }

  /**
   * Missing or unreadable records read as absent.
   */
  private readRecord(category: InputCategory): CacheRecord | null {
    const path = this.getRecordPath(category)
    if (!existsSync(path)) {
      return null
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'))
      return isCacheRecord(parsed) ? parsed : null
    } catch {
      return null
    }
  }
}
