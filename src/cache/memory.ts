import { type CachedEntry, INPUT_CATEGORIES, type InputCategory } from '../types'
import type { CacheRecord, InputCache } from './types'

export class MemoryInputCache implements InputCache {
  private readonly store = new Map<InputCategory, CacheRecord>()

  async get(category: InputCategory): Promise<string | null> {
    return this.store.get(category)?.value ?? null
  }

  async put(category: InputCategory, value: string | null): Promise<void> {
    this.store.set(category, { value, cachedAt: Date.now() })
  }

  async list(): Promise<CachedEntry[]> {
    const entries: CachedEntry[] = []
    for (const category of INPUT_CATEGORIES) {
      const record = this.store.get(category)
      if (record && record.value !== null) {
        entries.push({ category, value: record.value, cachedAt: record.cachedAt })
      }
    }
    return entries
  }

  /** Number of records held, including cleared ones. */
  get size(): number {
    return this.store.size
  }
}
