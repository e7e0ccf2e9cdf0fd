/**
 * Input Cache Types
 *
 * Durable category -> string storage for previously supplied inputs.
 * Implementations: FilesystemInputCache (CLI), MemoryInputCache (tests).
 *
 * Entries are kept forever - no TTL, no invalidation.
 */

import type { CachedEntry, InputCategory } from '../types'

export interface InputCache {
  /**
   * Look up the stored value for a category.
   * @returns The value, '' for a stored empty string, or null if never cached or cleared
   */
  get(category: InputCategory): Promise<string | null>

  /**
   * Persist a value, replacing any prior record. null clears the value.
   * @throws CacheWriteError when the backing location cannot be written
   */
  put(category: InputCategory, value: string | null): Promise<void>

  /**
   * All categories with a stored value, in category order.
   */
  list(): Promise<CachedEntry[]>
}

/**
 * On-disk shape of a single record.
 */
export interface CacheRecord {
  readonly value: string | null
  readonly cachedAt: number
}
