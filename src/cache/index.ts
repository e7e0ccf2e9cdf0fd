/**
 * Cache Module
 *
 * Durable storage for previously supplied inputs, one record per category.
 */

export { FilesystemInputCache, getDefaultCacheDir } from './filesystem'
export { categoryRecordKey } from './key'
export { MemoryInputCache } from './memory'
export type { CacheRecord, InputCache } from './types'
