/**
 * Cache Record Keys
 *
 * One record per category, named after the category.
 */

import type { InputCategory } from '../types'

/**
 * Record key for a category: whitespace runs become underscores.
 * 'Job description' -> 'Job_description'
 */
export function categoryRecordKey(category: InputCategory): string {
  return category.trim().replace(/\s+/g, '_')
}
