/**
 * Input Types
 *
 * Categories of cached input and the generation request built from them.
 */

export const INPUT_CATEGORIES = [
  'Resume',
  'Cover Letter',
  'Job description',
  'Additional prompt',
  'API key'
] as const

export type InputCategory = (typeof INPUT_CATEGORIES)[number]

/**
 * How a new value is acquired from the user.
 * - document: pick a file, extract its text
 * - text: type the value directly
 */
export type AcquisitionMode = 'document' | 'text'

export interface CachedEntry {
  readonly category: InputCategory
  readonly value: string
  readonly cachedAt: number
}

/**
 * The four resolved inputs. Absent values are always collapsed to ''.
 */
export interface GenerationRequest {
  readonly resume: string
  readonly referenceCoverLetter: string
  readonly jobDescription: string
  readonly remarks: string
}
