/**
 * CoverletterMe Core Library
 *
 * Cached input resolution, prompt assembly and cover letter generation.
 *
 * @license AGPL-3.0
 */

export const VERSION = '0.1.0'

// Cache module
export type { CacheRecord, InputCache } from './cache/index'
export {
  categoryRecordKey,
  FilesystemInputCache,
  getDefaultCacheDir,
  MemoryInputCache
} from './cache/index'
// Documents
export {
  DOCUMENT_FILTER,
  extractDocumentText,
  type FileFilter,
  joinDocxParagraphs,
  normalizeDocumentText
} from './documents/index'
// Errors
export { CacheWriteError, ExtractionError, GenerationError } from './errors'
// Generator
export {
  DEFAULT_MODEL,
  type GeneratorConfig,
  generateCoverLetter
} from './generator/index'
// Prompt
export { buildCoverLetterPrompt } from './prompt/index'
// Resolver
export {
  CATEGORY_DEFINITIONS,
  type CategoryDefinition,
  InputResolver,
  type InputResolverOptions,
  type Resolution,
  type ResolutionSource,
  resolveCredential,
  resolveGenerationRequest
} from './resolver/index'
// Types
export * from './types'
// User interface
export { createReadlinePrompter, type Prompter, TerminalUI } from './ui/terminal'
export type { UserInterface } from './ui/types'
