/**
 * Input Resolver
 *
 * Decides per category whether to reuse the cached value, ask for a new one,
 * or fall back to the cached value when the user supplies nothing.
 *
 * Policy:
 * - nothing cached: always ask for new input (no reuse question)
 * - cached: ask whether to reuse; on "no", ask for new input
 * - new input supplied (non-empty): cache it, then return it
 * - new input cancelled or empty: return the value cached before this attempt,
 *   without writing
 *
 * Categories are resolved independently; nothing is rolled back across them.
 */

import type { InputCache } from '../cache/types'
import { DOCUMENT_FILTER, extractDocumentText } from '../documents'
import type { GenerationRequest, InputCategory } from '../types'
import type { UserInterface } from '../ui/types'
import { CATEGORY_DEFINITIONS, type CategoryDefinition } from './categories'

export { CATEGORY_DEFINITIONS, type CategoryDefinition } from './categories'

/**
 * Where a resolved value came from.
 * - cache: user chose to reuse the cached value
 * - user: newly supplied and cached
 * - fallback: new input declined, cached value used
 * - empty: new input declined and nothing cached
 */
export type ResolutionSource = 'cache' | 'user' | 'fallback' | 'empty'

export interface Resolution {
  readonly category: InputCategory
  readonly value: string
  readonly source: ResolutionSource
}

export interface InputResolverOptions {
  /** Document text extractor (defaults to extractDocumentText) */
  extract?: ((path: string) => Promise<string>) | undefined
  /** Called after each category is resolved */
  onResolved?: ((resolution: Resolution) => void) | undefined
}

export class InputResolver {
  private readonly extract: (path: string) => Promise<string>
  private readonly onResolved: ((resolution: Resolution) => void) | undefined

  constructor(
    private readonly cache: InputCache,
    private readonly ui: UserInterface,
    options: InputResolverOptions = {}
  ) {
    this.extract = options.extract ?? extractDocumentText
    this.onResolved = options.onResolved
  }

  /**
   * Resolve a category to its final value ('' when nothing is available).
   */
  async resolve(category: InputCategory): Promise<string> {
    const resolution = await this.resolveWithSource(category)
    return resolution.value
  }

  async resolveWithSource(category: InputCategory): Promise<Resolution> {
    const definition = CATEGORY_DEFINITIONS[category]
    const cached = await this.cache.get(category)

    let resolution: Resolution
    if (
      cached !== null &&
      (await this.ui.askYesNo(category, `Do you want to use the existing ${definition.label}?`))
    ) {
      resolution = { category, value: cached, source: 'cache' }
    } else {
      resolution = await this.acquireNew(category, definition, cached)
    }

    this.onResolved?.(resolution)
    return resolution
  }

  /**
   * Ask for new input. Persists on success; otherwise falls back to `cached`.
   */
  private async acquireNew(
    category: InputCategory,
    definition: CategoryDefinition,
    cached: string | null
  ): Promise<Resolution> {
    const supplied =
      definition.mode === 'document'
        ? await this.acquireDocument(category, definition)
        : await this.ui.askText(category, definition.textPrompt ?? `Enter your ${definition.label}:`)

    if (supplied) {
      await this.cache.put(category, supplied)
      return { category, value: supplied, source: 'user' }
    }

    const verb = definition.mode === 'document' ? 'selected' : 'entered'
    await this.ui.warn(
      category,
      `No ${definition.label} ${verb}. No ${definition.label} cached.`
    )

    return cached === null
      ? { category, value: '', source: 'empty' }
      : { category, value: cached, source: 'fallback' }
  }

  private async acquireDocument(
    category: InputCategory,
    definition: CategoryDefinition
  ): Promise<string | null> {
    await this.ui.notify(category, `Please select your current ${definition.label}`)
    const path = await this.ui.chooseFile(category, DOCUMENT_FILTER)
    if (!path) return null
    return this.extract(path)
  }
}

/**
 * Resolve the four content categories, in order, into a generation request.
 */
export async function resolveGenerationRequest(
  resolver: InputResolver
): Promise<GenerationRequest> {
  const resume = await resolver.resolve('Resume')
  const referenceCoverLetter = await resolver.resolve('Cover Letter')
  const jobDescription = await resolver.resolve('Job description')
  const remarks = await resolver.resolve('Additional prompt')
  return { resume, referenceCoverLetter, jobDescription, remarks }
}

/**
 * Resolve the service credential. A key supplied by flag or environment
 * bypasses the cache entirely.
 */
export async function resolveCredential(
  resolver: InputResolver,
  override?: string | undefined
): Promise<string> {
  const key = override?.trim()
  if (key) return key
  return resolver.resolve('API key')
}
