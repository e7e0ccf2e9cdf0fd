/**
 * Input Category Definitions
 *
 * How each category is acquired and how it is named in prompts.
 */

import type { AcquisitionMode, InputCategory } from '../types'

export interface CategoryDefinition {
  readonly mode: AcquisitionMode
  /** Lowercase name used inside prompt sentences */
  readonly label: string
  /** Overrides the default "Enter your <label>:" text prompt */
  readonly textPrompt?: string
}

export const CATEGORY_DEFINITIONS: Record<InputCategory, CategoryDefinition> = {
  Resume: { mode: 'document', label: 'resume' },
  'Cover Letter': { mode: 'document', label: 'cover letter' },
  'Job description': { mode: 'text', label: 'job description' },
  'Additional prompt': { mode: 'text', label: 'additional prompt' },
  'API key': {
    mode: 'text',
    label: 'API key',
    textPrompt:
      "Enter your OpenAI API key. If you don't have one, create it at https://platform.openai.com/account/api-keys"
  }
}
