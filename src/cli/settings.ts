/**
 * Run Settings
 *
 * Resolves the settings a run needs from flags, environment and config file.
 *
 * Priority for every setting:
 * 1. CLI flag (--cache-dir, --model, --output, --api-key)
 * 2. Environment variable (COVERLETTER_CACHE_DIR, OPENAI_MODEL, OPENAI_API_KEY)
 * 3. Config file value
 * 4. Default
 */

import { getDefaultCacheDir } from '../cache/filesystem'
import { DEFAULT_MODEL } from '../generator'
import { loadConfig } from './config'

export const DEFAULT_OUTPUT_FILE = 'your_new_cover_letter.txt'

interface ResolveSettingsOptions {
  cacheDir?: string | undefined
  model?: string | undefined
  outputFile?: string | undefined
  apiKey?: string | undefined
  configFile?: string | undefined
}

export interface ResolvedSettings {
  readonly cacheDir: string
  readonly model: string
  readonly outputFile: string
  /** Only set when supplied by flag or environment; otherwise resolved interactively */
  readonly apiKey: string | undefined
}

function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '')
}

export async function resolveSettings(
  options: ResolveSettingsOptions = {}
): Promise<ResolvedSettings> {
  const config = await loadConfig(options.configFile)

  return {
    cacheDir:
      firstSet(options.cacheDir, process.env.COVERLETTER_CACHE_DIR, config?.cacheDir) ??
      getDefaultCacheDir(),
    model: firstSet(options.model, process.env.OPENAI_MODEL, config?.model) ?? DEFAULT_MODEL,
    outputFile: firstSet(options.outputFile, config?.outputFile) ?? DEFAULT_OUTPUT_FILE,
    apiKey: firstSet(options.apiKey, process.env.OPENAI_API_KEY)
  }
}
