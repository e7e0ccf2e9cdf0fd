/**
 * Cache Command
 *
 * Show which inputs are cached. The API key is never printed in full.
 */

import { FilesystemInputCache } from '../../cache/filesystem'
import type { CachedEntry } from '../../types'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'
import { resolveSettings } from '../settings'

const PREVIEW_LENGTH = 50

export function maskSecret(value: string): string {
  if (value.length <= 8) return '****'
  return `${value.slice(0, 3)}...${value.slice(-4)}`
}

export function describeEntry(entry: CachedEntry): string {
  if (entry.category === 'API key') {
    return maskSecret(entry.value)
  }
  const firstLine = entry.value.split('\n')[0] ?? ''
  const preview =
    firstLine.length > PREVIEW_LENGTH ? `${firstLine.slice(0, PREVIEW_LENGTH)}...` : firstLine
  return `"${preview}" (${entry.value.length} chars)`
}

/**
 * Execute the cache command.
 */
export async function cmdCache(args: CLIArgs, logger: Logger): Promise<void> {
  const { cacheDir } = await resolveSettings({
    cacheDir: args.cacheDir,
    configFile: args.configFile
  })
  const entries = await new FilesystemInputCache(cacheDir).list()

  logger.log(`\nCache dir: ${cacheDir}\n`)

  if (entries.length === 0) {
    logger.log('Nothing cached yet. Run `coverletter-me` to supply your inputs.')
    return
  }

  for (const entry of entries) {
    const cachedAt = new Date(entry.cachedAt).toISOString().slice(0, 10)
    logger.log(`  ${entry.category}: ${describeEntry(entry)} [${cachedAt}]`)
  }
}
