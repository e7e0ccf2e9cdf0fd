/**
 * Generate Command
 *
 * Resolves the credential and the four inputs, generates the cover letter
 * and saves it. Nothing is written unless generation succeeds.
 */

import { FilesystemInputCache } from '../../cache/filesystem'
import { GenerationError } from '../../errors'
import { type GeneratorConfig, generateCoverLetter } from '../../generator'
import { buildCoverLetterPrompt } from '../../prompt'
import { InputResolver, resolveCredential, resolveGenerationRequest } from '../../resolver'
import type { Result } from '../../types'
import { createReadlinePrompter, TerminalUI } from '../../ui/terminal'
import type { UserInterface } from '../../ui/types'
import type { CLIArgs } from '../args'
import { writeOutputFile } from '../io'
import type { Logger } from '../logger'
import { resolveSettings } from '../settings'

const APP_TITLE = 'CoverletterMe'

export interface GenerateDependencies {
  /** Interaction surface (defaults to a terminal UI on stdin/stdout) */
  ui?: UserInterface | undefined
  generate?: ((prompt: string, config: GeneratorConfig) => Promise<Result<string>>) | undefined
}

/**
 * Execute the generate command.
 */
export async function cmdGenerate(
  args: CLIArgs,
  logger: Logger,
  deps: GenerateDependencies = {}
): Promise<void> {
  const generate = deps.generate ?? generateCoverLetter
  if (deps.ui) {
    await runGenerate(args, logger, deps.ui, generate)
    return
  }

  const terminal = new TerminalUI(createReadlinePrompter())
  try {
    await runGenerate(args, logger, terminal, generate)
  } finally {
    terminal.close()
  }
}

async function runGenerate(
  args: CLIArgs,
  logger: Logger,
  ui: UserInterface,
  generate: NonNullable<GenerateDependencies['generate']>
): Promise<void> {
  const settings = await resolveSettings({
    cacheDir: args.cacheDir,
    model: args.model,
    outputFile: args.outputFile,
    apiKey: args.apiKey,
    configFile: args.configFile
  })
  logger.verbose(`Cache dir: ${settings.cacheDir}`)
  logger.verbose(`Model: ${settings.model}`)

  const cache = new FilesystemInputCache(settings.cacheDir)
  const resolver = new InputResolver(cache, ui, {
    onResolved: ({ category, value, source }) => {
      logger.verbose(`${category}: ${source} (${value.length} chars)`)
    }
  })

  const apiKey = await resolveCredential(resolver, settings.apiKey)
  const request = await resolveGenerationRequest(resolver)
  const prompt = buildCoverLetterPrompt(request)
  logger.verbose(`Prompt: ${prompt.length} chars`)

  logger.log('\n✍️  Generating cover letter, this can take a minute...')
  const result = await generate(prompt, { apiKey, model: settings.model })
  if (!result.ok) {
    throw new GenerationError(result.error.type, result.error.message)
  }

  await writeOutputFile(settings.outputFile, result.value)
  logger.success(`Saved ${result.value.length} chars to ${settings.outputFile}`)
  await ui.notify(APP_TITLE, `New cover letter successfully saved in ${settings.outputFile}`)
}
