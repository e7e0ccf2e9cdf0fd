/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getValidConfigKeys } from './config'

export type CommandName = 'generate' | 'cache' | 'config' | 'help'

export interface CLIArgs {
  command: CommandName
  outputFile: string | undefined
  model: string | undefined
  apiKey: string | undefined
  cacheDir: string | undefined
  configFile: string | undefined
  quiet: boolean
  verbose: boolean
  /** For config command: action (list, set, unset) */
  configAction: 'list' | 'set' | 'unset'
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Write a cover letter from your resume, a reference cover letter and a job description.

Inputs you supply are cached, so the next run can reuse them.

Examples:
  $ coverletter-me
  $ coverletter-me generate -o letters/acme.txt
  $ coverletter-me cache
  $ coverletter-me config set model gpt-4o-mini`

function createProgram(): Command {
  const program = new Command()
    .name('coverletter-me')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-dir <dir>', 'Cache directory for inputs (or set COVERLETTER_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set COVERLETTER_CONFIG)')

  // ============ GENERATE (default) ============
  program
    .command('generate', { isDefault: true })
    .description('Collect inputs and generate a cover letter')
    .option('-o, --output <file>', 'Output file (default: your_new_cover_letter.txt)')
    .option('--model <id>', 'OpenAI model (or set OPENAI_MODEL)')
    .option('--api-key <key>', 'OpenAI API key (or set OPENAI_API_KEY)')

  // ============ CACHE ============
  program.command('cache').description('Show cached inputs')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => k.length))
  const settingsHelp = configKeys
    .map((key) => `  ${key.padEnd(maxLen)}  ${getConfigDescription(key)}`)
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  coverletter-me config                            List current settings
  coverletter-me config set model gpt-4o-mini      Use another model
  coverletter-me config unset outputFile           Restore the default output file`
    )

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(command: CommandName, opts: Record<string, unknown>): CLIArgs {
  return {
    command,
    outputFile: optionalString(opts.output),
    model: optionalString(opts.model),
    apiKey: optionalString(opts.apiKey),
    cacheDir: optionalString(opts.cacheDir),
    configFile: optionalString(opts.configFile),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): 'list' | 'set' | 'unset' {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that capture the parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command, onParsed: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    const name = cmd.name()
    if (name === 'generate' || name === 'cache') {
      cmd.action(() => {
        onParsed(buildCLIArgs(name, cmd.optsWithGlobals()))
      })
    } else if (name === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        onParsed({
          ...buildCLIArgs('config', cmd.optsWithGlobals()),
          configAction: parseConfigAction(action),
          configKey: key,
          configValue: value
        })
      })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  const captured: { args?: CLIArgs } = {}
  captureArgs(program, (args) => {
    captured.args = args
  })

  program.parse()

  if (!captured.args) {
    program.help()
    process.exit(0)
  }

  return captured.args
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  const captured: { args?: CLIArgs } = {}
  captureArgs(program, (args) => {
    captured.args = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help/version
    return captured.args ?? buildCLIArgs('help', {})
  }

  return captured.args ?? buildCLIArgs('help', {})
}
