/**
 * Config Command
 *
 * Manage persistent CLI settings stored in ~/.config/coverletter-me/config.json.
 * Supports list, set, and unset operations.
 */

import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  setConfigValue,
  unsetConfigValue
} from '../config'
import type { Logger } from '../logger'

/**
 * Execute the config command.
 */
export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const configFile = args.configFile

  switch (args.configAction) {
    case 'list':
      await listConfig(configFile, logger)
      break
    case 'set':
      await setConfig(args.configKey, args.configValue, configFile, logger)
      break
    case 'unset':
      await unsetConfig(args.configKey, configFile, logger)
      break
  }
}

async function listConfig(configFile: string | undefined, logger: Logger): Promise<void> {
  const config = await loadConfig(configFile)
  const path = getConfigPath(configFile)

  logger.log(`\nConfig file: ${path}\n`)

  const setKeys = getValidConfigKeys().filter((key) => config?.[key] !== undefined)
  if (setKeys.length === 0) {
    logger.log('No settings configured. Run `coverletter-me config --help` for available settings.')
  } else {
    for (const key of setKeys) {
      logger.log(`  ${key}: ${config?.[key] ?? ''}`)
    }
  }
}

function validateConfigKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new Error(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new Error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(
  key: string | undefined,
  value: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'coverletter-me config set <key> <value>')
  if (value === undefined) {
    throw new Error('Missing value. Usage: coverletter-me config set <key> <value>')
  }
  await setConfigValue(validKey, value, configFile)
  logger.log(`Set ${validKey}=${value}`)
}

async function unsetConfig(
  key: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'coverletter-me config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.log(`Unset ${validKey}`)
}
