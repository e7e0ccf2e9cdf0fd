/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/coverletter-me/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or COVERLETTER_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Custom cache directory for stored inputs */
  cacheDir?: string | undefined
  /** OpenAI model used for generation */
  model?: string | undefined
  /** Destination file for the generated cover letter */
  outputFile?: string | undefined
  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  cacheDir: 'Cache directory for stored inputs (default: ~/.cache/coverletter-me)',
  model: 'OpenAI model for generation (default: gpt-3.5-turbo)',
  outputFile: 'Where to save the cover letter (default: your_new_cover_letter.txt)'
}

const CONFIG_KEYS = Object.keys(CONFIG_DESCRIPTIONS).filter(isValidConfigKey)

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get the config file path.
 * Priority: configFile arg > COVERLETTER_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.COVERLETTER_CONFIG) {
    return process.env.COVERLETTER_CONFIG
  }
  return join(homedir(), '.config', 'coverletter-me', 'config.json')
}

function toConfig(data: unknown): Config | null {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return null
  const config: Config = {}
  for (const key of [...CONFIG_KEYS, 'updatedAt' as const]) {
    const value: unknown = Reflect.get(data, key)
    if (typeof value === 'string') config[key] = value
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return toConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return key === 'cacheDir' || key === 'model' || key === 'outputFile'
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...CONFIG_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  config[key] = value
  await saveConfig(config, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}
