/**
 * Tests for CLI Configuration
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  saveConfig,
  setConfigValue,
  unsetConfigValue
} from './config'

describe('config', () => {
  let tempDir: string
  let configPath: string
  let originalEnv: string | undefined

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'coverletter-config-test-'))
    configPath = join(tempDir, 'config.json')
    originalEnv = process.env.COVERLETTER_CONFIG
    delete process.env.COVERLETTER_CONFIG
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
    if (originalEnv !== undefined) {
      process.env.COVERLETTER_CONFIG = originalEnv
    } else {
      delete process.env.COVERLETTER_CONFIG
    }
  })

  describe('getConfigPath', () => {
    it('returns explicit config file path when provided', () => {
      expect(getConfigPath('/custom/path/config.json')).toBe('/custom/path/config.json')
    })

    it('returns env var path when set', () => {
      process.env.COVERLETTER_CONFIG = '/env/config.json'
      expect(getConfigPath()).toBe('/env/config.json')
    })

    it('returns default XDG path when no override', () => {
      expect(getConfigPath()).toContain(join('.config', 'coverletter-me', 'config.json'))
    })
  })

  describe('loadConfig', () => {
    it('returns null for non-existent file', async () => {
      expect(await loadConfig(configPath)).toBeNull()
    })

    it('loads valid config file', async () => {
      await writeFile(configPath, JSON.stringify({ model: 'gpt-4o-mini' }))
      expect(await loadConfig(configPath)).toEqual({ model: 'gpt-4o-mini' })
    })

    it('drops unknown keys and non-string values', async () => {
      await writeFile(configPath, JSON.stringify({ model: 42, outputFile: 'out.txt', other: 'x' }))
      expect(await loadConfig(configPath)).toEqual({ outputFile: 'out.txt' })
    })

    it('returns null for invalid JSON', async () => {
      await writeFile(configPath, 'not valid json')
      expect(await loadConfig(configPath)).toBeNull()
    })
  })

  describe('saveConfig', () => {
    it('creates parent directories and adds a timestamp', async () => {
      const nested = join(tempDir, 'a', 'b', 'config.json')
      await saveConfig({ cacheDir: '/tmp/cache' }, nested)

      const saved: unknown = JSON.parse(await readFile(nested, 'utf-8'))
      expect(saved).toMatchObject({ cacheDir: '/tmp/cache' })
      expect(saved).toHaveProperty('updatedAt')
    })
  })

  describe('setConfigValue / unsetConfigValue', () => {
    it('sets and removes a value', async () => {
      await setConfigValue('outputFile', 'letters/acme.txt', configPath)
      expect((await loadConfig(configPath))?.outputFile).toBe('letters/acme.txt')

      await unsetConfigValue('outputFile', configPath)
      expect((await loadConfig(configPath))?.outputFile).toBeUndefined()
    })

    it('keeps other values when setting one', async () => {
      await setConfigValue('model', 'gpt-4o-mini', configPath)
      await setConfigValue('cacheDir', '/tmp/cache', configPath)

      const config = await loadConfig(configPath)
      expect(config?.model).toBe('gpt-4o-mini')
      expect(config?.cacheDir).toBe('/tmp/cache')
    })
  })

  describe('config keys', () => {
    it('lists valid keys alphabetically', () => {
      expect(getValidConfigKeys()).toEqual(['cacheDir', 'model', 'outputFile'])
    })

    it('validates keys', () => {
      expect(isValidConfigKey('model')).toBe(true)
      expect(isValidConfigKey('updatedAt')).toBe(false)
      expect(isValidConfigKey('homeCountry')).toBe(false)
    })
  })
})
