import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { getDefaultCacheDir } from '../cache/filesystem'
import { DEFAULT_MODEL } from '../generator'
import { DEFAULT_OUTPUT_FILE, resolveSettings } from './settings'

const ENV_KEYS = ['COVERLETTER_CACHE_DIR', 'OPENAI_MODEL', 'OPENAI_API_KEY'] as const

describe('resolveSettings', () => {
  let tempDir: string
  let configFile: string
  const savedEnv: Record<string, string | undefined> = {}

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'coverletter-settings-test-'))
    configFile = join(tempDir, 'config.json')
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key]
      delete process.env[key]
    }
  })

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key]
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  it('falls back to defaults', async () => {
    expect(await resolveSettings({ configFile })).toEqual({
      cacheDir: getDefaultCacheDir(),
      model: DEFAULT_MODEL,
      outputFile: DEFAULT_OUTPUT_FILE,
      apiKey: undefined
    })
  })

  it('prefers config file over defaults', async () => {
    writeFileSync(configFile, JSON.stringify({ model: 'config-model', outputFile: 'config.txt' }))

    const settings = await resolveSettings({ configFile })
    expect(settings.model).toBe('config-model')
    expect(settings.outputFile).toBe('config.txt')
  })

  it('prefers environment over config file', async () => {
    writeFileSync(configFile, JSON.stringify({ model: 'config-model', cacheDir: '/config/cache' }))
    process.env.OPENAI_MODEL = 'env-model'
    process.env.COVERLETTER_CACHE_DIR = '/env/cache'
    process.env.OPENAI_API_KEY = 'env-key'

    const settings = await resolveSettings({ configFile })
    expect(settings.model).toBe('env-model')
    expect(settings.cacheDir).toBe('/env/cache')
    expect(settings.apiKey).toBe('env-key')
  })

  it('prefers flags over everything', async () => {
    process.env.OPENAI_MODEL = 'env-model'
    process.env.OPENAI_API_KEY = 'env-key'

    const settings = await resolveSettings({
      configFile,
      model: 'flag-model',
      apiKey: 'flag-key',
      outputFile: 'flag.txt',
      cacheDir: '/flag/cache'
    })
    expect(settings).toEqual({
      cacheDir: '/flag/cache',
      model: 'flag-model',
      outputFile: 'flag.txt',
      apiKey: 'flag-key'
    })
  })

  it('ignores blank values', async () => {
    process.env.OPENAI_API_KEY = '   '
    expect((await resolveSettings({ configFile, model: '' })).model).toBe(DEFAULT_MODEL)
    expect((await resolveSettings({ configFile })).apiKey).toBeUndefined()
  })
})
