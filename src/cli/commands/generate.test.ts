import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { FilesystemInputCache } from '../../cache/filesystem'
import { GenerationError } from '../../errors'
import type { GeneratorConfig } from '../../generator'
import { answers, ScriptedUI } from '../../test-support'
import type { Result } from '../../types'
import { parseArgs } from '../args'
import type { Logger } from '../logger'
import { cmdGenerate } from './generate'

function createSilentLogger(): Logger {
  return { log: () => {}, verbose: () => {}, success: () => {}, error: () => {} }
}

describe('cmdGenerate', () => {
  let tempDir: string
  let cacheDir: string
  let outputFile: string
  let originalApiKey: string | undefined

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'coverletter-generate-test-'))
    cacheDir = join(tempDir, 'cache')
    outputFile = join(tempDir, 'out', 'letter.txt')
    originalApiKey = process.env.OPENAI_API_KEY
    delete process.env.OPENAI_API_KEY
  })

  afterEach(() => {
    if (originalApiKey !== undefined) process.env.OPENAI_API_KEY = originalApiKey
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  function argsFor(...extra: string[]) {
    return parseArgs(
      [
        '--cache-dir',
        cacheDir,
        '--config-file',
        join(tempDir, 'config.json'),
        'generate',
        '-o',
        outputFile,
        ...extra
      ],
      false
    )
  }

  it('resolves inputs, generates and saves the cover letter', async () => {
    const cache = new FilesystemInputCache(cacheDir)
    await cache.put('API key', 'test-key')
    await cache.put('Resume', 'Experienced engineer...')
    await cache.put('Cover Letter', 'Dear Hiring Manager...')
    const ui = new ScriptedUI([
      answers.yes(),
      answers.yes(),
      answers.yes(),
      answers.text('Senior Backend Role, Python, AWS'),
      answers.text('emphasize leadership')
    ])
    const generate = vi.fn(
      async (_prompt: string, _config: GeneratorConfig): Promise<Result<string>> => ({
        ok: true,
        value: 'Dear Acme team, ...'
      })
    )

    await cmdGenerate(argsFor('--model', 'gpt-4o-mini'), createSilentLogger(), { ui, generate })

    expect(readFileSync(outputFile, 'utf-8')).toBe('Dear Acme team, ...')
    expect(generate).toHaveBeenCalledTimes(1)
    const [prompt, config] = generate.mock.calls[0] ?? []
    expect(config).toEqual({ apiKey: 'test-key', model: 'gpt-4o-mini' })
    expect(prompt).toContain('Job description: ```Senior Backend Role, Python, AWS```')
    expect(prompt).toContain('Keep in mind that emphasize leadership.')

    expect(await cache.get('Job description')).toBe('Senior Backend Role, Python, AWS')
    expect(await cache.get('Additional prompt')).toBe('emphasize leadership')
    expect(ui.calls.at(-1)).toEqual({
      method: 'notify',
      title: 'CoverletterMe',
      message: `New cover letter successfully saved in ${outputFile}`
    })
  })

  it('uses --api-key without asking for or caching a key', async () => {
    const ui = new ScriptedUI([
      answers.file(null),
      answers.file(null),
      answers.text('role'),
      answers.text('remarks')
    ])
    const generate = vi.fn(
      async (_prompt: string, _config: GeneratorConfig): Promise<Result<string>> => ({
        ok: true,
        value: 'letter'
      })
    )

    await cmdGenerate(argsFor('--api-key', 'test-key'), createSilentLogger(), { ui, generate })

    expect(generate.mock.calls[0]?.[1].apiKey).toBe('test-key')
    expect(await new FilesystemInputCache(cacheDir).get('API key')).toBeNull()
    expect(ui.calls.some((c) => c.title === 'API key')).toBe(false)
  })

  it('throws GenerationError and leaves the output file untouched on failure', async () => {
    writeFileSync(join(tempDir, 'previous.txt'), 'previous letter')
    outputFile = join(tempDir, 'previous.txt')
    const ui = new ScriptedUI([
      answers.text(null),
      answers.file(null),
      answers.file(null),
      answers.text(null),
      answers.text(null)
    ])
    const generate = async (): Promise<Result<string>> => ({
      ok: false,
      error: { type: 'auth', message: 'Authentication failed: missing key' }
    })

    const run = cmdGenerate(argsFor(), createSilentLogger(), { ui, generate })

    await expect(run).rejects.toBeInstanceOf(GenerationError)
    await expect(run).rejects.toThrow('Authentication failed: missing key')
    expect(readFileSync(outputFile, 'utf-8')).toBe('previous letter')
  })
})
