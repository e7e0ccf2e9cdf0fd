/**
 * Terminal User Interface
 *
 * Implements the interaction surface with line prompts on stdin/stdout.
 */

import { existsSync, statSync } from 'node:fs'
import { extname, resolve } from 'node:path'
import { createInterface } from 'node:readline/promises'
import type { FileFilter } from '../documents'
import type { UserInterface } from './types'

/**
 * Minimal line I/O the terminal UI needs.
 */
export interface Prompter {
  question(query: string): Promise<string>
  print(line: string): void
  close(): void
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = createInterface({ input, output })
  return {
    question: (query) => rl.question(query),
    print: (line) => {
      output.write(`${line}\n`)
    },
    close: () => rl.close()
  }
}

/**
 * Strip whitespace and one pair of surrounding quotes (as pasted from a file manager).
 */
export function cleanPathAnswer(answer: string): string {
  const trimmed = answer.trim()
  const quoted = trimmed.match(/^(['"])(.*)\1$/)
  return quoted?.[2]?.trim() ?? trimmed
}

export function parseYesNo(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase()
  if (normalized === 'y' || normalized === 'yes') return true
  if (normalized === 'n' || normalized === 'no') return false
  return null
}

export class TerminalUI implements UserInterface {
  constructor(private readonly prompter: Prompter) {}

  async chooseFile(title: string, filter: FileFilter): Promise<string | null> {
    const extensions = filter.extensions.join(', ')
    for (;;) {
      const answer = await this.prompter.question(
        `[${title}] Path to ${filter.name} (${extensions}), empty to cancel: `
      )
      const path = cleanPathAnswer(answer)
      if (!path) return null

      if (!filter.extensions.includes(extname(path).toLowerCase())) {
        this.prompter.print(`  Expected one of: ${extensions}`)
        continue
      }
      if (!existsSync(path) || !statSync(path).isFile()) {
        this.prompter.print(`  File not found: ${path}`)
        continue
      }
      return resolve(path)
    }
  }

  async askText(title: string, label: string): Promise<string | null> {
    const answer = await this.prompter.question(`[${title}] ${label} `)
    const text = answer.trim()
    return text || null
  }

  async askYesNo(title: string, question: string): Promise<boolean> {
    for (;;) {
      const answer = parseYesNo(await this.prompter.question(`[${title}] ${question} (y/n) `))
      if (answer !== null) return answer
      this.prompter.print('  Please answer y or n.')
    }
  }

  async notify(title: string, message: string): Promise<void> {
    this.prompter.print(`[${title}] ${message}`)
  }

  async warn(title: string, message: string): Promise<void> {
    this.prompter.print(`[${title}] ⚠ ${message}`)
  }

  close(): void {
    this.prompter.close()
  }
}
