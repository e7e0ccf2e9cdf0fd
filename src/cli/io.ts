/**
 * CLI File I/O
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Write text to a file, replacing any previous content.
 */
export async function writeOutputFile(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, text, 'utf-8')
}
