/**
 * Document Text Extraction
 *
 * Reads plain text out of the documents a user selects (.docx, .txt).
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import mammoth from 'mammoth'
import { ExtractionError } from '../errors'

export interface FileFilter {
  readonly name: string
  readonly extensions: readonly string[]
}

export const DOCUMENT_FILTER: FileFilter = {
  name: 'Word Document',
  extensions: ['.docx', '.txt']
}

/**
 * Normalize line endings and trim. Inner line structure is kept as is.
 */
export function normalizeDocumentText(text: string): string {
  return text.replace(/\r\n?/g, '\n').trim()
}

/**
 * mammoth separates paragraphs with a blank line; join them with a single
 * newline instead, so an empty paragraph stays a blank line.
 */
export function joinDocxParagraphs(rawText: string): string {
  return normalizeDocumentText(rawText.replace(/\r\n?/g, '\n').replace(/\n\n/g, '\n'))
}

/**
 * Extract the text of a document, one paragraph per line.
 *
 * @throws ExtractionError for unsupported, unreadable or malformed files
 */
export async function extractDocumentText(path: string): Promise<string> {
  const extension = extname(path).toLowerCase()

  if (!DOCUMENT_FILTER.extensions.includes(extension)) {
    throw new ExtractionError(path, `unsupported file type "${extension || '(none)'}"`)
  }

  let buffer: Buffer
  try {
    buffer = await readFile(path)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ExtractionError(path, reason, error)
  }

  if (extension === '.txt') {
    return normalizeDocumentText(buffer.toString('utf-8'))
  }

  try {
    const result = await mammoth.extractRawText({ buffer })
    return joinDocxParagraphs(result.value)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ExtractionError(path, `malformed document (${reason})`, error)
  }
}
