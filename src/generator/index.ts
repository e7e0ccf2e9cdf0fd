/**
 * Cover Letter Generation
 *
 * OpenAI chat-completions client. One request per run, no retries.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { Result } from '../types'

export const OPENAI_CHAT_URL = 'https://api.openai.com/v1/chat/completions'

export const DEFAULT_MODEL = 'gpt-3.5-turbo'

export interface GeneratorConfig {
  readonly apiKey: string
  readonly model?: string | undefined
}

interface OpenAIResponse {
  choices?: Array<{ message?: { content?: string | null } }>
}

function isOpenAIResponse(data: unknown): data is OpenAIResponse {
  if (typeof data !== 'object' || data === null) return false
  const choices: unknown = Reflect.get(data, 'choices')
  return choices === undefined || Array.isArray(choices)
}

/**
 * Generate a cover letter from a prompt.
 * Deterministic output (temperature 0) so reruns with the same inputs match.
 */
export async function generateCoverLetter(
  prompt: string,
  config: GeneratorConfig
): Promise<Result<string>> {
  const model = config.model ?? DEFAULT_MODEL

  try {
    const response = await httpFetch(OPENAI_CHAT_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${config.apiKey}` },
      body: JSON.stringify({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0
      })
    })

    if (!response.ok) return handleHttpError(response)

    const data = await response.json()
    if (!isOpenAIResponse(data)) return emptyResponseError()

    const text = data.choices?.[0]?.message?.content
    return text ? { ok: true, value: text } : emptyResponseError()
  } catch (error) {
    return handleNetworkError(error)
  }
}
