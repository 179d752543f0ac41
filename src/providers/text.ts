/**
 * Text Provider Clients
 *
 * HTTP clients for the Anthropic Messages and OpenAI Chat Completions APIs,
 * exposed as a TextGenerator. Caching and retries live above this layer.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { ModelParameters, Result, TextGenerator, TextProvider } from '../types'

const ANTHROPIC_URL = 'https://api.anthropic.com/v1/messages'
const OPENAI_URL = 'https://api.openai.com/v1/chat/completions'

export interface TextClientConfig {
  readonly apiKeys: Partial<Record<TextProvider, string>>
  readonly timeoutMs?: number | undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : undefined
}

/** `content[0].text` of a Messages API response */
function anthropicText(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined
  const block = firstOf(data.content)
  return isRecord(block) && typeof block.text === 'string' ? block.text : undefined
}

/** `choices[0].message.content` of a Chat Completions response */
function openAIText(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined
  const choice = firstOf(data.choices)
  if (!isRecord(choice) || !isRecord(choice.message)) return undefined
  const content = choice.message.content
  return typeof content === 'string' ? content : undefined
}

async function callAnthropic(
  prompt: string,
  params: ModelParameters,
  apiKey: string,
  timeoutMs: number | undefined
): Promise<Result<string>> {
  try {
    const response = await httpFetch(ANTHROPIC_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': apiKey,
        'anthropic-version': '2023-06-01'
      },
      body: JSON.stringify({
        model: params.model,
        max_tokens: params.maxTokens,
        temperature: params.temperature,
        messages: [{ role: 'user', content: prompt }]
      }),
      timeoutMs
    })

    if (!response.ok) return handleHttpError(response)

    const text = anthropicText(await response.json())
    return text ? { ok: true, value: text } : emptyResponseError()
  } catch (error) {
    return handleNetworkError(error)
  }
}

async function callOpenAI(
  prompt: string,
  params: ModelParameters,
  apiKey: string,
  timeoutMs: number | undefined
): Promise<Result<string>> {
  try {
    const response = await httpFetch(OPENAI_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${apiKey}` },
      body: JSON.stringify({
        model: params.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: params.maxTokens,
        temperature: params.temperature
      }),
      timeoutMs
    })

    if (!response.ok) return handleHttpError(response)

    const text = openAIText(await response.json())
    return text ? { ok: true, value: text } : emptyResponseError()
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Create a TextGenerator that dispatches on `modelParameters.provider`.
 * A provider without a configured key fails with an `auth` error.
 */
export function createTextGenerator(config: TextClientConfig): TextGenerator {
  return async (prompt, params) => {
    const apiKey = config.apiKeys[params.provider]
    if (!apiKey) {
      return {
        ok: false,
        error: { type: 'auth', message: `No API key configured for ${params.provider}` }
      }
    }

    switch (params.provider) {
      case 'anthropic':
        return callAnthropic(prompt, params, apiKey, config.timeoutMs)
      case 'openai':
        return callOpenAI(prompt, params, apiKey, config.timeoutMs)
    }
  }
}
