/**
 * Image Provider Client
 *
 * OpenAI Images API client exposed as an ImageGenerator returning PNG bytes.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { ImageGenerator } from '../types'
import { DEFAULT_IMAGE_MODEL } from './models'

const OPENAI_IMAGES_URL = 'https://api.openai.com/v1/images/generations'

export interface ImageClientConfig {
  readonly apiKey: string
  readonly model?: string | undefined
  readonly timeoutMs?: number | undefined
}

function base64Image(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('data' in data)) return undefined
  const items = data.data
  if (!Array.isArray(items)) return undefined
  const first: unknown = items[0]
  if (typeof first !== 'object' || first === null || !('b64_json' in first)) return undefined
  return typeof first.b64_json === 'string' ? first.b64_json : undefined
}

export function createImageGenerator(config: ImageClientConfig): ImageGenerator {
  const model = config.model ?? DEFAULT_IMAGE_MODEL

  return async (request) => {
    try {
      const response = await httpFetch(OPENAI_IMAGES_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`
        },
        body: JSON.stringify({
          model,
          prompt: request.prompt,
          size: request.size,
          n: 1,
          response_format: 'b64_json'
        }),
        timeoutMs: config.timeoutMs
      })

      if (!response.ok) return handleHttpError(response)

      const encoded = base64Image(await response.json())
      return encoded ? { ok: true, value: Buffer.from(encoded, 'base64') } : emptyResponseError()
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}
