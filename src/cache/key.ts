/**
 * Cache Key Generation
 *
 * Generates deterministic SHA256 hash keys for generation request caching.
 */

import { createHash } from 'node:crypto'
import type { GenerationRequest } from '../types'
import type { CacheKeyComponents } from './types'

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj
  }

  if (Array.isArray(obj)) {
    return obj.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[key] = sortKeys(value)
  }
  return sorted
}

/**
 * Generate a deterministic cache key from request components.
 *
 * The key is a SHA256 hash of: service:model:normalized_payload
 *
 * @example
 * ```ts
 * const key = generateCacheKey({
 *   service: 'anthropic',
 *   model: 'claude-haiku-4-5',
 *   payload: { prompt: 'Write chapter one' }
 * })
 * // Returns: '3a7bd3e2...' (64 char hex string)
 * ```
 */
export function generateCacheKey(components: CacheKeyComponents): string {
  const { service, model, payload } = components
  const normalized = JSON.stringify(sortKeys(payload))
  const input = `${service}:${model}:${normalized}`

  return createHash('sha256').update(input).digest('hex')
}

/**
 * Generate cache key for a chapter generation request.
 * Every field of the request, model parameters included, is part of the fingerprint.
 */
export function generateChapterCacheKey(request: GenerationRequest): string {
  const { modelParameters } = request
  return generateCacheKey({
    service: modelParameters.provider,
    model: modelParameters.model,
    payload: {
      chapterIndex: request.chapterIndex,
      sectionTitle: request.sectionTitle,
      promptContext: request.promptContext,
      modelParameters
    }
  })
}
