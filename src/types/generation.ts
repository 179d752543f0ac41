/**
 * Generation Types
 *
 * Chapter generation requests, results and the provider-facing function types.
 */

import type { ApiErrorType, Result } from './common'

export type TextProvider = 'anthropic' | 'openai'

/**
 * Parameters forwarded to the text model. Part of the cache fingerprint.
 */
export interface ModelParameters {
  readonly provider: TextProvider
  readonly model: string
  /** Sampling temperature (0-1) */
  readonly temperature: number
  readonly maxTokens: number
}

/**
 * One chapter's generation request. Never mutated after creation.
 */
export interface GenerationRequest {
  /** 0-based position of the chapter in the book */
  readonly chapterIndex: number
  readonly sectionTitle: string
  /** Full prompt sent to the model */
  readonly promptContext: string
  readonly modelParameters: ModelParameters
}

export type ChapterSource = 'cache_hit' | 'generated' | 'failed'

export interface ChapterError {
  readonly type: ApiErrorType
  readonly message: string
  /** Attempts made before giving up */
  readonly attempts: number
  /** True when the error kind is not retryable (bad credentials, malformed request...) */
  readonly terminal: boolean
}

export interface ChapterResult {
  readonly chapterIndex: number
  readonly sectionTitle: string
  /** Generated text, empty when the chapter failed */
  readonly content: string
  readonly source: ChapterSource
  readonly error?: ChapterError | undefined
}

/**
 * External text generation call. Returns generated text or a classified error.
 */
export type TextGenerator = (
  promptContext: string,
  modelParameters: ModelParameters
) => Promise<Result<string>>

export interface ImageRequest {
  readonly prompt: string
  /** e.g. 1024x1024, 1024x1792 */
  readonly size: ImageSize
}

export type ImageSize = '1024x1024' | '1792x1024' | '1024x1792'

/**
 * External image generation call. Returns PNG bytes.
 */
export type ImageGenerator = (request: ImageRequest) => Promise<Result<Buffer>>
