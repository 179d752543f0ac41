/**
 * Pipeline Context
 *
 * Shared context for all pipeline steps: settings, cache, external generators
 * and logger.
 */

import { FilesystemCache } from '../../cache/filesystem'
import type { ContentCache } from '../../cache/types'
import { createImageGenerator } from '../../providers/image'
import { createTextGenerator } from '../../providers/text'
import type { ImageGenerator, TextGenerator } from '../../types'
import type { Logger } from '../logger'
import type { GenerationSettings } from '../settings'

/**
 * Pipeline context passed to all steps.
 */
export interface PipelineContext {
  /** Manuscript path */
  readonly input: string
  readonly settings: GenerationSettings
  /** Chapter and metadata cache */
  readonly cache: ContentCache
  readonly generateText: TextGenerator
  /** Undefined when image generation is off */
  readonly generateImage: ImageGenerator | undefined
  readonly logger: Logger
  /** Wait used between retries (tests pass a fake) */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

/**
 * Replacements for the pieces that talk to the outside world.
 */
export interface ContextOverrides {
  readonly cache?: ContentCache | undefined
  readonly generateText?: TextGenerator | undefined
  readonly generateImage?: ImageGenerator | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

/**
 * Build the pipeline context. Real provider clients and the filesystem cache
 * are created for anything not overridden.
 */
export function initContext(
  input: string,
  settings: GenerationSettings,
  logger: Logger,
  overrides: ContextOverrides = {}
): PipelineContext {
  const cache = overrides.cache ?? new FilesystemCache(settings.cacheDir, { logger })

  const generateText =
    overrides.generateText ??
    createTextGenerator({ apiKeys: settings.apiKeys, timeoutMs: settings.requestTimeoutMs })

  let generateImage: ImageGenerator | undefined
  if (settings.images) {
    const apiKey = settings.apiKeys.openai
    generateImage =
      overrides.generateImage ??
      (apiKey
        ? createImageGenerator({
            apiKey,
            model: settings.imageModel,
            timeoutMs: settings.requestTimeoutMs
          })
        : undefined)
  }

  return {
    input,
    settings,
    cache,
    generateText,
    generateImage,
    logger,
    sleep: overrides.sleep
  }
}
