/**
 * Metadata Step
 *
 * Generates title, subtitle, description and keywords. The model response is
 * cached like a chapter so that re-runs see the same title, and with it the
 * same chapter prompts and cache keys.
 */

import { generateCacheKey } from '../../cache/key'
import { buildMetadataPrompt } from '../../generation/prompt'
import { generateMetadata, parseMetadataResponse } from '../../metadata/index'
import { withRetry } from '../../retry/index'
import type { BookMetadata, TextGenerator } from '../../types'
import type { PipelineContext } from './context'

/**
 * Metadata known before any model call: CLI/config values only.
 */
export function baseMetadata(ctx: PipelineContext): BookMetadata {
  const { settings } = ctx
  return {
    title: settings.title,
    author: settings.author,
    language: settings.language,
    keywords: []
  }
}

export function metadataCacheKey(ctx: PipelineContext, content: string): string {
  const { modelParameters } = ctx.settings
  return generateCacheKey({
    service: modelParameters.provider,
    model: modelParameters.model,
    payload: {
      kind: 'metadata',
      prompt: buildMetadataPrompt(content, baseMetadata(ctx)),
      modelParameters
    }
  })
}

function isParsableMetadata(text: string): boolean {
  try {
    parseMetadataResponse(text)
    return true
  } catch {
    return false
  }
}

/**
 * Cached metadata response, or null on a miss. An entry that no longer
 * parses counts as a miss so the next run asks the model again.
 */
async function readCachedText(ctx: PipelineContext, key: string): Promise<string | null> {
  let text: string | null
  try {
    const entry = await ctx.cache.get(key)
    text = entry?.generatedText ?? null
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    ctx.logger.warn(`metadata: cache read failed, treating as miss: ${msg}`)
    return null
  }
  if (text !== null && !isParsableMetadata(text)) {
    ctx.logger.verbose('metadata: cached response is not valid metadata, treating as miss')
    return null
  }
  return text
}

/**
 * Metadata from a cached model response, without any external call.
 * Returns null when nothing is cached for this manuscript.
 */
export async function cachedMetadata(
  ctx: PipelineContext,
  content: string
): Promise<BookMetadata | null> {
  const cached = await readCachedText(ctx, metadataCacheKey(ctx, content))
  if (cached === null) return null
  return generateMetadata(
    content,
    baseMetadata(ctx),
    async () => ({ ok: true, value: cached }),
    ctx.settings.modelParameters,
    ctx.logger
  )
}

export async function stepMetadata(ctx: PipelineContext, content: string): Promise<BookMetadata> {
  const { logger, settings } = ctx
  logger.log('\n🏷️  Generating metadata...')

  const key = metadataCacheKey(ctx, content)
  const generate: TextGenerator = async (prompt, params) => {
    if (settings.useCache) {
      const cached = await readCachedText(ctx, key)
      if (cached !== null) {
        logger.verbose('metadata: cache hit')
        return { ok: true, value: cached }
      }
    }
    const result = await withRetry(() => ctx.generateText(prompt, params), settings.retry, {
      sleep: ctx.sleep
    })
    if (result.ok && isParsableMetadata(result.value)) {
      try {
        await ctx.cache.put(key, result.value)
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error)
        logger.warn(`metadata: cache write failed: ${msg}`)
      }
    }
    return result
  }

  const metadata = await generateMetadata(
    content,
    baseMetadata(ctx),
    generate,
    settings.modelParameters,
    logger
  )

  logger.success(`Title: ${metadata.title}${metadata.subtitle ? ` (${metadata.subtitle})` : ''}`)
  if (metadata.keywords.length > 0) {
    logger.success(`Keywords: ${metadata.keywords.join(', ')}`)
  }
  return metadata
}
