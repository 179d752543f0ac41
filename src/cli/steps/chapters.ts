/**
 * Chapters Step
 *
 * Builds one generation request per section and runs them through the
 * chapter task runner and the parallel dispatcher.
 */

import { generateChapterCacheKey } from '../../cache/key'
import { dispatchChapters, type DispatchSummary, summarizeResults } from '../../generation/dispatcher'
import { buildChapterRequests, type ManuscriptSection } from '../../generation/prompt'
import { ChapterTaskRunner } from '../../generation/runner'
import type { BookMetadata, ChapterResult, GenerationRequest } from '../../types'
import type { PipelineContext } from './context'

export interface ChaptersResult {
  readonly requests: readonly GenerationRequest[]
  readonly results: readonly ChapterResult[]
  readonly summary: DispatchSummary
  /** External calls made, each retry attempt included */
  readonly externalCalls: number
}

export async function stepChapters(
  ctx: PipelineContext,
  sections: readonly ManuscriptSection[],
  metadata: BookMetadata
): Promise<ChaptersResult> {
  const { logger, settings } = ctx
  const requests = buildChapterRequests(sections, metadata, settings.modelParameters)
  const mode = settings.parallel ? `${settings.maxWorkers} workers` : 'sequential'

  logger.log(
    `\n✍️  Generating ${requests.length} chapter(s) with ${settings.modelParameters.model} (${mode})...`
  )

  const runner = new ChapterTaskRunner({
    generate: ctx.generateText,
    cache: ctx.cache,
    useCache: settings.useCache,
    retry: settings.retry,
    sleep: ctx.sleep,
    logger
  })

  const results = await dispatchChapters(requests, runner, {
    maxWorkers: settings.maxWorkers,
    parallelEnabled: settings.parallel,
    logger,
    onProgress: ({ completed, total, result }) => {
      logger.progress(`${result.sectionTitle} (${result.source})`, completed, total)
    }
  })

  const summary = summarizeResults(results)
  logger.success(
    `${summary.generated} generated, ${summary.cacheHits} from cache, ${summary.failed} failed (${runner.externalCalls} API calls)`
  )
  for (const result of results) {
    if (result.error) {
      logger.error(
        `Chapter ${result.chapterIndex + 1} "${result.sectionTitle}": ${result.error.type}: ${result.error.message} (${result.error.attempts} attempt(s))`
      )
    }
  }

  return { requests, results, summary, externalCalls: runner.externalCalls }
}

/**
 * Count requests whose chapter text is already cached. Makes no external calls.
 */
export async function countCachedChapters(
  ctx: PipelineContext,
  requests: readonly GenerationRequest[]
): Promise<number> {
  let cached = 0
  for (const request of requests) {
    try {
      if ((await ctx.cache.get(generateChapterCacheKey(request))) !== null) cached++
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error)
      ctx.logger.warn(`chapter ${request.chapterIndex + 1}: cache read failed: ${msg}`)
    }
  }
  return cached
}
