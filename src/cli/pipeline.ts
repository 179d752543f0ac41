/**
 * Book Pipeline
 *
 * read → metadata → chapters → failure policy → images → format → package
 *
 * Each stage lives in ./steps; this module decides what happens between them.
 */

import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { DispatchSummary } from '../generation/dispatcher'
import { buildChapterRequests, type ManuscriptSection } from '../generation/prompt'
import type { BookImages } from '../images/index'
import type { BookPackage } from '../package/index'
import type { Book, BookMetadata, ChapterResult } from '../types'
import type { Logger } from './logger'
import type { GenerationSettings } from './settings'
import { countCachedChapters, stepChapters } from './steps/chapters'
import { type ContextOverrides, initContext, type PipelineContext } from './steps/context'
import { stepFormat } from './steps/format'
import { stepImages } from './steps/images'
import { baseMetadata, cachedMetadata, stepMetadata } from './steps/metadata'
import { stepPackage } from './steps/package'
import { stepRead } from './steps/read'

/**
 * Raised when too many chapters failed (or any failed terminally) to make a
 * book worth formatting.
 */
export class BookGenerationError extends Error {
  constructor(
    message: string,
    readonly failures: readonly ChapterResult[]
  ) {
    super(message)
    this.name = 'BookGenerationError'
  }
}

export interface DryRunReport {
  readonly dryRun: true
  readonly sectionCount: number
  /** Chapters already cached; null when the title is not known without a model call */
  readonly cachedCount: number | null
}

export interface PipelineReport {
  readonly dryRun: false
  readonly metadata: BookMetadata
  readonly summary: DispatchSummary
  readonly externalCalls: number
  readonly package: BookPackage
}

/**
 * Abort when any failure is terminal or failures exceed `maxFailedChapters`.
 *
 * @throws BookGenerationError
 */
export function checkFailurePolicy(results: readonly ChapterResult[], maxFailedChapters: number): void {
  const failures = results.filter((r) => r.source === 'failed')
  const terminal = failures.filter((r) => r.error?.terminal === true)

  if (terminal.length > 0) {
    const first = terminal[0]?.error
    throw new BookGenerationError(
      `${terminal.length} chapter(s) failed with a non-retryable error (${first?.type}: ${first?.message})`,
      failures
    )
  }
  if (failures.length > maxFailedChapters) {
    throw new BookGenerationError(
      `${failures.length} chapter(s) failed, more than the ${maxFailedChapters} allowed (maxFailedChapters)`,
      failures
    )
  }
}

/**
 * Combine metadata, chapter results and images into a Book.
 */
export function assembleBook(
  metadata: BookMetadata,
  results: readonly ChapterResult[],
  images: BookImages,
  generatedAt: Date
): Book {
  const illustrationFor = new Map(images.illustrations.map((i) => [i.chapterIndex, i.path] as const))
  return {
    metadata,
    chapters: results.map((result) => ({
      number: result.chapterIndex + 1,
      title: result.sectionTitle,
      content: result.content,
      source: result.source,
      illustrationPath: illustrationFor.get(result.chapterIndex)
    })),
    coverPath: images.coverPath,
    generatedAt
  }
}

async function runDry(
  ctx: PipelineContext,
  content: string,
  sections: readonly ManuscriptSection[]
): Promise<DryRunReport> {
  const { logger, settings } = ctx
  const sectionCount = sections.length
  logger.log('\n🔎 Dry run: checking cache...')

  const metadata = settings.title ? baseMetadata(ctx) : await cachedMetadata(ctx, content)
  if (!metadata) {
    logger.log('   Metadata not cached yet; chapter cache status depends on the generated title')
    logger.log(`\n   ${sectionCount} chapter(s) would be generated`)
    return { dryRun: true, sectionCount, cachedCount: null }
  }

  const requests = buildChapterRequests(sections, metadata, settings.modelParameters)
  const cachedCount = settings.useCache ? await countCachedChapters(ctx, requests) : 0
  logger.success(`${cachedCount}/${sectionCount} chapter(s) cached`)
  logger.log(`\n   ${sectionCount - cachedCount} chapter(s) would be generated`)
  return { dryRun: true, sectionCount, cachedCount }
}

/**
 * Generate and package a book from a manuscript.
 *
 * @throws ManuscriptError when the manuscript cannot be used
 * @throws BookGenerationError when the failure policy trips (nothing is written)
 */
export async function runPipeline(
  input: string,
  settings: GenerationSettings,
  logger: Logger,
  overrides: ContextOverrides = {}
): Promise<PipelineReport | DryRunReport> {
  const ctx = initContext(input, settings, logger, overrides)
  ctx.cache.resetStats()

  const { content, sections } = stepRead(ctx)
  if (settings.dryRun) {
    return runDry(ctx, content, sections)
  }

  const metadata = await stepMetadata(ctx, content)
  const chapters = await stepChapters(ctx, sections, metadata)
  checkFailurePolicy(chapters.results, settings.maxFailedChapters)

  const workDir = mkdtempSync(join(tmpdir(), 'chapterpress-'))
  try {
    const images = await stepImages(ctx, metadata, chapters.results, workDir)
    const book = assembleBook(metadata, chapters.results, images, new Date())
    const files = await stepFormat(ctx, book)
    const pkg = stepPackage(ctx, book, files, chapters.requests)

    const stats = ctx.cache.stats()
    logger.log(
      `\n💾 Cache: ${stats.hitCount} hit(s), ${stats.missCount} miss(es), ${stats.entryCount} entries`
    )

    return {
      dryRun: false,
      metadata,
      summary: chapters.summary,
      externalCalls: chapters.externalCalls,
      package: pkg
    }
  } finally {
    rmSync(workDir, { recursive: true, force: true })
  }
}
