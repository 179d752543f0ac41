/**
 * Images Step
 *
 * Optional cover and chapter illustrations. Failed chapters get no
 * illustration.
 */

import { type BookImages, generateBookImages } from '../../images/index'
import type { BookMetadata, ChapterResult } from '../../types'
import type { PipelineContext } from './context'

export async function stepImages(
  ctx: PipelineContext,
  metadata: BookMetadata,
  results: readonly ChapterResult[],
  outputDir: string
): Promise<BookImages> {
  const { logger, settings } = ctx
  if (!ctx.generateImage) {
    return { illustrations: [] }
  }

  logger.log(`\n🎨 Generating cover and ${settings.illustrations} illustration(s)...`)

  const images = await generateBookImages(
    metadata,
    results
      .filter((r) => r.source !== 'failed')
      .map((r) => ({ chapterIndex: r.chapterIndex, title: r.sectionTitle, content: r.content })),
    ctx.generateImage,
    { outputDir, illustrations: settings.illustrations, logger }
  )

  logger.success(
    `${images.coverPath ? 'Cover' : 'No cover'}, ${images.illustrations.length} illustration(s)`
  )
  return images
}
