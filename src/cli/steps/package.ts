/**
 * Package Step
 *
 * Writes the output package: book files, metadata, README and artifacts.
 */

import { type BookPackage, createPackage } from '../../package/index'
import type { Book, FormattedBook, GenerationRequest } from '../../types'
import type { PipelineContext } from './context'

export function stepPackage(
  ctx: PipelineContext,
  book: Book,
  files: readonly FormattedBook[],
  requests: readonly GenerationRequest[]
): BookPackage {
  const { logger, settings } = ctx
  logger.log('\n📦 Packaging...')

  const pkg = createPackage(settings.outputDir, book, files, {
    now: book.generatedAt,
    prompts: requests.map((r) => r.promptContext)
  })

  logger.success(pkg.dir)
  return pkg
}
