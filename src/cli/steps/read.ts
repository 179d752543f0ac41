/**
 * Read Step
 *
 * Reads the manuscript and splits it into titled sections.
 */

import type { ManuscriptSection } from '../../generation/prompt'
import { readManuscript, toSections } from '../../manuscript/index'
import type { PipelineContext } from './context'

export interface ReadResult {
  readonly content: string
  readonly sections: readonly ManuscriptSection[]
}

export function stepRead(ctx: PipelineContext): ReadResult {
  const { logger, settings } = ctx
  logger.log('\n📖 Reading manuscript...')

  const content = readManuscript(ctx.input)
  const sections = toSections(content, settings.chunkSize)

  logger.success(
    `${content.length.toLocaleString()} characters in ${sections.length} section(s) (chunk size ${settings.chunkSize})`
  )
  for (const [i, section] of sections.entries()) {
    logger.verbose(`section ${i + 1}: ${section.title} (${section.content.length} chars)`)
  }

  return { content, sections }
}
