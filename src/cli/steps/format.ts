/**
 * Format Step
 *
 * Renders the assembled book in each requested format.
 */

import { formatBook } from '../../format/index'
import type { Book, FormattedBook } from '../../types'
import type { PipelineContext } from './context'

function formatSize(bytes: number): string {
  return bytes >= 1024 * 1024
    ? `${(bytes / (1024 * 1024)).toFixed(1)} MB`
    : `${Math.max(1, Math.round(bytes / 1024))} KB`
}

export async function stepFormat(ctx: PipelineContext, book: Book): Promise<FormattedBook[]> {
  const { logger, settings } = ctx
  logger.log('\n📚 Formatting book...')

  const files: FormattedBook[] = []
  for (const format of settings.formats) {
    const file = await formatBook(book, format)
    logger.success(`${format.toUpperCase()}: ${file.fileName} (${formatSize(file.data.length)})`)
    files.push(file)
  }
  return files
}
