/**
 * Book Formatting
 *
 * Renders an assembled book into each supported output format.
 */

import type { Book, FormattedBook, OutputFormat } from '../types'
import { renderEpub } from './epub'
import { renderHtml } from './html'
import { renderPdf } from './pdf'
import { safeTitle } from './utils'

export { bookIdentifier, renderEpub } from './epub'
export { renderHtml } from './html'
export { renderPdf } from './pdf'
export { escapeXml, FAILED_CHAPTER_TEXT, safeTitle, toParagraphs } from './utils'

async function render(book: Book, format: OutputFormat): Promise<Buffer> {
  switch (format) {
    case 'pdf':
      return renderPdf(book)
    case 'epub':
      return renderEpub(book)
    case 'html':
      return Buffer.from(renderHtml(book), 'utf-8')
  }
}

export async function formatBook(book: Book, format: OutputFormat): Promise<FormattedBook> {
  return {
    format,
    fileName: `${safeTitle(book.metadata.title)}.${format}`,
    data: await render(book, format)
  }
}
