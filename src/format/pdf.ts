/**
 * PDF Output
 *
 * Renders a book with pdfkit: title page, optional cover page, table of
 * contents, one chapter per page run, page numbers in the footer.
 */

import type { Book, BookChapter } from '../types'
import { FAILED_CHAPTER_TEXT, fullTitle, readImage, toParagraphs } from './utils'

// PDFKit uses CommonJS exports, so we need to handle it carefully
type PDFDocumentClass = new (options?: PDFKit.PDFDocumentOptions) => PDFKit.PDFDocument

const MARGIN = 72

async function loadPDFKit(): Promise<PDFDocumentClass> {
  try {
    const pdfkit = await import('pdfkit')
    // pdfkit exports the PDFDocument class as default
    return pdfkit.default
  } catch {
    throw new Error('pdfkit is required for PDF output. Install it with: npm install pdfkit')
  }
}

function renderTitlePage(doc: PDFKit.PDFDocument, book: Book): void {
  const { metadata } = book
  doc.moveDown(8)
  doc.fontSize(28).font('Helvetica-Bold').text(metadata.title, { align: 'center' })
  if (metadata.subtitle) {
    doc.moveDown(0.5).fontSize(16).font('Helvetica').text(metadata.subtitle, { align: 'center' })
  }
  doc.moveDown(3).fontSize(14).font('Helvetica').text(metadata.author, { align: 'center' })
}

function renderCover(doc: PDFKit.PDFDocument, cover: Buffer): void {
  doc.addPage()
  const width = doc.page.width - MARGIN * 2
  const height = doc.page.height - MARGIN * 2
  doc.image(cover, MARGIN, MARGIN, { fit: [width, height], align: 'center', valign: 'center' })
}

function renderContents(doc: PDFKit.PDFDocument, chapters: readonly BookChapter[]): void {
  doc.addPage()
  doc.fontSize(20).font('Helvetica-Bold').text('Contents', { align: 'center' })
  doc.moveDown(1.5)
  doc.fontSize(12).font('Helvetica')
  for (const chapter of chapters) {
    doc.text(`${chapter.number}. ${chapter.title}`)
    doc.moveDown(0.3)
  }
}

function renderChapter(doc: PDFKit.PDFDocument, chapter: BookChapter): void {
  doc.addPage()
  doc.fontSize(18).font('Helvetica-Bold').text(chapter.title, { align: 'center' })
  doc.moveDown(1.5)

  const illustration = readImage(chapter.illustrationPath)
  if (illustration) {
    const width = doc.page.width - MARGIN * 2
    doc.image(illustration, { fit: [width, 300], align: 'center' })
    doc.moveDown(1)
  }

  if (chapter.source === 'failed') {
    doc.fontSize(12).font('Helvetica-Oblique').fillColor('#888888').text(FAILED_CHAPTER_TEXT)
    doc.fillColor('#000000')
    return
  }

  doc.fontSize(12).font('Times-Roman')
  for (const paragraph of toParagraphs(chapter.content)) {
    doc.text(paragraph, { align: 'justify', paragraphGap: 8 })
  }
}

/**
 * Page numbers on every page after the title page.
 */
function renderPageNumbers(doc: PDFKit.PDFDocument): void {
  const range = doc.bufferedPageRange()
  for (let i = range.start + 1; i < range.start + range.count; i++) {
    doc.switchToPage(i)
    const bottom = doc.page.margins.bottom
    // Writing inside the bottom margin would otherwise trigger a new page
    doc.page.margins.bottom = 0
    doc
      .fontSize(9)
      .font('Helvetica')
      .fillColor('#666666')
      .text(String(i + 1), 0, doc.page.height - MARGIN / 2, {
        width: doc.page.width,
        align: 'center'
      })
    doc.page.margins.bottom = bottom
  }
}

export async function renderPdf(book: Book): Promise<Buffer> {
  const PDF = await loadPDFKit()
  const { metadata } = book

  const doc = new PDF({
    size: 'A4',
    margin: MARGIN,
    bufferPages: true,
    info: {
      Title: fullTitle(metadata),
      Author: metadata.author,
      Subject: metadata.description ?? '',
      Keywords: metadata.keywords.join(', '),
      CreationDate: book.generatedAt
    }
  })

  const chunks: Buffer[] = []
  doc.on('data', (chunk: Buffer) => {
    chunks.push(chunk)
  })
  const finished = new Promise<Buffer>((resolve, reject) => {
    doc.on('end', () => resolve(Buffer.concat(chunks)))
    doc.on('error', reject)
  })

  renderTitlePage(doc, book)
  const cover = readImage(book.coverPath)
  if (cover) renderCover(doc, cover)
  renderContents(doc, book.chapters)
  for (const chapter of book.chapters) {
    renderChapter(doc, chapter)
  }
  renderPageNumbers(doc)

  doc.end()
  return finished
}
