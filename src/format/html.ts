/**
 * HTML Output
 *
 * Standalone HTML5 document with inline styles and embedded images.
 */

import type { Book, BookChapter } from '../types'
import { escapeXml, FAILED_CHAPTER_TEXT, fullTitle, readImage, toParagraphs } from './utils'

const STYLES = `body { font-family: Georgia, serif; max-width: 42em; margin: 2em auto; padding: 0 1em; line-height: 1.6; color: #222; }
header, nav { margin-bottom: 3em; }
h1 { text-align: center; margin-bottom: 0.2em; }
.subtitle, .author { text-align: center; color: #555; }
.cover, .illustration { display: block; max-width: 100%; margin: 1em auto; }
.failed { font-style: italic; color: #999; }
section.chapter { page-break-before: always; }`

function dataUri(data: Buffer): string {
  return `data:image/png;base64,${data.toString('base64')}`
}

function renderChapter(chapter: BookChapter): string {
  const id = `chapter-${chapter.number}`
  const lines = [`<section class="chapter" id="${id}">`, `<h2>${escapeXml(chapter.title)}</h2>`]

  const illustration = readImage(chapter.illustrationPath)
  if (illustration) {
    lines.push(`<img class="illustration" src="${dataUri(illustration)}" alt="${escapeXml(chapter.title)}">`)
  }

  if (chapter.source === 'failed') {
    lines.push(`<p class="failed">${escapeXml(FAILED_CHAPTER_TEXT)}</p>`)
  } else {
    for (const paragraph of toParagraphs(chapter.content)) {
      lines.push(`<p>${escapeXml(paragraph)}</p>`)
    }
  }

  lines.push('</section>')
  return lines.join('\n')
}

export function renderHtml(book: Book): string {
  const { metadata } = book
  const head = [
    '<!DOCTYPE html>',
    `<html lang="${escapeXml(metadata.language)}">`,
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeXml(fullTitle(metadata))}</title>`,
    `<meta name="author" content="${escapeXml(metadata.author)}">`,
    metadata.description ? `<meta name="description" content="${escapeXml(metadata.description)}">` : '',
    metadata.keywords.length > 0
      ? `<meta name="keywords" content="${escapeXml(metadata.keywords.join(', '))}">`
      : '',
    `<style>\n${STYLES}\n</style>`,
    '</head>',
    '<body>'
  ]

  const header = ['<header>']
  const cover = readImage(book.coverPath)
  if (cover) {
    header.push(`<img class="cover" src="${dataUri(cover)}" alt="Cover">`)
  }
  header.push(`<h1>${escapeXml(metadata.title)}</h1>`)
  if (metadata.subtitle) header.push(`<p class="subtitle">${escapeXml(metadata.subtitle)}</p>`)
  header.push(`<p class="author">${escapeXml(metadata.author)}</p>`, '</header>')

  const toc = [
    '<nav>',
    '<h2>Contents</h2>',
    '<ol>',
    ...book.chapters.map(
      (ch) => `<li><a href="#chapter-${ch.number}">${escapeXml(ch.title)}</a></li>`
    ),
    '</ol>',
    '</nav>'
  ]

  return [
    ...head.filter(Boolean),
    ...header,
    ...toc,
    ...book.chapters.map(renderChapter),
    '</body>',
    '</html>',
    ''
  ].join('\n')
}
