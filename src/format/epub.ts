/**
 * EPUB Output
 *
 * EPUB 3 package built with jszip: mimetype (stored, first entry),
 * META-INF/container.xml, OEBPS/content.opf, OEBPS/nav.xhtml and one XHTML
 * document per chapter.
 */

import { createHash } from 'node:crypto'
import JSZip from 'jszip'
import type { Book, BookChapter } from '../types'
import { escapeXml, FAILED_CHAPTER_TEXT, fullTitle, readImage, toParagraphs } from './utils'

const CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`

const STYLES = `body { font-family: serif; line-height: 1.6; }
h1, h2 { text-align: center; }
img { max-width: 100%; height: auto; display: block; margin: 1em auto; }
.failed { font-style: italic; color: #888; }
`

interface ManifestItem {
  readonly id: string
  readonly href: string
  readonly mediaType: string
  readonly properties?: string | undefined
}

function xhtml(title: string, language: string, body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" xml:lang="${escapeXml(language)}" lang="${escapeXml(language)}">
<head>
  <title>${escapeXml(title)}</title>
  <link href="style.css" rel="stylesheet" type="text/css"/>
</head>
<body>
${body}
</body>
</html>
`
}

function chapterFile(chapter: BookChapter): string {
  return `chapter_${String(chapter.number).padStart(2, '0')}.xhtml`
}

function illustrationFile(chapter: BookChapter): string {
  return `images/illustration_${String(chapter.number).padStart(2, '0')}.png`
}

function chapterBody(chapter: BookChapter, hasIllustration: boolean): string {
  const lines = [`<h2>${escapeXml(chapter.title)}</h2>`]
  if (hasIllustration) {
    lines.push(`<img src="${illustrationFile(chapter)}" alt="${escapeXml(chapter.title)}"/>`)
  }
  if (chapter.source === 'failed') {
    lines.push(`<p class="failed">${escapeXml(FAILED_CHAPTER_TEXT)}</p>`)
  } else {
    lines.push(...toParagraphs(chapter.content).map((p) => `<p>${escapeXml(p)}</p>`))
  }
  return lines.join('\n')
}

/**
 * Stable identifier derived from title, author and generation time.
 */
export function bookIdentifier(book: Book): string {
  const hex = createHash('sha256')
    .update(`${book.metadata.title}\n${book.metadata.author}\n${book.generatedAt.toISOString()}`)
    .digest('hex')
  return `urn:uuid:${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`
}

function contentOpf(book: Book, manifest: readonly ManifestItem[], spine: readonly string[]): string {
  const { metadata } = book
  const modified = book.generatedAt.toISOString().replace(/\.\d{3}Z$/, 'Z')
  const meta = [
    `<dc:identifier id="book-id">${escapeXml(bookIdentifier(book))}</dc:identifier>`,
    `<dc:title>${escapeXml(fullTitle(metadata))}</dc:title>`,
    `<dc:creator>${escapeXml(metadata.author)}</dc:creator>`,
    `<dc:language>${escapeXml(metadata.language)}</dc:language>`,
    metadata.description ? `<dc:description>${escapeXml(metadata.description)}</dc:description>` : '',
    ...metadata.keywords.map((k) => `<dc:subject>${escapeXml(k)}</dc:subject>`),
    `<meta property="dcterms:modified">${modified}</meta>`
  ].filter(Boolean)

  const items = manifest.map((item) => {
    const props = item.properties ? ` properties="${item.properties}"` : ''
    return `<item id="${item.id}" href="${item.href}" media-type="${item.mediaType}"${props}/>`
  })

  return `<?xml version="1.0" encoding="UTF-8"?>
<package version="3.0" unique-identifier="book-id" xmlns="http://www.idpf.org/2007/opf">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    ${meta.join('\n    ')}
  </metadata>
  <manifest>
    ${items.join('\n    ')}
  </manifest>
  <spine>
    ${spine.map((id) => `<itemref idref="${id}"/>`).join('\n    ')}
  </spine>
</package>
`
}

function navXhtml(book: Book): string {
  const entries = book.chapters.map(
    (ch) => `<li><a href="${chapterFile(ch)}">${escapeXml(ch.title)}</a></li>`
  )
  const body = `<nav epub:type="toc" id="toc">
<h1>Contents</h1>
<ol>
${entries.join('\n')}
</ol>
</nav>`
  return xhtml('Contents', book.metadata.language, body)
}

export async function renderEpub(book: Book): Promise<Buffer> {
  const { metadata } = book
  const zip = new JSZip()

  // Must be the first entry and uncompressed
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' })
  zip.file('META-INF/container.xml', CONTAINER_XML)

  const manifest: ManifestItem[] = [
    { id: 'nav', href: 'nav.xhtml', mediaType: 'application/xhtml+xml', properties: 'nav' },
    { id: 'css', href: 'style.css', mediaType: 'text/css' }
  ]
  const spine: string[] = []

  zip.file('OEBPS/style.css', STYLES)
  zip.file('OEBPS/nav.xhtml', navXhtml(book))

  const cover = readImage(book.coverPath)
  if (cover) {
    zip.file('OEBPS/images/cover.png', cover)
    zip.file(
      'OEBPS/cover.xhtml',
      xhtml(metadata.title, metadata.language, '<img src="images/cover.png" alt="Cover"/>')
    )
    manifest.push(
      { id: 'cover-image', href: 'images/cover.png', mediaType: 'image/png', properties: 'cover-image' },
      { id: 'cover', href: 'cover.xhtml', mediaType: 'application/xhtml+xml' }
    )
    spine.push('cover')
  }

  const titleBody = [
    `<h1>${escapeXml(metadata.title)}</h1>`,
    metadata.subtitle ? `<h2>${escapeXml(metadata.subtitle)}</h2>` : '',
    `<p style="text-align: center">${escapeXml(metadata.author)}</p>`
  ]
    .filter(Boolean)
    .join('\n')
  zip.file('OEBPS/title.xhtml', xhtml(metadata.title, metadata.language, titleBody))
  manifest.push({ id: 'title', href: 'title.xhtml', mediaType: 'application/xhtml+xml' })
  spine.push('title', 'nav')

  for (const chapter of book.chapters) {
    const id = `chapter-${chapter.number}`
    const illustration = readImage(chapter.illustrationPath)
    if (illustration) {
      zip.file(`OEBPS/${illustrationFile(chapter)}`, illustration)
      manifest.push({ id: `${id}-image`, href: illustrationFile(chapter), mediaType: 'image/png' })
    }
    zip.file(
      `OEBPS/${chapterFile(chapter)}`,
      xhtml(chapter.title, metadata.language, chapterBody(chapter, illustration !== undefined))
    )
    manifest.push({ id, href: chapterFile(chapter), mediaType: 'application/xhtml+xml' })
    spine.push(id)
  }

  zip.file('OEBPS/content.opf', contentOpf(book, manifest, spine))

  return zip.generateAsync({
    type: 'nodebuffer',
    mimeType: 'application/epub+zip',
    compression: 'DEFLATE'
  })
}
