import { mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import JSZip from 'jszip'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { bookIdentifier, renderEpub } from './epub'
import { createBook, createChapter } from '../test-support'

async function readText(zip: JSZip, path: string): Promise<string> {
  const file = zip.file(path)
  if (!file) throw new Error(`missing ${path}`)
  return file.async('string')
}

describe('renderEpub', () => {
  let testDir: string

  beforeEach(() => {
    testDir = join(tmpdir(), `epub-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
  })

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true })
  })

  it('stores the mimetype first', async () => {
    const zip = await JSZip.loadAsync(await renderEpub(createBook()))

    expect(Object.keys(zip.files)[0]).toBe('mimetype')
    expect(await readText(zip, 'mimetype')).toBe('application/epub+zip')
  })

  it('writes container, package document, navigation and chapters', async () => {
    const zip = await JSZip.loadAsync(await renderEpub(createBook()))

    expect(await readText(zip, 'META-INF/container.xml')).toContain('full-path="OEBPS/content.opf"')
    const opf = await readText(zip, 'OEBPS/content.opf')
    expect(opf).toContain('<dc:title>Tidal Gardens: Growing by the Sea</dc:title>')
    expect(opf).toContain('<dc:subject>seaweed</dc:subject>')
    expect(opf).toContain('<meta property="dcterms:modified">2025-03-01T12:00:00Z</meta>')
    expect(opf).toContain(
      '<itemref idref="title"/>\n    <itemref idref="nav"/>\n    <itemref idref="chapter-1"/>\n    <itemref idref="chapter-2"/>'
    )
    expect(await readText(zip, 'OEBPS/nav.xhtml')).toContain(
      '<li><a href="chapter_01.xhtml">Salt &amp; Spray</a></li>'
    )
    expect(await readText(zip, 'OEBPS/chapter_01.xhtml')).toContain(
      '<p>First paragraph about &lt;tides&gt;.</p>'
    )
  })

  it('includes cover and illustrations when the files exist', async () => {
    const coverPath = join(testDir, 'cover.png')
    const illustrationPath = join(testDir, 'illustration_01.png')
    writeFileSync(coverPath, 'cover-bytes')
    writeFileSync(illustrationPath, 'illustration-bytes')
    const book = createBook({
      coverPath,
      chapters: [createChapter({ illustrationPath })]
    })

    const zip = await JSZip.loadAsync(await renderEpub(book))

    expect(await readText(zip, 'OEBPS/images/cover.png')).toBe('cover-bytes')
    expect(await readText(zip, 'OEBPS/images/illustration_01.png')).toBe('illustration-bytes')
    const opf = await readText(zip, 'OEBPS/content.opf')
    expect(opf).toContain('properties="cover-image"')
    expect(await readText(zip, 'OEBPS/chapter_01.xhtml')).toContain(
      '<img src="images/illustration_01.png" alt="Salt &amp; Spray"/>'
    )
  })

  it('renders a placeholder for failed chapters', async () => {
    const book = createBook({ chapters: [createChapter({ source: 'failed', content: '' })] })

    const zip = await JSZip.loadAsync(await renderEpub(book))

    expect(await readText(zip, 'OEBPS/chapter_01.xhtml')).toContain(
      '<p class="failed">This chapter could not be generated.</p>'
    )
  })
})

describe('bookIdentifier', () => {
  it('is stable for the same book', () => {
    expect(bookIdentifier(createBook())).toBe(bookIdentifier(createBook()))
    expect(bookIdentifier(createBook())).toMatch(
      /^urn:uuid:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    )
  })

  it('changes with the generation time', () => {
    expect(bookIdentifier(createBook())).not.toBe(
      bookIdentifier(createBook({ generatedAt: new Date('2025-03-02T00:00:00Z') }))
    )
  })
})
