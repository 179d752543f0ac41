/**
 * Book Packaging
 *
 * Lays out the final deliverable:
 *
 * ```
 * <Safe_Title>_<YYYYMMDD_HHMMSS>/
 * ├── <Safe_Title>.pdf|epub|html
 * ├── metadata.json
 * ├── README.md
 * └── artifacts/
 *     ├── content.json
 *     ├── prompts.json          (when prompts are given)
 *     ├── chapters/chapter_NN.txt
 *     └── images/               (cover and illustrations, when generated)
 * ```
 */

import { copyFileSync, existsSync, mkdirSync, writeFileSync } from 'node:fs'
import { basename, join } from 'node:path'
import { FAILED_CHAPTER_TEXT, fullTitle, safeTitle } from '../format/utils'
import type { Book, BookChapter, FormattedBook } from '../types'

export interface PackageOptions {
  /** Timestamp used in the directory name (default: now) */
  readonly now?: Date | undefined
  /** Chapter prompts, by chapter index */
  readonly prompts?: readonly string[] | undefined
}

export interface BookPackage {
  readonly dir: string
  /** Paths of the formatted book files */
  readonly bookFiles: readonly string[]
  readonly imageFiles: readonly string[]
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * Local time as YYYYMMDD_HHMMSS.
 */
export function packageTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${day}_${time}`
}

function chapterText(chapter: BookChapter): string {
  const body = chapter.source === 'failed' ? FAILED_CHAPTER_TEXT : chapter.content
  return `Chapter ${chapter.number}: ${chapter.title}\n\n${body}\n`
}

function writeJson(path: string, data: unknown): void {
  writeFileSync(path, `${JSON.stringify(data, null, 2)}\n`)
}

function buildMetadataJson(book: Book, files: readonly FormattedBook[]): Record<string, unknown> {
  const { metadata } = book
  return {
    title: metadata.title,
    subtitle: metadata.subtitle ?? null,
    author: metadata.author,
    language: metadata.language,
    description: metadata.description ?? null,
    keywords: metadata.keywords,
    chapterCount: book.chapters.length,
    failedChapters: book.chapters.filter((c) => c.source === 'failed').map((c) => c.number),
    formats: files.map((f) => f.format),
    generatedAt: book.generatedAt.toISOString()
  }
}

export function buildReadme(book: Book, files: readonly FormattedBook[], dirName: string): string {
  const { metadata } = book
  const lines = [`# ${fullTitle(metadata)}`, '', `by ${metadata.author}`, '']
  if (metadata.description) lines.push(metadata.description, '')

  lines.push(
    '## Details',
    '',
    `- Language: ${metadata.language}`,
    `- Chapters: ${book.chapters.length}`,
    `- Generated: ${book.generatedAt.toISOString()}`
  )
  if (metadata.keywords.length > 0) lines.push(`- Keywords: ${metadata.keywords.join(', ')}`)

  lines.push('', '## Files', '', '```', `${dirName}/`)
  for (const file of files) lines.push(`├── ${file.fileName}`)
  lines.push(
    '├── metadata.json',
    '├── README.md',
    '└── artifacts/',
    '    ├── content.json',
    '    ├── chapters/',
    '    └── images/',
    '```',
    '',
    '## Contents',
    ''
  )
  for (const chapter of book.chapters) {
    const note = chapter.source === 'failed' ? ' (not generated)' : ''
    lines.push(`${chapter.number}. ${chapter.title}${note}`)
  }
  lines.push('')
  return lines.join('\n')
}

function copyImages(book: Book, imagesDir: string): string[] {
  const sources = [book.coverPath, ...book.chapters.map((c) => c.illustrationPath)].filter(
    (p): p is string => p !== undefined && existsSync(p)
  )
  if (sources.length === 0) return []

  mkdirSync(imagesDir, { recursive: true })
  return sources.map((source) => {
    const destination = join(imagesDir, basename(source))
    copyFileSync(source, destination)
    return destination
  })
}

/**
 * Write the package directory under `baseDir` and return what was written.
 */
export function createPackage(
  baseDir: string,
  book: Book,
  files: readonly FormattedBook[],
  options: PackageOptions = {}
): BookPackage {
  const dirName = `${safeTitle(book.metadata.title)}_${packageTimestamp(options.now ?? new Date())}`
  const dir = join(baseDir, dirName)
  const artifactsDir = join(dir, 'artifacts')
  const chaptersDir = join(artifactsDir, 'chapters')
  mkdirSync(chaptersDir, { recursive: true })

  const bookFiles = files.map((file) => {
    const path = join(dir, file.fileName)
    writeFileSync(path, file.data)
    return path
  })

  writeJson(join(dir, 'metadata.json'), buildMetadataJson(book, files))
  writeFileSync(join(dir, 'README.md'), buildReadme(book, files, dirName))

  writeJson(join(artifactsDir, 'content.json'), {
    metadata: book.metadata,
    chapters: book.chapters.map((c) => ({
      number: c.number,
      title: c.title,
      source: c.source,
      content: c.content
    }))
  })
  for (const chapter of book.chapters) {
    writeFileSync(join(chaptersDir, `chapter_${pad(chapter.number)}.txt`), chapterText(chapter))
  }

  if (options.prompts) {
    writeJson(
      join(artifactsDir, 'prompts.json'),
      options.prompts.map((prompt, i) => ({ chapter: i + 1, prompt }))
    )
  }

  const imageFiles = copyImages(book, join(artifactsDir, 'images'))

  return { dir, bookFiles, imageFiles }
}
