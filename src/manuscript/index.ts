/**
 * Manuscript Reading
 *
 * Loads the source manuscript and splits it into chapter-sized sections.
 */

import { readFileSync } from 'node:fs'
import type { ManuscriptSection } from '../generation/prompt'

export const MIN_MANUSCRIPT_LENGTH = 100
export const DEFAULT_CHUNK_SIZE = 2000

const MAX_TITLE_LENGTH = 80

export class ManuscriptError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ManuscriptError'
  }
}

/**
 * Read a UTF-8 manuscript.
 *
 * @throws ManuscriptError when the file is missing or too short to work from
 */
export function readManuscript(path: string): string {
  let content: string
  try {
    content = readFileSync(path, 'utf-8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ManuscriptError(`Cannot read manuscript ${path}: ${message}`)
  }

  const length = content.trim().length
  if (length < MIN_MANUSCRIPT_LENGTH) {
    throw new ManuscriptError(
      `Manuscript is too short (${length} characters, need at least ${MIN_MANUSCRIPT_LENGTH})`
    )
  }
  return content
}

/**
 * Pack blank-line separated paragraphs into sections of roughly `chunkSize`
 * characters. A paragraph is never split, so one longer than `chunkSize`
 * becomes a section of its own.
 */
export function splitIntoSections(content: string, chunkSize = DEFAULT_CHUNK_SIZE): string[] {
  const paragraphs = content
    .replace(/\r\n/g, '\n')
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)

  const sections: string[] = []
  let current: string[] = []
  let currentSize = 0

  for (const paragraph of paragraphs) {
    if (currentSize + paragraph.length > chunkSize && current.length > 0) {
      sections.push(current.join('\n\n'))
      current = []
      currentSize = 0
    }
    current.push(paragraph)
    currentSize += paragraph.length
  }

  if (current.length > 0) {
    sections.push(current.join('\n\n'))
  }
  return sections
}

/**
 * Title for a section: its Markdown heading, else a short first line, else
 * "Chapter N" (1-based).
 */
export function deriveSectionTitle(section: string, index: number): string {
  const firstLine = section.split('\n', 1)[0]?.trim() ?? ''

  const heading = firstLine.match(/^#{1,6}\s+(.+)$/)
  if (heading?.[1]) return heading[1].trim()

  if (
    firstLine.length > 0 &&
    firstLine.length <= MAX_TITLE_LENGTH &&
    !/[.!?:;,]$/.test(firstLine) &&
    section.trim() !== firstLine
  ) {
    return firstLine
  }
  return `Chapter ${index + 1}`
}

/**
 * Split a manuscript and title each section.
 */
export function toSections(content: string, chunkSize = DEFAULT_CHUNK_SIZE): ManuscriptSection[] {
  return splitIntoSections(content, chunkSize).map((text, i) => ({
    title: deriveSectionTitle(text, i),
    content: text
  }))
}

/**
 * Most frequent words of five or more letters, ties broken by first appearance.
 */
export function extractKeywords(text: string, max = 5): string[] {
  const counts = new Map<string, number>()
  for (const match of text.toLowerCase().matchAll(/\p{L}{5,}/gu)) {
    const word = match[0]
    counts.set(word, (counts.get(word) ?? 0) + 1)
  }
  // Map preserves insertion order and sort is stable
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, max)
    .map(([word]) => word)
}
