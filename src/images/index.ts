/**
 * Book Images
 *
 * Generates a cover and per-chapter illustrations through an ImageGenerator
 * and writes them as PNG files. Each image is optional: a failed one is
 * skipped with a warning and never fails the book.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { BookMetadata, ImageGenerator } from '../types'

/** Characters of chapter text used as illustration context */
const CONTEXT_CHARS = 200

export interface ImageLogger {
  verbose(msg: string): void
  warn(msg: string): void
}

export interface ChapterImageSource {
  readonly chapterIndex: number
  readonly title: string
  readonly content: string
}

export interface BookImageOptions {
  readonly outputDir: string
  /** Maximum chapter illustrations (0 = cover only) */
  readonly illustrations: number
  readonly logger?: ImageLogger | undefined
}

export interface ChapterIllustration {
  readonly chapterIndex: number
  readonly path: string
}

export interface BookImages {
  readonly coverPath?: string | undefined
  readonly illustrations: readonly ChapterIllustration[]
}

export function buildCoverPrompt(metadata: BookMetadata): string {
  const subject = metadata.description ?? metadata.keywords.join(', ')
  return [
    `Professional book cover artwork for a book titled "${metadata.title}".`,
    subject ? `Subject: ${subject}` : '',
    `Modern, high quality, suitable for a "${metadata.language}" language audience.`,
    'Leave space for the title. No text in the image.'
  ]
    .filter(Boolean)
    .join('\n')
}

export function buildIllustrationPrompt(metadata: BookMetadata, chapter: ChapterImageSource): string {
  const context = chapter.content.slice(0, CONTEXT_CHARS).trim()
  return [
    `Illustration for the chapter "${chapter.title}" of the book "${metadata.title}".`,
    'A clear visual representation of the chapter\'s key idea. No text in the image.',
    context ? `Context: ${context}` : ''
  ]
    .filter(Boolean)
    .join('\n')
}

function illustrationFileName(chapterIndex: number): string {
  return `illustration_${String(chapterIndex + 1).padStart(2, '0')}.png`
}

/**
 * Generate the cover and up to `options.illustrations` chapter illustrations,
 * one per chapter from the first.
 */
export async function generateBookImages(
  metadata: BookMetadata,
  chapters: readonly ChapterImageSource[],
  generate: ImageGenerator,
  options: BookImageOptions
): Promise<BookImages> {
  const { logger } = options
  mkdirSync(options.outputDir, { recursive: true })

  let coverPath: string | undefined
  const cover = await generate({ prompt: buildCoverPrompt(metadata), size: '1024x1792' })
  if (cover.ok) {
    coverPath = join(options.outputDir, 'cover.png')
    writeFileSync(coverPath, cover.value)
    logger?.verbose(`Cover saved to ${coverPath}`)
  } else {
    logger?.warn(`Cover generation failed, continuing without cover: ${cover.error.message}`)
  }

  const illustrations: ChapterIllustration[] = []
  for (const chapter of chapters.slice(0, Math.max(0, options.illustrations))) {
    const result = await generate({
      prompt: buildIllustrationPrompt(metadata, chapter),
      size: '1024x1024'
    })
    if (!result.ok) {
      logger?.warn(
        `Illustration for chapter ${chapter.chapterIndex + 1} failed, skipping: ${result.error.message}`
      )
      continue
    }
    const path = join(options.outputDir, illustrationFileName(chapter.chapterIndex))
    writeFileSync(path, result.value)
    illustrations.push({ chapterIndex: chapter.chapterIndex, path })
  }

  return { coverPath, illustrations }
}
