/**
 * Book Types
 *
 * Metadata, assembled chapters and output formats.
 */

import type { ChapterSource } from './generation'

export type OutputFormat = 'pdf' | 'epub' | 'html'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pdf', 'epub', 'html']

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value)
}

export interface BookMetadata {
  readonly title: string
  readonly subtitle?: string | undefined
  readonly author: string
  /** BCP 47 language code (e.g. "en", "ru") */
  readonly language: string
  readonly description?: string | undefined
  readonly keywords: readonly string[]
}

export interface BookChapter {
  /** 1-based chapter number as printed */
  readonly number: number
  readonly title: string
  readonly content: string
  readonly source: ChapterSource
  readonly illustrationPath?: string | undefined
}

/**
 * A fully assembled book, ready for formatting.
 */
export interface Book {
  readonly metadata: BookMetadata
  readonly chapters: readonly BookChapter[]
  readonly coverPath?: string | undefined
  readonly generatedAt: Date
}

export interface FormattedBook {
  readonly format: OutputFormat
  readonly fileName: string
  readonly data: Buffer
}
