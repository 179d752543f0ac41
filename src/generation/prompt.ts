/**
 * Generation Prompts
 *
 * Prompts for chapter text and book metadata. The chapter prompt is the
 * request's `promptContext`, so any change here changes every cache key.
 */

import type { BookMetadata, GenerationRequest, ModelParameters } from '../types'

/** Source material longer than this is truncated in the chapter prompt */
const MAX_SECTION_CHARS = 6000

/** Source material sent to the metadata prompt */
const MAX_METADATA_SAMPLE_CHARS = 3000

export interface ManuscriptSection {
  readonly title: string
  readonly content: string
}

export interface ChapterPromptContext {
  readonly bookTitle: string
  readonly language: string
  /** 0-based index of the chapter being written */
  readonly chapterIndex: number
  readonly chapterCount: number
  /** Titles of every chapter, in order */
  readonly outline: readonly string[]
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text
}

function formatOutline(outline: readonly string[], current: number): string {
  return outline
    .map((title, i) => `${i === current ? '>' : ' '} ${i + 1}. ${title}`)
    .join('\n')
}

/**
 * Build the prompt for one chapter.
 */
export function buildChapterPrompt(section: ManuscriptSection, context: ChapterPromptContext): string {
  const number = context.chapterIndex + 1
  return `You are writing chapter ${number} of ${context.chapterCount} of the book "${context.bookTitle}".

Book outline (current chapter marked with >):
${formatOutline(context.outline, context.chapterIndex)}

Chapter title: ${section.title}

Write the full chapter text in language "${context.language}", based on the source material below.
Requirements:
- 1500-2500 words
- Keep the facts and ideas of the source material; expand with explanation and examples
- Continue naturally from the previous chapter without repeating it
- Plain paragraphs separated by blank lines, no Markdown headings, do not repeat the chapter title

Source material:
"""
${truncate(section.content.trim(), MAX_SECTION_CHARS)}
"""`
}

/**
 * Build the prompt asking for book metadata as JSON.
 */
export function buildMetadataPrompt(content: string, base: BookMetadata): string {
  const titleHint = base.title ? `\nWorking title: ${base.title}` : ''
  return `Read the beginning of a manuscript and propose metadata for the book.${titleHint}
Language: ${base.language}

Respond with JSON only, in this shape:
{"title": "...", "subtitle": "...", "description": "2-3 sentences", "keywords": ["...", "..."]}

Title: at most 60 characters. Keywords: 3-7 short phrases. Write every value in language "${base.language}".

Manuscript:
"""
${truncate(content.trim(), MAX_METADATA_SAMPLE_CHARS)}
"""`
}

/**
 * One request per section, in section order.
 */
export function buildChapterRequests(
  sections: readonly ManuscriptSection[],
  metadata: BookMetadata,
  modelParameters: ModelParameters
): GenerationRequest[] {
  const outline = sections.map((s) => s.title)
  return sections.map((section, chapterIndex) =>
    Object.freeze({
      chapterIndex,
      sectionTitle: section.title,
      promptContext: buildChapterPrompt(section, {
        bookTitle: metadata.title,
        language: metadata.language,
        chapterIndex,
        chapterCount: sections.length,
        outline
      }),
      modelParameters
    })
  )
}
