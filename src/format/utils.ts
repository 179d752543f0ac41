/**
 * Format Utilities
 *
 * Shared helpers for all output formats.
 */

import { existsSync, readFileSync } from 'node:fs'
import { encode } from 'html-entities'
import type { BookMetadata } from '../types'

/** Printed in place of a chapter that could not be generated */
export const FAILED_CHAPTER_TEXT = 'This chapter could not be generated.'

/**
 * Escape text for HTML and XHTML content or attribute values.
 */
export function escapeXml(text: string): string {
  return encode(text, { mode: 'specialChars', level: 'xml' })
}

/**
 * Split chapter text into paragraphs on blank lines, joining wrapped lines.
 */
export function toParagraphs(content: string): string[] {
  return content
    .replace(/\r\n/g, '\n')
    .split(/\n\s*\n/)
    .map((p) => p.replace(/\s*\n\s*/g, ' ').trim())
    .filter((p) => p.length > 0)
}

/**
 * File-system safe version of a title: alphanumerics, space, `-` and `_`
 * kept, spaces turned into underscores, at most 50 characters.
 */
export function safeTitle(title: string): string {
  const cleaned = title
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trim()
    .replace(/\s+/g, '_')
    .slice(0, 50)
  return cleaned || 'book'
}

/**
 * "Title: Subtitle", or just the title.
 */
export function fullTitle(metadata: BookMetadata): string {
  return metadata.subtitle ? `${metadata.title}: ${metadata.subtitle}` : metadata.title
}

/**
 * Read an image file, or undefined when it is missing.
 */
export function readImage(path: string | undefined): Buffer | undefined {
  if (!path || !existsSync(path)) return undefined
  return readFileSync(path)
}
