/**
 * Book Metadata Generation
 *
 * Asks the text model for a title, subtitle, description and keywords.
 * Metadata is a nicety: any failure falls back to the base metadata.
 */

import { buildMetadataPrompt } from '../generation/prompt'
import { extractKeywords } from '../manuscript/index'
import type { BookMetadata, ModelParameters, TextGenerator } from '../types'

export interface MetadataLogger {
  warn(msg: string): void
}

interface ParsedMetadata {
  title?: string
  subtitle?: string
  description?: string
  keywords?: string[]
}

function extractJsonObject(response: string): string | null {
  // Might be wrapped in ```json```
  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)\s*```/)
  if (fenced?.[1]) return fenced[1]
  const objectMatch = response.match(/\{[\s\S]*\}/)
  return objectMatch ? objectMatch[0] : null
}

function parseString(val: unknown): string | undefined {
  return typeof val === 'string' && val.trim() ? val.trim() : undefined
}

function parseStringArray(val: unknown): string[] {
  if (!Array.isArray(val)) return []
  return val
    .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
    .map((item) => item.trim())
}

/**
 * Parse a model response into metadata fields.
 *
 * @throws Error when no JSON object can be found
 */
export function parseMetadataResponse(response: string): ParsedMetadata {
  const json = extractJsonObject(response)
  if (!json) {
    throw new Error('Could not find JSON object in response')
  }
  const data: unknown = JSON.parse(json)
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Metadata response is not a JSON object')
  }

  const parsed: ParsedMetadata = {}
  const record: Record<string, unknown> = { ...data }
  const title = parseString(record.title)
  const subtitle = parseString(record.subtitle)
  const description = parseString(record.description)
  const keywords = parseStringArray(record.keywords)
  if (title) parsed.title = title
  if (subtitle) parsed.subtitle = subtitle
  if (description) parsed.description = description
  if (keywords.length > 0) parsed.keywords = keywords
  return parsed
}

export const UNTITLED = 'Untitled'

/**
 * Base metadata with keywords derived from the content when it has none.
 */
function fallbackMetadata(content: string, base: BookMetadata): BookMetadata {
  return {
    ...base,
    title: base.title || UNTITLED,
    keywords: base.keywords.length > 0 ? base.keywords : extractKeywords(content)
  }
}

/**
 * Generate metadata for a manuscript, merged over `base`.
 *
 * A title given in `base` (e.g. from --title) is kept; the model's title only
 * fills an empty one.
 */
export async function generateMetadata(
  content: string,
  base: BookMetadata,
  generate: TextGenerator,
  modelParameters: ModelParameters,
  logger?: MetadataLogger
): Promise<BookMetadata> {
  const result = await generate(buildMetadataPrompt(content, base), modelParameters)
  if (!result.ok) {
    logger?.warn(`Metadata generation failed, using defaults: ${result.error.message}`)
    return fallbackMetadata(content, base)
  }

  let parsed: ParsedMetadata
  try {
    parsed = parseMetadataResponse(result.value)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger?.warn(`Could not parse metadata response, using defaults: ${message}`)
    return fallbackMetadata(content, base)
  }

  return {
    ...base,
    title: base.title || parsed.title || UNTITLED,
    subtitle: base.subtitle ?? parsed.subtitle,
    description: base.description ?? parsed.description,
    keywords: base.keywords.length > 0 ? base.keywords : (parsed.keywords ?? extractKeywords(content))
  }
}
