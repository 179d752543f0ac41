/**
 * Test Support
 *
 * Factories for test data. Test-only; excluded from the build.
 */

import type { Book, BookChapter } from '../types'

export function createChapter(overrides: Partial<BookChapter> = {}): BookChapter {
  return {
    number: 1,
    title: 'Salt & Spray',
    content: 'First paragraph about <tides>.\n\nSecond paragraph\nwrapped over lines.',
    source: 'generated',
    ...overrides
  }
}

export function createBook(overrides: Partial<Book> = {}): Book {
  return {
    metadata: {
      title: 'Tidal Gardens',
      subtitle: 'Growing by the Sea',
      author: 'Test Author',
      language: 'en',
      description: 'A coastal gardening guide.',
      keywords: ['seaweed', 'coast']
    },
    chapters: [
      createChapter(),
      createChapter({ number: 2, title: 'Storms', content: 'Wind everywhere.' })
    ],
    generatedAt: new Date('2025-03-01T12:00:00.000Z'),
    ...overrides
  }
}
