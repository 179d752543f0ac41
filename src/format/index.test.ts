import { describe, expect, it } from 'vitest'
import { formatBook, safeTitle, toParagraphs } from './index'
import { createBook } from '../test-support'

describe('formatBook', () => {
  it('names the file after the title', async () => {
    const result = await formatBook(createBook(), 'html')

    expect(result.format).toBe('html')
    expect(result.fileName).toBe('Tidal_Gardens.html')
    expect(result.data.toString('utf-8')).toContain('<h1>Tidal Gardens</h1>')
  })

  it('renders epub as a zip archive', async () => {
    const result = await formatBook(createBook(), 'epub')

    expect(result.fileName).toBe('Tidal_Gardens.epub')
    expect(result.data.subarray(0, 2).toString('latin1')).toBe('PK')
  })
})

describe('safeTitle', () => {
  it('keeps letters, digits, dashes and underscores', () => {
    expect(safeTitle('War & Peace: Part 1/2')).toBe('War_Peace_Part_12')
  })

  it('truncates to 50 characters', () => {
    expect(safeTitle('a'.repeat(80))).toHaveLength(50)
  })

  it('falls back for titles with nothing usable', () => {
    expect(safeTitle('?!')).toBe('book')
  })
})

describe('toParagraphs', () => {
  it('splits on blank lines and joins wrapped lines', () => {
    expect(toParagraphs('one\ntwo\n\n\nthree\r\n\r\nfour')).toEqual(['one two', 'three', 'four'])
  })
})
