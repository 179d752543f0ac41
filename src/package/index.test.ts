import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createBook, createChapter } from '../test-support'
import type { FormattedBook } from '../types'
import { buildReadme, createPackage, packageTimestamp } from './index'

const NOW = new Date(2025, 2, 1, 9, 5, 7)

const FILES: FormattedBook[] = [
  { format: 'html', fileName: 'Tidal_Gardens.html', data: Buffer.from('<html></html>') },
  { format: 'pdf', fileName: 'Tidal_Gardens.pdf', data: Buffer.from('%PDF-') }
]

describe('createPackage', () => {
  let testDir: string

  beforeEach(() => {
    testDir = join(tmpdir(), `package-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
  })

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true })
  })

  it('creates a timestamped directory with the book files', () => {
    const result = createPackage(testDir, createBook(), FILES, { now: NOW })

    expect(result.dir).toBe(join(testDir, 'Tidal_Gardens_20250301_090507'))
    expect(result.bookFiles).toEqual([
      join(result.dir, 'Tidal_Gardens.html'),
      join(result.dir, 'Tidal_Gardens.pdf')
    ])
    expect(readFileSync(join(result.dir, 'Tidal_Gardens.pdf'), 'utf-8')).toBe('%PDF-')
  })

  it('writes metadata.json', () => {
    const book = createBook({
      chapters: [createChapter(), createChapter({ number: 2, source: 'failed', content: '' })]
    })

    const { dir } = createPackage(testDir, book, FILES, { now: NOW })

    expect(JSON.parse(readFileSync(join(dir, 'metadata.json'), 'utf-8'))).toEqual({
      title: 'Tidal Gardens',
      subtitle: 'Growing by the Sea',
      author: 'Test Author',
      language: 'en',
      description: 'A coastal gardening guide.',
      keywords: ['seaweed', 'coast'],
      chapterCount: 2,
      failedChapters: [2],
      formats: ['html', 'pdf'],
      generatedAt: '2025-03-01T12:00:00.000Z'
    })
  })

  it('writes chapter text files and content.json', () => {
    const book = createBook({
      chapters: [
        createChapter({ content: 'Body text.' }),
        createChapter({ number: 2, title: 'Lost', source: 'failed', content: '' })
      ]
    })

    const { dir } = createPackage(testDir, book, FILES, { now: NOW })

    expect(readFileSync(join(dir, 'artifacts', 'chapters', 'chapter_01.txt'), 'utf-8')).toBe(
      'Chapter 1: Salt & Spray\n\nBody text.\n'
    )
    expect(readFileSync(join(dir, 'artifacts', 'chapters', 'chapter_02.txt'), 'utf-8')).toBe(
      'Chapter 2: Lost\n\nThis chapter could not be generated.\n'
    )
    const content = JSON.parse(readFileSync(join(dir, 'artifacts', 'content.json'), 'utf-8'))
    expect(content.chapters[0]).toEqual({
      number: 1,
      title: 'Salt & Spray',
      source: 'generated',
      content: 'Body text.'
    })
  })

  it('writes prompts only when given', () => {
    const without = createPackage(testDir, createBook(), FILES, { now: NOW })
    expect(existsSync(join(without.dir, 'artifacts', 'prompts.json'))).toBe(false)

    const withPrompts = createPackage(join(testDir, 'second'), createBook(), FILES, {
      now: NOW,
      prompts: ['first prompt', 'second prompt']
    })
    expect(
      JSON.parse(readFileSync(join(withPrompts.dir, 'artifacts', 'prompts.json'), 'utf-8'))
    ).toEqual([
      { chapter: 1, prompt: 'first prompt' },
      { chapter: 2, prompt: 'second prompt' }
    ])
  })

  it('copies existing images and skips missing ones', () => {
    const coverPath = join(testDir, 'cover.png')
    writeFileSync(coverPath, 'cover')
    const book = createBook({
      coverPath,
      chapters: [createChapter({ illustrationPath: join(testDir, 'missing.png') })]
    })

    const result = createPackage(join(testDir, 'out'), book, FILES, { now: NOW })

    expect(result.imageFiles).toEqual([join(result.dir, 'artifacts', 'images', 'cover.png')])
    expect(readFileSync(join(result.dir, 'artifacts', 'images', 'cover.png'), 'utf-8')).toBe('cover')
  })
})

describe('packageTimestamp', () => {
  it('formats local time', () => {
    expect(packageTimestamp(new Date(2024, 11, 31, 23, 59, 1))).toBe('20241231_235901')
  })
})

describe('buildReadme', () => {
  it('lists files and marks failed chapters', () => {
    const book = createBook({
      chapters: [createChapter(), createChapter({ number: 2, title: 'Lost', source: 'failed' })]
    })

    const readme = buildReadme(book, FILES, 'Tidal_Gardens_20250301_090507')

    expect(readme.startsWith('# Tidal Gardens: Growing by the Sea\n\nby Test Author\n')).toBe(true)
    expect(readme).toContain('├── Tidal_Gardens.html\n├── Tidal_Gardens.pdf\n')
    expect(readme).toContain('1. Salt & Spray\n2. Lost (not generated)\n')
  })
})
