import { beforeEach, describe, expect, it } from 'vitest'
import { MemoryCache } from './memory'

describe('MemoryCache', () => {
  let cache: MemoryCache

  beforeEach(() => {
    cache = new MemoryCache()
  })

  it('returns null for a missing key', async () => {
    expect(await cache.get('missing')).toBeNull()
  })

  it('returns stored text exactly', async () => {
    const text = 'Chapter one.\n\n  Indented line with ünïcödé and trailing space '
    await cache.put('abc', text)

    const entry = await cache.get('abc')

    expect(entry?.generatedText).toBe(text)
    expect(entry?.key).toBe('abc')
  })

  it('overwrites an existing entry', async () => {
    await cache.put('abc', 'first')
    await cache.put('abc', 'second')

    expect((await cache.get('abc'))?.generatedText).toBe('second')
    expect(cache.stats().entryCount).toBe(1)
  })

  it('counts hits and misses', async () => {
    await cache.put('a', 'text')
    await cache.get('a')
    await cache.get('a')
    await cache.get('b')

    expect(cache.stats()).toEqual({ hitCount: 2, missCount: 1, entryCount: 1 })
  })

  it('clears entries but keeps counters', async () => {
    await cache.put('a', 'text')
    await cache.get('a')
    await cache.clear()

    expect(cache.stats()).toEqual({ hitCount: 1, missCount: 0, entryCount: 0 })
    expect(await cache.get('a')).toBeNull()
  })

  it('resets counters', async () => {
    await cache.get('a')
    cache.resetStats()

    expect(cache.stats()).toEqual({ hitCount: 0, missCount: 0, entryCount: 0 })
  })

  it('stores prompts beside entries', async () => {
    await cache.setPrompt('a', 'Write chapter one')

    expect(cache.getPrompt('a')).toBe('Write chapter one')
  })
})
