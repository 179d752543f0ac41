/**
 * Filesystem-based Content Cache for CLI
 *
 * Stores generated chapter text as JSON files organized by hash prefix.
 * Entries never expire - they're kept until `chapterpress cache clear`.
 */

import { randomBytes } from 'node:crypto'
import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync
} from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import type { CacheEntry, CacheLogger, CacheStats, ContentCache } from './types'

interface FilesystemCacheOptions {
  /** Receives a warning when an entry is unreadable or corrupted */
  readonly logger?: CacheLogger | undefined
}

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'chapterpress')
  if (cacheDir.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/chapterpress/`
    )
  }
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (value === null || typeof value !== 'object') return false
  return (
    'key' in value &&
    typeof value.key === 'string' &&
    'generatedText' in value &&
    typeof value.generatedText === 'string' &&
    'createdAt' in value &&
    typeof value.createdAt === 'number'
  )
}

/**
 * Filesystem-based cache implementation for CLI usage.
 *
 * Directory structure:
 * ```
 * ~/.cache/chapterpress/chapters/
 * ├── ab/
 * │   ├── abcd1234...json
 * │   └── abcd1234...prompt.txt
 * ├── cd/
 * │   └── cdef5678...json
 * ```
 *
 * Uses first 2 chars of hash as subdirectory to avoid too many files in one dir.
 * Writes go to a temp file and are renamed into place, so readers see either
 * the previous or the new entry.
 */
export class FilesystemCache implements ContentCache {
  private readonly logger: CacheLogger | undefined
  private hitCount = 0
  private missCount = 0

  constructor(
    private readonly cacheDir: string,
    options: FilesystemCacheOptions = {}
  ) {
    guardAgainstUserCache(cacheDir)
    this.logger = options.logger
  }

  async get(key: string): Promise<CacheEntry | null> {
    const path = this.getCachePath(key)

    if (!existsSync(path)) {
      this.missCount++
      return null
    }

    let entry: unknown
    try {
      entry = JSON.parse(readFileSync(path, 'utf-8'))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.discardCorrupted(path, key, message)
      this.missCount++
      return null
    }

    if (!isCacheEntry(entry) || entry.key !== key) {
      this.discardCorrupted(path, key, 'unexpected entry shape')
      this.missCount++
      return null
    }

    this.hitCount++
    return entry
  }

  async put(key: string, generatedText: string): Promise<void> {
    const path = this.getCachePath(key)
    const entry: CacheEntry = { key, generatedText, createdAt: Date.now() }
    this.writeAtomic(path, JSON.stringify(entry, null, 2))
  }

  async setPrompt(key: string, prompt: string): Promise<void> {
    const promptPath = this.getCachePath(key).replace(/\.json$/, '.prompt.txt')
    this.writeAtomic(promptPath, prompt)
  }

  /**
   * Clear all cached entries.
   */
  async clear(): Promise<void> {
    const chaptersDir = join(this.cacheDir, 'chapters')
    if (existsSync(chaptersDir)) {
      rmSync(chaptersDir, { recursive: true, force: true })
    }
  }

  stats(): CacheStats {
    return {
      hitCount: this.hitCount,
      missCount: this.missCount,
      entryCount: this.countEntries()
    }
  }

  resetStats(): void {
    this.hitCount = 0
    this.missCount = 0
  }

  /**
   * Get the file path for a cache entry.
   */
  private getCachePath(key: string): string {
    if (!/^[a-zA-Z0-9_-]+$/.test(key)) {
      throw new Error(`FilesystemCache: invalid cache key "${key}"`)
    }
    const prefix = key.slice(0, 2)
    return join(this.cacheDir, 'chapters', prefix, `${key}.json`)
  }

  private writeAtomic(path: string, content: string): void {
    const dir = dirname(path)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
    const tmpPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
    writeFileSync(tmpPath, content)
    renameSync(tmpPath, path)
  }

  private discardCorrupted(path: string, key: string, reason: string): void {
    this.logger?.warn(`Ignoring corrupted cache entry ${key.slice(0, 8)}...: ${reason}`)
    try {
      rmSync(path, { force: true })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger?.warn(`Could not remove corrupted cache entry ${path}: ${message}`)
    }
  }

  private countEntries(): number {
    const chaptersDir = join(this.cacheDir, 'chapters')
    if (!existsSync(chaptersDir)) return 0

    let count = 0
    for (const prefix of readdirSync(chaptersDir, { withFileTypes: true })) {
      if (!prefix.isDirectory()) continue
      const files = readdirSync(join(chaptersDir, prefix.name))
      count += files.filter((f) => f.endsWith('.json')).length
    }
    return count
  }
}
