/**
 * In-memory Content Cache
 *
 * Process-scoped cache backed by a Map. Used when no cache directory is
 * configured and as the default in tests.
 */

import type { CacheEntry, CacheStats, ContentCache } from './types'

export class MemoryCache implements ContentCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly prompts = new Map<string, string>()
  private hitCount = 0
  private missCount = 0

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key)
    if (!entry) {
      this.missCount++
      return null
    }
    this.hitCount++
    return entry
  }

  async put(key: string, generatedText: string): Promise<void> {
    this.entries.set(key, { key, generatedText, createdAt: Date.now() })
  }

  async setPrompt(key: string, prompt: string): Promise<void> {
    this.prompts.set(key, prompt)
  }

  /**
   * Prompt stored for a key, if any.
   */
  getPrompt(key: string): string | undefined {
    return this.prompts.get(key)
  }

  async clear(): Promise<void> {
    this.entries.clear()
    this.prompts.clear()
  }

  stats(): CacheStats {
    return { hitCount: this.hitCount, missCount: this.missCount, entryCount: this.entries.size }
  }

  resetStats(): void {
    this.hitCount = 0
    this.missCount = 0
  }
}
