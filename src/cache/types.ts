/**
 * Content Cache Types
 *
 * Pluggable store for generated chapter text, keyed by the request fingerprint.
 * Implementations: MemoryCache (process scoped), FilesystemCache (survives restarts).
 */

/**
 * A stored generation result.
 */
export interface CacheEntry {
  /** SHA256 fingerprint of the request (64 hex chars) */
  readonly key: string
  readonly generatedText: string
  /** Epoch milliseconds */
  readonly createdAt: number
}

/**
 * Counters accumulated since construction or the last resetStats().
 */
export interface CacheStats {
  readonly hitCount: number
  readonly missCount: number
  readonly entryCount: number
}

/**
 * Store for generated content.
 *
 * A miss is `null`, never an error. Writes for an existing key overwrite it
 * (last write wins; content for one key is expected to be identical anyway).
 */
export interface ContentCache {
  get(key: string): Promise<CacheEntry | null>

  put(key: string, generatedText: string): Promise<void>

  clear(): Promise<void>

  stats(): CacheStats

  resetStats(): void

  /**
   * Store prompt text for debugging (optional).
   * Saved alongside the cached entry.
   */
  setPrompt?(key: string, prompt: string): Promise<void>
}

/**
 * Cache key components for generating deterministic hash
 */
export interface CacheKeyComponents {
  /** Service name: 'anthropic', 'openai' */
  readonly service: string
  /** Model name: 'claude-haiku-4-5', 'gpt-5-mini' */
  readonly model: string
  /** Request payload (will be JSON stringified with sorted keys) */
  readonly payload: unknown
}

/**
 * Minimal logging surface the caches need.
 */
export interface CacheLogger {
  warn(msg: string): void
}
