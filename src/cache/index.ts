/**
 * Cache Module
 *
 * Content-addressed storage of generated chapter text.
 */

export { FilesystemCache } from './filesystem'
export { generateCacheKey, generateChapterCacheKey } from './key'
export { MemoryCache } from './memory'
export type { CacheEntry, CacheKeyComponents, CacheLogger, CacheStats, ContentCache } from './types'
