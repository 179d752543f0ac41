/**
 * chapterpress Core Library
 *
 * Turn a manuscript into a generated, formatted book.
 *
 * Design principle: the library does no orchestration and no progress
 * reporting. File IO is limited to the cache, image files and the output
 * package; everything else is either pure or an API call behind a
 * TextGenerator / ImageGenerator.
 *
 * @license AGPL-3.0
 */

// Cache module
export {
  type CacheEntry,
  type CacheKeyComponents,
  type CacheLogger,
  type CacheStats,
  type ContentCache,
  FilesystemCache,
  generateCacheKey,
  generateChapterCacheKey,
  MemoryCache
} from './cache/index'
// Formatting
export {
  bookIdentifier,
  escapeXml,
  FAILED_CHAPTER_TEXT,
  formatBook,
  renderEpub,
  renderHtml,
  renderPdf,
  safeTitle
} from './format/index'
// Chapter generation
export {
  buildChapterPrompt,
  buildChapterRequests,
  buildMetadataPrompt,
  type ChapterPromptContext,
  type ChapterRunner,
  ChapterTaskRunner,
  type ChapterTaskRunnerOptions,
  type DispatchOptions,
  type DispatchProgressInfo,
  type DispatchSummary,
  dispatchChapters,
  type GenerationLogger,
  type ManuscriptSection,
  summarizeResults
} from './generation/index'
// HTTP helpers
export { classifyHttpStatus, UncachedHttpRequestError } from './http'
// Images
export {
  type BookImageOptions,
  type BookImages,
  buildCoverPrompt,
  buildIllustrationPrompt,
  type ChapterIllustration,
  generateBookImages
} from './images/index'
// Manuscript
export {
  deriveSectionTitle,
  extractKeywords,
  ManuscriptError,
  readManuscript,
  splitIntoSections,
  toSections
} from './manuscript/index'
// Metadata
export { generateMetadata, parseMetadataResponse } from './metadata/index'
// Packaging
export { type BookPackage, createPackage, type PackageOptions } from './package/index'
// Provider clients
export {
  createImageGenerator,
  createTextGenerator,
  DEFAULT_IMAGE_MODEL,
  DEFAULT_MODELS,
  getApiKeyEnvVar,
  type ImageClientConfig,
  type TextClientConfig
} from './providers/index'
// Retry
export {
  backoffDelay,
  DEFAULT_RETRY_CONFIG,
  isRecoverable,
  type RetryConfig,
  type RetryResult,
  validateRetryConfig,
  withRetry
} from './retry/index'
// Types
export type {
  ApiError,
  ApiErrorType,
  Book,
  BookChapter,
  BookMetadata,
  ChapterError,
  ChapterResult,
  ChapterSource,
  FormattedBook,
  GenerationRequest,
  ImageGenerator,
  ImageRequest,
  ImageSize,
  ModelParameters,
  OutputFormat,
  Result,
  TextGenerator,
  TextProvider
} from './types'
export { isOutputFormat, OUTPUT_FORMATS } from './types'
// Worker pool
export {
  runWorkerPool,
  type WorkerPoolOptions,
  type WorkerPoolResult,
  type WorkerProgressInfo
} from './worker-pool'

export const VERSION = '0.1.0'
