/**
 * Chapter Task Runner
 *
 * Runs one chapter's generation request: cache lookup, external call with
 * retries on a miss, cache write on success. Failures come back as data
 * (`source: 'failed'`) so the dispatcher can carry on with other chapters.
 */

import { generateChapterCacheKey } from '../cache/key'
import type { ContentCache } from '../cache/types'
import { DEFAULT_RETRY_CONFIG, isRecoverable, type RetryConfig, withRetry } from '../retry/index'
import type { ChapterError, ChapterResult, GenerationRequest, TextGenerator } from '../types'

/**
 * Logging surface used by the generation core.
 */
export interface GenerationLogger {
  verbose(msg: string): void
  warn(msg: string): void
}

export interface ChapterTaskRunnerOptions {
  /** External content-generation call */
  readonly generate: TextGenerator
  readonly cache?: ContentCache | undefined
  /**
   * Read from the cache (default true). When false the cache is bypassed for
   * reads but fresh results are still written back.
   */
  readonly useCache?: boolean | undefined
  readonly retry?: RetryConfig | undefined
  /** Share one external call between concurrent runs of the same request (default true) */
  readonly coalesce?: boolean | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  readonly logger?: GenerationLogger | undefined
}

/**
 * Anything that can turn a request into a result. The dispatcher only needs this.
 */
export interface ChapterRunner {
  run(request: GenerationRequest): Promise<ChapterResult>
}

/**
 * Build a failed result for a request.
 */
export function failedResult(request: GenerationRequest, error: ChapterError): ChapterResult {
  return {
    chapterIndex: request.chapterIndex,
    sectionTitle: request.sectionTitle,
    content: '',
    source: 'failed',
    error
  }
}

function label(request: GenerationRequest): string {
  return `chapter ${request.chapterIndex + 1}`
}

export class ChapterTaskRunner implements ChapterRunner {
  private readonly generate: TextGenerator
  private readonly cache: ContentCache | undefined
  private readonly useCache: boolean
  private readonly retry: RetryConfig
  private readonly coalesce: boolean
  private readonly sleep: ((ms: number) => Promise<void>) | undefined
  private readonly logger: GenerationLogger | undefined
  private readonly inFlight = new Map<string, Promise<ChapterResult>>()
  private calls = 0

  constructor(options: ChapterTaskRunnerOptions) {
    this.generate = options.generate
    this.cache = options.cache
    this.useCache = options.useCache ?? true
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG
    this.coalesce = options.coalesce ?? true
    this.sleep = options.sleep
    this.logger = options.logger
  }

  /** Number of external calls made so far (each retry attempt counts) */
  get externalCalls(): number {
    return this.calls
  }

  async run(request: GenerationRequest): Promise<ChapterResult> {
    const key = generateChapterCacheKey(request)

    if (!this.coalesce) {
      return this.execute(request, key)
    }

    const pending = this.inFlight.get(key)
    if (pending) {
      this.logger?.verbose(`${label(request)}: joining in-flight request ${key.slice(0, 8)}...`)
      return pending
    }

    const promise = this.execute(request, key).finally(() => {
      this.inFlight.delete(key)
    })
    this.inFlight.set(key, promise)
    return promise
  }

  private async execute(request: GenerationRequest, key: string): Promise<ChapterResult> {
    const cached = await this.readCache(request, key)
    if (cached !== null) {
      this.logger?.verbose(`${label(request)}: cache hit ${key.slice(0, 8)}...`)
      return {
        chapterIndex: request.chapterIndex,
        sectionTitle: request.sectionTitle,
        content: cached,
        source: 'cache_hit'
      }
    }

    const result = await withRetry(
      async () => {
        this.calls++
        return this.generate(request.promptContext, request.modelParameters)
      },
      this.retry,
      {
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger?.warn(
            `${label(request)}: attempt ${attempt}/${this.retry.maxAttempts} failed (${error.type}: ${error.message}). Retrying in ${delayMs}ms`
          )
        }
      }
    )

    if (!result.ok) {
      const terminal = !isRecoverable(this.retry, result.error)
      this.logger?.warn(
        `${label(request)}: giving up after ${result.attempts} attempt(s): ${result.error.message}`
      )
      return failedResult(request, {
        type: result.error.type,
        message: result.error.message,
        attempts: result.attempts,
        terminal
      })
    }

    await this.writeCache(request, key, result.value)

    return {
      chapterIndex: request.chapterIndex,
      sectionTitle: request.sectionTitle,
      content: result.value,
      source: 'generated'
    }
  }

  private async readCache(request: GenerationRequest, key: string): Promise<string | null> {
    if (!this.cache || !this.useCache) return null
    try {
      const entry = await this.cache.get(key)
      return entry?.generatedText ?? null
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger?.warn(`${label(request)}: cache read failed, treating as miss: ${message}`)
      return null
    }
  }

  private async writeCache(request: GenerationRequest, key: string, text: string): Promise<void> {
    if (!this.cache) return
    try {
      await this.cache.put(key, text)
      await this.cache.setPrompt?.(key, request.promptContext)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger?.warn(`${label(request)}: cache write failed: ${message}`)
    }
  }
}
