/**
 * Parallel Dispatcher
 *
 * Fans chapter requests out over a bounded worker pool and returns results in
 * input order. Falls back to sequential execution when parallelism is off or
 * the pool itself fails.
 */

import type { ChapterResult, GenerationRequest } from '../types'
import { runWorkerPool, type WorkerPoolRunner } from '../worker-pool'
import { type ChapterRunner, failedResult, type GenerationLogger } from './runner'

export interface DispatchProgressInfo {
  readonly completed: number
  readonly total: number
  readonly result: ChapterResult
}

export interface DispatchOptions {
  /** Upper bound on chapters generated at once (>= 1) */
  readonly maxWorkers: number
  /** When false, chapters run one after another in input order */
  readonly parallelEnabled: boolean
  /** Pool implementation (defaults to runWorkerPool) */
  readonly runPool?: WorkerPoolRunner | undefined
  readonly onProgress?: ((info: DispatchProgressInfo) => void) | undefined
  readonly logger?: GenerationLogger | undefined
}

export interface DispatchSummary {
  readonly total: number
  readonly generated: number
  readonly cacheHits: number
  readonly failed: number
  /** Failures caused by non-retryable errors (bad credentials, malformed request...) */
  readonly terminalFailures: number
}

/**
 * Run one request, converting an unexpected throw into a failed result.
 */
async function runSafely(runner: ChapterRunner, request: GenerationRequest): Promise<ChapterResult> {
  try {
    return await runner.run(request)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return failedResult(request, { type: 'network', message, attempts: 1, terminal: false })
  }
}

/**
 * Generate chapters for all requests.
 *
 * The returned array has the same length and order as `requests`. A failed
 * chapter never cancels the others.
 */
export async function dispatchChapters(
  requests: readonly GenerationRequest[],
  runner: ChapterRunner,
  options: DispatchOptions
): Promise<ChapterResult[]> {
  const total = requests.length
  const results: Array<ChapterResult | undefined> = new Array<ChapterResult | undefined>(total).fill(
    undefined
  )
  let completed = 0

  // A pool that failed may still finish tasks the fallback already ran
  const record = (index: number, result: ChapterResult): void => {
    if (results[index] !== undefined) return
    results[index] = result
    completed++
    options.onProgress?.({ completed, total, result })
  }

  const useParallel = options.parallelEnabled && options.maxWorkers > 1 && total > 1

  if (useParallel) {
    const runPool = options.runPool ?? runWorkerPool
    try {
      await runPool(requests, (request) => runSafely(runner, request), {
        concurrency: options.maxWorkers,
        onProgress: ({ index, result }) => record(index, result)
      })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      options.logger?.warn(`Worker pool failed (${message}); continuing sequentially`)
    }
  } else {
    options.logger?.verbose(`Generating ${total} chapter(s) sequentially`)
  }

  // Sequential path, and the fallback for anything the pool did not finish
  for (let index = 0; index < total; index++) {
    const request = requests[index]
    if (request === undefined || results[index] !== undefined) continue
    record(index, await runSafely(runner, request))
  }

  return results.filter((result): result is ChapterResult => result !== undefined)
}

/**
 * Count results by source.
 */
export function summarizeResults(results: readonly ChapterResult[]): DispatchSummary {
  return {
    total: results.length,
    generated: results.filter((r) => r.source === 'generated').length,
    cacheHits: results.filter((r) => r.source === 'cache_hit').length,
    failed: results.filter((r) => r.source === 'failed').length,
    terminalFailures: results.filter((r) => r.error?.terminal === true).length
  }
}
