/**
 * Worker Pool
 *
 * Generic bounded worker pool. N workers continuously pull tasks from a
 * shared queue; results come back in original task order regardless of
 * which worker finished first.
 *
 * Usage:
 * ```typescript
 * const { results } = await runWorkerPool(
 *   requests,
 *   async (request) => runner.run(request),
 *   {
 *     concurrency: 3,
 *     onProgress: ({ completed, total }) => console.log(`${completed}/${total}`)
 *   }
 * )
 * ```
 */

export const DEFAULT_CONCURRENCY = 3

/**
 * Task processor function type.
 * @param task The task to process
 * @param index Original index of the task in the array
 */
export type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>

/**
 * Progress callback info.
 */
export interface WorkerProgressInfo<R> {
  /** Task index (0-based) */
  readonly index: number
  readonly total: number
  /** Number of completed tasks so far */
  readonly completed: number
  readonly result: R
  readonly durationMs: number
}

/**
 * Error callback info.
 */
interface WorkerErrorInfo<T> {
  readonly task: T
  readonly index: number
  readonly error: Error
  readonly total: number
  readonly completed: number
}

export interface WorkerPoolOptions<T, R> {
  /** Number of concurrent workers (default 3) */
  readonly concurrency?: number | undefined
  /** Called after each task completes successfully */
  readonly onProgress?: ((info: WorkerProgressInfo<R>) => void) | undefined
  /** Called on task error. Return true to continue, false to stop all workers. */
  readonly onError?: ((info: WorkerErrorInfo<T>) => boolean) | undefined
}

export interface WorkerPoolResult<R> {
  /** Results in original task order (undefined for failed or skipped tasks) */
  readonly results: Array<R | undefined>
  /** Errors that occurred, by task index */
  readonly errors: ReadonlyArray<{ readonly index: number; readonly error: Error }>
  readonly successCount: number
  readonly errorCount: number
}

/**
 * Signature of runWorkerPool, so callers can inject an alternative pool.
 */
export type WorkerPoolRunner = <T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options?: WorkerPoolOptions<T, R>
) => Promise<WorkerPoolResult<R>>

/**
 * Run tasks through a worker pool.
 *
 * @throws RangeError when concurrency is not a positive integer
 */
export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions<T, R> = {}
): Promise<WorkerPoolResult<R>> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Worker pool concurrency must be a positive integer (got ${concurrency})`)
  }

  const settled: Array<{ result: R } | undefined> = new Array(tasks.length)
  const errors: Array<{ index: number; error: Error }> = []

  // Shared state for workers
  let nextIndex = 0
  let completed = 0
  let successCount = 0
  let shouldStop = false

  // Each worker claims the next unclaimed index until the queue is drained
  async function worker(): Promise<void> {
    while (!shouldStop && nextIndex < tasks.length) {
      const index = nextIndex++
      const task = tasks[index]
      if (task === undefined) break
      const startTime = Date.now()

      try {
        const result = await processor(task, index)
        settled[index] = { result }
        successCount++
        completed++
        options.onProgress?.({
          index,
          total: tasks.length,
          completed,
          result,
          durationMs: Date.now() - startTime
        })
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e))
        errors.push({ index, error })
        completed++

        const shouldContinue =
          options.onError?.({ task, index, error, total: tasks.length, completed }) ?? true
        if (!shouldContinue) {
          shouldStop = true
        }
      }
    }
  }

  const workerCount = Math.min(concurrency, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  const results = Array.from(settled, (entry) => entry?.result)
  return { results, errors, successCount, errorCount: errors.length }
}
