/**
 * Retry Wrapper
 *
 * Re-attempts a fallible operation with exponential backoff. Which error
 * kinds are worth retrying is configuration: an error whose type is not in
 * `recoverableErrors` is returned after the first attempt.
 */

import type { ApiError, ApiErrorType, Result } from '../types'

export interface RetryConfig {
  /** Total attempts, including the first (>= 1) */
  readonly maxAttempts: number
  /** Delay before the second attempt */
  readonly baseDelayMs: number
  /** Delay multiplier per further attempt (>= 1) */
  readonly backoffMultiplier: number
  /** Error kinds that are retried; everything else is terminal */
  readonly recoverableErrors: readonly ApiErrorType[]
}

export const DEFAULT_RECOVERABLE_ERRORS: readonly ApiErrorType[] = [
  'rate_limit',
  'network',
  'timeout',
  'invalid_response'
]

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  recoverableErrors: DEFAULT_RECOVERABLE_ERRORS
}

interface RetryInfo {
  /** Attempt that just failed (1-based) */
  readonly attempt: number
  readonly delayMs: number
  readonly error: ApiError
}

interface RetryOptions {
  /** Wait implementation (tests pass a fake) */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
  /** Called before each wait */
  readonly onRetry?: ((info: RetryInfo) => void) | undefined
}

/**
 * Outcome of a retried operation, tagged with the number of attempts made.
 */
export type RetryResult<T> = Result<T> & { readonly attempts: number }

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Delay before the attempt following `attempt` (1-based).
 */
export function backoffDelay(config: RetryConfig, attempt: number): number {
  return config.baseDelayMs * config.backoffMultiplier ** (attempt - 1)
}

/**
 * Check whether an error kind is retried under this config.
 */
export function isRecoverable(config: RetryConfig, error: ApiError): boolean {
  return config.recoverableErrors.includes(error.type)
}

/**
 * Validate a retry config, returning a list of problems (empty when valid).
 */
export function validateRetryConfig(config: RetryConfig): string[] {
  const problems: string[] = []
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    problems.push(`maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`)
  }
  if (!Number.isFinite(config.baseDelayMs) || config.baseDelayMs < 0) {
    problems.push(`baseDelayMs must be >= 0 (got ${config.baseDelayMs})`)
  }
  if (!Number.isFinite(config.backoffMultiplier) || config.backoffMultiplier < 1) {
    problems.push(`backoffMultiplier must be >= 1 (got ${config.backoffMultiplier})`)
  }
  return problems
}

/**
 * Run an operation with bounded retries.
 *
 * The operation receives the 1-based attempt number. A thrown exception is
 * treated as a `network` error so it goes through the same classification.
 *
 * @example
 * ```ts
 * const result = await withRetry(() => generate(prompt, params), DEFAULT_RETRY_CONFIG)
 * if (!result.ok) console.log(`gave up after ${result.attempts} attempts`)
 * ```
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<Result<T>>,
  config: RetryConfig,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? defaultSleep
  const maxAttempts = Math.max(1, Math.floor(config.maxAttempts))

  let attempt = 0
  for (;;) {
    attempt++
    let result: Result<T>
    try {
      result = await operation(attempt)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      result = { ok: false, error: { type: 'network', message } }
    }

    if (result.ok) {
      return { ...result, attempts: attempt }
    }

    if (attempt >= maxAttempts || !isRecoverable(config, result.error)) {
      return { ...result, attempts: attempt }
    }

    const delayMs = backoffDelay(config, attempt)
    options.onRetry?.({ attempt, delayMs, error: result.error })
    await sleep(delayMs)
  }
}
