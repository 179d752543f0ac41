import { describe, expect, it, vi } from 'vitest'
import type { ApiErrorType, Result } from '../types'
import {
  backoffDelay,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  validateRetryConfig,
  withRetry
} from './index'

const CONFIG: RetryConfig = {
  maxAttempts: 4,
  baseDelayMs: 100,
  backoffMultiplier: 2,
  recoverableErrors: ['rate_limit', 'network', 'timeout']
}

function failure(type: ApiErrorType, message = 'boom'): Result<string> {
  return { ok: false, error: { type, message } }
}

function createSleep() {
  const delays: number[] = []
  const sleep = vi.fn(async (ms: number) => {
    delays.push(ms)
  })
  return { delays, sleep }
}

describe('withRetry', () => {
  it('returns the value after a single successful attempt', async () => {
    const { sleep } = createSleep()
    const operation = vi.fn(async (): Promise<Result<string>> => ({ ok: true, value: 'text' }))

    const result = await withRetry(operation, CONFIG, { sleep })

    expect(result).toEqual({ ok: true, value: 'text', attempts: 1 })
    expect(operation).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('retries recoverable failures until success', async () => {
    const { delays, sleep } = createSleep()
    const operation = vi
      .fn<(attempt: number) => Promise<Result<string>>>()
      .mockResolvedValueOnce(failure('rate_limit'))
      .mockResolvedValueOnce(failure('network'))
      .mockResolvedValueOnce({ ok: true, value: 'third time' })

    const result = await withRetry(operation, CONFIG, { sleep })

    expect(result).toEqual({ ok: true, value: 'third time', attempts: 3 })
    expect(operation.mock.calls.map((call) => call[0])).toEqual([1, 2, 3])
    expect(delays).toEqual([100, 200])
  })

  it('attempts an always-failing recoverable operation exactly maxAttempts times', async () => {
    const { delays, sleep } = createSleep()
    const operation = vi.fn(async () => failure('timeout', 'slow upstream'))

    const result = await withRetry(operation, CONFIG, { sleep })

    expect(operation).toHaveBeenCalledTimes(4)
    expect(result).toEqual({
      ok: false,
      error: { type: 'timeout', message: 'slow upstream' },
      attempts: 4
    })
    expect(delays).toEqual([100, 200, 400])
  })

  it('uses non-decreasing delays following the multiplier', async () => {
    const { delays, sleep } = createSleep()
    const config: RetryConfig = { ...CONFIG, maxAttempts: 6, baseDelayMs: 50, backoffMultiplier: 1.5 }

    await withRetry(async () => failure('rate_limit'), config, { sleep })

    expect(delays).toEqual([50, 75, 112.5, 168.75, 253.125])
    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1] ?? 0)
    }
  })

  it('keeps a constant delay with multiplier 1', async () => {
    const { delays, sleep } = createSleep()

    await withRetry(async () => failure('network'), { ...CONFIG, backoffMultiplier: 1 }, { sleep })

    expect(delays).toEqual([100, 100, 100])
  })

  it.each(['auth', 'invalid_request', 'quota', 'invalid_response'] as const)(
    'does not retry terminal %s errors',
    async (type) => {
      const { sleep } = createSleep()
      const operation = vi.fn(async () => failure(type))

      const result = await withRetry(operation, CONFIG, { sleep })

      expect(operation).toHaveBeenCalledTimes(1)
      expect(result.attempts).toBe(1)
      expect(result.ok).toBe(false)
      expect(sleep).not.toHaveBeenCalled()
    }
  )

  it('retries an empty response under the default config', async () => {
    const { delays, sleep } = createSleep()
    const operation = vi
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(failure('invalid_response', 'Empty response from API'))
      .mockResolvedValueOnce({ ok: true, value: 'text' })

    const result = await withRetry(operation, DEFAULT_RETRY_CONFIG, { sleep })

    expect(result).toEqual({ ok: true, value: 'text', attempts: 2 })
    expect(delays).toEqual([1000])
  })

  it('follows the configured classification rather than a fixed one', async () => {
    const { sleep } = createSleep()
    const operation = vi.fn(async () => failure('rate_limit'))

    await withRetry(operation, { ...CONFIG, recoverableErrors: ['network'] }, { sleep })

    expect(operation).toHaveBeenCalledTimes(1)
  })

  it('stops at the first terminal error after recoverable ones', async () => {
    const { sleep } = createSleep()
    const operation = vi
      .fn<(attempt: number) => Promise<Result<string>>>()
      .mockResolvedValueOnce(failure('network'))
      .mockResolvedValueOnce(failure('auth', 'bad key'))

    const result = await withRetry(operation, CONFIG, { sleep })

    expect(result).toEqual({ ok: false, error: { type: 'auth', message: 'bad key' }, attempts: 2 })
  })

  it('treats thrown exceptions as network errors', async () => {
    const { sleep } = createSleep()
    const operation = vi.fn(async (): Promise<Result<string>> => {
      throw new Error('socket hang up')
    })

    const result = await withRetry(operation, { ...CONFIG, maxAttempts: 2 }, { sleep })

    expect(operation).toHaveBeenCalledTimes(2)
    expect(result).toEqual({
      ok: false,
      error: { type: 'network', message: 'socket hang up' },
      attempts: 2
    })
  })

  it('reports each retry before waiting', async () => {
    const { sleep } = createSleep()
    const onRetry = vi.fn()

    await withRetry(async () => failure('network', 'reset'), { ...CONFIG, maxAttempts: 2 }, {
      sleep,
      onRetry
    })

    expect(onRetry).toHaveBeenCalledTimes(1)
    expect(onRetry).toHaveBeenCalledWith({
      attempt: 1,
      delayMs: 100,
      error: { type: 'network', message: 'reset' }
    })
  })

  it('makes a single attempt when maxAttempts is 1', async () => {
    const operation = vi.fn(async () => failure('network'))

    const result = await withRetry(operation, { ...CONFIG, maxAttempts: 1 })

    expect(operation).toHaveBeenCalledTimes(1)
    expect(result.attempts).toBe(1)
  })
})

describe('backoffDelay', () => {
  it('computes base * multiplier^(attempt-1)', () => {
    expect(backoffDelay(DEFAULT_RETRY_CONFIG, 1)).toBe(1000)
    expect(backoffDelay(DEFAULT_RETRY_CONFIG, 2)).toBe(2000)
    expect(backoffDelay(DEFAULT_RETRY_CONFIG, 3)).toBe(4000)
  })
})

describe('validateRetryConfig', () => {
  it('accepts the defaults', () => {
    expect(validateRetryConfig(DEFAULT_RETRY_CONFIG)).toEqual([])
  })

  it('reports every invalid field', () => {
    const problems = validateRetryConfig({
      maxAttempts: 0,
      baseDelayMs: -1,
      backoffMultiplier: 0.5,
      recoverableErrors: []
    })

    expect(problems).toEqual([
      'maxAttempts must be an integer >= 1 (got 0)',
      'baseDelayMs must be >= 0 (got -1)',
      'backoffMultiplier must be >= 1 (got 0.5)'
    ])
  })
})
