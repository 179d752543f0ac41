/**
 * HTTP Utilities
 *
 * Typed fetch wrapper plus uniform classification of HTTP and network
 * failures into ApiError results. The classification feeds the retry
 * wrapper, which decides by error type (never by message text).
 */

import type { ApiErrorType, Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Check if HTTP requests should be blocked (tests running in CI).
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a real HTTP request is attempted while running tests in CI.
 */
export class UncachedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Tests must stub httpFetch or inject a generator.'
    )
    this.name = 'UncachedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
  arrayBuffer(): Promise<ArrayBuffer>
}

export interface HttpFetchOptions extends RequestInit {
  /** Abort the request after this many milliseconds */
  readonly timeoutMs?: number | undefined
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws UncachedHttpRequestError when HTTP requests are blocked (CI tests)
 */
export async function httpFetch(url: string, options: HttpFetchOptions = {}): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new UncachedHttpRequestError(url)
  }
  const { timeoutMs, ...init } = options
  if (timeoutMs !== undefined) {
    init.signal = AbortSignal.timeout(timeoutMs)
  }
  return fetch(url, init)
}

/**
 * Map an HTTP status to an error type.
 */
export function classifyHttpStatus(status: number): ApiErrorType {
  if (status === 429) return 'rate_limit'
  if (status === 401 || status === 403) return 'auth'
  if (status === 402) return 'quota'
  if (status === 408 || status === 504) return 'timeout'
  if (status === 400 || status === 404 || status === 422) return 'invalid_request'
  return 'network'
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()
  const type = classifyHttpStatus(response.status)

  switch (type) {
    case 'rate_limit': {
      const retryAfter = response.headers.get('retry-after')
      return {
        ok: false,
        error: {
          type,
          message: `Rate limited: ${errorText}`,
          retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
        }
      }
    }
    case 'auth':
      return { ok: false, error: { type, message: `Authentication failed: ${errorText}` } }
    case 'quota':
      return { ok: false, error: { type, message: `Quota exceeded: ${errorText}` } }
    case 'timeout':
      return { ok: false, error: { type, message: `Request timed out (${response.status}): ${errorText}` } }
    case 'invalid_request':
      return { ok: false, error: { type, message: `Invalid request (${response.status}): ${errorText}` } }
    default:
      return {
        ok: false,
        error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
      }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 * Aborts from the request timeout are reported as `timeout`.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { ok: false, error: { type: 'timeout', message: `Request timed out: ${message}` } }
  }
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}
