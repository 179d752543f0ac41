import { describe, expect, it } from 'vitest'
import type { HttpResponse } from './http'
import {
  classifyHttpStatus,
  emptyResponseError,
  handleHttpError,
  handleNetworkError
} from './http'
import type { ApiError } from './types'

// Helper to assert error result and get error
function assertError(result: { ok: boolean; error?: ApiError }): ApiError {
  expect(result.ok).toBe(false)
  if (!result.ok && result.error) return result.error
  throw new Error('Expected error result')
}

function createMockResponse(
  status: number,
  body: string,
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: (name: string) => headers[name.toLowerCase()] ?? null
    },
    text: async () => body,
    json: async () => JSON.parse(body),
    arrayBuffer: () => new Response(body).arrayBuffer()
  }
}

describe('HTTP Utilities', () => {
  describe('classifyHttpStatus', () => {
    it.each([
      [429, 'rate_limit'],
      [401, 'auth'],
      [403, 'auth'],
      [402, 'quota'],
      [408, 'timeout'],
      [504, 'timeout'],
      [400, 'invalid_request'],
      [404, 'invalid_request'],
      [422, 'invalid_request'],
      [500, 'network'],
      [503, 'network']
    ])('maps %i to %s', (status, type) => {
      expect(classifyHttpStatus(status)).toBe(type)
    })
  })

  describe('handleHttpError', () => {
    it('handles 429 rate limit error', async () => {
      const error = assertError(await handleHttpError(createMockResponse(429, 'Too many requests')))

      expect(error.type).toBe('rate_limit')
      expect(error.message).toBe('Rate limited: Too many requests')
      expect(error.retryAfter).toBeUndefined()
    })

    it('includes retry-after header when present', async () => {
      const response = createMockResponse(429, 'Too many requests', { 'retry-after': '60' })

      const error = assertError(await handleHttpError(response))

      expect(error.retryAfter).toBe(60)
    })

    it('handles 401 auth error', async () => {
      const error = assertError(await handleHttpError(createMockResponse(401, 'Invalid API key')))

      expect(error.type).toBe('auth')
      expect(error.message).toBe('Authentication failed: Invalid API key')
    })

    it('handles 402 quota error', async () => {
      const error = assertError(await handleHttpError(createMockResponse(402, 'No credits')))

      expect(error.type).toBe('quota')
      expect(error.message).toBe('Quota exceeded: No credits')
    })

    it('handles 400 bad request as invalid_request', async () => {
      const error = assertError(await handleHttpError(createMockResponse(400, 'Bad request')))

      expect(error.type).toBe('invalid_request')
      expect(error.message).toBe('Invalid request (400): Bad request')
    })

    it('handles gateway timeout', async () => {
      const error = assertError(await handleHttpError(createMockResponse(504, 'upstream')))

      expect(error.type).toBe('timeout')
    })

    it('handles generic HTTP errors as network', async () => {
      const error = assertError(await handleHttpError(createMockResponse(500, 'Internal error')))

      expect(error.type).toBe('network')
      expect(error.message).toBe('API error 500: Internal error')
    })
  })

  describe('handleNetworkError', () => {
    it('handles Error objects', () => {
      const error = assertError(handleNetworkError(new Error('Connection refused')))

      expect(error.type).toBe('network')
      expect(error.message).toBe('Network error: Connection refused')
    })

    it('handles non-Error values', () => {
      const error = assertError(handleNetworkError('socket hang up'))

      expect(error.message).toBe('Network error: socket hang up')
    })

    it('reports request timeouts as timeout', () => {
      const abort = new Error('The operation was aborted due to timeout')
      abort.name = 'TimeoutError'

      const error = assertError(handleNetworkError(abort))

      expect(error.type).toBe('timeout')
      expect(error.message).toBe('Request timed out: The operation was aborted due to timeout')
    })
  })

  describe('emptyResponseError', () => {
    it('returns invalid_response error', () => {
      const error = assertError(emptyResponseError())

      expect(error.type).toBe('invalid_response')
      expect(error.message).toBe('Empty response from API')
    })
  })
})
