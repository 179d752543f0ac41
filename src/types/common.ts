/**
 * Common Types
 *
 * Shared types used across multiple modules: Result and API errors.
 */

// Result Types
export type ApiErrorType =
  | 'rate_limit'
  | 'auth'
  | 'quota'
  | 'network'
  | 'timeout'
  | 'invalid_response'
  | 'invalid_request'

export const API_ERROR_TYPES: readonly ApiErrorType[] = [
  'rate_limit',
  'auth',
  'quota',
  'network',
  'timeout',
  'invalid_response',
  'invalid_request'
]

export function isApiErrorType(value: string): value is ApiErrorType {
  return API_ERROR_TYPES.some((t) => t === value)
}

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly retryAfter?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }
