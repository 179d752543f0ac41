/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './book'
export * from './common'
export * from './generation'
