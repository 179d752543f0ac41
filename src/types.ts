/**
 * Core types for the chapterpress library
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
