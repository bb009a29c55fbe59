/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './common.js'
export * from './parser.js'
export * from './streaming.js'
