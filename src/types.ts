/**
 * Core types for the cover letter generator
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
