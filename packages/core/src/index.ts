/**
 * Core Package
 *
 * Logging, environment configuration and byte utilities shared across the
 * workspace
 */

export * from './env'
// Export logger
export * from './logger'
export * from './utils/buffer'
