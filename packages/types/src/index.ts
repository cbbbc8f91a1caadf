/**
 * Centralized Type Definitions
 *
 * Single source of truth for the result tuples, codec contract and error
 * taxonomy shared across the workspace.
 */

// Codec contract and configuration
export * from './codec'
// Encoder / decoder primitives
export * from './core'
// Error taxonomy
export * from './errors'
// Safe types
export * from './safe'
