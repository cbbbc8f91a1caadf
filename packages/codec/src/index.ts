/**
 * Codec Package
 *
 * Deterministic, schema-driven binary serialization: fixed-width scalars,
 * length-prefixed blobs and sequences, options, canonical maps and sets,
 * tagged unions and structs, plus size probing and the type-tree builder.
 */

// Re-export the shared contract so callers need a single import
export type {
  AnyCodec,
  Codec,
  CodecConfig,
  CodecKind,
  DecodingResult,
  Infer,
  Safe,
} from '@keelson/types'
export {
  assertSafe,
  CodecError,
  DEFAULT_CODEC_CONFIG,
  FormatError,
  SchemaError,
  SizeUndefinedError,
  ValueError,
} from '@keelson/types'

// Entry points and configuration
export { decode, encode } from './codec'
export * from './config'

// Codecs
export * from './core/adapter'
export * from './core/bytes'
export * from './core/collection'
export * from './core/option'
export * from './core/primitive'
export * from './core/sequence'
export * from './core/size-probe'
export * from './core/struct'
export * from './core/union'

// Type-tree schema builder
export * from './schema/type-tree'
