/**
 * Codec Error Taxonomy
 *
 * Every failure surfaced by the codec is one of the classes below. Schema
 * errors are thrown while a schema is built; the others travel inside
 * `Safe` tuples returned by encode/decode/probe.
 */

export const CODEC_ERROR_CODES = {
  INVALID_SCHEMA: 'INVALID_SCHEMA',
  DECODING_ERROR: 'DECODING_ERROR',
  ENCODING_ERROR: 'ENCODING_ERROR',
  SIZE_UNDEFINED: 'SIZE_UNDEFINED',
} as const

export type CodecErrorCode =
  (typeof CODEC_ERROR_CODES)[keyof typeof CODEC_ERROR_CODES]

export abstract class CodecError extends Error {
  abstract readonly code: CodecErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Invalid schema construction: reserved or duplicate names, unnamed fields,
 * malformed variant declarations
 */
export class SchemaError extends CodecError {
  readonly code = CODEC_ERROR_CODES.INVALID_SCHEMA
}

/**
 * Malformed bytes during decode
 */
export class FormatError extends CodecError {
  readonly code = CODEC_ERROR_CODES.DECODING_ERROR
}

/**
 * Value that cannot be encoded by the codec it was given to
 */
export class ValueError extends CodecError {
  readonly code = CODEC_ERROR_CODES.ENCODING_ERROR
}

/**
 * Static size requested from a codec whose width depends on the value
 */
export class SizeUndefinedError extends CodecError {
  readonly code = CODEC_ERROR_CODES.SIZE_UNDEFINED
}
