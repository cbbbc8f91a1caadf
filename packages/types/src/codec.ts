/**
 * Codec Types
 *
 * The shared contract every schema-bound codec implements
 */

import type { DecodingResult } from './core'
import type { Safe } from './safe'

export type CodecKind =
  | 'bool'
  | 'int'
  | 'float'
  | 'bytes'
  | 'string'
  | 'fixedBytes'
  | 'array'
  | 'vec'
  | 'option'
  | 'map'
  | 'set'
  | 'tuple'
  | 'struct'
  | 'enum'
  | 'mapped'

/**
 * Stateless transformer between a value and its canonical byte sequence
 *
 * Members are methods: `Codec<number>` has to stay assignable to
 * `Codec<unknown>` inside heterogeneous trees.
 */
export interface Codec<T> {
  readonly kind: CodecKind
  /** Encoded width when it does not depend on the value */
  readonly fixedSize: number | undefined
  encode(value: T): Safe<Uint8Array>
  decode(data: Uint8Array): Safe<DecodingResult<T>>
  /** Byte length of the next encoded value in `data`, without decoding it */
  probe(data: Uint8Array): Safe<number>
}

export type AnyCodec = Codec<unknown>

/**
 * Value type carried by a codec
 */
export type Infer<C> = C extends Codec<infer T> ? T : never

/**
 * Codec configuration
 */
export interface CodecConfig {
  /** Maximum size of encoded output and decoded input, in bytes */
  maxDataSize: number
  /** Accept input that continues past the decoded value */
  allowTrailingBytes: boolean
}

export const DEFAULT_CODEC_CONFIG: CodecConfig = {
  maxDataSize: 1024 * 1024 * 10, // 10MB
  allowTrailingBytes: true,
}
