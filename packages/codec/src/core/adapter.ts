/**
 * Adapter Codecs
 *
 * Reuse an existing wire format under a different host representation.
 * The inner codec owns the bytes; the adapter only converts values.
 */

import type { Hex } from '@keelson/core'
import { fromHex, toHex } from '@keelson/core'
import type { Codec, DecodingResult, Safe } from '@keelson/types'
import { safeError, safeResult, ValueError } from '@keelson/types'
import { fixedBytes } from './bytes'
import { describeValue } from './stream'

export interface AdapterMapping<I, O> {
  decode(inner: I): Safe<O>
  encode(outer: O): Safe<I>
}

export class AdapterCodec<I, O> implements Codec<O> {
  readonly kind = 'mapped'

  constructor(
    readonly inner: Codec<I>,
    private readonly mapping: AdapterMapping<I, O>,
  ) {}

  get fixedSize(): number | undefined {
    return this.inner.fixedSize
  }

  encode(value: O): Safe<Uint8Array> {
    const [error, inner] = this.mapping.encode(value)
    if (error) {
      return safeError(error)
    }
    return this.inner.encode(inner)
  }

  decode(data: Uint8Array): Safe<DecodingResult<O>> {
    const [error, decoded] = this.inner.decode(data)
    if (error) {
      return safeError(error)
    }
    const [mapError, value] = this.mapping.decode(decoded.value)
    if (mapError) {
      return safeError(mapError)
    }
    return safeResult({ ...decoded, value })
  }

  probe(data: Uint8Array): Safe<number> {
    return this.inner.probe(data)
  }
}

export function adapt<I, O>(
  inner: Codec<I>,
  mapping: AdapterMapping<I, O>,
): AdapterCodec<I, O> {
  return new AdapterCodec(inner, mapping)
}

/**
 * Fixed-length blob surfaced as a `0x`-prefixed hex string
 */
export function fixedHex(length: number): AdapterCodec<Uint8Array, Hex> {
  return adapt(fixedBytes(length), {
    decode: (inner) => safeResult(toHex(inner)),
    encode: (outer) => {
      const decoded = typeof outer === 'string' ? fromHex(outer) : undefined
      if (decoded === undefined) {
        return safeError(
          new ValueError(`Expected hex string, got ${describeValue(outer)}`),
        )
      }
      return safeResult(decoded)
    },
  })
}
