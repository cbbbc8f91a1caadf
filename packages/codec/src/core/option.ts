/**
 * Optional Value Serialization
 *
 * maybe(x) ≡ ⟨0⟩           when x = ∅
 * maybe(x) ≡ ⟨1⟩ ∥ encode(x) otherwise
 */

import type { Codec, DecodingResult, Safe } from '@keelson/types'
import { FormatError, safeError, safeResult } from '@keelson/types'
import { takeBytes } from './stream'

export const OPTION_NONE = 0x00
export const OPTION_SOME = 0x01

export type Option<T> = T | null

export class OptionCodec<T> implements Codec<Option<T>> {
  readonly kind = 'option'
  readonly fixedSize = undefined

  constructor(readonly inner: Codec<T>) {}

  encode(value: Option<T> | undefined): Safe<Uint8Array> {
    if (value === null || value === undefined) {
      return safeResult(Uint8Array.of(OPTION_NONE))
    }
    const [error, encoded] = this.inner.encode(value)
    if (error) {
      return safeError(error)
    }
    const result = new Uint8Array(1 + encoded.length)
    result[0] = OPTION_SOME
    result.set(encoded, 1)
    return safeResult(result)
  }

  decode(data: Uint8Array): Safe<DecodingResult<Option<T>>> {
    const [tagError, tag] = this.readTag(data)
    if (tagError) {
      return safeError(tagError)
    }
    if (tag.value === OPTION_NONE) {
      return safeResult({ value: null, remaining: tag.remaining, consumed: 1 })
    }
    const [error, inner] = this.inner.decode(tag.remaining)
    if (error) {
      return safeError(error)
    }
    return safeResult({ ...inner, consumed: 1 + inner.consumed })
  }

  probe(data: Uint8Array): Safe<number> {
    const [tagError, tag] = this.readTag(data)
    if (tagError) {
      return safeError(tagError)
    }
    if (tag.value === OPTION_NONE) {
      return safeResult(1)
    }
    const [error, size] = this.inner.probe(tag.remaining)
    if (error) {
      return safeError(error)
    }
    return safeResult(1 + size)
  }

  private readTag(data: Uint8Array): Safe<DecodingResult<number>> {
    const [error, taken] = takeBytes(data, 1, 'option tag')
    if (error) {
      return safeError(error)
    }
    const tag = taken.value[0]
    if (tag !== OPTION_NONE && tag !== OPTION_SOME) {
      return safeError(new FormatError(`Invalid option tag: ${tag}`))
    }
    return safeResult({ ...taken, value: tag })
  }
}

export function option<T>(inner: Codec<T>): OptionCodec<T> {
  return new OptionCodec(inner)
}
