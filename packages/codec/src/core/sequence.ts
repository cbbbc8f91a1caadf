/**
 * Sequence Serialization
 *
 * encode([i₀, i₁, ...]) ≡ encode(i₀) ∥ encode(i₁) ∥ ...
 *
 * Elements are concatenated with no separators. A fixed array carries no
 * prefix because its length is known from the schema; a vector carries a
 * u32 little-endian element count:
 *
 * vec(x) ≡ encode[4](len(x)) ∥ encode(x₀) ∥ encode(x₁) ∥ ...
 *
 * Examples:
 * - array(u8, 2): [1, 2] → 0x0102
 * - vec(u8): [1, 2] → 0x02000000 0102
 * - vec(T): [] → 0x00000000 for any T
 */

import { concatBytes } from '@keelson/core'
import type { AnyCodec, Codec, DecodingResult, Safe } from '@keelson/types'
import {
  SchemaError,
  safeError,
  safeResult,
  ValueError,
} from '@keelson/types'
import { probeElements } from './size-probe'
import {
  checkCount,
  decodeLengthPrefix,
  describeValue,
  encodeLengthPrefix,
  LENGTH_PREFIX_SIZE,
  minEncodedSize,
  requireElementWidth,
} from './stream'

/**
 * Encode each element in turn and collect the parts
 */
export function encodeElements<T>(
  elements: Iterable<T>,
  codec: Codec<T>,
): Safe<Uint8Array[]> {
  const parts: Uint8Array[] = []
  for (const element of elements) {
    const [error, encoded] = codec.encode(element)
    if (error) {
      return safeError(error)
    }
    parts.push(encoded)
  }
  return safeResult(parts)
}

/**
 * Decode exactly `count` back-to-back elements
 */
export function decodeElements<T>(
  data: Uint8Array,
  codec: Codec<T>,
  count: number,
): Safe<DecodingResult<T[]>> {
  const result: T[] = []
  let remaining = data

  for (let i = 0; i < count; i++) {
    const [error, decoded] = codec.decode(remaining)
    if (error) {
      return safeError(error)
    }
    result.push(decoded.value)
    remaining = decoded.remaining
  }

  return safeResult({
    value: result,
    remaining,
    consumed: data.length - remaining.length,
  })
}

/**
 * Array whose length is fixed by the schema
 */
export class ArrayCodec<T> implements Codec<T[]> {
  readonly kind = 'array'
  readonly fixedSize: number | undefined

  constructor(
    readonly element: Codec<T>,
    readonly length: number,
  ) {
    if (!Number.isInteger(length) || length < 0) {
      throw new SchemaError(`Invalid fixed array length: ${length}`)
    }
    this.fixedSize =
      element.fixedSize === undefined ? undefined : element.fixedSize * length
  }

  encode(value: T[]): Safe<Uint8Array> {
    if (!Array.isArray(value)) {
      return safeError(
        new ValueError(`array cannot encode ${describeValue(value)}`),
      )
    }
    if (value.length !== this.length) {
      return safeError(
        new ValueError(
          `Fixed array expects ${this.length} elements, got ${value.length}`,
        ),
      )
    }
    const [error, parts] = encodeElements(value, this.element)
    if (error) {
      return safeError(error)
    }
    return safeResult(concatBytes(parts))
  }

  decode(data: Uint8Array): Safe<DecodingResult<T[]>> {
    return decodeElements(data, this.element, this.length)
  }

  probe(data: Uint8Array): Safe<number> {
    const elements: AnyCodec[] = [this.element]
    return probeElements(elements, data, this.length)
  }
}

/**
 * Variable-length sequence with a u32 element count
 */
export class VecCodec<T> implements Codec<T[]> {
  readonly kind = 'vec'
  readonly fixedSize = undefined

  constructor(readonly element: Codec<T>) {
    requireElementWidth(minEncodedSize(element.fixedSize), 'vec')
  }

  encode(value: T[]): Safe<Uint8Array> {
    if (!Array.isArray(value)) {
      return safeError(
        new ValueError(`vec cannot encode ${describeValue(value)}`),
      )
    }
    const [prefixError, prefix] = encodeLengthPrefix(value.length, 'vec')
    if (prefixError) {
      return safeError(prefixError)
    }
    const [error, parts] = encodeElements(value, this.element)
    if (error) {
      return safeError(error)
    }
    return safeResult(concatBytes([prefix, ...parts]))
  }

  decode(data: Uint8Array): Safe<DecodingResult<T[]>> {
    const [prefixError, count] = decodeLengthPrefix(data, 'vec')
    if (prefixError) {
      return safeError(prefixError)
    }
    const [countError] = checkCount(
      count.value,
      minEncodedSize(this.element.fixedSize),
      count.remaining.length,
      'vec',
    )
    if (countError) {
      return safeError(countError)
    }
    const [error, elements] = decodeElements(
      count.remaining,
      this.element,
      count.value,
    )
    if (error) {
      return safeError(error)
    }
    return safeResult({
      ...elements,
      consumed: LENGTH_PREFIX_SIZE + elements.consumed,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    const [prefixError, count] = decodeLengthPrefix(data, 'vec')
    if (prefixError) {
      return safeError(prefixError)
    }
    const elements: AnyCodec[] = [this.element]
    const [error, size] = probeElements(elements, count.remaining, count.value)
    if (error) {
      return safeError(error)
    }
    return safeResult(LENGTH_PREFIX_SIZE + size)
  }
}

export function array<T>(element: Codec<T>, length: number): ArrayCodec<T> {
  return new ArrayCodec(element, length)
}

export function vec<T>(element: Codec<T>): VecCodec<T> {
  return new VecCodec(element)
}
