/**
 * Map and Set Serialization
 *
 * map(d) ≡ encode[4](|d|) ∥ orderby{encode(k)}(encode(k) ∥ encode(d[k]))
 * set(s) ≡ encode[4](|s|) ∥ orderby{encode(x)}(encode(x))
 *
 * Entries are ordered by their *encoded* bytes, not by the host values, so
 * a logical collection has exactly one byte form whatever order it was built
 * in. Encoded keys are self-delimiting, so ordering by key ∥ value is the
 * same as ordering by key alone.
 *
 * Decoding walks entries in stream order. Repeats are detected by their
 * encoded bytes, so a repeated key keeps the last value and a repeated set
 * element collapses into one even when the host values are distinct objects.
 */

import type { Hex } from '@keelson/core'
import { bytesEqual, compareBytes, concatBytes, toHex } from '@keelson/core'
import type { Codec, DecodingResult, Safe } from '@keelson/types'
import { safeError, safeResult, ValueError } from '@keelson/types'
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

interface EncodedEntry {
  key: Uint8Array
  bytes: Uint8Array
}

/**
 * Sort encoded entries into canonical order and frame them as a vector
 */
export function encodeCanonical(
  entries: EncodedEntry[],
  what: string,
): Safe<Uint8Array> {
  const sorted = [...entries].sort((a, b) => compareBytes(a.key, b.key))

  for (let i = 1; i < sorted.length; i++) {
    if (bytesEqual(sorted[i - 1].key, sorted[i].key)) {
      return safeError(
        new ValueError(`${what} holds two entries with identical encodings`),
      )
    }
  }

  const [error, prefix] = encodeLengthPrefix(sorted.length, what)
  if (error) {
    return safeError(error)
  }
  return safeResult(concatBytes([prefix, ...sorted.map((e) => e.bytes)]))
}

export class MapCodec<K, V> implements Codec<Map<K, V>> {
  readonly kind = 'map'
  readonly fixedSize = undefined

  constructor(
    readonly key: Codec<K>,
    readonly value: Codec<V>,
  ) {
    requireElementWidth(
      minEncodedSize(key.fixedSize) + minEncodedSize(value.fixedSize),
      'map',
    )
  }

  encode(value: Map<K, V>): Safe<Uint8Array> {
    if (!(value instanceof Map)) {
      return safeError(
        new ValueError(`map cannot encode ${describeValue(value)}`),
      )
    }
    const entries: EncodedEntry[] = []
    for (const [k, v] of value) {
      const [keyError, key] = this.key.encode(k)
      if (keyError) {
        return safeError(keyError)
      }
      const [valueError, encodedValue] = this.value.encode(v)
      if (valueError) {
        return safeError(valueError)
      }
      entries.push({ key, bytes: concatBytes([key, encodedValue]) })
    }
    return encodeCanonical(entries, 'map')
  }

  decode(data: Uint8Array): Safe<DecodingResult<Map<K, V>>> {
    const [prefixError, count] = decodeLengthPrefix(data, 'map')
    if (prefixError) {
      return safeError(prefixError)
    }
    const [countError] = checkCount(
      count.value,
      minEncodedSize(this.key.fixedSize) + minEncodedSize(this.value.fixedSize),
      count.remaining.length,
      'map',
    )
    if (countError) {
      return safeError(countError)
    }

    const entries = new Map<Hex, [K, V]>()
    let remaining = count.remaining
    for (let i = 0; i < count.value; i++) {
      const [keyError, key] = this.key.decode(remaining)
      if (keyError) {
        return safeError(keyError)
      }
      const [valueError, entryValue] = this.value.decode(key.remaining)
      if (valueError) {
        return safeError(valueError)
      }
      entries.set(toHex(remaining.subarray(0, key.consumed)), [
        key.value,
        entryValue.value,
      ])
      remaining = entryValue.remaining
    }

    return safeResult({
      value: new Map(entries.values()),
      remaining,
      consumed: LENGTH_PREFIX_SIZE + count.remaining.length - remaining.length,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    const [prefixError, count] = decodeLengthPrefix(data, 'map')
    if (prefixError) {
      return safeError(prefixError)
    }
    const [error, size] = probeElements(
      [this.key, this.value],
      count.remaining,
      count.value,
    )
    if (error) {
      return safeError(error)
    }
    return safeResult(LENGTH_PREFIX_SIZE + size)
  }
}

export class SetCodec<T> implements Codec<Set<T>> {
  readonly kind = 'set'
  readonly fixedSize = undefined

  constructor(readonly element: Codec<T>) {
    requireElementWidth(minEncodedSize(element.fixedSize), 'set')
  }

  encode(value: Set<T>): Safe<Uint8Array> {
    if (!(value instanceof Set)) {
      return safeError(
        new ValueError(`set cannot encode ${describeValue(value)}`),
      )
    }
    const entries: EncodedEntry[] = []
    for (const element of value) {
      const [error, encoded] = this.element.encode(element)
      if (error) {
        return safeError(error)
      }
      entries.push({ key: encoded, bytes: encoded })
    }
    return encodeCanonical(entries, 'set')
  }

  decode(data: Uint8Array): Safe<DecodingResult<Set<T>>> {
    const [prefixError, count] = decodeLengthPrefix(data, 'set')
    if (prefixError) {
      return safeError(prefixError)
    }
    const [countError] = checkCount(
      count.value,
      minEncodedSize(this.element.fixedSize),
      count.remaining.length,
      'set',
    )
    if (countError) {
      return safeError(countError)
    }

    const elements = new Map<Hex, T>()
    let remaining = count.remaining
    for (let i = 0; i < count.value; i++) {
      const [error, element] = this.element.decode(remaining)
      if (error) {
        return safeError(error)
      }
      elements.set(
        toHex(remaining.subarray(0, element.consumed)),
        element.value,
      )
      remaining = element.remaining
    }

    return safeResult({
      value: new Set(elements.values()),
      remaining,
      consumed: LENGTH_PREFIX_SIZE + count.remaining.length - remaining.length,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    const [prefixError, count] = decodeLengthPrefix(data, 'set')
    if (prefixError) {
      return safeError(prefixError)
    }
    const [error, size] = probeElements(
      [this.element],
      count.remaining,
      count.value,
    )
    if (error) {
      return safeError(error)
    }
    return safeResult(LENGTH_PREFIX_SIZE + size)
  }
}

export function hashMap<K, V>(key: Codec<K>, value: Codec<V>): MapCodec<K, V> {
  return new MapCodec(key, value)
}

export function hashSet<T>(element: Codec<T>): SetCodec<T> {
  return new SetCodec(element)
}
