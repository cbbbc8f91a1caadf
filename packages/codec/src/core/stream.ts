/**
 * Stream helpers shared by every codec
 *
 * Decoding consumes its input strictly left to right: each helper takes the
 * unread tail and hands back what it read together with the new tail.
 */

import { writeUintLE, readUintLE } from '@keelson/core'
import type { DecodingResult, Safe } from '@keelson/types'
import {
  FormatError,
  safeError,
  safeResult,
  SchemaError,
  ValueError,
} from '@keelson/types'

/** Largest count or byte length a u32 prefix can carry */
export const MAX_PREFIXED_LENGTH = 0xffffffff

export const LENGTH_PREFIX_SIZE = 4

/**
 * Take exactly `length` bytes from the front of `data`
 */
export function takeBytes(
  data: Uint8Array,
  length: number,
  what: string,
): Safe<DecodingResult<Uint8Array>> {
  if (data.length < length) {
    return safeError(
      new FormatError(
        `Insufficient data for ${what} (expected ${length} bytes, got ${data.length})`,
      ),
    )
  }
  return safeResult({
    value: data.subarray(0, length),
    remaining: data.subarray(length),
    consumed: length,
  })
}

/**
 * Encode a u32 little-endian length or count prefix
 */
export function encodeLengthPrefix(
  length: number,
  what: string,
): Safe<Uint8Array> {
  if (length > MAX_PREFIXED_LENGTH) {
    return safeError(
      new ValueError(
        `${what} length ${length} exceeds maximum ${MAX_PREFIXED_LENGTH}`,
      ),
    )
  }
  return safeResult(writeUintLE(BigInt(length), LENGTH_PREFIX_SIZE))
}

/**
 * Decode a u32 little-endian length or count prefix
 */
export function decodeLengthPrefix(
  data: Uint8Array,
  what: string,
): Safe<DecodingResult<number>> {
  const [error, prefix] = takeBytes(data, LENGTH_PREFIX_SIZE, `${what} length`)
  if (error) {
    return safeError(error)
  }
  return safeResult({
    value: Number(readUintLE(prefix.value, LENGTH_PREFIX_SIZE)),
    remaining: prefix.remaining,
    consumed: LENGTH_PREFIX_SIZE,
  })
}

/**
 * Reject a decoded element count that the remaining input cannot hold.
 *
 * `minElementSize` is the smallest encoding one element can have; every
 * value-dependent encoding takes at least one byte, and counted collections
 * never hold zero-width elements (see `requireElementWidth`).
 */
export function checkCount(
  count: number,
  minElementSize: number,
  available: number,
  what: string,
): Safe<number> {
  if (count * minElementSize > available) {
    return safeError(
      new FormatError(
        `${what} count ${count} inconsistent with remaining ${available} bytes`,
      ),
    )
  }
  return safeResult(count)
}

/**
 * Refuse counted elements that can encode to nothing, since their count
 * would not be bounded by the input
 */
export function requireElementWidth(
  minElementSize: number,
  what: string,
): void {
  if (minElementSize === 0) {
    throw new SchemaError(`${what} elements must encode to at least one byte`)
  }
}

/**
 * Smallest number of bytes an encoding produced by a codec can occupy
 */
export function minEncodedSize(fixedSize: number | undefined): number {
  return fixedSize ?? 1
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function describeValue(value: unknown): string {
  if (typeof value === 'bigint') {
    return `${value}n`
  }
  if (typeof value === 'string') {
    return JSON.stringify(value)
  }
  if (value === null || typeof value !== 'object') {
    return String(value)
  }
  // "[object Map]" -> "Map"
  return Object.prototype.toString.call(value).slice(8, -1)
}
