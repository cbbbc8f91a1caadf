/**
 * Size Probing
 *
 * Determines how many bytes the next encoded value occupies without
 * rebuilding it. Statically sized codecs answer with their width; options
 * and enums peek at their one-byte tag and recurse into the selected
 * payload; length-prefixed codecs read the prefix and walk their elements.
 */

import type { AnyCodec, Codec, DecodingResult, Safe } from '@keelson/types'
import {
  FormatError,
  safeError,
  safeResult,
  SizeUndefinedError,
} from '@keelson/types'

/**
 * Static width of a codec
 *
 * Fails for codecs whose width depends on the value (options, enums,
 * length-prefixed data and aggregates containing them).
 */
export function sizeOf(codec: AnyCodec): Safe<number, SizeUndefinedError> {
  if (codec.fixedSize === undefined) {
    return safeError(
      new SizeUndefinedError(
        `Size of ${codec.kind} codec depends on the encoded value`,
      ),
    )
  }
  return safeResult(codec.fixedSize)
}

/**
 * Byte length of the next value `codec` would decode from `data`
 */
export function probeSize(codec: AnyCodec, data: Uint8Array): Safe<number> {
  return codec.probe(data)
}

/**
 * Split the raw encoding of the next value off the front of `data`, for
 * re-framing it elsewhere without decoding it
 */
export function sliceEncoded<T>(
  codec: Codec<T>,
  data: Uint8Array,
): Safe<DecodingResult<Uint8Array>> {
  const [error, size] = codec.probe(data)
  if (error) {
    return safeError(error)
  }
  return safeResult({
    value: data.slice(0, size),
    remaining: data.subarray(size),
    consumed: size,
  })
}

export function probeFixed(
  data: Uint8Array,
  size: number,
  what: string,
): Safe<number> {
  if (data.length < size) {
    return safeError(
      new FormatError(
        `Insufficient data for ${what} (expected ${size} bytes, got ${data.length})`,
      ),
    )
  }
  return safeResult(size)
}

/**
 * Total length of `count` back-to-back encodings, one codec per slot
 * cycling through `codecs` (a single codec for homogeneous sequences,
 * key and value codecs for map entries, the field codecs for aggregates)
 */
export function probeElements(
  codecs: readonly AnyCodec[],
  data: Uint8Array,
  count: number,
): Safe<number> {
  let groupSize: number | undefined = 0
  for (const codec of codecs) {
    groupSize =
      groupSize === undefined || codec.fixedSize === undefined
        ? undefined
        : groupSize + codec.fixedSize
  }
  if (groupSize !== undefined) {
    return probeFixed(data, groupSize * count, 'sequence')
  }

  let offset = 0
  for (let i = 0; i < count; i++) {
    for (const codec of codecs) {
      const [error, size] = codec.probe(data.subarray(offset))
      if (error) {
        return safeError(error)
      }
      offset += size
    }
  }
  return safeResult(offset)
}
