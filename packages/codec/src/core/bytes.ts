/**
 * Byte Blob and String Serialization
 *
 * bytes  ≡ encode[4](len(x)) ∥ x
 * string ≡ encode[4](len(utf8(x))) ∥ utf8(x)
 *
 * Fixed-length blobs (hashes, public keys) have an identity serialization:
 * their width is known from the schema so no prefix travels.
 */

import type { Codec, DecodingResult, Safe } from '@keelson/types'
import {
  FormatError,
  SchemaError,
  safeError,
  safeResult,
  ValueError,
} from '@keelson/types'
import * as _ from 'radash'
import { probeFixed } from './size-probe'
import {
  decodeLengthPrefix,
  describeValue,
  encodeLengthPrefix,
  LENGTH_PREFIX_SIZE,
  takeBytes,
} from './stream'

const utf8Encoder = new TextEncoder()
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

function encodePrefixed(payload: Uint8Array, what: string): Safe<Uint8Array> {
  const [error, prefix] = encodeLengthPrefix(payload.length, what)
  if (error) {
    return safeError(error)
  }
  const result = new Uint8Array(prefix.length + payload.length)
  result.set(prefix, 0)
  result.set(payload, prefix.length)
  return safeResult(result)
}

function decodePrefixed(
  data: Uint8Array,
  what: string,
): Safe<DecodingResult<Uint8Array>> {
  const [lengthError, length] = decodeLengthPrefix(data, what)
  if (lengthError) {
    return safeError(lengthError)
  }
  const [error, payload] = takeBytes(length.remaining, length.value, what)
  if (error) {
    return safeError(error)
  }
  return safeResult({
    value: payload.value.slice(),
    remaining: payload.remaining,
    consumed: LENGTH_PREFIX_SIZE + payload.consumed,
  })
}

function probePrefixed(data: Uint8Array, what: string): Safe<number> {
  const [error, length] = decodeLengthPrefix(data, what)
  if (error) {
    return safeError(error)
  }
  return probeFixed(data, LENGTH_PREFIX_SIZE + length.value, what)
}

export class BytesCodec implements Codec<Uint8Array> {
  readonly kind = 'bytes'
  readonly fixedSize = undefined

  encode(value: Uint8Array): Safe<Uint8Array> {
    if (!(value instanceof Uint8Array)) {
      return safeError(
        new ValueError(`bytes cannot encode ${describeValue(value)}`),
      )
    }
    return encodePrefixed(value, 'bytes')
  }

  decode(data: Uint8Array): Safe<DecodingResult<Uint8Array>> {
    return decodePrefixed(data, 'bytes')
  }

  probe(data: Uint8Array): Safe<number> {
    return probePrefixed(data, 'bytes')
  }
}

export class StringCodec implements Codec<string> {
  readonly kind = 'string'
  readonly fixedSize = undefined

  encode(value: string): Safe<Uint8Array> {
    if (typeof value !== 'string') {
      return safeError(
        new ValueError(`string cannot encode ${describeValue(value)}`),
      )
    }
    return encodePrefixed(utf8Encoder.encode(value), 'string')
  }

  decode(data: Uint8Array): Safe<DecodingResult<string>> {
    const [error, payload] = decodePrefixed(data, 'string')
    if (error) {
      return safeError(error)
    }
    const [utf8Error, text] = _.try(() => utf8Decoder.decode(payload.value))()
    if (utf8Error) {
      return safeError(
        new FormatError('string payload is not valid UTF-8', {
          cause: utf8Error,
        }),
      )
    }
    return safeResult({
      value: text,
      remaining: payload.remaining,
      consumed: payload.consumed,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    return probePrefixed(data, 'string')
  }
}

/**
 * Opaque blob whose width is fixed by the schema
 */
export class FixedBytesCodec implements Codec<Uint8Array> {
  readonly kind = 'fixedBytes'

  constructor(readonly fixedSize: number) {
    if (!Number.isInteger(fixedSize) || fixedSize < 0) {
      throw new SchemaError(`Invalid fixed byte length: ${fixedSize}`)
    }
  }

  encode(value: Uint8Array): Safe<Uint8Array> {
    if (!(value instanceof Uint8Array)) {
      return safeError(
        new ValueError(`fixed bytes cannot encode ${describeValue(value)}`),
      )
    }
    if (value.length !== this.fixedSize) {
      return safeError(
        new ValueError(
          `Expected ${this.fixedSize} bytes, got ${value.length}`,
        ),
      )
    }
    return safeResult(value.slice())
  }

  decode(data: Uint8Array): Safe<DecodingResult<Uint8Array>> {
    const [error, taken] = takeBytes(data, this.fixedSize, 'fixed bytes')
    if (error) {
      return safeError(error)
    }
    return safeResult({ ...taken, value: taken.value.slice() })
  }

  probe(data: Uint8Array): Safe<number> {
    return probeFixed(data, this.fixedSize, 'fixed bytes')
  }
}

export const bytes = new BytesCodec()
export const string = new StringCodec()

export function fixedBytes(length: number): FixedBytesCodec {
  return new FixedBytesCodec(length)
}

/** 32-byte account address */
export const publicKey = fixedBytes(32)
