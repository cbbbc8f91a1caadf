/**
 * Byte Blob and String Tests
 */

import {
  assertSafe,
  FormatError,
  SchemaError,
  ValueError,
} from '@keelson/types'
import { describe, expect, it } from 'vitest'
import { fixedHex } from '../core/adapter'
import { bytes, fixedBytes, publicKey, string } from '../core/bytes'

describe('String encoding', () => {
  it('should prefix UTF-8 bytes with a u32 length', () => {
    expect(assertSafe(string.encode('abc'))).toEqual(
      Uint8Array.from([3, 0, 0, 0, 0x61, 0x62, 0x63]),
    )
  })

  it('should count encoded bytes, not characters', () => {
    const encoded = assertSafe(string.encode('héllo'))
    expect(encoded.slice(0, 4)).toEqual(Uint8Array.from([6, 0, 0, 0]))
    expect(encoded.length).toBe(10)

    const decoded = assertSafe(string.decode(encoded))
    expect(decoded.value).toBe('héllo')
    expect(decoded.consumed).toBe(10)
  })

  it('should encode the empty string as a zero length', () => {
    expect(assertSafe(string.encode(''))).toEqual(new Uint8Array(4))
  })

  it('should reject payloads that are not valid UTF-8', () => {
    const [error] = string.decode(Uint8Array.from([1, 0, 0, 0, 0xff]))
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe('string payload is not valid UTF-8')
  })

  it('should reject a length larger than the input', () => {
    const [error] = string.decode(Uint8Array.from([5, 0, 0, 0, 0x61, 0x62]))
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe(
      'Insufficient data for string (expected 5 bytes, got 2)',
    )
  })
})

describe('Bytes encoding', () => {
  it('should prefix raw bytes with a u32 length', () => {
    expect(assertSafe(bytes.encode(Uint8Array.from([1, 2, 3])))).toEqual(
      Uint8Array.from([3, 0, 0, 0, 1, 2, 3]),
    )
  })

  it('should decode into a copy of the input', () => {
    const input = Uint8Array.from([2, 0, 0, 0, 7, 8, 9])
    const decoded = assertSafe(bytes.decode(input))
    input[4] = 0

    expect(decoded.value).toEqual(Uint8Array.from([7, 8]))
    expect(decoded.remaining).toEqual(Uint8Array.from([9]))
  })
})

describe('Fixed bytes encoding', () => {
  it('should carry no length prefix', () => {
    const codec = fixedBytes(4)
    expect(codec.fixedSize).toBe(4)
    expect(assertSafe(codec.encode(Uint8Array.from([1, 2, 3, 4])))).toEqual(
      Uint8Array.from([1, 2, 3, 4]),
    )
  })

  it('should reject blobs of the wrong length', () => {
    const [error] = fixedBytes(4).encode(Uint8Array.from([1, 2, 3]))
    expect(error).toBeInstanceOf(ValueError)
    expect(error?.message).toBe('Expected 4 bytes, got 3')
  })

  it('should reject invalid widths at construction', () => {
    expect(() => fixedBytes(-1)).toThrow(SchemaError)
    expect(() => fixedBytes(1.5)).toThrow(SchemaError)
  })

  it('should treat public keys as 32 raw bytes', () => {
    const key = new Uint8Array(32).fill(0x11)
    expect(publicKey.fixedSize).toBe(32)
    expect(assertSafe(publicKey.encode(key))).toEqual(key)
  })
})

describe('Fixed hex encoding', () => {
  it('should surface fixed bytes as a hex string', () => {
    const codec = fixedHex(2)
    const decoded = assertSafe(codec.decode(Uint8Array.from([0xab, 0xcd, 0x01])))
    expect(decoded.value).toBe('0xabcd')
    expect(decoded.consumed).toBe(2)
    expect(assertSafe(codec.encode('0xabcd'))).toEqual(
      Uint8Array.from([0xab, 0xcd]),
    )
  })

  it('should reject strings that are not hex', () => {
    const [error] = fixedHex(2).encode('0xzz')
    expect(error).toBeInstanceOf(ValueError)
    expect(error?.message).toBe('Expected hex string, got "0xzz"')
  })

  it('should reject hex of the wrong width', () => {
    const [error] = fixedHex(2).encode('0xabcdef')
    expect(error).toBeInstanceOf(ValueError)
    expect(error?.message).toBe('Expected 2 bytes, got 3')
  })
})
