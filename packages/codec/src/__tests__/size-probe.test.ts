/**
 * Size Probing Tests
 */

import { assertSafe, FormatError, SizeUndefinedError } from '@keelson/types'
import { describe, expect, it } from 'vitest'
import { bytes, string } from '../core/bytes'
import { hashMap } from '../core/collection'
import { option } from '../core/option'
import { u8, u16, u32, u64 } from '../core/primitive'
import { array, vec } from '../core/sequence'
import { probeSize, sizeOf, sliceEncoded } from '../core/size-probe'
import { struct } from '../core/struct'
import {
  namedVariant,
  taggedUnion,
  tupleVariant,
  unitVariant,
} from '../core/union'

const shape = taggedUnion({
  Empty: unitVariant(),
  Named: tupleVariant<[string]>([string]),
  Point: namedVariant({ x: u16 }),
})

describe('Static size', () => {
  it('should report the width of statically sized codecs', () => {
    expect(assertSafe(sizeOf(u32))).toBe(4)
    expect(assertSafe(sizeOf(struct({ a: u8, b: u64 })))).toBe(9)
    expect(assertSafe(sizeOf(array(u16, 3)))).toBe(6)
  })

  it('should fail for value-dependent codecs', () => {
    const [optionError] = sizeOf(option(u8))
    expect(optionError).toBeInstanceOf(SizeUndefinedError)
    expect(optionError?.message).toBe(
      'Size of option codec depends on the encoded value',
    )

    const [vecError] = sizeOf(vec(u8))
    expect(vecError).toBeInstanceOf(SizeUndefinedError)
    const [structError] = sizeOf(struct({ a: u8, b: bytes }))
    expect(structError).toBeInstanceOf(SizeUndefinedError)
  })
})

describe('Probing', () => {
  it('should peek at option tags', () => {
    expect(assertSafe(probeSize(option(u8), Uint8Array.from([0, 99])))).toBe(1)
    expect(assertSafe(probeSize(option(u8), Uint8Array.from([1, 5, 99])))).toBe(
      2,
    )
    expect(
      assertSafe(
        probeSize(
          option(string),
          Uint8Array.from([1, 2, 0, 0, 0, 0x61, 0x62, 0xff]),
        ),
      ),
    ).toBe(7)
  })

  it('should follow the selected enum variant', () => {
    expect(assertSafe(probeSize(shape, Uint8Array.from([0, 0xff])))).toBe(1)
    expect(
      assertSafe(probeSize(shape, Uint8Array.from([1, 1, 0, 0, 0, 0x7a]))),
    ).toBe(6)
    expect(assertSafe(probeSize(shape, Uint8Array.from([2, 1, 2])))).toBe(3)
  })

  it('should recurse through nested tags', () => {
    expect(
      assertSafe(probeSize(option(shape), Uint8Array.from([1, 2, 1, 2, 9]))),
    ).toBe(4)
    expect(
      assertSafe(
        probeSize(vec(option(u8)), Uint8Array.from([2, 0, 0, 0, 0, 1, 7, 9])),
      ),
    ).toBe(7)
  })

  it('should walk map entries', () => {
    const encoded = Uint8Array.from([
      2, 0, 0, 0,
      1, 0, 0, 0, 0x61, 2,
      1, 0, 0, 0, 0x62, 1,
    ])
    expect(assertSafe(probeSize(hashMap(string, u8), encoded))).toBe(16)
  })

  it('should agree with the encoded length', () => {
    const codec = struct({ name: string, tags: vec(option(u16)) })
    const encoded = assertSafe(codec.encode({ name: 'n', tags: [1, null] }))
    expect(assertSafe(probeSize(codec, encoded))).toBe(encoded.length)
  })

  it('should fail on truncated input', () => {
    const [vecError] = probeSize(
      vec(u32),
      Uint8Array.from([2, 0, 0, 0, 1, 0, 0, 0]),
    )
    expect(vecError).toBeInstanceOf(FormatError)

    const [tagError] = probeSize(shape, Uint8Array.from([3]))
    expect(tagError).toBeInstanceOf(FormatError)
  })
})

describe('Slicing encoded values', () => {
  it('should split the next value off without decoding it', () => {
    const sliced = assertSafe(
      sliceEncoded(option(u32), Uint8Array.from([1, 1, 0, 0, 0, 0xaa])),
    )
    expect(sliced.value).toEqual(Uint8Array.from([1, 1, 0, 0, 0]))
    expect(sliced.remaining).toEqual(Uint8Array.from([0xaa]))
    expect(sliced.consumed).toBe(5)
  })
})
