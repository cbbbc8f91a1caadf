import { assertSafe, FormatError, SizeUndefinedError } from '@keelson/types'
import { describe, expect, it } from 'vitest'
import { string } from '../core/bytes'
import { option } from '../core/option'
import { u8 } from '../core/primitive'
import { sizeOf } from '../core/size-probe'

describe('Option encoding', () => {
  it('should tag present values with 1', () => {
    expect(assertSafe(option(u8).encode(5))).toEqual(Uint8Array.from([1, 5]))
  })

  it('should encode absent values as a single 0', () => {
    expect(assertSafe(option(u8).encode(null))).toEqual(Uint8Array.from([0]))
    expect(assertSafe(option(u8).encode(undefined))).toEqual(
      Uint8Array.from([0]),
    )
  })

  it('should decode both tags', () => {
    const none = assertSafe(option(u8).decode(Uint8Array.from([0, 9])))
    expect(none.value).toBeNull()
    expect(none.consumed).toBe(1)
    expect(none.remaining).toEqual(Uint8Array.from([9]))

    const some = assertSafe(option(u8).decode(Uint8Array.from([1, 5])))
    expect(some.value).toBe(5)
    expect(some.consumed).toBe(2)
  })

  it('should round-trip nested options', () => {
    const codec = option(option(string))
    expect(assertSafe(codec.encode('x'))).toEqual(
      Uint8Array.from([1, 1, 1, 0, 0, 0, 0x78]),
    )
    expect(assertSafe(codec.decode(Uint8Array.from([1, 0]))).value).toBeNull()
  })

  it('should reject tags other than 0 and 1', () => {
    const [error] = option(u8).decode(Uint8Array.from([2, 5]))
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe('Invalid option tag: 2')
  })

  it('should fail when the tag promises a missing value', () => {
    const [error] = option(u8).decode(Uint8Array.from([1]))
    expect(error).toBeInstanceOf(FormatError)
  })

  it('should have no static size', () => {
    const [error] = sizeOf(option(u8))
    expect(error).toBeInstanceOf(SizeUndefinedError)
  })
})
