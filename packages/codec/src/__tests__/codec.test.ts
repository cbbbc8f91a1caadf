/**
 * Codec Tests
 *
 * Whole-payload entry points and configuration loading
 */

import { logger } from '@keelson/core'
import {
  assertSafe,
  DEFAULT_CODEC_CONFIG,
  FormatError,
  ValueError,
} from '@keelson/types'
import { beforeAll, describe, expect, it } from 'vitest'
import { decode, encode } from '../codec'
import { loadCodecConfig } from '../config'
import { string } from '../core/bytes'
import { u8, u32 } from '../core/primitive'

beforeAll(() => {
  logger.init()
})

describe('Entry points', () => {
  it('should encode and decode whole payloads', () => {
    const encoded = assertSafe(encode(u32, 0xdeadbeef))
    expect(encoded).toEqual(Uint8Array.from([0xef, 0xbe, 0xad, 0xde]))
    expect(assertSafe(decode(u32, encoded))).toBe(0xdeadbeef)
  })

  it('should pass codec errors through', () => {
    const [error] = encode(u8, 300)
    expect(error).toBeInstanceOf(ValueError)
    expect(error?.message).toBe('u8 value 300 out of range [0, 255]')
  })

  it('should accept trailing bytes by default', () => {
    expect(assertSafe(decode(u8, Uint8Array.from([7, 8, 9])))).toBe(7)
  })

  it('should reject trailing bytes when configured', () => {
    const [error] = decode(u8, Uint8Array.from([7, 8, 9]), {
      allowTrailingBytes: false,
    })
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe('2 trailing bytes after decoded value')
  })

  it('should enforce the maximum data size', () => {
    const [encodeError] = encode(string, 'abcdef', { maxDataSize: 5 })
    expect(encodeError).toBeInstanceOf(ValueError)
    expect(encodeError?.message).toBe('Encoded size 10 exceeds maximum 5')

    const [decodeError] = decode(string, new Uint8Array(8), { maxDataSize: 5 })
    expect(decodeError).toBeInstanceOf(FormatError)
    expect(decodeError?.message).toBe('Input size 8 exceeds maximum 5')
  })
})

describe('Configuration', () => {
  it('should fall back to defaults', () => {
    expect(loadCodecConfig({ env: {} })).toEqual(DEFAULT_CODEC_CONFIG)
  })

  it('should read the environment', () => {
    const config = loadCodecConfig({
      env: {
        KEELSON_MAX_DATA_SIZE: '1024',
        KEELSON_ALLOW_TRAILING_BYTES: 'false',
      },
    })
    expect(config).toEqual({ maxDataSize: 1024, allowTrailingBytes: false })
  })

  it('should let overrides win over the environment', () => {
    const config = loadCodecConfig({
      env: { KEELSON_MAX_DATA_SIZE: '1024' },
      overrides: { maxDataSize: 64 },
    })
    expect(config).toEqual({ maxDataSize: 64, allowTrailingBytes: true })
  })

  it('should reject malformed values', () => {
    expect(() =>
      loadCodecConfig({ env: { KEELSON_ALLOW_TRAILING_BYTES: 'maybe' } }),
    ).toThrow()
    expect(() =>
      loadCodecConfig({ env: { KEELSON_MAX_DATA_SIZE: '-1' } }),
    ).toThrow()
  })
})
