/**
 * Buffer utilities
 *
 * Byte manipulation helpers shared by the codecs
 */

import { bytesToHex, type Hex, hexToBytes, isHex } from 'viem'

/**
 * Concatenate multiple byte arrays into a fresh one
 */
export function concatBytes(bytes: Uint8Array[]): Uint8Array {
  const totalLength = bytes.reduce((acc, curr) => acc + curr.length, 0)
  const result = new Uint8Array(totalLength)
  let offset = 0
  for (const byte of bytes) {
    result.set(byte, offset)
    offset += byte.length
  }
  return result
}

/**
 * Lexicographic byte comparison; a proper prefix sorts first
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  return Buffer.compare(a, b)
}

/**
 * Check if two byte arrays hold the same content
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0
}

/**
 * Little-endian view of an unsigned integer of `length` bytes
 */
export function writeUintLE(value: bigint, length: number): Uint8Array {
  const result = new Uint8Array(length)
  for (let i = 0; i < length; i++) {
    result[i] = Number((value >> BigInt(8 * i)) & 0xffn)
  }
  return result
}

/**
 * Read an unsigned little-endian integer from the first `length` bytes
 */
export function readUintLE(data: Uint8Array, length: number): bigint {
  let value = 0n
  for (let i = 0; i < length; i++) {
    value |= BigInt(data[i]) << BigInt(8 * i)
  }
  return value
}

export function toHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes)
}

export function fromHex(hex: string): Uint8Array | undefined {
  if (!isHex(hex, { strict: true })) {
    return undefined
  }
  return hexToBytes(hex)
}

export type { Hex }
