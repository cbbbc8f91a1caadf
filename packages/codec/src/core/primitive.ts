/**
 * Fixed-Width Scalar Serialization
 *
 * Integers are little-endian two's complement of 1, 2, 4, 8 or 16 bytes.
 * 8/16/32-bit values travel as `number`, 64/128-bit values as `bigint`.
 *
 * encode[l](x) ≡ ⟨x mod 256⟩ ∥ encode[l-1](⌊x/256⌋), encode[0](x) ≡ ⟨⟩
 *
 * Booleans occupy one byte restricted to {0, 1}. Floats are IEEE-754
 * little-endian and NaN is rejected in both directions.
 */

import { readUintLE, writeUintLE } from '@keelson/core'
import type {
  Codec,
  DecodingResult,
  FloatByteLength,
  IntegerByteLength,
  Safe,
} from '@keelson/types'
import {
  FormatError,
  safeError,
  safeResult,
  ValueError,
} from '@keelson/types'
import { probeFixed } from './size-probe'
import { describeValue, takeBytes } from './stream'

/**
 * Integer codec over a fixed byte width
 *
 * Range checks and the two's complement mapping happen on `bigint`;
 * subclasses only convert between the host representation and `bigint`.
 */
abstract class IntegerCodec<T extends number | bigint> implements Codec<T> {
  readonly kind = 'int'
  readonly fixedSize: number
  readonly min: bigint
  readonly max: bigint
  private readonly bits: number

  constructor(
    readonly name: string,
    byteLength: IntegerByteLength,
    readonly signed: boolean,
  ) {
    this.fixedSize = byteLength
    this.bits = byteLength * 8
    const bits = BigInt(this.bits)
    this.min = signed ? -(2n ** (bits - 1n)) : 0n
    this.max = signed ? 2n ** (bits - 1n) - 1n : 2n ** bits - 1n
  }

  protected abstract toBigInt(value: unknown): bigint | undefined

  protected abstract fromBigInt(value: bigint): T

  encode(value: T): Safe<Uint8Array> {
    const big = this.toBigInt(value)
    if (big === undefined) {
      return safeError(
        new ValueError(`${this.name} cannot encode ${describeValue(value)}`),
      )
    }
    if (big < this.min || big > this.max) {
      return safeError(
        new ValueError(
          `${this.name} value ${big} out of range [${this.min}, ${this.max}]`,
        ),
      )
    }
    return safeResult(
      writeUintLE(BigInt.asUintN(this.bits, big), this.fixedSize),
    )
  }

  decode(data: Uint8Array): Safe<DecodingResult<T>> {
    const [error, taken] = takeBytes(data, this.fixedSize, this.name)
    if (error) {
      return safeError(error)
    }
    const raw = readUintLE(taken.value, this.fixedSize)
    return safeResult({
      value: this.fromBigInt(this.signed ? BigInt.asIntN(this.bits, raw) : raw),
      remaining: taken.remaining,
      consumed: taken.consumed,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    return probeFixed(data, this.fixedSize, this.name)
  }
}

export class NumberIntegerCodec extends IntegerCodec<number> {
  protected toBigInt(value: unknown): bigint | undefined {
    return typeof value === 'number' && Number.isInteger(value)
      ? BigInt(value)
      : undefined
  }

  protected fromBigInt(value: bigint): number {
    return Number(value)
  }
}

export class BigIntegerCodec extends IntegerCodec<bigint> {
  protected toBigInt(value: unknown): bigint | undefined {
    return typeof value === 'bigint' ? value : undefined
  }

  protected fromBigInt(value: bigint): bigint {
    return value
  }
}

export const u8 = new NumberIntegerCodec('u8', 1, false)
export const i8 = new NumberIntegerCodec('i8', 1, true)
export const u16 = new NumberIntegerCodec('u16', 2, false)
export const i16 = new NumberIntegerCodec('i16', 2, true)
export const u32 = new NumberIntegerCodec('u32', 4, false)
export const i32 = new NumberIntegerCodec('i32', 4, true)
export const u64 = new BigIntegerCodec('u64', 8, false)
export const i64 = new BigIntegerCodec('i64', 8, true)
export const u128 = new BigIntegerCodec('u128', 16, false)
export const i128 = new BigIntegerCodec('i128', 16, true)

export class BoolCodec implements Codec<boolean> {
  readonly kind = 'bool'
  readonly fixedSize = 1

  encode(value: boolean): Safe<Uint8Array> {
    if (typeof value !== 'boolean') {
      return safeError(
        new ValueError(`bool cannot encode ${describeValue(value)}`),
      )
    }
    return safeResult(Uint8Array.of(value ? 1 : 0))
  }

  decode(data: Uint8Array): Safe<DecodingResult<boolean>> {
    const [error, taken] = takeBytes(data, 1, 'bool')
    if (error) {
      return safeError(error)
    }
    const byte = taken.value[0]
    if (byte !== 0 && byte !== 1) {
      return safeError(new FormatError(`Invalid bool byte: ${byte}`))
    }
    return safeResult({
      value: byte === 1,
      remaining: taken.remaining,
      consumed: 1,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    return probeFixed(data, 1, 'bool')
  }
}

export const bool = new BoolCodec()

/**
 * IEEE-754 little-endian float that forbids NaN
 */
export class FloatCodec implements Codec<number> {
  readonly kind = 'float'

  constructor(
    readonly name: string,
    readonly fixedSize: FloatByteLength,
  ) {}

  encode(value: number): Safe<Uint8Array> {
    if (typeof value !== 'number') {
      return safeError(
        new ValueError(`${this.name} cannot encode ${describeValue(value)}`),
      )
    }
    if (Number.isNaN(value)) {
      return safeError(new ValueError(`${this.name} does not support NaN`))
    }
    // Finite values past the f32 range would round to an infinity
    if (
      this.fixedSize === 4 &&
      Number.isFinite(value) &&
      !Number.isFinite(Math.fround(value))
    ) {
      return safeError(
        new ValueError(`${this.name} value ${value} out of range`),
      )
    }
    const result = new Uint8Array(this.fixedSize)
    const view = new DataView(result.buffer)
    if (this.fixedSize === 4) {
      view.setFloat32(0, value, true)
    } else {
      view.setFloat64(0, value, true)
    }
    return safeResult(result)
  }

  decode(data: Uint8Array): Safe<DecodingResult<number>> {
    const [error, taken] = takeBytes(data, this.fixedSize, this.name)
    if (error) {
      return safeError(error)
    }
    const view = new DataView(
      taken.value.buffer,
      taken.value.byteOffset,
      this.fixedSize,
    )
    const value =
      this.fixedSize === 4 ? view.getFloat32(0, true) : view.getFloat64(0, true)
    if (Number.isNaN(value)) {
      return safeError(new FormatError(`${this.name} does not support NaN`))
    }
    return safeResult({
      value,
      remaining: taken.remaining,
      consumed: this.fixedSize,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    return probeFixed(data, this.fixedSize, this.name)
  }
}

export const f32 = new FloatCodec('f32', 4)
export const f64 = new FloatCodec('f64', 8)
