/**
 * Struct and Tuple Serialization
 *
 * encode(a, b, ...) ≡ encode(a) ∥ encode(b) ∥ ...
 *
 * A struct is an ordered list of named fields, a tuple an ordered list of
 * positional ones. Neither carries a count or a tag; names exist only on the
 * host side. Field order is the key order of the object the struct was
 * declared with.
 */

import { concatBytes } from '@keelson/core'
import type { AnyCodec, Codec, DecodingResult, Safe } from '@keelson/types'
import {
  FormatError,
  SchemaError,
  safeError,
  safeResult,
  ValueError,
} from '@keelson/types'
import { probeElements } from './size-probe'
import { describeValue, isRecord } from './stream'

export type FieldCodecs<T> = { [K in keyof T]: Codec<T[K]> }

// Integer-like keys are enumerated before all others, so they would not keep
// their declared position
const INDEX_LIKE_NAME = /^(0|[1-9]\d*)$/

/**
 * Reject names that cannot stand for a field in declared order, and
 * `__proto__`, which a plain object takes as its prototype
 */
export function checkFieldName(name: string, owner: string): void {
  if (name.length === 0) {
    throw new SchemaError(`Unnamed fields are not allowed in ${owner}`)
  }
  if (name === '__proto__') {
    throw new SchemaError(`Field name "__proto__" is not allowed in ${owner}`)
  }
  if (INDEX_LIKE_NAME.test(name)) {
    throw new SchemaError(
      `Field name "${name}" in ${owner} would not keep its declared position`,
    )
  }
}

function sumFixedSizes(codecs: readonly AnyCodec[]): number | undefined {
  let total: number | undefined = 0
  for (const codec of codecs) {
    total =
      total === undefined || codec.fixedSize === undefined
        ? undefined
        : total + codec.fixedSize
  }
  return total
}

export class StructCodec<T extends Record<string, unknown>>
  implements Codec<T>
{
  readonly kind = 'struct'
  readonly fixedSize: number | undefined
  readonly fieldNames: readonly string[]
  private readonly fields: ReadonlyArray<readonly [string, AnyCodec]>

  constructor(fields: FieldCodecs<T>) {
    const entries: Array<readonly [string, AnyCodec]> = []
    for (const name in fields) {
      checkFieldName(name, 'struct')
      entries.push([name, fields[name]])
    }
    this.fields = entries
    this.fieldNames = entries.map(([name]) => name)
    this.fixedSize = sumFixedSizes(entries.map(([, codec]) => codec))
  }

  encode(value: T): Safe<Uint8Array> {
    if (!isRecord(value)) {
      return safeError(
        new ValueError(`struct cannot encode ${describeValue(value)}`),
      )
    }
    const parts: Uint8Array[] = []
    for (const [name, codec] of this.fields) {
      const [error, encoded] = codec.encode(value[name])
      if (error) {
        return safeError(
          new ValueError(`Field "${name}": ${error.message}`, { cause: error }),
        )
      }
      parts.push(encoded)
    }
    return safeResult(concatBytes(parts))
  }

  decode(data: Uint8Array): Safe<DecodingResult<T>> {
    const result: Record<string, unknown> = {}
    let remaining = data
    for (const [name, codec] of this.fields) {
      const [error, decoded] = codec.decode(remaining)
      if (error) {
        return safeError(
          new FormatError(`Field "${name}": ${error.message}`, {
            cause: error,
          }),
        )
      }
      result[name] = decoded.value
      remaining = decoded.remaining
    }
    return safeResult({
      // every declared field was assigned above from its own codec
      value: result as T,
      remaining,
      consumed: data.length - remaining.length,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    return probeElements(
      this.fields.map(([, codec]) => codec),
      data,
      1,
    )
  }
}

export class TupleCodec<T extends unknown[]> implements Codec<T> {
  readonly kind = 'tuple'
  readonly fixedSize: number | undefined
  private readonly elements: readonly AnyCodec[]

  constructor(elements: FieldCodecs<T>) {
    const codecs: AnyCodec[] = []
    for (const codec of elements) {
      codecs.push(codec)
    }
    this.elements = codecs
    this.fixedSize = sumFixedSizes(codecs)
  }

  get length(): number {
    return this.elements.length
  }

  encode(value: T): Safe<Uint8Array> {
    if (!Array.isArray(value)) {
      return safeError(
        new ValueError(`tuple cannot encode ${describeValue(value)}`),
      )
    }
    if (value.length !== this.elements.length) {
      return safeError(
        new ValueError(
          `Tuple expects ${this.elements.length} elements, got ${value.length}`,
        ),
      )
    }
    const parts: Uint8Array[] = []
    for (let i = 0; i < this.elements.length; i++) {
      const [error, encoded] = this.elements[i].encode(value[i])
      if (error) {
        return safeError(error)
      }
      parts.push(encoded)
    }
    return safeResult(concatBytes(parts))
  }

  decode(data: Uint8Array): Safe<DecodingResult<T>> {
    const result: unknown[] = []
    let remaining = data
    for (const codec of this.elements) {
      const [error, decoded] = codec.decode(remaining)
      if (error) {
        return safeError(error)
      }
      result.push(decoded.value)
      remaining = decoded.remaining
    }
    return safeResult({
      // one element per declared position, in order
      value: result as T,
      remaining,
      consumed: data.length - remaining.length,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    return probeElements(this.elements, data, 1)
  }
}

export function struct<T extends Record<string, unknown>>(
  fields: FieldCodecs<T>,
): StructCodec<T> {
  return new StructCodec(fields)
}

export function tuple<T extends unknown[]>(
  elements: FieldCodecs<T>,
): TupleCodec<T> {
  return new TupleCodec(elements)
}
