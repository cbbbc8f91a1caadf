/**
 * Tagged Union (Enum) Serialization
 *
 * enum(v) ≡ ⟨index(v)⟩ ∥ payload(v)
 *
 * The discriminant is one byte holding the variant's 0-based position in
 * declaration order. A payload is one of:
 * - unit: nothing
 * - tuple: positional fields back-to-back, no count
 * - named: named fields back-to-back in declared order, names never on
 *   the wire
 *
 * Host values are `{ kind }` for unit variants, `{ kind, tupleData }` for
 * tuple variants and `{ kind, ...fields }` for named variants. `kind` and
 * `tupleData` are therefore reserved, as is any name starting with `_`.
 */

import { logger } from '@keelson/core'
import type { AnyCodec, Codec, DecodingResult, Safe } from '@keelson/types'
import {
  FormatError,
  SchemaError,
  safeError,
  safeResult,
  ValueError,
} from '@keelson/types'
import { probeFixed } from './size-probe'
import { describeValue, isRecord, takeBytes } from './stream'
import type { FieldCodecs } from './struct'
import { checkFieldName, StructCodec, TupleCodec } from './struct'

export const VARIANT_KIND_KEY = 'kind'
export const TUPLE_DATA_KEY = 'tupleData'
export const RESERVED_NAME_PREFIX = '_'
export const MAX_VARIANTS = 256

const RESERVED_NAMES: readonly string[] = [VARIANT_KIND_KEY, TUPLE_DATA_KEY]

export interface UnitVariant {
  readonly shape: 'unit'
}

export interface TupleVariant<T extends unknown[]> {
  readonly shape: 'tuple'
  readonly codec: TupleCodec<T>
}

export interface NamedVariant<T extends Record<string, unknown>> {
  readonly shape: 'named'
  readonly codec: StructCodec<T>
}

export type VariantShape =
  | UnitVariant
  | TupleVariant<unknown[]>
  | NamedVariant<Record<string, unknown>>

export type VariantShapes = Record<string, VariantShape>

type VariantValue<N extends string, S> =
  S extends TupleVariant<infer T>
    ? { kind: N; tupleData: T }
    : S extends NamedVariant<infer T>
      ? { kind: N } & T
      : { kind: N }

/**
 * Host value of an enum declared with `V`: one member per variant
 */
export type EnumValue<V extends VariantShapes> = {
  [N in keyof V & string]: VariantValue<N, V[N]>
}[keyof V & string]

export interface VariantInfo {
  readonly index: number
  readonly name: string
  readonly shape: VariantShape
}

export function unitVariant(): UnitVariant {
  return { shape: 'unit' }
}

export function tupleVariant<T extends unknown[]>(
  fields: FieldCodecs<T>,
): TupleVariant<T> {
  return { shape: 'tuple', codec: new TupleCodec(fields) }
}

export function namedVariant<T extends Record<string, unknown>>(
  fields: FieldCodecs<T>,
): NamedVariant<T> {
  return { shape: 'named', codec: new StructCodec(fields) }
}

/**
 * Reject variant and variant-field names that collide with the host value
 * layout
 */
export function checkVariantName(name: string, owner: string): void {
  checkFieldName(name, owner)
  if (RESERVED_NAMES.includes(name)) {
    throw new SchemaError(`The name "${name}" is reserved in ${owner}`)
  }
  if (name.startsWith(RESERVED_NAME_PREFIX)) {
    throw new SchemaError(
      `Names in ${owner} cannot start with "${RESERVED_NAME_PREFIX}": "${name}"`,
    )
  }
}

function payloadCodec(shape: VariantShape): AnyCodec | undefined {
  switch (shape.shape) {
    case 'unit':
      return undefined
    case 'tuple':
    case 'named':
      return shape.codec
    default: {
      const exhaustive: never = shape
      throw new SchemaError(`Unrecognized variant shape: ${exhaustive}`)
    }
  }
}

export class EnumCodec<V extends VariantShapes> implements Codec<EnumValue<V>> {
  readonly kind = 'enum'
  readonly fixedSize = undefined
  readonly variants: readonly VariantInfo[]
  private readonly byName: ReadonlyMap<string, VariantInfo>

  constructor(shapes: V) {
    const variants: VariantInfo[] = []
    for (const name in shapes) {
      checkVariantName(name, 'enum')
      const shape: VariantShape = shapes[name]
      if (shape.shape === 'named') {
        for (const field of shape.codec.fieldNames) {
          checkVariantName(field, `enum variant "${name}"`)
        }
      }
      variants.push({ index: variants.length, name, shape })
    }
    if (variants.length === 0) {
      throw new SchemaError('An enum needs at least one variant')
    }
    if (variants.length > MAX_VARIANTS) {
      throw new SchemaError(
        `An enum holds at most ${MAX_VARIANTS} variants, got ${variants.length}`,
      )
    }

    this.variants = variants
    this.byName = new Map(variants.map((v) => [v.name, v]))

    logger.debug('Enum codec built', {
      variants: variants.map((v) => `${v.index}:${v.name}:${v.shape.shape}`),
    })
  }

  /**
   * Variant declared under `name`, if any
   */
  variant(name: string): VariantInfo | undefined {
    return this.byName.get(name)
  }

  encode(value: EnumValue<V>): Safe<Uint8Array> {
    const host: unknown = value
    if (!isRecord(host)) {
      return safeError(
        new ValueError(`enum cannot encode ${describeValue(host)}`),
      )
    }
    const name = host[VARIANT_KIND_KEY]
    const info = typeof name === 'string' ? this.byName.get(name) : undefined
    if (info === undefined) {
      return safeError(
        new ValueError(`No declared variant for kind ${describeValue(name)}`),
      )
    }

    const codec = payloadCodec(info.shape)
    if (codec === undefined) {
      return safeResult(Uint8Array.of(info.index))
    }
    const payload =
      info.shape.shape === 'tuple' ? host[TUPLE_DATA_KEY] : host
    const [error, encoded] = codec.encode(payload)
    if (error) {
      return safeError(
        new ValueError(`Variant "${info.name}": ${error.message}`, {
          cause: error,
        }),
      )
    }
    const result = new Uint8Array(1 + encoded.length)
    result[0] = info.index
    result.set(encoded, 1)
    return safeResult(result)
  }

  decode(data: Uint8Array): Safe<DecodingResult<EnumValue<V>>> {
    const [tagError, tag] = this.readDiscriminant(data)
    if (tagError) {
      return safeError(tagError)
    }
    const info = tag.value
    const codec = payloadCodec(info.shape)
    if (codec === undefined) {
      return safeResult({
        value: this.toHost(info, undefined),
        remaining: tag.remaining,
        consumed: 1,
      })
    }
    const [error, payload] = codec.decode(tag.remaining)
    if (error) {
      return safeError(
        new FormatError(`Variant "${info.name}": ${error.message}`, {
          cause: error,
        }),
      )
    }
    return safeResult({
      value: this.toHost(info, payload.value),
      remaining: payload.remaining,
      consumed: 1 + payload.consumed,
    })
  }

  probe(data: Uint8Array): Safe<number> {
    const [tagError, tag] = this.readDiscriminant(data)
    if (tagError) {
      return safeError(tagError)
    }
    const codec = payloadCodec(tag.value.shape)
    if (codec === undefined) {
      return probeFixed(data, 1, 'enum')
    }
    const [error, size] = codec.probe(tag.remaining)
    if (error) {
      return safeError(error)
    }
    return safeResult(1 + size)
  }

  private readDiscriminant(data: Uint8Array): Safe<DecodingResult<VariantInfo>> {
    const [error, taken] = takeBytes(data, 1, 'enum discriminant')
    if (error) {
      return safeError(error)
    }
    const index = taken.value[0]
    const info = this.variants[index]
    if (info === undefined) {
      return safeError(
        new FormatError(
          `Enum discriminant ${index} out of range (${this.variants.length} variants)`,
        ),
      )
    }
    return safeResult({ ...taken, value: info })
  }

  private toHost(info: VariantInfo, payload: unknown): EnumValue<V> {
    const host: Record<string, unknown> = { [VARIANT_KIND_KEY]: info.name }
    if (info.shape.shape === 'tuple') {
      host[TUPLE_DATA_KEY] = payload
    } else if (info.shape.shape === 'named' && isRecord(payload)) {
      Object.assign(host, payload)
    }
    // the variant registry guarantees payload matches the variant's shape
    return host as EnumValue<V>
  }
}

/**
 * Declare an enum; variant indices follow the key order of `variants`
 */
export function taggedUnion<V extends VariantShapes>(variants: V): EnumCodec<V> {
  return new EnumCodec(variants)
}
