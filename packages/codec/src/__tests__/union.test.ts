/**
 * Tagged Union Tests
 *
 * One discriminant byte followed by the selected variant's payload
 */

import type { Codec } from '@keelson/types'
import {
  assertSafe,
  FormatError,
  SchemaError,
  SizeUndefinedError,
  ValueError,
} from '@keelson/types'
import { describe, expect, it } from 'vitest'
import { string } from '../core/bytes'
import { option } from '../core/option'
import { u8, u16 } from '../core/primitive'
import { vec } from '../core/sequence'
import { sizeOf } from '../core/size-probe'
import type { VariantShape } from '../core/union'
import {
  namedVariant,
  taggedUnion,
  tupleVariant,
  unitVariant,
} from '../core/union'

const action = taggedUnion({
  Push: tupleVariant<[number]>([u8]),
  Stop: unitVariant(),
  Move: namedVariant({ x: u16 }),
})

describe('Enum encoding', () => {
  it('should encode a unit variant as its index alone', () => {
    expect(assertSafe(action.encode({ kind: 'Stop' }))).toEqual(
      Uint8Array.from([1]),
    )
  })

  it('should follow the index with positional fields', () => {
    expect(assertSafe(action.encode({ kind: 'Push', tupleData: [9] }))).toEqual(
      Uint8Array.from([0, 9]),
    )
  })

  it('should follow the index with named fields', () => {
    expect(assertSafe(action.encode({ kind: 'Move', x: 513 }))).toEqual(
      Uint8Array.from([2, 0x01, 0x02]),
    )
  })

  it('should decode into host values by variant shape', () => {
    expect(assertSafe(action.decode(Uint8Array.from([1]))).value).toEqual({
      kind: 'Stop',
    })
    expect(assertSafe(action.decode(Uint8Array.from([0, 9]))).value).toEqual({
      kind: 'Push',
      tupleData: [9],
    })
    const move = assertSafe(action.decode(Uint8Array.from([2, 0x01, 0x02, 7])))
    expect(move.value).toEqual({ kind: 'Move', x: 513 })
    expect(move.consumed).toBe(3)
    expect(move.remaining).toEqual(Uint8Array.from([7]))
  })

  it('should number variants in declaration order', () => {
    expect(action.variants.map((v) => v.name)).toEqual(['Push', 'Stop', 'Move'])
    expect(action.variant('Move')?.index).toBe(2)
    expect(action.variant('Jump')).toBeUndefined()
  })

  it('should reject a discriminant past the last variant', () => {
    const [error] = action.decode(Uint8Array.from([3]))
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe('Enum discriminant 3 out of range (3 variants)')
  })

  it('should reject an undeclared kind', () => {
    const loose: Codec<unknown> = action
    const [error] = loose.encode({ kind: 'Jump' })
    expect(error).toBeInstanceOf(ValueError)
    expect(error?.message).toBe('No declared variant for kind "Jump"')
  })

  it('should name the variant whose payload failed', () => {
    const [error] = action.encode({ kind: 'Move', x: 70000 })
    expect(error).toBeInstanceOf(ValueError)
    expect(error?.message).toBe(
      'Variant "Move": Field "x": u16 value 70000 out of range [0, 65535]',
    )
  })

  it('should round-trip inside options and vecs', () => {
    const codec = vec(option(action))
    const value = [{ kind: 'Stop' as const }, null, { kind: 'Move' as const, x: 1 }]
    const encoded = assertSafe(codec.encode(value))
    expect(encoded).toEqual(
      Uint8Array.from([3, 0, 0, 0, 1, 1, 0, 1, 2, 1, 0]),
    )
    expect(assertSafe(codec.decode(encoded)).value).toEqual(value)
  })

  it('should carry strings in tuple payloads', () => {
    const message = taggedUnion({
      Text: tupleVariant<[string, number]>([string, u8]),
    })
    const encoded = assertSafe(
      message.encode({ kind: 'Text', tupleData: ['ok', 3] }),
    )
    expect(encoded).toEqual(Uint8Array.from([0, 2, 0, 0, 0, 0x6f, 0x6b, 3]))
    expect(assertSafe(message.decode(encoded)).value).toEqual({
      kind: 'Text',
      tupleData: ['ok', 3],
    })
  })

  it('should have no static size', () => {
    const [error] = sizeOf(taggedUnion({ A: unitVariant(), B: unitVariant() }))
    expect(error).toBeInstanceOf(SizeUndefinedError)
  })
})

describe('Enum declaration', () => {
  it('should reject reserved variant names', () => {
    expect(() => taggedUnion({ kind: unitVariant() })).toThrow(SchemaError)
    expect(() => taggedUnion({ tupleData: unitVariant() })).toThrow(SchemaError)
  })

  it('should reject names starting with an underscore', () => {
    expect(() => taggedUnion({ _hidden: unitVariant() })).toThrow(
      'Names in enum cannot start with "_": "_hidden"',
    )
  })

  it('should reject reserved names in named variant fields', () => {
    expect(() =>
      taggedUnion({ A: namedVariant({ kind: u8 }) }),
    ).toThrow('The name "kind" is reserved in enum variant "A"')
    expect(() => taggedUnion({ A: namedVariant({ _x: u8 }) })).toThrow(
      SchemaError,
    )
  })

  it('should require at least one variant', () => {
    expect(() => taggedUnion({})).toThrow('An enum needs at least one variant')
  })

  it('should hold at most 256 variants', () => {
    const variants: Record<string, VariantShape> = {}
    for (let i = 0; i < 256; i++) {
      variants[`V${i}`] = unitVariant()
    }
    const widest = taggedUnion(variants)
    expect(assertSafe(widest.encode({ kind: 'V255' }))).toEqual(
      Uint8Array.from([255]),
    )

    variants.V256 = unitVariant()
    expect(() => taggedUnion(variants)).toThrow(
      'An enum holds at most 256 variants, got 257',
    )
  })
})
