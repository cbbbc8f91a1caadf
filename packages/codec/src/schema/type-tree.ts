/**
 * Type-Tree Schema Builder
 *
 * Turns the static type tree an interface-description loader produces into
 * a codec. The tree is validated with zod before anything is built; every
 * structural problem surfaces as a SchemaError.
 *
 * Example:
 *   buildCodec({ defined: 'Point' }, [
 *     { name: 'Point', type: { kind: 'struct', fields: [
 *       { name: 'x', type: 'i32' }, { name: 'y', type: 'i32' } ] } },
 *   ])
 */

import { logger } from '@keelson/core'
import type { AnyCodec, Safe } from '@keelson/types'
import { SchemaError, safeError, safeResult } from '@keelson/types'
import * as _ from 'radash'
import { z } from 'zod'
import { bytes, publicKey, string } from '../core/bytes'
import { hashMap, hashSet } from '../core/collection'
import { option } from '../core/option'
import {
  bool,
  f32,
  f64,
  i8,
  i16,
  i32,
  i64,
  i128,
  u8,
  u16,
  u32,
  u64,
  u128,
} from '../core/primitive'
import { array, vec } from '../core/sequence'
import { checkFieldName, StructCodec, TupleCodec } from '../core/struct'
import type { VariantShape } from '../core/union'
import { EnumCodec } from '../core/union'

const PRIMITIVE_CODECS = {
  bool,
  u8,
  i8,
  u16,
  i16,
  u32,
  i32,
  u64,
  i64,
  u128,
  i128,
  f32,
  f64,
  bytes,
  string,
  publicKey,
} satisfies Record<string, AnyCodec>

export type PrimitiveTypeName = keyof typeof PRIMITIVE_CODECS

const PRIMITIVE_NAMES = [
  'bool',
  'u8',
  'i8',
  'u16',
  'i16',
  'u32',
  'i32',
  'u64',
  'i64',
  'u128',
  'i128',
  'f32',
  'f64',
  'bytes',
  'string',
  'publicKey',
] as const satisfies readonly PrimitiveTypeName[]

export type TypeDescriptor =
  | PrimitiveTypeName
  | { vec: TypeDescriptor }
  | { array: [TypeDescriptor, number] }
  | { option: TypeDescriptor }
  | { hashMap: [TypeDescriptor, TypeDescriptor] }
  | { hashSet: TypeDescriptor }
  | { tuple: TypeDescriptor[] }
  | { defined: string }

export interface FieldDescriptor {
  name: string
  type: TypeDescriptor
}

export interface VariantDescriptor {
  name: string
  /** Named fields, bare types (positional tuple) or nothing (unit) */
  fields?: Array<FieldDescriptor | TypeDescriptor>
}

export type TypeDefinition =
  | { name: string; type: { kind: 'struct'; fields: FieldDescriptor[] } }
  | { name: string; type: { kind: 'enum'; variants: VariantDescriptor[] } }

export const typeDescriptorSchema: z.ZodType<TypeDescriptor> = z.lazy(() =>
  z.union([
    z.enum(PRIMITIVE_NAMES),
    z.object({ vec: typeDescriptorSchema }).strict(),
    z
      .object({
        array: z.tuple([typeDescriptorSchema, z.number().int().nonnegative()]),
      })
      .strict(),
    z.object({ option: typeDescriptorSchema }).strict(),
    z
      .object({ hashMap: z.tuple([typeDescriptorSchema, typeDescriptorSchema]) })
      .strict(),
    z.object({ hashSet: typeDescriptorSchema }).strict(),
    z.object({ tuple: z.array(typeDescriptorSchema) }).strict(),
    z.object({ defined: z.string().min(1) }).strict(),
  ]),
)

export const fieldDescriptorSchema: z.ZodType<FieldDescriptor> = z
  .object({ name: z.string(), type: typeDescriptorSchema })
  .strict()

export const typeDefinitionSchema: z.ZodType<TypeDefinition> = z.union([
  z
    .object({
      name: z.string().min(1),
      type: z
        .object({
          kind: z.literal('struct'),
          fields: z.array(fieldDescriptorSchema),
        })
        .strict(),
    })
    .strict(),
  z
    .object({
      name: z.string().min(1),
      type: z
        .object({
          kind: z.literal('enum'),
          variants: z.array(
            z
              .object({
                name: z.string(),
                fields: z
                  .array(z.union([fieldDescriptorSchema, typeDescriptorSchema]))
                  .optional(),
              })
              .strict(),
          ),
        })
        .strict(),
    })
    .strict(),
])

function isFieldDescriptor(
  field: FieldDescriptor | TypeDescriptor,
): field is FieldDescriptor {
  return typeof field === 'object' && 'name' in field && 'type' in field
}

function checkUnique(names: readonly string[], owner: string): void {
  const seen = new Set<string>()
  for (const name of names) {
    if (seen.has(name)) {
      throw new SchemaError(`Duplicate name "${name}" in ${owner}`)
    }
    seen.add(name)
  }
}

/**
 * Builds codecs for one type tree, memoising defined types and rejecting
 * recursive definitions
 */
class TypeTreeBuilder {
  private readonly definitions: ReadonlyMap<string, TypeDefinition>
  private readonly built = new Map<string, AnyCodec>()
  private readonly inProgress = new Set<string>()

  constructor(definitions: readonly TypeDefinition[]) {
    checkUnique(
      definitions.map((d) => d.name),
      'type definitions',
    )
    this.definitions = new Map(definitions.map((d) => [d.name, d]))
  }

  build(type: TypeDescriptor): AnyCodec {
    if (typeof type === 'string') {
      return PRIMITIVE_CODECS[type]
    }
    if ('vec' in type) {
      return vec(this.build(type.vec))
    }
    if ('array' in type) {
      return array(this.build(type.array[0]), type.array[1])
    }
    if ('option' in type) {
      return option(this.build(type.option))
    }
    if ('hashMap' in type) {
      return hashMap(this.build(type.hashMap[0]), this.build(type.hashMap[1]))
    }
    if ('hashSet' in type) {
      return hashSet(this.build(type.hashSet))
    }
    if ('tuple' in type) {
      return new TupleCodec(type.tuple.map((t) => this.build(t)))
    }
    return this.buildDefined(type.defined)
  }

  private buildDefined(name: string): AnyCodec {
    const cached = this.built.get(name)
    if (cached) {
      return cached
    }
    const definition = this.definitions.get(name)
    if (!definition) {
      throw new SchemaError(`Unknown defined type "${name}"`)
    }
    if (this.inProgress.has(name)) {
      throw new SchemaError(`Recursive defined type "${name}"`)
    }

    this.inProgress.add(name)
    const codec =
      definition.type.kind === 'struct'
        ? this.buildStruct(name, definition.type.fields)
        : this.buildEnum(name, definition.type.variants)
    this.inProgress.delete(name)
    this.built.set(name, codec)
    return codec
  }

  private buildFields(
    fields: readonly FieldDescriptor[],
    owner: string,
  ): Record<string, AnyCodec> {
    checkUnique(
      fields.map((f) => f.name),
      owner,
    )
    const codecs: Record<string, AnyCodec> = {}
    for (const field of fields) {
      checkFieldName(field.name, owner)
      codecs[field.name] = this.build(field.type)
    }
    return codecs
  }

  private buildStruct(
    name: string,
    fields: readonly FieldDescriptor[],
  ): AnyCodec {
    return new StructCodec(this.buildFields(fields, `struct "${name}"`))
  }

  private buildEnum(
    name: string,
    variants: readonly VariantDescriptor[],
  ): AnyCodec {
    checkUnique(
      variants.map((v) => v.name),
      `enum "${name}"`,
    )
    const shapes: Record<string, VariantShape> = {}
    for (const variant of variants) {
      shapes[variant.name] = this.buildVariant(name, variant)
    }
    return new EnumCodec(shapes)
  }

  private buildVariant(
    enumName: string,
    variant: VariantDescriptor,
  ): VariantShape {
    const owner = `enum "${enumName}" variant "${variant.name}"`
    const fields = variant.fields ?? []
    if (fields.length === 0) {
      return { shape: 'unit' }
    }

    const named = fields.filter(isFieldDescriptor)
    if (named.length === fields.length) {
      return {
        shape: 'named',
        codec: new StructCodec(this.buildFields(named, owner)),
      }
    }
    if (named.length > 0) {
      throw new SchemaError(`Unnamed fields are not allowed in ${owner}`)
    }

    const positional: TypeDescriptor[] = []
    for (const field of fields) {
      if (!isFieldDescriptor(field)) {
        positional.push(field)
      }
    }
    return {
      shape: 'tuple',
      codec: new TupleCodec(positional.map((t) => this.build(t))),
    }
  }
}

/**
 * Build a codec from a type tree and the defined types it may reference
 */
export function buildCodec(
  type: unknown,
  definitions: unknown = [],
): Safe<AnyCodec, SchemaError> {
  const parsedType = typeDescriptorSchema.safeParse(type)
  if (!parsedType.success) {
    return safeError(
      new SchemaError(`Invalid type descriptor: ${parsedType.error.message}`, {
        cause: parsedType.error,
      }),
    )
  }
  const parsedDefinitions = z.array(typeDefinitionSchema).safeParse(definitions)
  if (!parsedDefinitions.success) {
    return safeError(
      new SchemaError(
        `Invalid type definitions: ${parsedDefinitions.error.message}`,
        { cause: parsedDefinitions.error },
      ),
    )
  }

  const [error, codec] = _.try(() =>
    new TypeTreeBuilder(parsedDefinitions.data).build(parsedType.data),
  )()
  if (error) {
    return safeError(
      error instanceof SchemaError
        ? error
        : new SchemaError(error.message, { cause: error }),
    )
  }

  logger.debug('Codec built from type tree', {
    kind: codec.kind,
    definitions: parsedDefinitions.data.length,
  })
  return safeResult(codec)
}

/**
 * Build the codec of the defined type called `name`
 */
export function buildDefinedCodec(
  name: string,
  definitions: unknown,
): Safe<AnyCodec, SchemaError> {
  return buildCodec({ defined: name }, definitions)
}
