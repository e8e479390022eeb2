/**
 * Entity definitions
 *
 * An EntityDefinition is the hand-written (or generated) description of an
 * entity type that the registry turns into ClassMetadata. Definitions are
 * validated with zod, both when registered explicitly and when read from a
 * class's static `entity` property.
 *
 * @example
 * registry.register(Person, {
 *   id: { field: 'id', name: 'native_id', type: 'number' },
 *   columns: {
 *     name: true,                     // same native name
 *     age: 'person_age',              // renamed
 *     address: { embedded: Address },
 *     phones: { list: true },
 *     pets: { list: Pet },
 *   },
 * })
 */

import { z } from 'zod'
import type { AttributeConverter, EntityClass } from '../types/metadata'

const entityClassSchema = z.custom<EntityClass>(
  (value) => typeof value === 'function',
  { message: 'Expected an entity class' }
)

const converterSchema = z.custom<AttributeConverter>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'toDocument') === 'function' &&
    typeof Reflect.get(value, 'toEntity') === 'function',
  { message: 'Expected an attribute converter with toDocument() and toEntity()' }
)

const nativeName = z.string().min(1)

export const columnDefinitionSchema = z
  .object({
    name: nativeName.optional(),
    embedded: entityClassSchema.optional(),
    list: z.union([z.literal(true), entityClassSchema]).optional(),
    converter: converterSchema.optional(),
  })
  .strict()
  .refine((column) => !(column.embedded && column.list), {
    message: 'A column cannot be both embedded and a list',
  })

export const idDefinitionSchema = z.union([
  nativeName,
  z
    .object({
      field: nativeName,
      name: nativeName.optional(),
      type: z.enum(['string', 'number', 'bigint']).optional(),
      converter: converterSchema.optional(),
    })
    .strict(),
])

export const entityDefinitionSchema = z
  .object({
    name: nativeName.optional(),
    collection: nativeName.optional(),
    embeddable: z.boolean().optional(),
    id: idDefinitionSchema.optional(),
    columns: z.record(z.union([z.literal(true), nativeName, columnDefinitionSchema])).default({}),
  })
  .strict()
  .superRefine((definition, ctx) => {
    if (definition.embeddable) {
      if (definition.id !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['id'], message: 'Embeddable types cannot declare an id' })
      }
      if (definition.collection !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['collection'], message: 'Embeddable types have no collection' })
      }
    } else if (definition.id === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['id'], message: 'Entity definitions require an id' })
    }
  })

/** Definition as written by the caller */
export type EntityDefinition = z.input<typeof entityDefinitionSchema>

/** Definition after validation and defaults */
export type ParsedEntityDefinition = z.output<typeof entityDefinitionSchema>

export type ColumnDefinition = z.input<typeof columnDefinitionSchema>

export type IdDefinition = z.input<typeof idDefinitionSchema>
