/**
 * Class metadata types
 *
 * ClassMetadata is the resolved logical-to-native mapping for one entity
 * type. It is built once per type, frozen, and shared by every converter,
 * mapper and template that touches the type.
 */

import type { DocumentValue } from './document'

/** Zero-argument entity constructor */
export type EntityClass<T extends object = object> = new () => T

/** Declared identifier value types used for coercion */
export type IdType = 'string' | 'number' | 'bigint'

/**
 * Two-way value normalisation for a single column
 *
 * @example
 * const isoDate: AttributeConverter<Date, string> = {
 *   toDocument: (d) => d.toISOString(),
 *   toEntity: (s) => new Date(s),
 * }
 */
export interface AttributeConverter<E = unknown, D extends DocumentValue = DocumentValue> {
  toDocument(value: E): D
  toEntity(value: D): E
}

/** How a column's value is laid out in the document */
export type ColumnKind = 'value' | 'embedded' | 'list'

export interface ColumnMetadata {
  /** Logical (entity property) name */
  readonly field: string
  /** Native (document field) name */
  readonly name: string
  readonly kind: ColumnKind
  /** Element entity type for embedded columns and lists of entities */
  readonly entity?: EntityClass
  readonly converter?: AttributeConverter
}

export interface IdMetadata extends ColumnMetadata {
  readonly kind: 'value'
  /** Declared value type; comparisons and stored ids are coerced to it */
  readonly type?: IdType
}

export interface ClassMetadata {
  /** Entity name (defaults to the class name) */
  readonly name: string
  /** Logical collection name (defaults to the entity name) */
  readonly collection: string
  readonly type: EntityClass
  /** Embeddable types have no id and no collection of their own */
  readonly embeddable: boolean
  readonly id?: IdMetadata
  /** Non-id columns keyed by logical name, in declaration order */
  readonly columns: ReadonlyMap<string, ColumnMetadata>
}

/**
 * Strategy turning an entity type into its ClassMetadata
 */
export interface MetadataResolver {
  resolve(type: EntityClass): ClassMetadata
}
