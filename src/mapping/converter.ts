/**
 * EntityConverter - entity ↔ document mapping
 *
 * Converts class instances to native DocumentRecords and back, guided by
 * ClassMetadata:
 *
 * - value columns: scalars copied (Dates and byte arrays are cloned)
 * - embedded columns: nested entity converted recursively into a Document
 * - list columns: element-wise conversion, order preserved
 * - null/undefined fields: omitted, so "unset" and "null" never diverge
 *
 * Column converters run in both directions; ids with a declared type are
 * coerced on the way out and on the way back in (capturing store-assigned
 * identifiers in the declared type).
 *
 * @module mapping/converter
 */

import { ErrorCode, MappingError, ValidationError } from '../errors'
import { allFields, coerceId, isEntityClass } from '../metadata'
import {
  Document,
  DocumentRecord,
  isDocumentValue,
  isScalar,
  type DocumentField,
  type DocumentValue,
  type Scalar,
} from '../types/document'
import type {
  ClassMetadata,
  ColumnMetadata,
  EntityClass,
  IdMetadata,
  MetadataResolver,
} from '../types/metadata'
import { getValueType, isNullish, isPlainRecord } from '../utils'

/**
 * Bidirectional entity/document converter
 *
 * @example
 * const converter = new EntityConverter(registry)
 * const record = converter.toDocument(person)
 * const copy = converter.toEntity(Person, record)
 */
export class EntityConverter {
  constructor(readonly resolver: MetadataResolver) {}

  /**
   * Metadata for an entity instance
   *
   * @throws MappingError for plain objects and unregistered classes
   */
  metadataOf(entity: object): ClassMetadata {
    const type = entity.constructor
    if (!isEntityClass(type) || isPlainRecord(entity)) {
      throw new MappingError(
        'Entities must be class instances; plain objects carry no metadata',
        ErrorCode.UNKNOWN_ENTITY
      )
    }
    return this.resolver.resolve(type)
  }

  /**
   * Convert an entity into its native document
   *
   * @throws ValidationError if entity is null or undefined
   * @throws MappingError if a field value cannot be reconciled with its column
   */
  toDocument(entity: object): DocumentRecord {
    if (isNullish(entity)) {
      throw new ValidationError('Cannot convert a null entity')
    }
    const metadata = this.metadataOf(entity)
    if (metadata.embeddable) {
      throw new MappingError(
        `Embeddable type '${metadata.name}' cannot be stored on its own`,
        ErrorCode.MAPPING_FAILED,
        { entity: metadata.name }
      )
    }
    return new DocumentRecord(metadata.collection, this.writeFields(entity, metadata))
  }

  /**
   * Reconstitute an entity of `type` from a stored document
   *
   * Document fields with no matching column are ignored.
   *
   * @throws MappingError if a stored value's shape contradicts its column
   */
  toEntity<T extends object>(type: EntityClass<T>, document: Document): T {
    const metadata = this.resolver.resolve(type)
    const entity = new type()

    for (const column of allFields(metadata)) {
      const stored = document.get(column.name)
      if (stored === undefined) continue
      const value = this.readValue(stored, column, metadata)
      if (!Reflect.set(entity, column.field, value)) {
        throw new MappingError(
          `Field '${column.field}' of '${metadata.name}' is not writable`,
          ErrorCode.MAPPING_FAILED,
          { entity: metadata.name, field: column.field }
        )
      }
    }

    return entity
  }

  // ===========================================================================
  // Entity -> Document
  // ===========================================================================

  private writeFields(entity: object, metadata: ClassMetadata): DocumentField[] {
    const fields: DocumentField[] = []
    for (const column of allFields(metadata)) {
      const raw: unknown = Reflect.get(entity, column.field)
      if (isNullish(raw)) continue
      fields.push({ name: column.name, value: this.writeValue(raw, column, metadata) })
    }
    return fields
  }

  private writeValue(raw: unknown, column: ColumnMetadata, owner: ClassMetadata): DocumentValue {
    if (column.converter) {
      const converted = column.converter.toDocument(raw)
      if (!isDocumentValue(converted)) {
        throw shapeError(owner, column, 'a document value from its converter', converted)
      }
      return converted
    }

    if (isIdColumn(owner, column) && column.type) {
      return convertId(raw, owner, column, `Id of '${owner.name}' cannot be stored as ${column.type}`)
    }

    switch (column.kind) {
      case 'value':
        if (!isScalar(raw)) throw shapeError(owner, column, 'a scalar', raw)
        return copyScalar(raw)

      case 'embedded':
        return this.writeEmbedded(raw, column, owner)

      case 'list': {
        if (!Array.isArray(raw)) throw shapeError(owner, column, 'a sequence', raw)
        const elements: DocumentValue[] = []
        for (const element of raw) {
          if (column.entity) {
            elements.push(this.writeEmbedded(element, column, owner))
          } else if (isScalar(element)) {
            elements.push(copyScalar(element))
          } else {
            throw shapeError(owner, column, 'a sequence of scalars', element)
          }
        }
        return elements
      }
    }
  }

  private writeEmbedded(raw: unknown, column: ColumnMetadata, owner: ClassMetadata): Document {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw) || isScalar(raw)) {
      throw shapeError(owner, column, 'an embedded entity', raw)
    }
    const metadata = this.resolver.resolve(elementType(owner, column))
    return new Document(this.writeFields(raw, metadata))
  }

  // ===========================================================================
  // Document -> Entity
  // ===========================================================================

  private readValue(stored: DocumentValue, column: ColumnMetadata, owner: ClassMetadata): unknown {
    if (column.converter) {
      return column.converter.toEntity(stored)
    }

    if (isIdColumn(owner, column) && column.type) {
      return convertId(stored, owner, column, `Stored id of '${owner.name}' cannot be read as ${column.type}`)
    }

    switch (column.kind) {
      case 'value':
        if (!isScalar(stored)) throw shapeError(owner, column, 'a scalar', stored)
        return copyScalar(stored)

      case 'embedded':
        if (!(stored instanceof Document)) throw shapeError(owner, column, 'an embedded document', stored)
        return this.toEntity(elementType(owner, column), stored)

      case 'list': {
        if (!Array.isArray(stored)) throw shapeError(owner, column, 'a sequence', stored)
        const elements: unknown[] = []
        for (const element of stored) {
          if (column.entity) {
            if (!(element instanceof Document)) throw shapeError(owner, column, 'a sequence of documents', element)
            elements.push(this.toEntity(column.entity, element))
          } else if (isScalar(element)) {
            elements.push(copyScalar(element))
          } else {
            throw shapeError(owner, column, 'a sequence of scalars', element)
          }
        }
        return elements
      }
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isIdColumn(owner: ClassMetadata, column: ColumnMetadata): column is IdMetadata {
  return owner.id === column
}

/**
 * Coerce an id to its declared type, reporting failures as shape mismatches
 */
function convertId(value: unknown, owner: ClassMetadata, column: IdMetadata, message: string): string | number | bigint {
  const type = column.type ?? 'string'
  try {
    return coerceId(value, type, column.field)
  } catch (error) {
    throw new MappingError(
      message,
      ErrorCode.SHAPE_MISMATCH,
      { entity: owner.name, field: column.field, expected: type, actual: shapeOf(value) },
      error instanceof Error ? error : undefined
    )
  }
}

function elementType(owner: ClassMetadata, column: ColumnMetadata): EntityClass {
  if (!column.entity) {
    throw new MappingError(
      `Column '${column.field}' of '${owner.name}' declares no entity type`,
      ErrorCode.MAPPING_FAILED,
      { entity: owner.name, field: column.field }
    )
  }
  return column.entity
}

function copyScalar(value: Scalar): Scalar {
  if (value instanceof Date) return new Date(value.getTime())
  if (value instanceof Uint8Array) return value.slice()
  return value
}

function shapeOf(value: unknown): string {
  return value instanceof Document ? 'document' : getValueType(value)
}

function shapeError(owner: ClassMetadata, column: ColumnMetadata, expected: string, actual: unknown): MappingError {
  const actualShape = shapeOf(actual)
  return new MappingError(
    `Field '${column.field}' of '${owner.name}' expects ${expected} but found ${actualShape}`,
    ErrorCode.SHAPE_MISMATCH,
    { entity: owner.name, field: column.field, expected, actual: actualShape }
  )
}
