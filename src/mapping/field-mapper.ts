/**
 * FieldMapper - logical → native field resolution
 *
 * Resolution precedence for each path segment:
 * 1. the column's declared native name
 * 2. the id convention (declared id name, else the registry default)
 * 3. the logical name itself
 *
 * Unknown logical names are rejected.
 *
 * @module mapping/field-mapper
 */

import { ErrorCode, MappingError } from '../errors'
import { coerceId, findField } from '../metadata'
import type {
  ClassMetadata,
  ColumnMetadata,
  EntityClass,
  MetadataResolver,
} from '../types/metadata'

/** Outcome of resolving a logical path */
export interface ResolvedField {
  /** Native dotted path */
  readonly path: string
  /** Metadata of the last segment */
  readonly column: ColumnMetadata
  /** Entity that declares the last segment */
  readonly owner: ClassMetadata
  /** Whether the last segment is its owner's id */
  readonly isId: boolean
}

/**
 * Metadata-driven field resolver
 *
 * @example
 * const mapper = new FieldMapper(registry)
 * mapper.resolve(Person, 'id') // 'native_id'
 * mapper.resolve(Person, 'address.city') // 'address.city_name'
 */
export class FieldMapper {
  constructor(readonly resolver: MetadataResolver) {}

  /**
   * Native path for a logical path
   *
   * @throws MappingError when any segment is not mapped
   */
  resolve(type: EntityClass, logicalPath: string): string {
    return this.resolveField(type, logicalPath).path
  }

  /**
   * Resolve a logical path, keeping the metadata needed to normalise values
   */
  resolveField(type: EntityClass, logicalPath: string): ResolvedField {
    const segments = logicalPath.split('.')
    let owner = this.resolver.resolve(type)
    const native: string[] = []

    for (const [index, segment] of segments.entries()) {
      const column = findField(owner, segment)
      if (!column) {
        throw new MappingError(
          `Unknown field '${segment}' for entity '${owner.name}'`,
          ErrorCode.UNKNOWN_FIELD,
          { entity: owner.name, field: logicalPath }
        )
      }
      native.push(column.name)

      if (index === segments.length - 1) {
        return { path: native.join('.'), column, owner, isId: owner.id === column }
      }

      if (!column.entity) {
        throw new MappingError(
          `Field '${segment}' of '${owner.name}' has no nested fields`,
          ErrorCode.UNKNOWN_FIELD,
          { entity: owner.name, field: logicalPath }
        )
      }
      owner = this.resolver.resolve(column.entity)
    }

    throw new MappingError('Field path must not be empty', ErrorCode.UNKNOWN_FIELD, { field: logicalPath })
  }

  /**
   * Logical and native names of a type's id field
   *
   * @throws MappingError for embeddable types, which have no id
   */
  idField(type: EntityClass): { field: string; name: string } {
    const metadata = this.resolver.resolve(type)
    if (!metadata.id) {
      throw new MappingError(
        `Entity '${metadata.name}' declares no id`,
        ErrorCode.MAPPING_FAILED,
        { entity: metadata.name }
      )
    }
    return { field: metadata.id.field, name: metadata.id.name }
  }

  /**
   * Apply the column's declared normalisation to a comparison value:
   * the column converter if any, else id coercion when the id declares a type
   *
   * @throws ValidationError when an id value cannot be coerced
   */
  normalize(resolved: ResolvedField, value: unknown): unknown {
    const { column } = resolved
    if (column.converter) {
      return column.converter.toDocument(value)
    }
    if (resolved.isId && resolved.owner.id?.type) {
      return coerceId(value, resolved.owner.id.type, resolved.owner.id.field)
    }
    return value
  }
}
