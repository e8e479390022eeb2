/**
 * Mapped query builders
 *
 * Builders seeded from entity metadata: the collection comes from the
 * type's ClassMetadata and every logical field (predicate, projection,
 * ordering) is resolved to its native name through a FieldMapper.
 * Comparison operands are normalised the way the field is stored.
 *
 * @example
 * selectFrom(Person, mapper).where('id').gte(10).build()
 * // equals select().from('Person').where('native_id').gte(10).build()
 *
 * @module query/mapped-builder
 */

import { ErrorCode, MappingError } from '../errors'
import type { FieldMapper } from '../mapping'
import type { EntityClass } from '../types/metadata'
import type { SortDirection } from '../types/query'
import { DeleteQueryBuilder, QueryBuilder } from './builder'
import type { ConditionBuilder, Connector } from './condition'

/**
 * Select builder speaking the entity's logical field names
 */
export class MappedQueryBuilder<T extends object = object> extends QueryBuilder {
  constructor(
    readonly type: EntityClass<T>,
    readonly mapper: FieldMapper,
    fields: readonly string[] = []
  ) {
    super(fields.map((field) => mapper.resolve(type, field)))
    this.from(collectionOf(type, mapper))
  }

  override where(field: string): ConditionBuilder<this, unknown> {
    return this.mapped('where', field)
  }

  override and(field: string): ConditionBuilder<this, unknown> {
    return this.mapped('and', field)
  }

  override or(field: string): ConditionBuilder<this, unknown> {
    return this.mapped('or', field)
  }

  override orderBy(field: string, direction: SortDirection = 'asc'): this {
    return super.orderBy(this.mapper.resolve(this.type, field), direction)
  }

  override clone(): MappedQueryBuilder<T> {
    return this.copyTo(new MappedQueryBuilder(this.type, this.mapper))
  }

  private mapped(connector: Connector, field: string): ConditionBuilder<this, unknown> {
    const resolved = this.mapper.resolveField(this.type, field)
    return this.startCondition<unknown>(connector, resolved.path, (value) => this.mapper.normalize(resolved, value))
  }
}

/**
 * Delete builder speaking the entity's logical field names
 */
export class MappedDeleteQueryBuilder<T extends object = object> extends DeleteQueryBuilder {
  constructor(
    readonly type: EntityClass<T>,
    readonly mapper: FieldMapper
  ) {
    super()
    this.from(collectionOf(type, mapper))
  }

  override where(field: string): ConditionBuilder<this, unknown> {
    return this.mapped('where', field)
  }

  override and(field: string): ConditionBuilder<this, unknown> {
    return this.mapped('and', field)
  }

  override or(field: string): ConditionBuilder<this, unknown> {
    return this.mapped('or', field)
  }

  override clone(): MappedDeleteQueryBuilder<T> {
    const copy = new MappedDeleteQueryBuilder(this.type, this.mapper)
    this.copyConditionState(copy)
    return copy
  }

  private mapped(connector: Connector, field: string): ConditionBuilder<this, unknown> {
    const resolved = this.mapper.resolveField(this.type, field)
    return this.startCondition<unknown>(connector, resolved.path, (value) => this.mapper.normalize(resolved, value))
  }
}

/**
 * Start a select over `type`, projecting the given logical fields
 *
 * @throws MappingError if the type or a projected field is not mapped
 */
export function selectFrom<T extends object>(
  type: EntityClass<T>,
  mapper: FieldMapper,
  ...fields: string[]
): MappedQueryBuilder<T> {
  return new MappedQueryBuilder(type, mapper, fields)
}

/**
 * Start a delete over `type`
 *
 * @example
 * deleteFrom(Person, mapper).where('id').eq('20').build()
 * // { collection: 'Person', where: { field: 'native_id', comparator: 'eq', value: 20, ... } }
 */
export function deleteFrom<T extends object>(type: EntityClass<T>, mapper: FieldMapper): MappedDeleteQueryBuilder<T> {
  return new MappedDeleteQueryBuilder(type, mapper)
}

function collectionOf(type: EntityClass, mapper: FieldMapper): string {
  const metadata = mapper.resolver.resolve(type)
  if (metadata.embeddable) {
    throw new MappingError(
      `Embeddable type '${metadata.name}' has no collection to query`,
      ErrorCode.MAPPING_FAILED,
      { entity: metadata.name }
    )
  }
  return metadata.collection
}
