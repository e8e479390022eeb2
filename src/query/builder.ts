/**
 * QueryBuilder - fluent construction of select and delete descriptors
 *
 * @example
 * const query = select('name', 'age')
 *   .from('Person')
 *   .where('age').gte(18)
 *   .and('name').like('A%')
 *   .orderBy('age', 'desc')
 *   .limit(10)
 *   .build()
 *
 * @example
 * const removal = deleteQuery()
 *   .from('Person')
 *   .where('status').in(['archived', 'spam'])
 *   .build()
 */

import { IncompleteQueryError, ValidationError } from '../errors'
import type {
  Condition,
  DeleteQuery,
  QueryValue,
  SelectQuery,
  Sort,
  SortDirection,
} from '../types/query'
import { ConditionBuilder, combine, type Connector, type ValueNormalizer } from './condition'

/** Builder state shared by select and delete builders */
interface ConditionState {
  collection?: string | undefined
  where?: Condition | undefined
  /** Field whose comparison has been started but not completed */
  pending?: string | undefined
}

/**
 * Shared `from` / `where` / `and` / `or` handling
 *
 * @typeParam Q - Descriptor produced by build()
 */
export abstract class ConditionalQueryBuilder<Q> {
  protected state: ConditionState = {}

  protected abstract readonly kind: 'select' | 'delete'

  /**
   * Set the target collection
   */
  from(collection: string): this {
    if (typeof collection !== 'string' || collection.length === 0) {
      throw new ValidationError('from() requires a non-empty collection name', {
        field: 'collection',
        value: collection,
      })
    }
    this.state.collection = collection
    return this
  }

  /**
   * Start the predicate
   *
   * @throws ValidationError if a predicate already exists
   */
  where(field: string): ConditionBuilder<this> {
    return this.startCondition<QueryValue>('where', field)
  }

  /**
   * Conjoin a comparison with the accumulated predicate
   */
  and(field: string): ConditionBuilder<this> {
    return this.startCondition<QueryValue>('and', field)
  }

  /**
   * Disjoin a comparison with the accumulated predicate
   */
  or(field: string): ConditionBuilder<this> {
    return this.startCondition<QueryValue>('or', field)
  }

  /** Collection set so far */
  get collection(): string | undefined {
    return this.state.collection
  }

  abstract build(): Q

  protected startCondition<V>(
    connector: Connector,
    field: string,
    normalize?: ValueNormalizer
  ): ConditionBuilder<this, V> {
    this.assertSettled(connector)
    if (connector === 'where' && this.state.where) {
      throw new ValidationError('where() may only be called once; use and() or or()', { operation: 'where' })
    }
    if (connector !== 'where' && !this.state.where) {
      throw new ValidationError(`${connector}() requires a preceding where()`, { operation: connector })
    }

    this.state.pending = field
    return new ConditionBuilder<this, V>(
      field,
      (condition) => {
        const current = this.state.where
        this.state.where = current && connector !== 'where' ? combine(current, connector, condition) : condition
        this.state.pending = undefined
        return this
      },
      normalize
    )
  }

  /**
   * Collection name for build(); rejects half-finished comparisons
   */
  protected requireCollection(): string {
    this.assertSettled('build')
    if (this.state.collection === undefined) {
      throw new IncompleteQueryError(undefined, this.kind)
    }
    return this.state.collection
  }

  protected copyConditionState(target: ConditionalQueryBuilder<Q>): void {
    target.state = { ...this.state }
  }

  private assertSettled(operation: string): void {
    if (this.state.pending !== undefined) {
      throw new ValidationError(`Comparison on '${this.state.pending}' was never completed`, {
        field: this.state.pending,
        operation,
      })
    }
  }
}

// =============================================================================
// Select
// =============================================================================

/**
 * Builder for SelectQuery descriptors
 */
export class QueryBuilder extends ConditionalQueryBuilder<SelectQuery> {
  protected override readonly kind = 'select'
  protected fields: readonly string[]
  protected sort: Sort[] = []
  protected window: { skip?: number | undefined; limit?: number | undefined } = {}

  /**
   * @param fields - Projected fields; none means every field
   */
  constructor(fields: readonly string[] = []) {
    super()
    this.fields = [...fields]
  }

  /**
   * Append an ordering; earlier calls take precedence
   */
  orderBy(field: string, direction: SortDirection = 'asc'): this {
    if (direction !== 'asc' && direction !== 'desc') {
      throw new ValidationError(`Invalid sort direction: ${String(direction)}`, {
        field,
        operation: 'orderBy',
        value: direction,
      })
    }
    this.sort.push(Object.freeze({ field, direction }))
    return this
  }

  /** Skip the first `count` matches */
  skip(count: number): this {
    this.window.skip = requireCount('skip', count)
    return this
  }

  /** Return at most `count` matches */
  limit(count: number): this {
    this.window.limit = requireCount('limit', count)
    return this
  }

  /**
   * Build a frozen descriptor; the builder stays usable
   *
   * @throws IncompleteQueryError if from() was never called
   */
  override build(): SelectQuery {
    const collection = this.requireCollection()
    const { where } = this.state
    const { skip, limit } = this.window
    return Object.freeze<SelectQuery>({
      collection,
      fields: Object.freeze([...this.fields]),
      ...(where ? { where } : {}),
      sort: Object.freeze([...this.sort]),
      ...(skip !== undefined ? { skip } : {}),
      ...(limit !== undefined ? { limit } : {}),
    })
  }

  /**
   * Independent copy of this builder
   */
  clone(): QueryBuilder {
    return this.copyTo(new QueryBuilder(this.fields))
  }

  protected copyTo<B extends QueryBuilder>(target: B): B {
    this.copyConditionState(target)
    target.fields = [...this.fields]
    target.sort = [...this.sort]
    target.window = { ...this.window }
    return target
  }
}

// =============================================================================
// Delete
// =============================================================================

/**
 * Builder for DeleteQuery descriptors
 *
 * Ordering and windowing have no meaning for a delete and are rejected.
 */
export class DeleteQueryBuilder extends ConditionalQueryBuilder<DeleteQuery> {
  protected override readonly kind = 'delete'

  orderBy(_field: string, _direction?: SortDirection): never {
    throw new ValidationError('Delete queries do not support orderBy()', { operation: 'orderBy' })
  }

  skip(_count: number): never {
    throw new ValidationError('Delete queries do not support skip()', { operation: 'skip' })
  }

  limit(_count: number): never {
    throw new ValidationError('Delete queries do not support limit()', { operation: 'limit' })
  }

  /**
   * @throws IncompleteQueryError if from() was never called
   */
  override build(): DeleteQuery {
    const collection = this.requireCollection()
    const { where } = this.state
    return Object.freeze<DeleteQuery>({ collection, ...(where ? { where } : {}) })
  }

  clone(): DeleteQueryBuilder {
    const copy = new DeleteQueryBuilder()
    this.copyConditionState(copy)
    return copy
  }
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Start a select query projecting `fields` (every field when none given)
 */
export function select(...fields: string[]): QueryBuilder {
  return new QueryBuilder(fields)
}

/**
 * Start a delete query
 */
export function deleteQuery(): DeleteQueryBuilder {
  return new DeleteQueryBuilder()
}

function requireCount(operation: 'skip' | 'limit', count: number): number {
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`${operation}() requires a non-negative integer, got ${String(count)}`, {
      field: operation,
      operation,
      value: count,
    })
  }
  return count
}
