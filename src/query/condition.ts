/**
 * Condition builder and predicate helpers
 *
 * A ConditionBuilder is handed out by `where()`, `and()` and `or()` and
 * completes exactly one comparison, returning control to the query builder
 * that created it.
 *
 * @module query/condition
 */

import { ValidationError } from '../errors'
import { isDocumentValue } from '../types/document'
import type {
  Condition,
  FieldCondition,
  QueryValue,
  ScalarComparator,
} from '../types/query'
import { getValueType } from '../utils'

/** How a completed comparison joins the accumulated predicate */
export type Connector = 'where' | 'and' | 'or'

/** Turns a caller-side operand into a stored-side one */
export type ValueNormalizer = (value: unknown) => unknown

/**
 * Check if a value may appear as a comparison operand
 */
export function isQueryValue(value: unknown): value is QueryValue {
  return value === null || isDocumentValue(value)
}

/**
 * Fluent comparison for a single field
 *
 * @typeParam B - Builder returned once the comparison completes
 * @typeParam V - Operand type accepted from the caller
 */
export class ConditionBuilder<B, V = QueryValue> {
  private negated = false

  constructor(
    readonly field: string,
    private readonly complete: (condition: Condition) => B,
    private readonly normalize: ValueNormalizer = (value) => value
  ) {}

  /** Negate the comparison that follows */
  not(): this {
    this.negated = !this.negated
    return this
  }

  eq(value: V): B {
    return this.scalar('eq', value)
  }

  gt(value: V): B {
    return this.scalar('gt', value)
  }

  gte(value: V): B {
    return this.scalar('gte', value)
  }

  lt(value: V): B {
    return this.scalar('lt', value)
  }

  lte(value: V): B {
    return this.scalar('lte', value)
  }

  /**
   * Pattern match: `%` matches any run of characters, `_` exactly one
   */
  like(pattern: string): B {
    if (typeof pattern !== 'string') {
      throw new ValidationError(`like() on '${this.field}' requires a string pattern`, {
        field: this.field,
        expectedType: 'string',
        actualType: getValueType(pattern),
        operation: 'like',
      })
    }
    return this.finish({ type: 'condition', field: this.field, comparator: 'like', value: pattern })
  }

  /**
   * Membership in a non-empty list of values
   */
  in(values: readonly V[]): B {
    if (!Array.isArray(values) || values.length === 0) {
      throw new ValidationError(`in() on '${this.field}' requires a non-empty array`, {
        field: this.field,
        operation: 'in',
        value: values,
      })
    }
    const operands = Object.freeze(values.map((value) => this.operand(value)))
    return this.finish({ type: 'condition', field: this.field, comparator: 'in', value: operands })
  }

  /**
   * Inclusive range; exactly two bounds
   */
  between(...bounds: V[]): B {
    const [low, high] = bounds
    if (bounds.length !== 2 || low === undefined || high === undefined) {
      throw new ValidationError(
        `between() on '${this.field}' requires exactly two values, got ${bounds.length}`,
        { field: this.field, operation: 'between', value: bounds }
      )
    }
    const range = Object.freeze<[QueryValue, QueryValue]>([this.operand(low), this.operand(high)])
    return this.finish({ type: 'condition', field: this.field, comparator: 'between', value: range })
  }

  private scalar(comparator: ScalarComparator, value: V): B {
    return this.finish({ type: 'condition', field: this.field, comparator, value: this.operand(value) })
  }

  private operand(value: V): QueryValue {
    const normalized = this.normalize(value)
    if (!isQueryValue(normalized)) {
      throw new ValidationError(`Unsupported value for '${this.field}'`, {
        field: this.field,
        expectedType: 'document value',
        actualType: getValueType(normalized),
        value: normalized,
      })
    }
    return normalized
  }

  private finish(condition: FieldCondition): B {
    const frozen = Object.freeze(condition)
    return this.complete(this.negated ? Object.freeze<Condition>({ type: 'not', condition: frozen }) : frozen)
  }
}

/**
 * Join a condition onto an accumulated predicate, flattening groups of the
 * same kind so `a and b and c` stays one level deep
 */
export function combine(current: Condition, kind: 'and' | 'or', next: Condition): Condition {
  const conditions =
    (current.type === 'and' || current.type === 'or') && current.type === kind
      ? [...current.conditions, next]
      : [current, next]
  return Object.freeze<Condition>({ type: kind, conditions: Object.freeze(conditions) })
}
