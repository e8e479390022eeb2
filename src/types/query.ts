/**
 * Store-agnostic query descriptors
 *
 * SelectQuery and DeleteQuery are produced by the fluent builders and
 * handed unchanged to collection managers. Field names inside a descriptor
 * are whatever the builder was given: literal names, or native names when
 * built through the mapped builder. Descriptors are deeply frozen.
 */

import type { DocumentValue } from './document'

// =============================================================================
// Comparators
// =============================================================================

/** Comparators taking a single operand */
export type ScalarComparator = 'eq' | 'gt' | 'gte' | 'lt' | 'lte' | 'like'

/** All supported comparators */
export type Comparator = ScalarComparator | 'in' | 'between'

/** Operand accepted by a comparator; null matches absent fields under eq */
export type QueryValue = DocumentValue | null

// =============================================================================
// Predicate Tree
// =============================================================================

interface FieldConditionBase {
  readonly type: 'condition'
  /** Field name (dot notation reaches into embedded documents) */
  readonly field: string
}

/** Single-operand comparison */
export interface ScalarCondition extends FieldConditionBase {
  readonly comparator: ScalarComparator
  readonly value: QueryValue
}

/** Membership in a non-empty list */
export interface InCondition extends FieldConditionBase {
  readonly comparator: 'in'
  readonly value: readonly QueryValue[]
}

/** Inclusive range */
export interface BetweenCondition extends FieldConditionBase {
  readonly comparator: 'between'
  readonly value: readonly [QueryValue, QueryValue]
}

/** Leaf node of the predicate tree */
export type FieldCondition = ScalarCondition | InCondition | BetweenCondition

/** Conjunction or disjunction of child conditions */
export interface CompositeCondition {
  readonly type: 'and' | 'or'
  readonly conditions: readonly Condition[]
}

/** Negation of a child condition */
export interface NotCondition {
  readonly type: 'not'
  readonly condition: Condition
}

/** Predicate tree node */
export type Condition = FieldCondition | CompositeCondition | NotCondition

// =============================================================================
// Descriptors
// =============================================================================

export type SortDirection = 'asc' | 'desc'

export interface Sort {
  readonly field: string
  readonly direction: SortDirection
}

/**
 * Read request: collection, optional projection, predicate, ordering and window
 */
export interface SelectQuery {
  readonly collection: string
  /** Projected field names; empty means every field */
  readonly fields: readonly string[]
  readonly where?: Condition
  readonly sort: readonly Sort[]
  readonly skip?: number
  readonly limit?: number
}

/**
 * Delete request: collection and predicate only
 */
export interface DeleteQuery {
  readonly collection: string
  readonly where?: Condition
}
