/**
 * In-memory predicate evaluation
 *
 * Evaluates Condition trees against stored documents. Used by the memory
 * collection managers; other managers translate descriptors to their own
 * query language instead.
 *
 * ## Null Handling
 *
 * - `eq null` matches fields that are null or absent
 * - ordering comparators (gt, gte, lt, lte, between) never match an absent field
 * - `in [null, ...]` matches absent fields
 *
 * ## Sequences
 *
 * A scalar operand compared with `eq` or `in` against a sequence field
 * matches when any element matches. A path through a sequence of embedded
 * documents (`pets.name`) collects the field from every element.
 */

import { Document } from '../types/document'
import type { Condition, FieldCondition, QueryValue } from '../types/query'
import { compareValues, deepEqual, getNestedValue, isNullish } from '../utils'

/**
 * Build a reusable predicate from a condition (undefined matches everything)
 */
export function createPredicate(condition: Condition | undefined): (document: Document) => boolean {
  if (!condition) return () => true
  return (document) => matchesCondition(document.toObject(), condition)
}

/**
 * Check whether a plain document view satisfies a condition
 *
 * @example
 * matchesCondition({ age: 30 }, { type: 'condition', field: 'age', comparator: 'gte', value: 18 }) // true
 */
export function matchesCondition(row: Record<string, unknown>, condition: Condition): boolean {
  switch (condition.type) {
    case 'and':
      return condition.conditions.every(child => matchesCondition(row, child))
    case 'or':
      return condition.conditions.some(child => matchesCondition(row, child))
    case 'not':
      return !matchesCondition(row, condition.condition)
    case 'condition':
      return matchesField(getNestedValue(row, condition.field), condition)
  }
}

function matchesField(value: unknown, condition: FieldCondition): boolean {
  switch (condition.comparator) {
    case 'eq':
      return equalsOperand(value, condition.value)

    case 'in':
      return condition.value.some(operand => equalsOperand(value, operand))

    case 'gt':
      return ordered(value, condition.value, cmp => cmp > 0)

    case 'gte':
      return ordered(value, condition.value, cmp => cmp >= 0)

    case 'lt':
      return ordered(value, condition.value, cmp => cmp < 0)

    case 'lte':
      return ordered(value, condition.value, cmp => cmp <= 0)

    case 'between': {
      const [low, high] = condition.value
      return ordered(value, low, cmp => cmp >= 0) && ordered(value, high, cmp => cmp <= 0)
    }

    case 'like':
      return typeof value === 'string' && typeof condition.value === 'string' && likePattern(condition.value).test(value)
  }
}

function equalsOperand(value: unknown, operand: QueryValue): boolean {
  const expected = plainOperand(operand)
  if (deepEqual(value, expected)) return true
  return Array.isArray(value) && !Array.isArray(expected) && value.some(element => deepEqual(element, expected))
}

function ordered(value: unknown, operand: QueryValue, accept: (cmp: number) => boolean): boolean {
  if (isNullish(value) || isNullish(operand)) return false
  const cmp = compareValues(value, plainOperand(operand))
  return !Number.isNaN(cmp) && accept(cmp)
}

function plainOperand(operand: QueryValue): unknown {
  if (operand instanceof Document) return operand.toObject()
  if (Array.isArray(operand)) return operand.map(plainOperand)
  return operand
}

const patternCache = new Map<string, RegExp>()

/**
 * Translate a like pattern to an anchored regular expression:
 * `%` matches any run of characters, `_` exactly one, everything else literally
 *
 * @example
 * likePattern('A%').test('Ada') // true
 * likePattern('_d_').test('Ada') // true
 */
export function likePattern(pattern: string): RegExp {
  const cached = patternCache.get(pattern)
  if (cached) return cached

  let source = ''
  for (const char of pattern) {
    if (char === '%') source += '[\\s\\S]*'
    else if (char === '_') source += '[\\s\\S]'
    else source += char.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
  }
  const regex = new RegExp(`^${source}$`, 'u')
  patternCache.set(pattern, regex)
  return regex
}
