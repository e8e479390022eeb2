/**
 * Sort and window helpers for in-memory select evaluation
 */

import type { Document } from '../types/document'
import type { Sort } from '../types/query'
import { compareValues, getNestedValue, isNullish } from '../utils'

/**
 * Compare two values with nulls-last behavior.
 * Null/undefined values sort after all non-null values regardless of direction.
 */
export function compareValuesNullsLast(a: unknown, b: unknown, direction: 1 | -1): number {
  const aIsNull = isNullish(a)
  const bIsNull = isNullish(b)

  if (aIsNull && bIsNull) return 0
  if (aIsNull) return 1
  if (bIsNull) return -1

  const cmp = compareValues(a, b)
  return Number.isNaN(cmp) ? 0 : direction * cmp
}

/**
 * Value a document sorts by. A path yielding a sequence sorts by its
 * smallest element ascending and its largest descending; an empty one
 * sorts like an absent field.
 */
function sortKey(view: Record<string, unknown>, field: string, direction: 1 | -1): unknown {
  const value = getNestedValue(view, field)
  if (!Array.isArray(value)) return value
  let key: unknown
  for (const element of value) {
    if (isNullish(element)) continue
    if (key === undefined || direction * compareValues(element, key) < 0) key = element
  }
  return key
}

/**
 * Sort documents by each ordering in turn; the first non-zero comparison
 * decides. Stable, so ties keep insertion order. Paths resolve the way
 * predicates resolve them.
 *
 * @returns A new array
 */
export function sortDocuments<D extends Document>(documents: readonly D[], sort: readonly Sort[]): D[] {
  const rows = documents.map(document => ({ document, view: document.toObject() }))
  if (sort.length > 0) {
    rows.sort((a, b) => {
      for (const { field, direction } of sort) {
        const sign = direction === 'desc' ? -1 : 1
        const cmp = compareValuesNullsLast(sortKey(a.view, field, sign), sortKey(b.view, field, sign), sign)
        if (cmp !== 0) return cmp
      }
      return 0
    })
  }
  return rows.map(row => row.document)
}

/**
 * Apply skip then limit
 */
export function applyWindow<T>(items: readonly T[], skip?: number, limit?: number): T[] {
  const start = skip ?? 0
  return limit === undefined ? items.slice(start) : items.slice(start, start + limit)
}
