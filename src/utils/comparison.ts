/**
 * Shared Comparison and Value Utilities
 *
 * Value equality, ordering and nested access used by the in-memory
 * collection managers when they evaluate query descriptors.
 */

// =============================================================================
// Deep Equality
// =============================================================================

/**
 * Deep equality check for two values
 *
 * Handles primitives, Dates (by timestamp), byte arrays, arrays
 * (element-wise) and plain objects (key-value). null and undefined are
 * treated as equivalent.
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual([1, 2], [1, 2]) // true
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || a === undefined) return b === null || b === undefined

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    if (a.length !== b.length) return false
    return a.every((v, i) => v === b[i])
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isPlainRecord(a) && isPlainRecord(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => deepEqual(a[k], b[k]))
  }

  return false
}

// =============================================================================
// Value Comparison for Ordering
// =============================================================================

/**
 * Compare two values for ordering
 *
 * null/undefined sort first. Numbers, bigints, strings, Dates and booleans
 * compare natively; mixed number/bigint compare numerically; anything else
 * falls back to string comparison. Returns NaN when either side is NaN.
 *
 * @example
 * compareValues(1, 2) // -1
 * compareValues('b', 'a') // 1
 * compareValues(null, 1) // -1
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a === null || a === undefined) {
    return b === null || b === undefined ? 0 : -1
  }
  if (b === null || b === undefined) return 1

  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return NaN
    return Math.sign(a - b)
  }
  if ((typeof a === 'bigint' || typeof a === 'number') && (typeof b === 'bigint' || typeof b === 'number')) {
    if (Number.isNaN(a) || Number.isNaN(b)) return NaN
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (typeof a === 'string' && typeof b === 'string') {
    if (a < b) return -1
    if (a > b) return 1
    return 0
  }
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime())
  if (typeof a === 'boolean' && typeof b === 'boolean') return (a ? 1 : 0) - (b ? 1 : 0)

  return String(a).localeCompare(String(b))
}

// =============================================================================
// Nested Value Access
// =============================================================================

const INDEX = /^\d+$/

/**
 * Get a nested value from a document view using dot notation
 *
 * A numeric segment indexes into a sequence; any other segment applied to
 * a sequence collects the field from every element, dropping elements that
 * lack it.
 *
 * @example
 * getNestedValue({ a: { b: 1 } }, 'a.b') // 1
 * getNestedValue({ items: [{ x: 1 }] }, 'items.0.x') // 1
 * getNestedValue({ items: [{ x: 1 }, { y: 2 }, { x: 3 }] }, 'items.x') // [1, 3]
 */
export function getNestedValue(value: unknown, path: string): unknown {
  return resolvePath(value, path.split('.'))
}

function resolvePath(value: unknown, path: readonly string[]): unknown {
  const [head, ...rest] = path
  if (head === undefined) return value
  if (Array.isArray(value)) {
    if (INDEX.test(head)) return resolvePath(value[Number(head)], rest)
    return value.map(element => resolvePath(element, path)).filter(element => element !== undefined)
  }
  if (isPlainRecord(value)) return resolvePath(value[head], rest)
  return undefined
}

// =============================================================================
// Null/Undefined Helpers
// =============================================================================

/**
 * Check if a value is null or undefined (nullish)
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

// =============================================================================
// Type Helpers
// =============================================================================

/**
 * Check whether a value is a plain key/value record (not an array, Date,
 * byte array or class instance with a custom prototype chain)
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Get a short description of a value's shape, used in error messages
 *
 * @example
 * getValueType(null) // 'null'
 * getValueType([1, 2]) // 'array'
 * getValueType(new Date()) // 'date'
 */
export function getValueType(value: unknown): string {
  if (value === null || value === undefined) return 'null'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Date) return 'date'
  if (value instanceof Uint8Array) return 'bytes'
  return typeof value
}
