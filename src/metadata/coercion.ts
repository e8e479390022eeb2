/**
 * Identifier value coercion
 *
 * An id column may declare its value type. Values crossing the mapping
 * layer (query operands, ids handed back by the store) are coerced to that
 * type; anything that cannot be converted without loss is rejected.
 */

import { ValidationError } from '../errors'
import { getValueType } from '../utils'
import type { IdType } from '../types/metadata'

const INTEGER = /^-?\d+$/
const DECIMAL = /^-?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i

/**
 * Coerce `value` to the declared id type
 *
 * - `number`: finite numbers as-is, numeric strings, safe bigints
 * - `string`: strings as-is, numbers and bigints stringified
 * - `bigint`: bigints as-is, integral numbers, integer strings
 *
 * @throws ValidationError when the value cannot be represented
 *
 * @example
 * coerceId('20', 'number', 'id') // 20
 * coerceId(7, 'string', 'id') // '7'
 * coerceId('x', 'number', 'id') // throws ValidationError
 */
export function coerceId(value: unknown, type: IdType, field: string): string | number | bigint {
  switch (type) {
    case 'number': {
      if (typeof value === 'number' && Number.isFinite(value)) return value
      if (typeof value === 'string' && DECIMAL.test(value.trim())) {
        const parsed = Number(value.trim())
        if (Number.isFinite(parsed)) return parsed
      }
      if (typeof value === 'bigint' && Number.isSafeInteger(Number(value))) return Number(value)
      break
    }
    case 'string': {
      if (typeof value === 'string') return value
      if ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'bigint') return String(value)
      break
    }
    case 'bigint': {
      if (typeof value === 'bigint') return value
      if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value)
      if (typeof value === 'string' && INTEGER.test(value.trim())) return BigInt(value.trim())
      break
    }
  }

  throw new ValidationError(
    `Cannot coerce ${formatValue(value)} to the ${type} id type of '${field}'`,
    { field, expectedType: type, actualType: getValueType(value), value }
  )
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value)
  return getValueType(value)
}
