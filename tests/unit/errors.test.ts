/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  ConfigurationError,
  DelegateError,
  DocmapError,
  ErrorCode,
  IncompleteQueryError,
  MappingError,
  NonUniqueResultError,
  ValidationError,
  assertValid,
  isDelegateError,
  isDocmapError,
  isMappingError,
  isNonUniqueResultError,
  isValidationError,
  toError,
  wrapError,
} from '../../src/errors'

describe('DocmapError', () => {
  it('carries code, context and cause', () => {
    const cause = new Error('disk full')
    const error = new DocmapError('Operation failed', ErrorCode.INTERNAL, { collection: 'Person' }, cause)

    expect(error.message).toBe('Operation failed')
    expect(error.code).toBe(ErrorCode.INTERNAL)
    expect(error.context).toEqual({ collection: 'Person' })
    expect(error.cause).toBe(cause)
    expect(error.is(ErrorCode.INTERNAL)).toBe(true)
    expect(error.is(ErrorCode.UNKNOWN)).toBe(false)
  })

  it('defaults to UNKNOWN with an empty context', () => {
    const error = new DocmapError('Something happened')
    expect(error.code).toBe(ErrorCode.UNKNOWN)
    expect(error.context).toEqual({})
    expect(error.cause).toBeUndefined()
  })

  it('round-trips through JSON including a DocmapError cause', () => {
    const cause = new ValidationError('bad ttl', { field: 'ttl' })
    const error = new DocmapError('insert failed', ErrorCode.DELEGATE_FAILED, { operation: 'insert' }, cause)

    const json = error.toJSON()
    expect(json.name).toBe('DocmapError')
    expect(json.code).toBe(ErrorCode.DELEGATE_FAILED)
    expect(json.context).toEqual({ operation: 'insert' })
    expect(json.cause?.name).toBe('ValidationError')
    expect(json.cause?.code).toBe(ErrorCode.INVALID_INPUT)

    const restored = DocmapError.fromJSON(json)
    expect(restored.message).toBe('insert failed')
    expect(restored.code).toBe(ErrorCode.DELEGATE_FAILED)
    expect(restored.context).toEqual({ operation: 'insert' })
    expect(restored.cause).toBeInstanceOf(DocmapError)
    expect(restored.cause?.message).toBe('bad ttl')
  })

  it('omits an empty context from JSON', () => {
    expect(new DocmapError('x').toJSON().context).toBeUndefined()
  })
})

describe('subclasses', () => {
  it('ValidationError picks its code from the context', () => {
    expect(new ValidationError('a').code).toBe(ErrorCode.VALIDATION_FAILED)
    expect(new ValidationError('b', { field: 'ttl' }).code).toBe(ErrorCode.INVALID_INPUT)

    const typed = new ValidationError('c', { field: 'id', expectedType: 'number', actualType: 'string' })
    expect(typed.code).toBe(ErrorCode.INVALID_TYPE)
    expect(typed.field).toBe('id')
    expect(typed.expectedType).toBe('number')
    expect(typed.actualType).toBe('string')
  })

  it('MappingError exposes entity and field', () => {
    const error = new MappingError('Unknown field', ErrorCode.UNKNOWN_FIELD, { entity: 'Person', field: 'nmae' })
    expect(error.code).toBe(ErrorCode.UNKNOWN_FIELD)
    expect(error.entity).toBe('Person')
    expect(error.field).toBe('nmae')
    expect(new MappingError('x').code).toBe(ErrorCode.MAPPING_FAILED)
  })

  it('IncompleteQueryError has a default message and records the query kind', () => {
    const error = new IncompleteQueryError(undefined, 'delete')
    expect(error.message).toBe('Query has no collection; call from() before build()')
    expect(error.code).toBe(ErrorCode.INCOMPLETE_QUERY)
    expect(error.context).toEqual({ kind: 'delete' })
  })

  it('NonUniqueResultError names the collection', () => {
    const error = new NonUniqueResultError('Person')
    expect(error.message).toBe("Expected at most one result from collection 'Person' but found more")
    expect(error.collection).toBe('Person')
  })

  it('DelegateError exposes operation and stage and keeps the cause', () => {
    const cause = new Error('connection reset')
    const error = new DelegateError('failed', { operation: 'update', stage: 'DELEGATE' }, cause)
    expect(error.operation).toBe('update')
    expect(error.stage).toBe('DELEGATE')
    expect(error.cause).toBe(cause)
    expect(error.code).toBe(ErrorCode.DELEGATE_FAILED)
  })

  it('every subclass is a DocmapError and an Error with its own name', () => {
    const errors = [
      new ValidationError('v'),
      new MappingError('m'),
      new IncompleteQueryError(),
      new NonUniqueResultError('c'),
      new DelegateError('d', { operation: 'insert', stage: 'DELEGATE' }),
      new ConfigurationError('c'),
    ]
    expect(errors.map(e => e.name)).toEqual([
      'ValidationError',
      'MappingError',
      'IncompleteQueryError',
      'NonUniqueResultError',
      'DelegateError',
      'ConfigurationError',
    ])
    for (const error of errors) {
      expect(error).toBeInstanceOf(Error)
      expect(isDocmapError(error)).toBe(true)
    }
  })
})

describe('type guards', () => {
  it('distinguish error kinds', () => {
    const validation = new ValidationError('v')
    const mapping = new MappingError('m')

    expect(isValidationError(validation)).toBe(true)
    expect(isValidationError(mapping)).toBe(false)
    expect(isMappingError(mapping)).toBe(true)
    expect(isDelegateError(new DelegateError('d', { operation: 'delete', stage: 'DELEGATE' }))).toBe(true)
    expect(isNonUniqueResultError(new NonUniqueResultError('Person'))).toBe(true)
    expect(isDocmapError(new Error('plain'))).toBe(false)
  })
})

describe('helpers', () => {
  it('toError keeps errors and wraps other values', () => {
    const error = new Error('x')
    expect(toError(error)).toBe(error)
    expect(toError('boom').message).toBe('boom')
  })

  it('wrapError passes DocmapErrors through', () => {
    const original = new MappingError('m')
    expect(wrapError(original)).toBe(original)
  })

  it('wrapError wraps plain errors as INTERNAL with the cause', () => {
    const cause = new TypeError('undefined is not a function')
    const wrapped = wrapError(cause, { operation: 'select' })
    expect(wrapped.code).toBe(ErrorCode.INTERNAL)
    expect(wrapped.message).toBe('undefined is not a function')
    expect(wrapped.cause).toBe(cause)
    expect(wrapped.context).toEqual({ operation: 'select' })
  })

  it('wrapError wraps non-errors as UNKNOWN', () => {
    const wrapped = wrapError(42)
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN)
    expect(wrapped.message).toBe('42')
  })

  it('assertValid throws a ValidationError when the condition is false', () => {
    expect(() => assertValid(true, 'never')).not.toThrow()
    expect(() => assertValid(false, 'limit must be positive', { field: 'limit' })).toThrow(ValidationError)
  })
})
