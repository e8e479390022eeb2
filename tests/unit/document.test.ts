/**
 * Document model tests
 */

import { describe, it, expect } from 'vitest'
import { ValidationError } from '../../src/errors'
import { Document, DocumentRecord, isDocumentValue, isScalar } from '../../src/types'

describe('Document', () => {
  it('keeps fields in insertion order', () => {
    const doc = Document.of({ name: 'Ada', age: 36, active: true })
    expect(doc.names()).toEqual(['name', 'age', 'active'])
    expect(doc.size).toBe(3)
    expect(doc.get('age')).toBe(36)
    expect(doc.has('missing')).toBe(false)
    expect(doc.get('missing')).toBeUndefined()
  })

  it('rejects duplicate field names', () => {
    expect(() => new Document([
      { name: 'a', value: 1 },
      { name: 'a', value: 2 },
    ])).toThrow(ValidationError)
  })

  it('is immutable', () => {
    const doc = Document.of({ a: 1 })
    expect(Object.isFrozen(doc.fields)).toBe(true)
    expect(Object.isFrozen(doc.fields[0])).toBe(true)
  })

  it('with() replaces in place or appends, leaving the original untouched', () => {
    const doc = Document.of({ a: 1, b: 2 })
    expect(doc.with('a', 10).toObject()).toEqual({ a: 10, b: 2 })
    expect(doc.with('c', 3).names()).toEqual(['a', 'b', 'c'])
    expect(doc.toObject()).toEqual({ a: 1, b: 2 })
  })

  it('without() drops a field', () => {
    expect(Document.of({ a: 1, b: 2 }).without('a').names()).toEqual(['b'])
  })

  it('toObject() recurses into embedded documents and sequences', () => {
    const doc = Document.of({
      name: 'Ada',
      address: Document.of({ city_name: 'London' }),
      pets: [Document.of({ name: 'Rex' }), Document.of({ name: 'Tom' })],
      phones: ['1', '2'],
    })
    expect(doc.toObject()).toEqual({
      name: 'Ada',
      address: { city_name: 'London' },
      pets: [{ name: 'Rex' }, { name: 'Tom' }],
      phones: ['1', '2'],
    })
  })

  it('iterates its fields', () => {
    const doc = Document.of({ x: 1, y: 2 })
    expect([...doc].map(field => field.name)).toEqual(['x', 'y'])
  })
})

describe('DocumentRecord', () => {
  it('knows its collection and keeps it through with()/without()', () => {
    const record = new DocumentRecord('Person', [{ name: 'name', value: 'Ada' }])
    const changed = record.with('age', 36).without('name')
    expect(changed).toBeInstanceOf(DocumentRecord)
    expect(changed.collection).toBe('Person')
    expect(changed.toObject()).toEqual({ age: 36 })
  })

  it('requires a collection name', () => {
    expect(() => new DocumentRecord('', [])).toThrow(ValidationError)
  })

  it('from() binds an existing document', () => {
    const record = DocumentRecord.from('Person', Document.of({ a: 1 }))
    expect(record.collection).toBe('Person')
    expect(record.get('a')).toBe(1)
  })
})

describe('value guards', () => {
  it('isScalar accepts primitives, dates and byte arrays only', () => {
    expect([
      'x',
      1,
      true,
      10n,
      new Date(0),
      new Uint8Array([1]),
      null,
      undefined,
      {},
      [],
    ].map(isScalar)).toEqual([true, true, true, true, true, true, false, false, false, false])
  })

  it('isDocumentValue accepts nested documents and sequences', () => {
    expect(isDocumentValue([1, ['a', Document.of({ b: 2 })]])).toBe(true)
    expect(isDocumentValue([1, null])).toBe(false)
    expect(isDocumentValue({ plain: true })).toBe(false)
  })
})
