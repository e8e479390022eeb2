/**
 * Native document representation
 *
 * A Document is an ordered sequence of (native name, value) fields. A
 * DocumentRecord is a Document that also knows the collection it belongs
 * to; it is the unit exchanged with collection managers.
 */

import { ValidationError } from '../errors'

// =============================================================================
// Values
// =============================================================================

/** Scalar values a document field can hold */
export type Scalar = string | number | boolean | bigint | Date | Uint8Array

/** A field value: scalar, embedded document, or ordered sequence */
export type DocumentValue = Scalar | Document | readonly DocumentValue[]

/** One (native name, value) pair */
export interface DocumentField {
  readonly name: string
  readonly value: DocumentValue
}

/** Check whether a value is a scalar document value */
export function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint' ||
    value instanceof Date ||
    value instanceof Uint8Array
  )
}

/** Check whether a value can be stored in a document field */
export function isDocumentValue(value: unknown): value is DocumentValue {
  if (isScalar(value) || value instanceof Document) return true
  return Array.isArray(value) && value.every(isDocumentValue)
}

// =============================================================================
// Document
// =============================================================================

/**
 * Ordered, immutable set of native fields
 *
 * @example
 * const doc = Document.of({ name: 'Ada', age: 36 })
 * doc.get('name') // 'Ada'
 * doc.names() // ['name', 'age']
 */
export class Document implements Iterable<DocumentField> {
  readonly fields: readonly DocumentField[]

  constructor(fields: Iterable<DocumentField> = []) {
    const seen = new Set<string>()
    const copy: DocumentField[] = []
    for (const field of fields) {
      if (seen.has(field.name)) {
        throw new ValidationError(`Duplicate document field '${field.name}'`, { field: field.name })
      }
      seen.add(field.name)
      copy.push(Object.freeze({ name: field.name, value: field.value }))
    }
    this.fields = Object.freeze(copy)
  }

  /**
   * Build a document from a plain object, keeping key order
   */
  static of(entries: Record<string, DocumentValue>): Document {
    return new Document(Object.entries(entries).map(([name, value]) => ({ name, value })))
  }

  get size(): number {
    return this.fields.length
  }

  has(name: string): boolean {
    return this.fields.some(f => f.name === name)
  }

  get(name: string): DocumentValue | undefined {
    return this.fields.find(f => f.name === name)?.value
  }

  names(): string[] {
    return this.fields.map(f => f.name)
  }

  /**
   * Return a copy with `name` set to `value` (replacing in place, or appended)
   */
  with(name: string, value: DocumentValue): Document {
    return new Document(replaceField(this.fields, name, value))
  }

  /**
   * Return a copy without the named field
   */
  without(name: string): Document {
    return new Document(this.fields.filter(f => f.name !== name))
  }

  /**
   * Plain-object view, recursing into embedded documents and sequences.
   * Used for filter evaluation and debugging output.
   */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {}
    for (const { name, value } of this.fields) {
      result[name] = plainValue(value)
    }
    return result
  }

  [Symbol.iterator](): Iterator<DocumentField> {
    return this.fields[Symbol.iterator]()
  }
}

// =============================================================================
// DocumentRecord
// =============================================================================

/**
 * A document bound to its logical collection
 *
 * @example
 * const record = new DocumentRecord('Person', [
 *   { name: 'native_id', value: 1 },
 *   { name: 'name', value: 'Ada' },
 * ])
 */
export class DocumentRecord extends Document {
  readonly collection: string

  constructor(collection: string, fields: Iterable<DocumentField> = []) {
    super(fields)
    if (!collection) {
      throw new ValidationError('Document record requires a collection name')
    }
    this.collection = collection
  }

  static from(collection: string, document: Document): DocumentRecord {
    return new DocumentRecord(collection, document.fields)
  }

  override with(name: string, value: DocumentValue): DocumentRecord {
    return new DocumentRecord(this.collection, replaceField(this.fields, name, value))
  }

  override without(name: string): DocumentRecord {
    return new DocumentRecord(this.collection, this.fields.filter(f => f.name !== name))
  }
}

// =============================================================================
// Helpers
// =============================================================================

function replaceField(fields: readonly DocumentField[], name: string, value: DocumentValue): DocumentField[] {
  let replaced = false
  const next = fields.map(f => {
    if (f.name !== name) return f
    replaced = true
    return { name, value }
  })
  if (!replaced) next.push({ name, value })
  return next
}

function plainValue(value: DocumentValue): unknown {
  if (value instanceof Document) return value.toObject()
  if (Array.isArray(value)) return value.map(plainValue)
  return value
}
