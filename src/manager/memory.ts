/**
 * MemoryCollectionManager - in-memory CollectionManager
 *
 * Keeps records per collection, keyed by their native id. Used by tests and
 * as the default provider when no store is configured.
 *
 * - ids missing on insert are assigned by the id generator
 * - records inserted with a time-to-live disappear once it elapses
 * - select evaluates predicate, ordering, window and projection in that order
 */

import { DocmapError, ErrorCode } from '../errors'
import { DEFAULT_ID_NAME } from '../metadata'
import { createPredicate } from '../query/filter'
import { applyWindow, sortDocuments } from '../query/sort'
import { Document, DocumentRecord, type DocumentValue } from '../types/document'
import type { DeleteQuery, SelectQuery } from '../types/query'
import { getValueType } from '../utils'
import type { CollectionManager } from './types'

/** Assigns an id to a record inserted without one */
export type IdGenerator = (collection: string) => DocumentValue

export interface MemoryCollectionManagerOptions {
  /** Native id field name (default `_id`) */
  idName?: string | undefined
  /** Clock in milliseconds, used for time-to-live expiry */
  now?: (() => number) | undefined
  /** Id assignment; defaults to a per-collection counter starting at 1 */
  idGenerator?: IdGenerator | undefined
}

/** Stored record entry */
interface Entry {
  record: DocumentRecord
  expiresAt?: number | undefined
}

/**
 * In-memory collection manager for testing and local use
 */
export class MemoryCollectionManager implements CollectionManager {
  readonly type = 'memory'
  readonly idName: string

  private collections = new Map<string, Map<string, Entry>>()
  private counters = new Map<string, number>()
  private readonly now: () => number
  private readonly idGenerator: IdGenerator

  constructor(options: MemoryCollectionManagerOptions = {}) {
    this.idName = options.idName ?? DEFAULT_ID_NAME
    this.now = options.now ?? Date.now
    this.idGenerator = options.idGenerator ?? ((collection) => this.nextId(collection))
  }

  insert(record: DocumentRecord, ttl?: number): DocumentRecord {
    const entries = this.entries(record.collection)
    const stored = record.has(this.idName) ? record : this.withGeneratedId(record)
    const key = idKey(stored.get(this.idName))

    if (entries.has(key)) {
      throw new DocmapError(
        `Record with id ${key} already exists in '${record.collection}'`,
        ErrorCode.ALREADY_EXISTS,
        { collection: record.collection, id: key }
      )
    }

    entries.set(key, { record: stored, expiresAt: ttl === undefined ? undefined : this.now() + ttl })
    return stored
  }

  update(record: DocumentRecord): DocumentRecord {
    const entries = this.entries(record.collection)
    if (!record.has(this.idName)) {
      throw new DocmapError(
        `Cannot update a record without '${this.idName}'`,
        ErrorCode.INVALID_INPUT,
        { collection: record.collection }
      )
    }
    const key = idKey(record.get(this.idName))
    const existing = entries.get(key)
    if (!existing) {
      throw new DocmapError(
        `Record with id ${key} not found in '${record.collection}'`,
        ErrorCode.NOT_FOUND,
        { collection: record.collection, id: key }
      )
    }
    entries.set(key, { record, expiresAt: existing.expiresAt })
    return record
  }

  delete(query: DeleteQuery): void {
    const entries = this.entries(query.collection)
    const matches = createPredicate(query.where)
    for (const [key, { record }] of [...entries]) {
      if (matches(record)) entries.delete(key)
    }
  }

  select(query: SelectQuery): DocumentRecord[] {
    const matches = createPredicate(query.where)
    const found = [...this.entries(query.collection).values()]
      .map(entry => entry.record)
      .filter(record => matches(record))
    const window = applyWindow(sortDocuments(found, query.sort), query.skip, query.limit)
    return query.fields.length === 0 ? window : window.map(record => project(record, query.fields))
  }

  /**
   * Number of live records in a collection
   */
  count(collection: string): number {
    return this.entries(collection).size
  }

  /**
   * Drop every record (and reset id counters)
   */
  clear(): void {
    this.collections.clear()
    this.counters.clear()
  }

  /**
   * Live entries of a collection, with expired ones removed
   */
  private entries(collection: string): Map<string, Entry> {
    let entries = this.collections.get(collection)
    if (!entries) {
      entries = new Map()
      this.collections.set(collection, entries)
    }
    const now = this.now()
    for (const [key, entry] of entries) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) entries.delete(key)
    }
    return entries
  }

  private withGeneratedId(record: DocumentRecord): DocumentRecord {
    const id = this.idGenerator(record.collection)
    return new DocumentRecord(record.collection, [{ name: this.idName, value: id }, ...record.fields])
  }

  private nextId(collection: string): number {
    const taken = this.collections.get(collection)
    let next = (this.counters.get(collection) ?? 0) + 1
    while (taken?.has(idKey(next))) next++
    this.counters.set(collection, next)
    return next
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Map key for an id value; typed so that 1 and '1' stay distinct
 */
function idKey(value: DocumentValue | undefined): string {
  if (value instanceof Document) return `document:${JSON.stringify(value.toObject())}`
  if (value instanceof Date) return `date:${value.toISOString()}`
  return `${getValueType(value)}:${String(value)}`
}

/**
 * Keep the top-level fields a projection touches; a nested path keeps its
 * whole embedded document
 */
function project(record: DocumentRecord, fields: readonly string[]): DocumentRecord {
  const roots = new Set(fields.map(field => field.split('.')[0]))
  return new DocumentRecord(record.collection, record.fields.filter(field => roots.has(field.name)))
}
