/**
 * Collection manager contracts
 *
 * A collection manager is the store-facing client the templates delegate
 * to. It persists native DocumentRecords and evaluates query descriptors;
 * it never sees entities.
 */

import type { DocumentRecord } from '../types/document'
import type { DeleteQuery, SelectQuery } from '../types/query'

/**
 * Blocking collection manager
 */
export interface CollectionManager {
  /**
   * Store a new record, returning it as stored (including any assigned id)
   *
   * @param ttl - Time-to-live in milliseconds
   */
  insert(record: DocumentRecord, ttl?: number): DocumentRecord
  /** Replace an existing record, returning it as stored */
  update(record: DocumentRecord): DocumentRecord
  delete(query: DeleteQuery): void
  select(query: SelectQuery): Iterable<DocumentRecord>
}

/**
 * Promise-based collection manager
 */
export interface AsyncCollectionManager {
  insert(record: DocumentRecord, ttl?: number): Promise<DocumentRecord>
  update(record: DocumentRecord): Promise<DocumentRecord>
  delete(query: DeleteQuery): Promise<void>
  select(query: SelectQuery): Promise<Iterable<DocumentRecord>>
}
