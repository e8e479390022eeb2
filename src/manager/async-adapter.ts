/**
 * Promise-based view of a blocking CollectionManager
 *
 * Each call is deferred to a later microtask, so failures always surface as
 * rejections and never as synchronous throws.
 *
 * @example
 * const manager = new AsyncCollectionAdapter(new MemoryCollectionManager())
 * const template = new AsyncDocumentTemplate(manager)
 */

import type { DocumentRecord } from '../types/document'
import type { DeleteQuery, SelectQuery } from '../types/query'
import type { AsyncCollectionManager, CollectionManager } from './types'

export class AsyncCollectionAdapter implements AsyncCollectionManager {
  constructor(readonly manager: CollectionManager) {}

  async insert(record: DocumentRecord, ttl?: number): Promise<DocumentRecord> {
    await Promise.resolve()
    return this.manager.insert(record, ttl)
  }

  async update(record: DocumentRecord): Promise<DocumentRecord> {
    await Promise.resolve()
    return this.manager.update(record)
  }

  async delete(query: DeleteQuery): Promise<void> {
    await Promise.resolve()
    this.manager.delete(query)
  }

  async select(query: SelectQuery): Promise<Iterable<DocumentRecord>> {
    await Promise.resolve()
    return this.manager.select(query)
  }
}
