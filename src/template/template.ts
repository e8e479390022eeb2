/**
 * DocumentTemplate - blocking entity operations
 *
 * Each call runs to completion on the caller's stack: entities are
 * converted to native records, handed to the CollectionManager, and the
 * stored records converted back so that store-assigned ids are visible on
 * the returned entities.
 *
 * @example
 * const template = new DocumentTemplate(new MemoryCollectionManager(), { resolver: registry })
 * const saved = template.insert(person)
 * const adults = [...template.find(Person, template.select(Person).where('age').gte(18).build())]
 */

import type { CollectionManager } from '../manager'
import type { EntityClass } from '../types/metadata'
import type { DeleteQuery, SelectQuery } from '../types/query'
import { TemplateBase, isBatch, type TemplateOptions } from './base'

export class DocumentTemplate extends TemplateBase {
  constructor(
    readonly manager: CollectionManager,
    options: TemplateOptions = {}
  ) {
    super(options)
  }

  /**
   * Insert entities one after another; the first failure stops the batch
   *
   * @param ttl - Time-to-live in milliseconds, applied to every entity
   * @returns The stored entities, in input order
   */
  insert<T extends object>(entities: Iterable<T>, ttl?: number): T[]
  /**
   * Insert one entity
   *
   * @param ttl - Time-to-live in milliseconds
   * @returns The entity as stored
   * @throws ValidationError for null entities and non-positive ttl
   * @throws MappingError when the entity cannot be converted
   * @throws DelegateError when the manager or a hook fails
   */
  insert<T extends object>(entity: T, ttl?: number): T
  insert<T extends object>(value: T | Iterable<T>, ttl?: number): T | T[] {
    if (isBatch(value)) {
      return Array.from(value, entity => this.insertOne(entity, ttl))
    }
    return this.insertOne(value, ttl)
  }

  /**
   * Update entities one after another; the first failure stops the batch
   */
  update<T extends object>(entities: Iterable<T>): T[]
  /**
   * Replace the stored record of an entity
   *
   * @returns The entity as stored
   */
  update<T extends object>(entity: T): T
  update<T extends object>(value: T | Iterable<T>): T | T[] {
    if (isBatch(value)) {
      return Array.from(value, entity => this.updateOne(entity))
    }
    return this.updateOne(value)
  }

  /**
   * Delete every record matching the query
   */
  delete(query: DeleteQuery): void {
    const run = this.workflow.beginQuery('delete', query)
    run.step('DELEGATE', () => this.manager.delete(query))
    this.workflow.finishDelete(run, query)
  }

  /**
   * Run a select query, converting each record to `type` as it is consumed
   *
   * The sequence is lazy and can be iterated once.
   */
  find<T extends object>(type: EntityClass<T>, query: SelectQuery): IterableIterator<T> {
    const run = this.workflow.beginQuery('select', query)
    const records = run.step('DELEGATE', () => this.manager.select(query))
    return this.workflow.finishSelect(run, type, query, records)
  }

  /**
   * The only match of a query, or undefined when nothing matches
   *
   * @throws NonUniqueResultError when more than one record matches
   */
  singleResult<T extends object>(type: EntityClass<T>, query: SelectQuery): T | undefined {
    const run = this.workflow.beginQuery('select', query)
    const records = run.step('DELEGATE', () => this.manager.select(query))
    return this.workflow.finishSingle(run, type, query, records)
  }

  /**
   * Look up an entity by id
   */
  findById<T extends object>(type: EntityClass<T>, id: unknown): T | undefined {
    const { field } = this.mapper.idField(type)
    return this.singleResult(type, this.select(type).where(field).eq(id).build())
  }

  /**
   * Delete the record with the given id, if any
   */
  deleteById(type: EntityClass, id: unknown): void {
    const { field } = this.mapper.idField(type)
    this.delete(this.deleteFrom(type).where(field).eq(id).build())
  }

  private insertOne<T extends object>(entity: T, ttl?: number): T {
    const { run, record } = this.workflow.beginWrite('insert', entity, ttl)
    const stored = run.step('DELEGATE', () => this.manager.insert(record, ttl))
    return this.workflow.finishWrite(run, entity, record, stored)
  }

  private updateOne<T extends object>(entity: T): T {
    const { run, record } = this.workflow.beginWrite('update', entity)
    const stored = run.step('DELEGATE', () => this.manager.update(record))
    return this.workflow.finishWrite(run, entity, record, stored)
  }
}
