/**
 * AsyncDocumentTemplate - promise and callback entity operations
 *
 * Same operations as DocumentTemplate over an AsyncCollectionManager. Every
 * operation either returns a Promise or, given a Node-style completion
 * callback, returns nothing and invokes the callback exactly once.
 *
 * Validation and mapping failures are thrown synchronously, before the
 * manager is called. Failures from hooks, the manager or CONVERT_IN are only
 * ever delivered through the promise or the callback.
 *
 * @example
 * const saved = await template.insert(person)
 *
 * @example
 * template.insert(person, (error, saved) => {
 *   if (error) return report(error)
 *   use(saved)
 * })
 */

import { toError } from '../errors'
import type { AsyncCollectionManager } from '../manager'
import type { DocumentRecord } from '../types/document'
import type { EntityClass } from '../types/metadata'
import type { DeleteQuery, SelectQuery } from '../types/query'
import { safeCallback } from '../utils'
import type { Operation, WorkflowRun } from '../workflow'
import { TemplateBase, isBatch, type TemplateOptions } from './base'

/**
 * Node-style completion callback: `(error)` on failure, `(null, result)` on success
 */
export type Callback<R> = (error: Error | null, result?: R) => void | Promise<void>

/**
 * Receives failures thrown by completion callbacks
 */
export type CallbackFailureHandler = (error: Error, context: { operation: Operation }) => void

/** Arguments of insert(): entities or entity, optional ttl, optional callback */
type InsertArgs<R, V> = [value: V, ttl?: number | undefined, callback?: Callback<R> | undefined]

/** Arguments of update(): entities or entity, optional callback */
type UpdateArgs<R, V> = [value: V, callback?: Callback<R> | undefined]

function isBatchInsert<T extends object>(
  args: InsertArgs<T[], Iterable<T>> | InsertArgs<T, T>
): args is InsertArgs<T[], Iterable<T>> {
  return isBatch(args[0])
}

function isBatchUpdate<T extends object>(
  args: UpdateArgs<T[], Iterable<T>> | UpdateArgs<T, T>
): args is UpdateArgs<T[], Iterable<T>> {
  return isBatch(args[0])
}

export interface AsyncTemplateOptions extends TemplateOptions {
  /**
   * Called when a completion callback throws or rejects, after the failure
   * has been logged with logger.error
   */
  onCallbackError?: CallbackFailureHandler | undefined
}

export class AsyncDocumentTemplate extends TemplateBase {
  private readonly onCallbackError: CallbackFailureHandler | undefined

  constructor(
    readonly manager: AsyncCollectionManager,
    options: AsyncTemplateOptions = {}
  ) {
    super(options)
    this.onCallbackError = options.onCallbackError
  }

  /**
   * Insert entities one after another; the first failure stops the batch.
   * Every entity is validated and converted before the first is stored.
   */
  insert<T extends object>(entities: Iterable<T>, ttl?: number): Promise<T[]>
  insert<T extends object>(entities: Iterable<T>, ttl: number | undefined, callback: Callback<T[]>): void
  insert<T extends object>(entity: T, ttl?: number): Promise<T>
  insert<T extends object>(entity: T, ttl: number | undefined, callback: Callback<T>): void
  insert<T extends object>(...args: InsertArgs<T[], Iterable<T>> | InsertArgs<T, T>): Promise<T> | Promise<T[]> | void {
    if (isBatchInsert(args)) {
      const [entities, ttl, callback] = args
      const batch = [...entities]
      const prepared = batch.map(entity => this.workflow.prepareWrite('insert', entity, ttl))
      const pending = this.writeAll(batch, prepared, record => this.manager.insert(record, ttl))
      return this.settle('insert', pending, callback)
    }
    const [entity, ttl, callback] = args
    const { run, record } = this.workflow.prepareWrite('insert', entity, ttl)
    const pending = this.write(run, entity, record, () => this.manager.insert(record, ttl))
    return this.settle('insert', pending, callback)
  }

  /**
   * Update entities one after another; the first failure stops the batch
   */
  update<T extends object>(entities: Iterable<T>): Promise<T[]>
  update<T extends object>(entities: Iterable<T>, callback: Callback<T[]>): void
  update<T extends object>(entity: T): Promise<T>
  update<T extends object>(entity: T, callback: Callback<T>): void
  update<T extends object>(...args: UpdateArgs<T[], Iterable<T>> | UpdateArgs<T, T>): Promise<T> | Promise<T[]> | void {
    if (isBatchUpdate(args)) {
      const [entities, callback] = args
      const batch = [...entities]
      const prepared = batch.map(entity => this.workflow.prepareWrite('update', entity))
      const pending = this.writeAll(batch, prepared, record => this.manager.update(record))
      return this.settle('update', pending, callback)
    }
    const [entity, callback] = args
    const { run, record } = this.workflow.prepareWrite('update', entity)
    const pending = this.write(run, entity, record, () => this.manager.update(record))
    return this.settle('update', pending, callback)
  }

  /**
   * Delete every record matching the query
   */
  delete(query: DeleteQuery): Promise<void>
  delete(query: DeleteQuery, callback: Callback<void>): void
  delete(query: DeleteQuery, callback?: Callback<void>): Promise<void> | void {
    const run = this.workflow.prepareQuery('delete', query)
    const pending = (async (): Promise<void> => {
      run.hook('pre', { query })
      await run.stepAsync('DELEGATE', () => this.manager.delete(query))
      this.workflow.finishDelete(run, query)
    })()
    return this.settle('delete', pending, callback)
  }

  /**
   * Run a select query; the resolved sequence converts records lazily and
   * can be iterated once
   */
  find<T extends object>(type: EntityClass<T>, query: SelectQuery): Promise<IterableIterator<T>>
  find<T extends object>(type: EntityClass<T>, query: SelectQuery, callback: Callback<IterableIterator<T>>): void
  find<T extends object>(
    type: EntityClass<T>,
    query: SelectQuery,
    callback?: Callback<IterableIterator<T>>
  ): Promise<IterableIterator<T>> | void {
    const run = this.workflow.prepareQuery('select', query)
    const pending = this.selected(run, query).then(records => this.workflow.finishSelect(run, type, query, records))
    return this.settle('select', pending, callback)
  }

  /**
   * The only match of a query, or undefined when nothing matches; more than
   * one match fails with NonUniqueResultError
   */
  singleResult<T extends object>(type: EntityClass<T>, query: SelectQuery): Promise<T | undefined>
  singleResult<T extends object>(type: EntityClass<T>, query: SelectQuery, callback: Callback<T | undefined>): void
  singleResult<T extends object>(
    type: EntityClass<T>,
    query: SelectQuery,
    callback?: Callback<T | undefined>
  ): Promise<T | undefined> | void {
    const run = this.workflow.prepareQuery('select', query)
    const pending = this.selected(run, query).then(records => this.workflow.finishSingle(run, type, query, records))
    return this.settle('select', pending, callback)
  }

  /**
   * Look up an entity by id
   */
  findById<T extends object>(type: EntityClass<T>, id: unknown): Promise<T | undefined> {
    const { field } = this.mapper.idField(type)
    return this.singleResult(type, this.select(type).where(field).eq(id).build())
  }

  /**
   * Delete the record with the given id, if any
   */
  deleteById(type: EntityClass, id: unknown): Promise<void> {
    const { field } = this.mapper.idField(type)
    return this.delete(this.deleteFrom(type).where(field).eq(id).build())
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * PRE_HOOK and DELEGATE for select
   */
  private async selected(run: WorkflowRun, query: SelectQuery): Promise<Iterable<DocumentRecord>> {
    run.hook('pre', { query })
    return run.stepAsync('DELEGATE', () => this.manager.select(query))
  }

  private async write<T extends object>(
    run: WorkflowRun,
    entity: T,
    record: DocumentRecord,
    delegate: () => Promise<DocumentRecord>
  ): Promise<T> {
    run.hook('pre', { record })
    const stored = await run.stepAsync('DELEGATE', delegate)
    return this.workflow.finishWrite(run, entity, record, stored)
  }

  private async writeAll<T extends object>(
    entities: readonly T[],
    prepared: readonly { run: WorkflowRun; record: DocumentRecord }[],
    delegate: (record: DocumentRecord) => Promise<DocumentRecord>
  ): Promise<T[]> {
    const results: T[] = []
    for (const [index, entity] of entities.entries()) {
      const step = prepared[index]
      if (!step) break
      const { run, record } = step
      results.push(await this.write(run, entity, record, () => delegate(record)))
    }
    return results
  }

  /**
   * Hand the outcome to the promise or, when given, to the callback
   */
  private settle<R>(operation: Operation, pending: Promise<R>, callback: Callback<R> | undefined): Promise<R> | void {
    if (!callback) return pending

    const deliver = (...args: [Error | null, R?]): void => {
      safeCallback<[Error | null, R?], { operation: Operation }>(
        callback,
        {
          logPrefix: '[AsyncDocumentTemplate]',
          context: { operation },
          onError: this.onCallbackError,
        },
        ...args
      )
    }

    void pending.then(
      result => deliver(null, result),
      (error: unknown) => deliver(toError(error))
    )
  }
}
