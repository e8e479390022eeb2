/**
 * Operation workflow
 *
 * Every template call runs through the same stage machine:
 *
 * ```
 * START -> VALIDATE -> CONVERT_OUT -> PRE_HOOK -> DELEGATE -> POST_HOOK -> CONVERT_IN -> DONE
 * ```
 *
 * with FAILED reachable from any stage. CONVERT_OUT is skipped by delete and
 * select, which carry descriptors rather than entities. Stages before DELEGATE
 * are shared verbatim by the sync and async templates; only the DELEGATE
 * call itself differs.
 *
 * Failures leave the run in FAILED and carry `operation` and `stage` in their
 * context. Manager and hook failures become DelegateError with the original
 * failure as cause; nothing is retried.
 *
 * @module workflow/workflow
 */

import {
  DelegateError,
  DocmapError,
  ErrorCode,
  MappingError,
  NonUniqueResultError,
  ValidationError,
  toError,
  wrapError,
} from '../errors'
import type { EntityConverter } from '../mapping'
import type { DocumentRecord } from '../types/document'
import type { EntityClass } from '../types/metadata'
import type { DeleteQuery, SelectQuery } from '../types/query'
import { getValueType, isNullish, logger } from '../utils'
import { HookRegistry, type HookContext, type HookPhase, type Operation } from './hooks'

export type Stage =
  | 'START'
  | 'VALIDATE'
  | 'CONVERT_OUT'
  | 'PRE_HOOK'
  | 'DELEGATE'
  | 'POST_HOOK'
  | 'CONVERT_IN'
  | 'DONE'
  | 'FAILED'

// =============================================================================
// WorkflowRun
// =============================================================================

/**
 * State of a single template call
 */
export class WorkflowRun {
  private current: Stage = 'START'
  private target: string | undefined

  constructor(
    readonly operation: Operation,
    private readonly hooks: HookRegistry
  ) {
    logger.debug(`[Workflow] ${operation}: START`)
  }

  get stage(): Stage {
    return this.current
  }

  /** Collection the call targets, once known */
  get collection(): string | undefined {
    return this.target
  }

  set collection(collection: string | undefined) {
    this.target = collection
  }

  /**
   * Enter `stage` and run `action`, failing the run if it throws
   */
  step<R>(stage: Stage, action: () => R): R {
    this.enter(stage)
    try {
      return action()
    } catch (error) {
      throw this.fail(error)
    }
  }

  /**
   * Async counterpart of step(); a synchronous throw from `action` also
   * surfaces as a rejection
   */
  async stepAsync<R>(stage: Stage, action: () => Promise<R>): Promise<R> {
    this.enter(stage)
    try {
      return await action()
    } catch (error) {
      throw this.fail(error)
    }
  }

  /**
   * Run the hooks for `phase` under the matching stage
   */
  hook(phase: HookPhase, details: Omit<HookContext, 'operation' | 'phase' | 'collection'> = {}): void {
    this.step(phase === 'pre' ? 'PRE_HOOK' : 'POST_HOOK', () => {
      this.hooks.run({ ...details, operation: this.operation, phase, collection: this.target ?? '' })
    })
  }

  done(): void {
    this.enter('DONE')
  }

  /**
   * Move to FAILED and return the error to raise, annotated with the
   * operation and the stage that failed
   */
  fail(error: unknown, stage: Stage = this.current): DocmapError {
    if (this.current === 'FAILED' && error instanceof DocmapError) {
      return error
    }

    const failure = this.classify(error, stage)
    failure.context.operation ??= this.operation
    failure.context.stage ??= stage
    if (this.target !== undefined) {
      failure.context.collection ??= this.target
    }

    this.current = 'FAILED'
    logger.warn(`[Workflow] ${this.operation} failed at ${stage}: ${failure.message}`)
    return failure
  }

  private enter(stage: Stage): void {
    logger.debug(`[Workflow] ${this.operation}${this.target ? ` ${this.target}` : ''}: ${this.current} -> ${stage}`)
    this.current = stage
  }

  private classify(error: unknown, stage: Stage): DocmapError {
    const context = { operation: this.operation, stage, collection: this.target }

    switch (stage) {
      case 'DELEGATE':
        if (error instanceof DelegateError) return error
        return new DelegateError(
          `Collection manager failed during ${this.operation}: ${toError(error).message}`,
          context,
          toError(error)
        )

      case 'PRE_HOOK':
      case 'POST_HOOK':
        return new DelegateError(
          `${stage === 'PRE_HOOK' ? 'Pre' : 'Post'}-${this.operation} hook failed: ${toError(error).message}`,
          context,
          toError(error),
          ErrorCode.HOOK_FAILED
        )

      case 'CONVERT_OUT':
      case 'CONVERT_IN':
        if (error instanceof DocmapError) return error
        return new MappingError(
          `Conversion failed during ${this.operation}: ${toError(error).message}`,
          ErrorCode.MAPPING_FAILED,
          {},
          toError(error)
        )

      default:
        return wrapError(error)
    }
  }
}

// =============================================================================
// Workflow
// =============================================================================

/**
 * Stage logic shared by the sync and async templates
 *
 * Each `begin*` method runs every stage up to DELEGATE and returns what the
 * template hands to its collection manager; each `finish*` method runs the
 * remaining stages on what the manager returned.
 */
export class Workflow {
  constructor(
    readonly converter: EntityConverter,
    readonly hooks: HookRegistry = new HookRegistry()
  ) {}

  /**
   * VALIDATE and CONVERT_OUT for insert and update
   */
  prepareWrite(operation: 'insert' | 'update', entity: object, ttl?: number): { run: WorkflowRun; record: DocumentRecord } {
    const run = new WorkflowRun(operation, this.hooks)
    run.step('VALIDATE', () => {
      requireEntity(operation, entity)
      if (ttl !== undefined) requireTtl(ttl)
    })
    const record = run.step('CONVERT_OUT', () => this.converter.toDocument(entity))
    run.collection = record.collection
    return { run, record }
  }

  /**
   * prepareWrite() followed by PRE_HOOK
   */
  beginWrite(operation: 'insert' | 'update', entity: object, ttl?: number): { run: WorkflowRun; record: DocumentRecord } {
    const prepared = this.prepareWrite(operation, entity, ttl)
    prepared.run.hook('pre', { record: prepared.record })
    return prepared
  }

  /**
   * POST_HOOK and CONVERT_IN for insert and update; the returned entity has
   * the same class as the one written, carrying any store-assigned id
   */
  finishWrite<T extends object>(run: WorkflowRun, entity: T, record: DocumentRecord, stored: DocumentRecord): T {
    run.hook('post', { record, result: stored })
    const result = run.step('CONVERT_IN', () => {
      const converted = this.converter.toEntity(this.converter.metadataOf(entity).type, stored)
      if (!sharesPrototype(converted, entity)) {
        throw new MappingError('Converted entity does not match the written type', ErrorCode.SHAPE_MISMATCH)
      }
      return converted
    })
    run.done()
    return result
  }

  /**
   * VALIDATE for delete and select
   */
  prepareQuery(operation: 'delete' | 'select', query: DeleteQuery | SelectQuery): WorkflowRun {
    const run = new WorkflowRun(operation, this.hooks)
    run.step('VALIDATE', () => requireQuery(operation, query))
    run.collection = query.collection
    return run
  }

  /**
   * prepareQuery() followed by PRE_HOOK
   */
  beginQuery(operation: 'delete', query: DeleteQuery): WorkflowRun
  beginQuery(operation: 'select', query: SelectQuery): WorkflowRun
  beginQuery(operation: 'delete' | 'select', query: DeleteQuery | SelectQuery): WorkflowRun {
    const run = this.prepareQuery(operation, query)
    run.hook('pre', { query })
    return run
  }

  /**
   * POST_HOOK for delete
   */
  finishDelete(run: WorkflowRun, query: DeleteQuery): void {
    run.hook('post', { query })
    run.done()
  }

  /**
   * POST_HOOK, then a lazy CONVERT_IN over the manager's records. The run
   * completes when the sequence is exhausted.
   */
  finishSelect<T extends object>(
    run: WorkflowRun,
    type: EntityClass<T>,
    query: SelectQuery,
    records: Iterable<DocumentRecord>
  ): IterableIterator<T> {
    run.hook('post', { query })
    return this.convertAll(run, type, records)
  }

  /**
   * finishSelect() reduced to at most one entity. The run ends in DONE, or
   * in FAILED when a second record exists.
   *
   * @throws NonUniqueResultError when more than one record matches
   */
  finishSingle<T extends object>(
    run: WorkflowRun,
    type: EntityClass<T>,
    query: SelectQuery,
    records: Iterable<DocumentRecord>
  ): T | undefined {
    const results = this.finishSelect(run, type, query, records)
    try {
      const first = results.next()
      if (first.done) return undefined
      if (!results.next().done) {
        throw run.fail(new NonUniqueResultError(query.collection))
      }
      return first.value
    } finally {
      results.return?.()
    }
  }

  private *convertAll<T extends object>(
    run: WorkflowRun,
    type: EntityClass<T>,
    records: Iterable<DocumentRecord>
  ): Generator<T, void, undefined> {
    const iterator = run.step('CONVERT_IN', () => records[Symbol.iterator]())
    for (;;) {
      let next: IteratorResult<DocumentRecord>
      try {
        next = iterator.next()
      } catch (error) {
        throw run.fail(error, 'DELEGATE')
      }
      if (next.done) break
      const record = next.value
      yield run.step('CONVERT_IN', () => this.converter.toEntity(type, record))
    }
    run.done()
  }
}

// =============================================================================
// Validation
// =============================================================================

/**
 * @throws ValidationError for null, undefined and non-object entities
 */
export function requireEntity(operation: Operation, entity: unknown): asserts entity is object {
  if (isNullish(entity)) {
    throw new ValidationError(`${operation} requires an entity, got ${getValueType(entity)}`, { operation })
  }
  if (typeof entity !== 'object') {
    throw new ValidationError(`${operation} requires an entity object`, {
      field: 'entity',
      expectedType: 'object',
      actualType: getValueType(entity),
      operation,
    })
  }
}

/**
 * @throws ValidationError for missing queries and queries without a collection
 */
export function requireQuery(operation: Operation, query: unknown): void {
  if (isNullish(query)) {
    throw new ValidationError(`${operation} requires a query, got ${getValueType(query)}`, { operation })
  }
  const collection: unknown = typeof query === 'object' ? Reflect.get(query, 'collection') : undefined
  if (typeof collection !== 'string' || collection.length === 0) {
    throw new ValidationError(`${operation} requires a query with a collection`, { field: 'collection', operation })
  }
}

/**
 * Time-to-live must be a finite, positive number of milliseconds
 *
 * @throws ValidationError otherwise
 */
export function requireTtl(ttl: unknown): asserts ttl is number {
  if (typeof ttl !== 'number' || !Number.isFinite(ttl) || ttl <= 0) {
    throw new ValidationError(`Time-to-live must be a positive number of milliseconds, got ${String(ttl)}`, {
      field: 'ttl',
      operation: 'insert',
      value: ttl,
    })
  }
}

function sharesPrototype<T extends object>(value: object, like: T): value is T {
  return Object.getPrototypeOf(value) === Object.getPrototypeOf(like)
}
