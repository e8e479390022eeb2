/**
 * Pieces shared by the sync and async templates
 */

import { EntityConverter, FieldMapper } from '../mapping'
import { EntityRegistry } from '../metadata'
import {
  MappedDeleteQueryBuilder,
  MappedQueryBuilder,
  deleteFrom,
  selectFrom,
} from '../query'
import type { EntityClass, MetadataResolver } from '../types/metadata'
import { HookRegistry, Workflow } from '../workflow'

export interface TemplateOptions {
  /** Metadata source; defaults to a fresh EntityRegistry */
  resolver?: MetadataResolver | undefined
  /** Hook registry; defaults to an empty one */
  hooks?: HookRegistry | undefined
}

/**
 * Converter, mapper, hooks and workflow wiring common to both templates
 */
export abstract class TemplateBase {
  readonly resolver: MetadataResolver
  readonly converter: EntityConverter
  readonly mapper: FieldMapper
  readonly hooks: HookRegistry
  protected readonly workflow: Workflow

  constructor(options: TemplateOptions = {}) {
    this.resolver = options.resolver ?? new EntityRegistry()
    this.converter = new EntityConverter(this.resolver)
    this.mapper = new FieldMapper(this.resolver)
    this.hooks = options.hooks ?? new HookRegistry()
    this.workflow = new Workflow(this.converter, this.hooks)
  }

  /**
   * Mapped select builder over `type`
   *
   * @example
   * template.find(Person, template.select(Person).where('age').gte(18).build())
   */
  select<T extends object>(type: EntityClass<T>, ...fields: string[]): MappedQueryBuilder<T> {
    return selectFrom(type, this.mapper, ...fields)
  }

  /**
   * Mapped delete builder over `type`
   */
  deleteFrom<T extends object>(type: EntityClass<T>): MappedDeleteQueryBuilder<T> {
    return deleteFrom(type, this.mapper)
  }
}

/**
 * Distinguish a batch of entities from a single one
 */
export function isBatch<T extends object>(value: T | Iterable<T>): value is Iterable<T> {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, Symbol.iterator) === 'function'
}
