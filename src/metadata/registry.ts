/**
 * Entity Registry
 *
 * Resolves entity types to frozen ClassMetadata. Metadata comes from one of
 * two strategies, tried in order:
 *
 * 1. Explicit registration via `register(type, definition)`
 * 2. Definition sources consulted on first lookup (by default the class's
 *    static `entity` property)
 *
 * Metadata is built once per type and cached; afterwards it is read-only
 * and safe to share between sync and async templates.
 *
 * @module metadata/registry
 */

import { ErrorCode, MappingError } from '../errors'
import { isPlainRecord } from '../utils'
import type {
  ClassMetadata,
  ColumnMetadata,
  EntityClass,
  IdMetadata,
  MetadataResolver,
} from '../types/metadata'
import {
  entityDefinitionSchema,
  type EntityDefinition,
  type ParsedEntityDefinition,
} from './definition'

/** Native id field name used when an id declares none */
export const DEFAULT_ID_NAME = '_id'

/**
 * Looks up an unparsed definition for a type, or undefined when it has none
 */
export type DefinitionSource = (type: EntityClass) => unknown

/**
 * Reads the definition from a static `entity` property on the class
 *
 * @example
 * class Person {
 *   static readonly entity: EntityDefinition = { id: 'id', columns: { name: true } }
 *   id?: number
 *   name = ''
 * }
 */
export const staticDefinitionSource: DefinitionSource = (type) => Reflect.get(type, 'entity')

export interface EntityRegistryOptions {
  /** Native name for ids that do not declare one (default `_id`) */
  idName?: string | undefined
  /** Strategies consulted for unregistered types */
  sources?: DefinitionSource[] | undefined
}

/**
 * Check whether a value can serve as an entity constructor
 */
export function isEntityClass(value: unknown): value is EntityClass {
  return typeof value === 'function'
}

/**
 * Registry of entity types and their metadata
 */
export class EntityRegistry implements MetadataResolver {
  private readonly metadata = new Map<EntityClass, ClassMetadata>()
  private readonly idName: string
  private readonly sources: DefinitionSource[]

  constructor(options: EntityRegistryOptions = {}) {
    this.idName = options.idName ?? DEFAULT_ID_NAME
    this.sources = options.sources ?? [staticDefinitionSource]
  }

  /**
   * Register an entity type with an explicit definition
   *
   * @throws MappingError if the type is already registered or the definition is invalid
   */
  register(type: EntityClass, definition: EntityDefinition): ClassMetadata {
    if (this.metadata.has(type)) {
      throw new MappingError(
        `Entity type '${type.name}' is already registered`,
        ErrorCode.MAPPING_FAILED,
        { entity: type.name }
      )
    }
    const metadata = buildClassMetadata(type, definition, this.idName)
    this.metadata.set(type, metadata)
    return metadata
  }

  /**
   * Resolve metadata for a type, consulting definition sources on first use
   *
   * @throws MappingError if no strategy knows the type
   */
  resolve(type: EntityClass): ClassMetadata {
    const cached = this.metadata.get(type)
    if (cached) return cached

    for (const source of this.sources) {
      const definition = source(type)
      if (definition === undefined) continue
      const metadata = buildClassMetadata(type, definition, this.idName)
      this.metadata.set(type, metadata)
      return metadata
    }

    throw new MappingError(
      `No metadata registered for entity type '${type.name || '<anonymous>'}'`,
      ErrorCode.UNKNOWN_ENTITY,
      { entity: type.name }
    )
  }

  /**
   * Resolve metadata from an entity instance's constructor
   */
  resolveInstance(entity: object): ClassMetadata {
    const type = entity.constructor
    if (!isEntityClass(type) || isPlainRecord(entity)) {
      throw new MappingError(
        'Entities must be class instances; plain objects carry no metadata',
        ErrorCode.UNKNOWN_ENTITY
      )
    }
    return this.resolve(type)
  }

  has(type: EntityClass): boolean {
    return this.metadata.has(type)
  }

  /** Types resolved so far */
  types(): EntityClass[] {
    return [...this.metadata.keys()]
  }
}

// =============================================================================
// Metadata Construction
// =============================================================================

/**
 * Validate a definition and build frozen ClassMetadata from it
 *
 * @throws MappingError when the definition is malformed or two fields share a native name
 */
export function buildClassMetadata(type: EntityClass, definition: unknown, idName: string = DEFAULT_ID_NAME): ClassMetadata {
  const parsed = entityDefinitionSchema.safeParse(definition)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new MappingError(
      `Invalid entity definition for '${type.name}': ${issues}`,
      ErrorCode.MAPPING_FAILED,
      { entity: type.name }
    )
  }

  const def = parsed.data
  const name = def.name ?? type.name
  const id = def.id === undefined ? undefined : buildIdMetadata(def.id, idName)
  const columns = new Map<string, ColumnMetadata>()
  const nativeNames = new Set<string>(id ? [id.name] : [])

  for (const [field, column] of Object.entries(def.columns)) {
    if (id && field === id.field) {
      throw new MappingError(
        `Column '${field}' of '${name}' is already declared as the id`,
        ErrorCode.MAPPING_FAILED,
        { entity: name, field }
      )
    }
    const metadata = buildColumnMetadata(field, column)
    if (nativeNames.has(metadata.name)) {
      throw new MappingError(
        `Native field '${metadata.name}' is mapped twice in '${name}'`,
        ErrorCode.MAPPING_FAILED,
        { entity: name, field }
      )
    }
    nativeNames.add(metadata.name)
    columns.set(field, metadata)
  }

  return Object.freeze<ClassMetadata>({
    name,
    collection: def.collection ?? name,
    type,
    embeddable: def.embeddable ?? false,
    ...(id ? { id } : {}),
    columns,
  })
}

function buildIdMetadata(id: NonNullable<ParsedEntityDefinition['id']>, idName: string): IdMetadata {
  if (typeof id === 'string') {
    return Object.freeze<IdMetadata>({ field: id, name: idName, kind: 'value' })
  }
  return Object.freeze<IdMetadata>({
    field: id.field,
    name: id.name ?? idName,
    kind: 'value',
    ...(id.type ? { type: id.type } : {}),
    ...(id.converter ? { converter: id.converter } : {}),
  })
}

function buildColumnMetadata(
  field: string,
  column: ParsedEntityDefinition['columns'][string]
): ColumnMetadata {
  if (column === true) {
    return Object.freeze<ColumnMetadata>({ field, name: field, kind: 'value' })
  }
  if (typeof column === 'string') {
    return Object.freeze<ColumnMetadata>({ field, name: column, kind: 'value' })
  }

  const name = column.name ?? field
  const converter = column.converter ? { converter: column.converter } : {}

  if (column.embedded) {
    return Object.freeze<ColumnMetadata>({ field, name, kind: 'embedded', entity: column.embedded, ...converter })
  }
  if (column.list !== undefined) {
    const element = column.list === true ? {} : { entity: column.list }
    return Object.freeze<ColumnMetadata>({ field, name, kind: 'list', ...element, ...converter })
  }
  return Object.freeze<ColumnMetadata>({ field, name, kind: 'value', ...converter })
}

// =============================================================================
// Lookup Helpers
// =============================================================================

/**
 * Find the id or column metadata for a logical field name
 */
export function findField(metadata: ClassMetadata, field: string): ColumnMetadata | undefined {
  if (metadata.id && metadata.id.field === field) return metadata.id
  return metadata.columns.get(field)
}

/**
 * All mapped fields, id first, then columns in declaration order
 */
export function allFields(metadata: ClassMetadata): ColumnMetadata[] {
  return metadata.id ? [metadata.id, ...metadata.columns.values()] : [...metadata.columns.values()]
}
