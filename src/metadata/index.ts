/**
 * Entity metadata: definitions, registry and id coercion
 *
 * @module metadata
 */

export {
  entityDefinitionSchema,
  columnDefinitionSchema,
  idDefinitionSchema,
  type EntityDefinition,
  type ParsedEntityDefinition,
  type ColumnDefinition,
  type IdDefinition,
} from './definition'

export {
  DEFAULT_ID_NAME,
  type DefinitionSource,
  type EntityRegistryOptions,
  staticDefinitionSource,
  isEntityClass,
  EntityRegistry,
  buildClassMetadata,
  findField,
  allFields,
} from './registry'

export { coerceId } from './coercion'
