/**
 * docmap - entity/document mapping over document stores
 *
 * @packageDocumentation
 */

// =============================================================================
// Templates
// =============================================================================

export {
  DocumentTemplate,
  AsyncDocumentTemplate,
  TemplateBase,
  TemplateRegistry,
  createTemplateRegistry,
  getTemplateRegistry,
  setTemplateRegistry,
  clearTemplateRegistry,
  type TemplateOptions,
  type AsyncTemplateOptions,
  type Callback,
  type CallbackFailureHandler,
  type ProviderManagers,
} from './template'

// =============================================================================
// Queries
// =============================================================================

export {
  QueryBuilder,
  DeleteQueryBuilder,
  ConditionalQueryBuilder,
  ConditionBuilder,
  MappedQueryBuilder,
  MappedDeleteQueryBuilder,
  select,
  deleteQuery,
  selectFrom,
  deleteFrom,
  createPredicate,
  matchesCondition,
  likePattern,
  sortDocuments,
} from './query'

// =============================================================================
// Mapping & Metadata
// =============================================================================

export { EntityConverter, FieldMapper, type ResolvedField } from './mapping'

export {
  EntityRegistry,
  DEFAULT_ID_NAME,
  staticDefinitionSource,
  buildClassMetadata,
  coerceId,
  type DefinitionSource,
  type EntityDefinition,
  type ColumnDefinition,
  type IdDefinition,
  type EntityRegistryOptions,
} from './metadata'

// =============================================================================
// Workflow & Hooks
// =============================================================================

export {
  Workflow,
  WorkflowRun,
  HookRegistry,
  type Stage,
  type Operation,
  type HookPhase,
  type HookContext,
  type HookHandler,
} from './workflow'

// =============================================================================
// Collection Managers
// =============================================================================

export {
  MemoryCollectionManager,
  AsyncCollectionAdapter,
  type CollectionManager,
  type AsyncCollectionManager,
  type IdGenerator,
  type MemoryCollectionManagerOptions,
} from './manager'

// =============================================================================
// Configuration
// =============================================================================

export {
  defineConfig,
  parseConfig,
  loadConfigFromEnv,
  getConfig,
  setConfig,
  clearConfig,
  type DocmapConfig,
  type DocmapConfigInput,
  type ProviderConfig,
  type TemplateKind,
} from './config'

// =============================================================================
// Types, Errors & Utilities
// =============================================================================

export * from './types'
export * from './errors'

export {
  type Logger,
  consoleLogger,
  noopLogger,
  logger,
  setLogger,
} from './utils'
