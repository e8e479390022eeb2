/**
 * @module manager
 */

export type { AsyncCollectionManager, CollectionManager } from './types'
export {
  MemoryCollectionManager,
  type IdGenerator,
  type MemoryCollectionManagerOptions,
} from './memory'
export { AsyncCollectionAdapter } from './async-adapter'
