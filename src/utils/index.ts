/**
 * Utility functions for docmap
 *
 * @module utils
 */

export {
  deepEqual,
  compareValues,
  getNestedValue,
  getValueType,
  isNullish,
  isPlainRecord,
} from './comparison'

export {
  type Logger,
  consoleLogger,
  noopLogger,
  logger,
  setLogger,
} from './logger'

export {
  type MaybeAsyncCallback,
  type SafeCallbackOptions,
  safeCallback,
} from './safe-callback'
