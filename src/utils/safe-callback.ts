/**
 * Completion callback delivery
 *
 * Caller-supplied callbacks may be sync or async. A throw or a rejection is
 * logged with logger.error and handed to the optional `onError` handler; it
 * never propagates into the mapping layer.
 *
 * @module utils/safe-callback
 */

import { toError } from '../errors'
import { logger } from './logger'

/**
 * A callback that can be either synchronous or asynchronous.
 */
export type MaybeAsyncCallback<TArgs extends unknown[]> = (...args: TArgs) => void | Promise<void>

export interface SafeCallbackOptions<TContext extends Record<string, string>> {
  /** Prefix of the log lines, e.g. `[AsyncDocumentTemplate]` */
  logPrefix: string
  /** Rendered as `key=value` pairs in the error log */
  context: TContext
  onError?: ((error: Error, context: TContext) => void) | undefined
}

/**
 * Invoke `callback` with `args`, reporting sync throws and async rejections
 *
 * @example
 * safeCallback(callback, { logPrefix: '[AsyncDocumentTemplate]', context: { operation: 'insert' } }, null, saved)
 */
export function safeCallback<TArgs extends unknown[], TContext extends Record<string, string>>(
  callback: MaybeAsyncCallback<TArgs>,
  options: SafeCallbackOptions<TContext>,
  ...args: TArgs
): void {
  const report = (error: unknown): void => {
    const failure = toError(error)
    logger.error(`${options.logPrefix} Callback error (context: ${formatContext(options.context)}): ${failure.message}`, failure)

    if (!options.onError) return
    try {
      options.onError(failure, options.context)
    } catch (handlerError) {
      logger.warn(`${options.logPrefix} Error in error handler: ${toError(handlerError).message}`)
    }
  }

  try {
    const result = callback(...args)
    if (result instanceof Promise) {
      void result.then(undefined, report)
    }
  } catch (error) {
    report(error)
  }
}

function formatContext(context: Record<string, string>): string {
  return Object.entries(context)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ')
}
