/**
 * Operation hooks
 *
 * Handlers observe each template operation immediately before (`pre`) and
 * after (`post`) the collection manager is called. A handler that throws
 * fails the operation; the template reports it as a DelegateError.
 *
 * @example
 * const off = hooks.on('pre', 'insert', ({ record }) => audit(record))
 * off() // unregister
 */

import type { DocumentRecord } from '../types/document'
import type { DeleteQuery, SelectQuery } from '../types/query'

/** Template operations that pass through the workflow */
export type Operation = 'insert' | 'update' | 'delete' | 'select'

export type HookPhase = 'pre' | 'post'

/**
 * What a handler sees
 */
export interface HookContext {
  readonly operation: Operation
  readonly phase: HookPhase
  readonly collection: string
  /** Outgoing record (insert, update) */
  readonly record?: DocumentRecord
  /** Query descriptor (select, delete) */
  readonly query?: SelectQuery | DeleteQuery
  /** Record returned by the manager (insert, update; post phase only) */
  readonly result?: DocumentRecord
}

export type HookHandler = (context: HookContext) => void

interface Registration {
  phase: HookPhase
  operation: Operation | '*'
  handler: HookHandler
}

/**
 * Registry of pre/post operation handlers
 */
export class HookRegistry {
  private registrations: Registration[] = []

  /**
   * Register a handler
   *
   * @param operation - Operation to observe, or '*' for all
   * @returns Function to unregister the handler
   */
  on(phase: HookPhase, operation: Operation | '*', handler: HookHandler): () => void {
    const registration: Registration = { phase, operation, handler }
    this.registrations.push(registration)
    return () => {
      const index = this.registrations.indexOf(registration)
      if (index > -1) {
        this.registrations.splice(index, 1)
      }
    }
  }

  /**
   * Invoke matching handlers in registration order; the first throw stops the run
   */
  run(context: HookContext): void {
    for (const { phase, operation, handler } of [...this.registrations]) {
      if (phase === context.phase && (operation === '*' || operation === context.operation)) {
        handler(context)
      }
    }
  }

  /** Number of registered handlers */
  get size(): number {
    return this.registrations.length
  }

  clear(): void {
    this.registrations = []
  }
}
