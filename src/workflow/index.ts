/**
 * @module workflow
 */

export {
  HookRegistry,
  type HookContext,
  type HookHandler,
  type HookPhase,
  type Operation,
} from './hooks'

export {
  Workflow,
  WorkflowRun,
  requireEntity,
  requireQuery,
  requireTtl,
  type Stage,
} from './workflow'
