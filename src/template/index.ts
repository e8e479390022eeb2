/**
 * @module template
 */

export { TemplateBase, isBatch, type TemplateOptions } from './base'
export { DocumentTemplate } from './template'
export {
  AsyncDocumentTemplate,
  type AsyncTemplateOptions,
  type Callback,
  type CallbackFailureHandler,
} from './template-async'
export {
  TemplateRegistry,
  clearTemplateRegistry,
  createTemplateRegistry,
  getTemplateRegistry,
  setTemplateRegistry,
  type ProviderManagers,
} from './registry'
