/**
 * TemplateRegistry - templates keyed by (kind, provider)
 *
 * Built once from configuration and a manager per declared provider, then
 * frozen. Every template in a registry shares one metadata resolver.
 *
 * @example
 * const templates = createTemplateRegistry(parseConfig(), {
 *   memory: { sync: manager, async: new AsyncCollectionAdapter(manager) },
 * })
 * templates.get('sync').insert(person)
 * templates.get('async', 'memory')
 */

import { getConfig, parseConfig, type DocmapConfig, type TemplateKind } from '../config'
import { ConfigurationError, ErrorCode } from '../errors'
import type { AsyncCollectionManager, CollectionManager } from '../manager'
import { EntityRegistry } from '../metadata'
import { consoleLogger, setLogger } from '../utils'
import type { TemplateOptions } from './base'
import { DocumentTemplate } from './template'
import { AsyncDocumentTemplate, type AsyncTemplateOptions } from './template-async'

/** Collection managers available for one provider */
export interface ProviderManagers {
  sync?: CollectionManager | undefined
  async?: AsyncCollectionManager | undefined
}

export class TemplateRegistry {
  readonly defaultProvider: string
  private readonly sync: ReadonlyMap<string, DocumentTemplate>
  private readonly async: ReadonlyMap<string, AsyncDocumentTemplate>

  constructor(
    defaultProvider: string,
    sync: ReadonlyMap<string, DocumentTemplate>,
    async: ReadonlyMap<string, AsyncDocumentTemplate>
  ) {
    this.defaultProvider = defaultProvider
    this.sync = sync
    this.async = async
    Object.freeze(this)
  }

  /**
   * Template of `kind` for `provider` (default: the configured default provider)
   *
   * @throws ConfigurationError if no such template was configured
   */
  get(kind: 'sync', provider?: string): DocumentTemplate
  get(kind: 'async', provider?: string): AsyncDocumentTemplate
  get(kind: TemplateKind, provider: string = this.defaultProvider): DocumentTemplate | AsyncDocumentTemplate {
    const template = kind === 'sync' ? this.sync.get(provider) : this.async.get(provider)
    if (!template) {
      throw new ConfigurationError(
        `No ${kind} template configured for provider '${provider}'`,
        ErrorCode.PROVIDER_NOT_FOUND,
        { kind, provider }
      )
    }
    return template
  }

  has(kind: TemplateKind, provider: string = this.defaultProvider): boolean {
    return kind === 'sync' ? this.sync.has(provider) : this.async.has(provider)
  }

  /** Providers serving `kind` */
  providers(kind: TemplateKind): string[] {
    return [...(kind === 'sync' ? this.sync : this.async).keys()]
  }
}

/**
 * Build a template for every provider the configuration declares
 *
 * Without `config`, the configuration installed with setConfig() is used, or
 * the defaults when none is. `debug: true` installs the console logger.
 *
 * @throws ConfigurationError when a declared provider has no manager of its kind
 */
export function createTemplateRegistry(
  config: DocmapConfig | undefined,
  managers: Readonly<Record<string, ProviderManagers>>,
  options: AsyncTemplateOptions = {}
): TemplateRegistry {
  config ??= getConfig() ?? parseConfig()
  if (config.debug) {
    setLogger(consoleLogger)
  }

  const shared: TemplateOptions = {
    resolver: options.resolver ?? new EntityRegistry({ idName: config.idName }),
    hooks: options.hooks,
  }
  const sync = new Map<string, DocumentTemplate>()
  const async = new Map<string, AsyncDocumentTemplate>()

  for (const { name, kind } of config.providers) {
    const provided = managers[name]
    if (kind === 'sync') {
      if (!provided?.sync) throw missingManager(name, kind)
      sync.set(name, new DocumentTemplate(provided.sync, shared))
    } else {
      if (!provided?.async) throw missingManager(name, kind)
      async.set(name, new AsyncDocumentTemplate(provided.async, { ...shared, onCallbackError: options.onCallbackError }))
    }
  }

  return new TemplateRegistry(config.defaultProvider, sync, async)
}

function missingManager(provider: string, kind: TemplateKind): ConfigurationError {
  return new ConfigurationError(
    `Provider '${provider}' is declared for ${kind} templates but no ${kind} manager was supplied`,
    ErrorCode.PROVIDER_NOT_FOUND,
    { provider, kind }
  )
}

// =============================================================================
// Process-wide Registry
// =============================================================================

let _registry: TemplateRegistry | null = null

/**
 * Install the process-wide registry
 */
export function setTemplateRegistry(registry: TemplateRegistry): void {
  _registry = registry
}

/**
 * The process-wide registry
 *
 * @throws ConfigurationError if none has been installed
 */
export function getTemplateRegistry(): TemplateRegistry {
  if (!_registry) {
    throw new ConfigurationError('No template registry installed; call setTemplateRegistry() first')
  }
  return _registry
}

/**
 * Remove the process-wide registry (useful for testing)
 */
export function clearTemplateRegistry(): void {
  _registry = null
}
