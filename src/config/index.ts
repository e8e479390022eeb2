/**
 * docmap Configuration
 *
 * Configuration schema, loading from the environment, and the cached
 * process configuration.
 */

export {
  DEFAULT_PROVIDER,
  clearConfig,
  configSchema,
  defineConfig,
  getConfig,
  parseConfig,
  providerConfigSchema,
  setConfig,
  templateKindSchema,
  type DocmapConfig,
  type DocmapConfigInput,
  type ProviderConfig,
  type TemplateKind,
} from './loader'

export { loadConfigFromEnv } from './env'
