/**
 * Configuration schema and loading
 *
 * @example
 * ```typescript
 * export default defineConfig({
 *   defaultProvider: 'memory',
 *   providers: [
 *     { name: 'memory', kind: 'sync' },
 *     { name: 'memory', kind: 'async' },
 *   ],
 * })
 * ```
 */

import { z } from 'zod'
import { ConfigurationError, ErrorCode } from '../errors'
import { DEFAULT_ID_NAME } from '../metadata'

export const DEFAULT_PROVIDER = 'memory'

/** Template flavours a provider can serve */
export const templateKindSchema = z.enum(['sync', 'async'])

export type TemplateKind = z.infer<typeof templateKindSchema>

export const providerConfigSchema = z
  .object({
    name: z.string().min(1),
    kind: templateKindSchema,
  })
  .strict()

export const configSchema = z
  .object({
    /** Provider used when get() is called without one */
    defaultProvider: z.string().min(1).default(DEFAULT_PROVIDER),
    /** Install the console logger */
    debug: z.boolean().default(false),
    /** Native id field name for ids that declare none */
    idName: z.string().min(1).default(DEFAULT_ID_NAME),
    providers: z.array(providerConfigSchema).default([
      { name: DEFAULT_PROVIDER, kind: 'sync' },
      { name: DEFAULT_PROVIDER, kind: 'async' },
    ]),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.providers.forEach((provider, index) => {
      const key = `${provider.name}:${provider.kind}`
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providers', index],
          message: `Provider '${key}' is declared twice`,
        })
      }
      seen.add(key)
    })
    if (!config.providers.some(provider => provider.name === config.defaultProvider)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultProvider'],
        message: `Default provider '${config.defaultProvider}' is not declared`,
      })
    }
  })

/** Configuration as written */
export type DocmapConfigInput = z.input<typeof configSchema>

/** Configuration after validation and defaults */
export type DocmapConfig = z.output<typeof configSchema>

export type ProviderConfig = z.output<typeof providerConfigSchema>

/**
 * Define configuration with type safety
 */
export function defineConfig(config: DocmapConfigInput): DocmapConfigInput {
  return config
}

/**
 * Validate configuration and fill in defaults
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseConfig(input: unknown = {}): DocmapConfig {
  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, ErrorCode.INVALID_CONFIG, { issues })
  }
  return result.data
}

// =============================================================================
// Cached Configuration
// =============================================================================

let _config: DocmapConfig | null = null

/**
 * Get the configuration set with setConfig(), if any
 */
export function getConfig(): DocmapConfig | null {
  return _config
}

/**
 * Validate and cache configuration
 */
export function setConfig(config: DocmapConfigInput): DocmapConfig {
  _config = parseConfig(config)
  return _config
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfig(): void {
  _config = null
}
