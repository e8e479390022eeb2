/**
 * Configuration from environment variables
 *
 * | Variable                  | Example                         |
 * |---------------------------|---------------------------------|
 * | `DOCMAP_DEFAULT_PROVIDER` | `memory`                        |
 * | `DOCMAP_DEBUG`            | `true`, `1`, `yes` / `false`... |
 * | `DOCMAP_ID_NAME`          | `_id`                           |
 * | `DOCMAP_PROVIDERS`        | `memory:sync,memory:async`      |
 *
 * Unset variables fall back to the configuration defaults.
 */

import { z } from 'zod'
import { ConfigurationError, ErrorCode } from '../errors'
import { parseConfig, type DocmapConfig, type DocmapConfigInput } from './loader'

const TRUTHY = ['true', '1', 'yes', 'on']
const FALSY = ['false', '0', 'no', 'off', '']

const envSchema = z.object({
  DOCMAP_DEFAULT_PROVIDER: z.string().trim().min(1).optional(),
  DOCMAP_DEBUG: z
    .string()
    .trim()
    .toLowerCase()
    .refine(value => TRUTHY.includes(value) || FALSY.includes(value), {
      message: `Expected one of ${[...TRUTHY, ...FALSY.filter(Boolean)].join(', ')}`,
    })
    .transform(value => TRUTHY.includes(value))
    .optional(),
  DOCMAP_ID_NAME: z.string().trim().min(1).optional(),
  DOCMAP_PROVIDERS: z
    .string()
    .transform((value, ctx) => {
      const providers: { name: string; kind: string }[] = []
      for (const entry of value.split(',').map(part => part.trim()).filter(Boolean)) {
        const [name, kind, ...rest] = entry.split(':').map(part => part.trim())
        if (!name || !kind || rest.length > 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected name:kind, got '${entry}'` })
          return z.NEVER
        }
        providers.push({ name, kind })
      }
      return providers
    })
    .optional(),
})

/**
 * Build configuration from environment variables
 *
 * @throws ConfigurationError for malformed variables or an invalid result
 *
 * @example
 * loadConfigFromEnv({ DOCMAP_PROVIDERS: 'memory:sync', DOCMAP_DEBUG: '1' })
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DocmapConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    throw new ConfigurationError(
      `Invalid environment configuration: ${issues.join('; ')}`,
      ErrorCode.INVALID_CONFIG,
      { issues }
    )
  }

  const vars = result.data
  const input: Record<keyof DocmapConfigInput, unknown> = {
    defaultProvider: vars.DOCMAP_DEFAULT_PROVIDER,
    debug: vars.DOCMAP_DEBUG,
    idName: vars.DOCMAP_ID_NAME,
    providers: vars.DOCMAP_PROVIDERS,
  }
  return parseConfig(Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined)))
}
