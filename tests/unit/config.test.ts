/**
 * Configuration tests
 */

import { describe, it, expect } from 'vitest'
import {
  clearConfig,
  defineConfig,
  getConfig,
  loadConfigFromEnv,
  parseConfig,
  setConfig,
} from '../../src/config'
import { ConfigurationError, ErrorCode } from '../../src/errors'

describe('parseConfig', () => {
  it('fills in defaults', () => {
    expect(parseConfig()).toEqual({
      defaultProvider: 'memory',
      debug: false,
      idName: '_id',
      providers: [
        { name: 'memory', kind: 'sync' },
        { name: 'memory', kind: 'async' },
      ],
    })
  })

  it('keeps explicit values', () => {
    const config = parseConfig(
      defineConfig({
        defaultProvider: 'mongo',
        debug: true,
        idName: 'key',
        providers: [{ name: 'mongo', kind: 'async' }],
      })
    )
    expect(config).toEqual({
      defaultProvider: 'mongo',
      debug: true,
      idName: 'key',
      providers: [{ name: 'mongo', kind: 'async' }],
    })
  })

  it('rejects an undeclared default provider', () => {
    try {
      parseConfig({ defaultProvider: 'mongo' })
      expect.unreachable('parseConfig should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect(error).toMatchObject({
        code: ErrorCode.INVALID_CONFIG,
        message: "Invalid configuration: defaultProvider: Default provider 'mongo' is not declared",
      })
    }
  })

  it('rejects providers declared twice', () => {
    expect(() =>
      parseConfig({
        providers: [
          { name: 'memory', kind: 'sync' },
          { name: 'memory', kind: 'sync' },
        ],
      })
    ).toThrow("Invalid configuration: providers.1: Provider 'memory:sync' is declared twice")
  })

  it('rejects unknown template kinds', () => {
    expect(() => parseConfig({ providers: [{ name: 'memory', kind: 'blocking' }] })).toThrow(
      "Invalid configuration: providers.0.kind: Invalid enum value. Expected 'sync' | 'async', received 'blocking'"
    )
  })

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ provider: 'memory' })).toThrow(
      "Invalid configuration: Unrecognized key(s) in object: 'provider'"
    )
  })

  it('lists every issue in the error context', () => {
    try {
      parseConfig({ debug: 'yes', idName: '' })
      expect.unreachable('parseConfig should have thrown')
    } catch (error) {
      expect(error instanceof ConfigurationError && error.context['issues']).toEqual([
        'debug: Expected boolean, received string',
        'idName: String must contain at least 1 character(s)',
      ])
    }
  })
})

describe('cached configuration', () => {
  it('is empty until set', () => {
    expect(getConfig()).toBeNull()
  })

  it('stores the parsed configuration', () => {
    const config = setConfig({ debug: true })
    expect(config.debug).toBe(true)
    expect(config.defaultProvider).toBe('memory')
    expect(getConfig()).toBe(config)

    clearConfig()
    expect(getConfig()).toBeNull()
  })

  it('does not replace the cache with an invalid configuration', () => {
    const config = setConfig({})
    expect(() => setConfig({ defaultProvider: 'mongo' })).toThrow(ConfigurationError)
    expect(getConfig()).toBe(config)
  })
})

describe('loadConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(parseConfig())
  })

  it('reads every variable', () => {
    const config = loadConfigFromEnv({
      DOCMAP_DEFAULT_PROVIDER: 'mongo',
      DOCMAP_DEBUG: ' Yes ',
      DOCMAP_ID_NAME: 'key',
      DOCMAP_PROVIDERS: 'mongo:sync, mongo:async,',
    })
    expect(config).toEqual({
      defaultProvider: 'mongo',
      debug: true,
      idName: 'key',
      providers: [
        { name: 'mongo', kind: 'sync' },
        { name: 'mongo', kind: 'async' },
      ],
    })
  })

  it('reads false-like debug values', () => {
    expect(loadConfigFromEnv({ DOCMAP_DEBUG: 'off' }).debug).toBe(false)
    expect(loadConfigFromEnv({ DOCMAP_DEBUG: '' }).debug).toBe(false)
  })

  it('rejects unreadable debug values', () => {
    expect(() => loadConfigFromEnv({ DOCMAP_DEBUG: 'maybe' })).toThrow(
      'Invalid environment configuration: DOCMAP_DEBUG: Expected one of true, 1, yes, on, false, 0, no, off'
    )
  })

  it('rejects malformed provider entries', () => {
    expect(() => loadConfigFromEnv({ DOCMAP_PROVIDERS: 'memory' })).toThrow(
      "Invalid environment configuration: DOCMAP_PROVIDERS: Expected name:kind, got 'memory'"
    )
  })

  it('validates the assembled configuration', () => {
    expect(() => loadConfigFromEnv({ DOCMAP_PROVIDERS: 'memory:blocking' })).toThrow(
      "Invalid configuration: providers.0.kind: Invalid enum value. Expected 'sync' | 'async', received 'blocking'"
    )
  })

  it('ignores unrelated variables', () => {
    expect(loadConfigFromEnv({ PATH: '/usr/bin', HOME: '/home/test' }).defaultProvider).toBe('memory')
  })
})
