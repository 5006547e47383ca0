/**
 * Tests for configuration resolution and environment overrides
 */

import { fileURLToPath } from 'node:url'
import { describe, it, expect } from 'vitest'
import {
  DEFAULT_CONFIG,
  clearConfig,
  configFromEnv,
  configFromEnvFile,
  configureFromEnv,
  defineConfig,
  getConfig,
  resolveConfig,
  setConfig,
} from '../../src/config'
import { ConfigurationError, ErrorCode } from '../../src/errors'
import { consoleLogger, logger, noopLogger } from '../../src/utils/logger'

const fixture = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url))

function expectConfigError(run: () => unknown, message: string, key: string): void {
  try {
    run()
    expect.fail('Should have thrown')
  } catch (error) {
    expect(error).toBeInstanceOf(ConfigurationError)
    if (error instanceof ConfigurationError) {
      expect(error.code).toBe(ErrorCode.INVALID_CONFIG)
      expect(error.message).toBe(message)
      expect(error.key).toBe(key)
    }
  }
}

describe('resolveConfig', () => {
  it('should return the defaults without overrides', () => {
    const config = resolveConfig()
    expect(config).toEqual(DEFAULT_CONFIG)
    expect(config.defaultMaxCells).toBe(100)
    expect(config.absoluteMaxCells).toBe(500)
    expect(config.precisionBuckets.s2).toEqual({ fine: 13, medium: 11, coarse: 9 })
  })

  it('should merge overrides and freeze the result', () => {
    const config = resolveConfig({ defaultMaxCells: 20, precisionBuckets: { geohash: { fine: 7 } } })
    expect(config.defaultMaxCells).toBe(20)
    expect(config.precisionBuckets.geohash).toEqual({ fine: 7, medium: 5, coarse: 4 })
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.precisionBuckets.geohash)).toBe(true)
  })

  it('should layer overrides onto a base', () => {
    const base = resolveConfig({ defaultMaxCells: 20 })
    expect(resolveConfig({ fineRadiusKm: 1 }, base).defaultMaxCells).toBe(20)
  })

  it('should reject a default cap above the absolute cap', () => {
    expectConfigError(
      () => resolveConfig({ defaultMaxCells: 600 }),
      'defaultMaxCells must be an integer in [1, 500], got 600',
      'defaultMaxCells'
    )
  })

  it('should reject non-positive radius thresholds', () => {
    expectConfigError(
      () => resolveConfig({ fineRadiusKm: 0 }),
      'fineRadiusKm must be a positive number, got 0',
      'fineRadiusKm'
    )
  })

  it('should reject thresholds out of order', () => {
    expectConfigError(
      () => resolveConfig({ fineRadiusKm: 20 }),
      'fineRadiusKm must not exceed mediumRadiusKm',
      'fineRadiusKm'
    )
  })

  it('should reject a pole threshold outside (0, 90]', () => {
    expectConfigError(
      () => resolveConfig({ poleThresholdDegrees: 95 }),
      'poleThresholdDegrees must be in (0, 90], got 95',
      'poleThresholdDegrees'
    )
  })

  it('should reject bucket levels outside the scheme bounds', () => {
    expectConfigError(
      () => resolveConfig({ precisionBuckets: { geohash: { fine: 13 } } }),
      'precisionBuckets.geohash.fine must be an integer in [1, 12], got 13',
      'precisionBuckets.geohash.fine'
    )
  })

  it('should reject buckets that are not ordered fine to coarse', () => {
    expectConfigError(
      () => resolveConfig({ precisionBuckets: { h3: { coarse: 9 } } }),
      'precisionBuckets.h3 must satisfy fine >= medium >= coarse',
      'precisionBuckets.h3'
    )
  })

  it('should validate eagerly in defineConfig', () => {
    expect(defineConfig({ defaultMaxCells: 10 }).defaultMaxCells).toBe(10)
    expect(() => defineConfig({ absoluteMaxCells: 0 })).toThrow(ConfigurationError)
  })
})

describe('process-wide configuration', () => {
  it('should replace and restore the current configuration', () => {
    expect(getConfig()).toBe(DEFAULT_CONFIG)
    setConfig({ defaultMaxCells: 25 })
    expect(getConfig().defaultMaxCells).toBe(25)
    clearConfig()
    expect(getConfig()).toBe(DEFAULT_CONFIG)
  })

  it('should build each replacement from the defaults', () => {
    setConfig({ defaultMaxCells: 25 })
    setConfig({ fineRadiusKm: 1 })
    expect(getConfig().defaultMaxCells).toBe(100)
  })
})

describe('configFromEnv', () => {
  it('should read numeric variables', () => {
    expect(
      configFromEnv({
        GEOCELL_DEFAULT_MAX_CELLS: '40',
        GEOCELL_ABSOLUTE_MAX_CELLS: '800',
        GEOCELL_FINE_RADIUS_KM: ' 0.5 ',
        GEOCELL_MEDIUM_RADIUS_KM: '5',
        GEOCELL_POLE_THRESHOLD: '80',
      })
    ).toEqual({
      defaultMaxCells: 40,
      absoluteMaxCells: 800,
      fineRadiusKm: 0.5,
      mediumRadiusKm: 5,
      poleThresholdDegrees: 80,
    })
  })

  it('should skip unset variables', () => {
    expect(configFromEnv({ HOME: '/tmp' })).toEqual({})
  })

  it('should reject values that are not numbers', () => {
    expectConfigError(
      () => configFromEnv({ GEOCELL_DEFAULT_MAX_CELLS: 'lots' }),
      'GEOCELL_DEFAULT_MAX_CELLS must be numeric, got "lots"',
      'GEOCELL_DEFAULT_MAX_CELLS'
    )
    expectConfigError(
      () => configFromEnv({ GEOCELL_POLE_THRESHOLD: '' }),
      'GEOCELL_POLE_THRESHOLD must be numeric, got ""',
      'GEOCELL_POLE_THRESHOLD'
    )
  })
})

describe('configFromEnvFile', () => {
  it('should read overrides from a dotenv file', () => {
    expect(configFromEnvFile(fixture('geocell.env'))).toEqual({ defaultMaxCells: 50, fineRadiusKm: 1.5 })
  })

  it('should report a missing file', () => {
    const path = fixture('missing.env')
    expectConfigError(() => configFromEnvFile(path), `Cannot read env file ${path}`, 'path')
  })
})

describe('configureFromEnv', () => {
  it('should resolve and validate the environment', () => {
    expect(configureFromEnv({ GEOCELL_DEFAULT_MAX_CELLS: '30' }).defaultMaxCells).toBe(30)
    expect(() => configureFromEnv({ GEOCELL_DEFAULT_MAX_CELLS: '0' })).toThrow(ConfigurationError)
  })

  it('should install the resolved configuration process-wide', () => {
    const config = configureFromEnv({ GEOCELL_DEFAULT_MAX_CELLS: '30' })
    expect(getConfig()).toBe(config)
    expect(getConfig().defaultMaxCells).toBe(30)
  })

  it('should install neither configuration nor logger when a value is invalid', () => {
    expect(() =>
      configureFromEnv({ GEOCELL_DEFAULT_MAX_CELLS: '30', GEOCELL_LOG_LEVEL: 'loud' })
    ).toThrow(ConfigurationError)
    expect(getConfig()).toBe(DEFAULT_CONFIG)
    expect(logger).toBe(noopLogger)
  })

  it('should install the console logger when debugging is enabled', () => {
    configureFromEnv({ GEOCELL_DEBUG: 'true' })
    expect(logger).toBe(consoleLogger)
  })

  it('should leave the logger alone otherwise', () => {
    configureFromEnv({ GEOCELL_DEBUG: '0' })
    expect(logger).toBe(noopLogger)
  })

  it('should install a console logger at the requested level', () => {
    configureFromEnv({ GEOCELL_LOG_LEVEL: ' WARN ', GEOCELL_DEBUG: '1' })
    expect(logger).not.toBe(noopLogger)
    expect(logger).not.toBe(consoleLogger)
  })

  it('should reject an unknown log level', () => {
    expectConfigError(
      () => configureFromEnv({ GEOCELL_LOG_LEVEL: 'loud' }),
      'GEOCELL_LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
      'GEOCELL_LOG_LEVEL'
    )
  })
})
