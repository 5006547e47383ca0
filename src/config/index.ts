/**
 * geocell Configuration
 *
 * Covering limits, adaptive-precision thresholds and per-scheme precision
 * buckets. Configuration is resolved once (defaults + overrides), validated,
 * and frozen; the process-wide instance can be replaced with setConfig().
 *
 * @module config
 */

import {
  ABSOLUTE_MAX_CELLS,
  DEFAULT_MAX_CELLS,
  DEFAULT_POLE_THRESHOLD_DEGREES,
  FINE_RADIUS_KM,
  MEDIUM_RADIUS_KM,
} from '../constants'
import { ConfigurationError } from '../errors'
import { SCHEME_LEVEL_BOUNDS, type SpatialIndexType } from '../indexes/types'

// =============================================================================
// Types
// =============================================================================

/**
 * Levels chosen by adaptive precision for each radius bucket
 */
export interface PrecisionBuckets {
  fine: number
  medium: number
  coarse: number
}

export interface GeoCellConfig {
  /** maxCells used when a covering call does not pass one */
  defaultMaxCells: number
  /** Largest maxCells a caller may request */
  absoluteMaxCells: number
  /** Radius (km) at or below which the fine bucket is used */
  fineRadiusKm: number
  /** Radius (km) at or below which the medium bucket is used */
  mediumRadiusKm: number
  /** |latitude| above which queries are logged as polar */
  poleThresholdDegrees: number
  precisionBuckets: Readonly<Record<SpatialIndexType, Readonly<PrecisionBuckets>>>
}

/**
 * Partial configuration accepted by resolveConfig / defineConfig
 */
export interface GeoCellConfigInput {
  defaultMaxCells?: number
  absoluteMaxCells?: number
  fineRadiusKm?: number
  mediumRadiusKm?: number
  poleThresholdDegrees?: number
  precisionBuckets?: Partial<Record<SpatialIndexType, Partial<PrecisionBuckets>>>
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_PRECISION_BUCKETS: Readonly<Record<SpatialIndexType, Readonly<PrecisionBuckets>>> = Object.freeze({
  geohash: Object.freeze({ fine: 6, medium: 5, coarse: 4 }),
  s2: Object.freeze({ fine: 13, medium: 11, coarse: 9 }),
  h3: Object.freeze({ fine: 8, medium: 7, coarse: 6 }),
})

export const DEFAULT_CONFIG: Readonly<GeoCellConfig> = Object.freeze({
  defaultMaxCells: DEFAULT_MAX_CELLS,
  absoluteMaxCells: ABSOLUTE_MAX_CELLS,
  fineRadiusKm: FINE_RADIUS_KM,
  mediumRadiusKm: MEDIUM_RADIUS_KM,
  poleThresholdDegrees: DEFAULT_POLE_THRESHOLD_DEGREES,
  precisionBuckets: DEFAULT_PRECISION_BUCKETS,
})

// =============================================================================
// Resolution
// =============================================================================

function requireInteger(key: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${key} must be an integer in [${min}, ${max}], got ${value}`, { key, value })
  }
}

function requirePositive(key: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive number, got ${value}`, { key, value })
  }
}

function resolveBuckets(
  scheme: SpatialIndexType,
  base: Readonly<PrecisionBuckets>,
  input: Partial<PrecisionBuckets> | undefined
): Readonly<PrecisionBuckets> {
  const merged: PrecisionBuckets = { ...base, ...input }
  const { min, max } = SCHEME_LEVEL_BOUNDS[scheme]
  requireInteger(`precisionBuckets.${scheme}.fine`, merged.fine, min, max)
  requireInteger(`precisionBuckets.${scheme}.medium`, merged.medium, min, max)
  requireInteger(`precisionBuckets.${scheme}.coarse`, merged.coarse, min, max)
  if (!(merged.fine >= merged.medium && merged.medium >= merged.coarse)) {
    throw new ConfigurationError(
      `precisionBuckets.${scheme} must satisfy fine >= medium >= coarse`,
      { key: `precisionBuckets.${scheme}`, value: merged }
    )
  }
  return Object.freeze(merged)
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws {ConfigurationError} When a value is out of range or the
 * thresholds and buckets are not ordered fine → coarse
 */
export function resolveConfig(input: GeoCellConfigInput = {}, base: GeoCellConfig = DEFAULT_CONFIG): Readonly<GeoCellConfig> {
  const buckets = Object.freeze({
    geohash: resolveBuckets('geohash', base.precisionBuckets.geohash, input.precisionBuckets?.geohash),
    s2: resolveBuckets('s2', base.precisionBuckets.s2, input.precisionBuckets?.s2),
    h3: resolveBuckets('h3', base.precisionBuckets.h3, input.precisionBuckets?.h3),
  })

  const config: GeoCellConfig = {
    defaultMaxCells: input.defaultMaxCells ?? base.defaultMaxCells,
    absoluteMaxCells: input.absoluteMaxCells ?? base.absoluteMaxCells,
    fineRadiusKm: input.fineRadiusKm ?? base.fineRadiusKm,
    mediumRadiusKm: input.mediumRadiusKm ?? base.mediumRadiusKm,
    poleThresholdDegrees: input.poleThresholdDegrees ?? base.poleThresholdDegrees,
    precisionBuckets: buckets,
  }

  requireInteger('absoluteMaxCells', config.absoluteMaxCells, 1, Number.MAX_SAFE_INTEGER)
  requireInteger('defaultMaxCells', config.defaultMaxCells, 1, config.absoluteMaxCells)
  requirePositive('fineRadiusKm', config.fineRadiusKm)
  requirePositive('mediumRadiusKm', config.mediumRadiusKm)
  if (config.fineRadiusKm > config.mediumRadiusKm) {
    throw new ConfigurationError('fineRadiusKm must not exceed mediumRadiusKm', {
      key: 'fineRadiusKm',
      value: config.fineRadiusKm,
    })
  }
  if (!(config.poleThresholdDegrees > 0 && config.poleThresholdDegrees <= 90)) {
    throw new ConfigurationError(`poleThresholdDegrees must be in (0, 90], got ${config.poleThresholdDegrees}`, {
      key: 'poleThresholdDegrees',
      value: config.poleThresholdDegrees,
    })
  }

  return Object.freeze(config)
}

/**
 * Identity helper for typed configuration objects, validated eagerly
 *
 * @example
 * ```typescript
 * export default defineConfig({
 *   defaultMaxCells: 200,
 *   precisionBuckets: { h3: { fine: 9 } },
 * })
 * ```
 */
export function defineConfig(input: GeoCellConfigInput): Readonly<GeoCellConfig> {
  return resolveConfig(input)
}

// =============================================================================
// Process-wide Configuration
// =============================================================================

let _config: Readonly<GeoCellConfig> = DEFAULT_CONFIG

/**
 * Current process-wide configuration (defaults until setConfig is called)
 */
export function getConfig(): Readonly<GeoCellConfig> {
  return _config
}

/**
 * Replace the process-wide configuration
 */
export function setConfig(input: GeoCellConfigInput): Readonly<GeoCellConfig> {
  _config = resolveConfig(input)
  return _config
}

/**
 * Restore the defaults (useful for testing)
 */
export function clearConfig(): void {
  _config = DEFAULT_CONFIG
}

export { configFromEnv, configFromEnvFile, configureFromEnv, type EnvSource } from './env'
