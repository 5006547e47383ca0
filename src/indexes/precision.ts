/**
 * Adaptive precision
 *
 * Picks a level from the query radius: small radii get fine cells, large
 * radii coarse ones, so a covering stays within a few dozen cells.
 *
 * @module indexes/precision
 */

import { getConfig, type GeoCellConfig, type PrecisionBuckets } from '../config'
import { ErrorCode, ValidationError } from '../errors'
import { assertSchemeLevel } from './schemes'
import type { GridScheme } from './types'

export type PrecisionBucket = keyof PrecisionBuckets

export interface PrecisionSelection {
  level: number
  bucket: PrecisionBucket
}

/** An explicit level, or 'adaptive' to derive one from the radius */
export type PrecisionInput = number | 'adaptive'

function assertRadius(radiusKm: number): void {
  if (!Number.isFinite(radiusKm) || radiusKm < 0) {
    throw new ValidationError(
      `radiusKm must be a non-negative finite number, got ${radiusKm}`,
      ErrorCode.OUT_OF_RANGE,
      { field: 'radiusKm', value: radiusKm }
    )
  }
}

/**
 * Bucket for a radius: ≤ fineRadiusKm → fine, ≤ mediumRadiusKm → medium,
 * otherwise coarse
 */
export function precisionBucket(radiusKm: number, config: Readonly<GeoCellConfig> = getConfig()): PrecisionBucket {
  assertRadius(radiusKm)
  if (radiusKm <= config.fineRadiusKm) return 'fine'
  if (radiusKm <= config.mediumRadiusKm) return 'medium'
  return 'coarse'
}

/**
 * @throws {ValidationError} For a negative or non-finite radius
 */
export function selectPrecision(
  scheme: GridScheme,
  radiusKm: number,
  config: Readonly<GeoCellConfig> = getConfig()
): PrecisionSelection {
  const bucket = precisionBucket(radiusKm, config)
  return { level: config.precisionBuckets[scheme.name][bucket], bucket }
}

/**
 * Level to query at: the explicit level after validation, or the adaptive
 * choice for the radius
 */
export function resolvePrecision(
  scheme: GridScheme,
  precision: PrecisionInput,
  radiusKm: number,
  config: Readonly<GeoCellConfig> = getConfig()
): number {
  if (precision === 'adaptive') {
    return selectPrecision(scheme, radiusKm, config).level
  }
  assertSchemeLevel(scheme, precision)
  return precision
}
