/**
 * Scheme registry
 *
 * @module indexes/schemes
 */

import { ErrorCode, ValidationError } from '../errors'
import { geohashScheme } from './geohash/scheme'
import { h3Scheme } from './h3/scheme'
import { s2Scheme } from './s2/scheme'
import { SPATIAL_INDEX_TYPES, type GridScheme, type SpatialIndexType } from './types'

const SCHEMES: Readonly<Record<SpatialIndexType, GridScheme>> = {
  geohash: geohashScheme,
  s2: s2Scheme,
  h3: h3Scheme,
}

export function isSpatialIndexType(value: string): value is SpatialIndexType {
  return SPATIAL_INDEX_TYPES.some((type) => type === value)
}

/**
 * @throws {ValidationError} For an unknown scheme name
 */
export function getScheme(name: string): GridScheme {
  if (!isSpatialIndexType(name)) {
    throw new ValidationError(`Unknown spatial index type "${name}"`, ErrorCode.VALIDATION_FAILED, {
      field: 'scheme',
      value: name,
    })
  }
  return SCHEMES[name]
}

/**
 * Throw unless `level` is an integer within the scheme's bounds
 */
export function assertSchemeLevel(scheme: GridScheme, level: number): void {
  if (!Number.isInteger(level) || level < scheme.minLevel || level > scheme.maxLevel) {
    throw new ValidationError(
      `${scheme.name} level must be an integer between ${scheme.minLevel} and ${scheme.maxLevel}, got ${level}`,
      ErrorCode.INVALID_LEVEL,
      { field: 'level', value: level }
    )
  }
}
