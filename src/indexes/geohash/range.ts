/**
 * Geohash range covering
 *
 * A rectangle maps to the lexicographic key range between the geohashes of
 * its southwest and northeast corners. The range is a superset of the
 * rectangle (curve locality is imperfect), so callers post-filter results.
 *
 * @module indexes/geohash/range
 */

import { ErrorCode, ValidationError } from '../../errors'
import { GeoBoundingBox } from '../../geo/bounding-box'
import type { GeoPoint } from '../../geo/point'
import { encodeGeohash } from './geohash'

/**
 * Inclusive key range [minHash, maxHash]
 */
export interface GeohashRange {
  minHash: string
  maxHash: string
}

function rangeOf(bounds: GeoBoundingBox, precision: number): GeohashRange {
  return {
    minHash: encodeGeohash(bounds.south, bounds.west, precision),
    maxHash: encodeGeohash(bounds.north, bounds.east, precision),
  }
}

/**
 * Single key range for a rectangle
 *
 * @throws {ValidationError} DATELINE_CROSSING when the rectangle wraps the
 * antimeridian (use getRangesForBoundingBox)
 */
export function getRangeForBoundingBox(bounds: GeoBoundingBox, precision: number): GeohashRange {
  if (bounds.crossesDateLine()) {
    throw new ValidationError(
      'Bounding box crosses the antimeridian; a single geohash range cannot cover it',
      ErrorCode.DATELINE_CROSSING,
      { field: 'bounds', value: bounds.toString() }
    )
  }
  return rangeOf(bounds, precision)
}

export function getRangeForRadius(center: GeoPoint, radiusKm: number, precision: number): GeohashRange {
  return getRangeForBoundingBox(GeoBoundingBox.fromCenterAndRadius(center, radiusKm), precision)
}

/**
 * One range per side of the antimeridian: a single range for ordinary
 * rectangles, [western, eastern] for crossing ones. The union of the
 * ranges covers the rectangle.
 */
export function getRangesForBoundingBox(bounds: GeoBoundingBox, precision: number): GeohashRange[] {
  return bounds.splitAtDateLine().map((part) => rangeOf(part, precision))
}

export function getRangesForRadius(center: GeoPoint, radiusKm: number, precision: number): GeohashRange[] {
  return getRangesForBoundingBox(GeoBoundingBox.fromCenterAndRadius(center, radiusKm), precision)
}

/**
 * Whether `hash` (at the range's precision or finer) falls inside the range
 */
export function rangeContains(range: GeohashRange, hash: string): boolean {
  const key = hash.toLowerCase().slice(0, range.minHash.length)
  return key >= range.minHash && key <= range.maxHash
}
