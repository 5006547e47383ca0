/**
 * Exact post-filters
 *
 * Coverings and geohash ranges over-select. After the store returns
 * candidates, these helpers keep the ones actually inside the query area.
 *
 * @module query/post-filter
 */

import type { GeoBoundingBox } from '../geo/bounding-box'
import type { GeoPoint } from '../geo/point'
import { ErrorCode, ValidationError } from '../errors'

/** Extracts the location of an item */
export type Locator<T> = (item: T) => GeoPoint

export interface DistanceMatch<T> {
  item: T
  distanceKm: number
}

/**
 * Items within `radiusKm` of `center` (all items when no radius is given),
 * nearest first. Items at equal distance keep their input order.
 */
export function filterByDistance<T>(
  items: Iterable<T>,
  locate: Locator<T>,
  center: GeoPoint,
  radiusKm?: number
): DistanceMatch<T>[] {
  if (radiusKm !== undefined && (!Number.isFinite(radiusKm) || radiusKm < 0)) {
    throw new ValidationError(`radiusKm must be a non-negative finite number, got ${radiusKm}`, ErrorCode.OUT_OF_RANGE, {
      field: 'radiusKm',
      value: radiusKm,
    })
  }

  const matches: DistanceMatch<T>[] = []
  for (const item of items) {
    const distanceKm = center.distanceToKilometers(locate(item))
    if (radiusKm === undefined || distanceKm <= radiusKm) {
      matches.push({ item, distanceKm })
    }
  }
  return matches.sort((a, b) => a.distanceKm - b.distanceKm)
}

/**
 * Items whose location lies inside `bounds` (inclusive, date-line aware)
 */
export function filterByBoundingBox<T>(items: Iterable<T>, locate: Locator<T>, bounds: GeoBoundingBox): T[] {
  const matches: T[] = []
  for (const item of items) {
    if (bounds.contains(locate(item))) matches.push(item)
  }
  return matches
}
