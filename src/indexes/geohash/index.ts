/**
 * Geohash index keys (scheme A)
 *
 * @module indexes/geohash
 */

export {
  BASE32,
  encodeGeohash,
  decodeGeohash,
  decodeGeohashBounds,
  geohashBounds,
  getNeighbor,
  getNeighbors,
  neighborList,
  geohashParent,
  geohashChildren,
  geohashCellDegrees,
  geohashCellSizeKm,
  precisionToMeters,
  radiusToPrecision,
  isValidGeohash,
  normalizeGeohash,
  assertGeohashPrecision,
  type CardinalDirection,
  type Direction,
  type GeohashDecodeResult,
  type GeohashNeighbors,
} from './geohash'
export {
  getRangeForBoundingBox,
  getRangeForRadius,
  getRangesForBoundingBox,
  getRangesForRadius,
  rangeContains,
  type GeohashRange,
} from './range'
export { geohashScheme } from './scheme'
