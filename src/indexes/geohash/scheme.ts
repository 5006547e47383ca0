/**
 * Geohash as a GridScheme
 *
 * @module indexes/geohash/scheme
 */

import { GEOHASH_MAX_PRECISION, GEOHASH_MIN_PRECISION } from '../../constants'
import { GeoPoint } from '../../geo/point'
import type { GridScheme } from '../types'
import {
  decodeGeohash,
  decodeGeohashBounds,
  encodeGeohash,
  geohashCellSizeKm,
  geohashChildren,
  geohashParent,
  isValidGeohash,
  neighborList,
  normalizeGeohash,
} from './geohash'

export const geohashScheme: GridScheme = {
  name: 'geohash',
  minLevel: GEOHASH_MIN_PRECISION,
  maxLevel: GEOHASH_MAX_PRECISION,

  encode(point, level) {
    return encodeGeohash(point.latitude, point.longitude, level)
  },

  decode(cell) {
    const { lat, lng } = decodeGeohash(cell)
    return new GeoPoint(lat, lng)
  },

  decodeBounds: decodeGeohashBounds,
  neighbors: neighborList,
  parent: geohashParent,
  children: geohashChildren,

  level(cell) {
    return normalizeGeohash(cell).length
  },

  isPentagon(cell) {
    normalizeGeohash(cell)
    return false
  },

  isValid: isValidGeohash,

  cellSizeKm: geohashCellSizeKm,
}
