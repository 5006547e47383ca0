/**
 * S2 as a GridScheme
 *
 * @module indexes/s2/scheme
 */

import { S2_MAX_LEVEL, S2_MIN_LEVEL } from '../../constants'
import { GeoPoint } from '../../geo/point'
import type { GridScheme } from '../types'
import {
  decodeS2,
  encodeS2,
  isValidS2Token,
  parseS2Token,
  s2Bounds,
  s2CellSizeKm,
  s2Children,
  s2Level,
  s2Neighbors,
  s2Parent,
} from './s2'

export const s2Scheme: GridScheme = {
  name: 's2',
  minLevel: S2_MIN_LEVEL,
  maxLevel: S2_MAX_LEVEL,

  encode(point, level) {
    return encodeS2(point.latitude, point.longitude, level)
  },

  decode(cell) {
    const { lat, lng } = decodeS2(cell)
    return new GeoPoint(lat, lng)
  },

  decodeBounds: s2Bounds,
  neighbors: s2Neighbors,

  parent(cell) {
    return s2Parent(cell)
  },

  children: s2Children,
  level: s2Level,

  isPentagon(cell) {
    parseS2Token(cell)
    return false
  },

  isValid: isValidS2Token,
  cellSizeKm: s2CellSizeKm,
}
