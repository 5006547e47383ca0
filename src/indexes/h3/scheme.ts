/**
 * H3 as a GridScheme
 *
 * @module indexes/h3/scheme
 */

import { H3_MAX_RESOLUTION, H3_MIN_RESOLUTION } from '../../constants'
import { GeoPoint } from '../../geo/point'
import type { GridScheme } from '../types'
import {
  decodeH3,
  encodeH3,
  h3Bounds,
  h3CellSizeKm,
  h3Children,
  h3Neighbors,
  h3Parent,
  h3Resolution,
  isH3Pentagon,
  isValidH3Cell,
} from './h3'

export const h3Scheme: GridScheme = {
  name: 'h3',
  minLevel: H3_MIN_RESOLUTION,
  maxLevel: H3_MAX_RESOLUTION,

  encode(point, level) {
    return encodeH3(point.latitude, point.longitude, level)
  },

  decode(cell) {
    const { lat, lng } = decodeH3(cell)
    return new GeoPoint(lat, lng)
  },

  decodeBounds: h3Bounds,
  neighbors: h3Neighbors,

  parent(cell) {
    return h3Parent(cell)
  },

  children: h3Children,
  level: h3Resolution,
  isPentagon: isH3Pentagon,
  isValid: isValidH3Cell,
  cellSizeKm: h3CellSizeKm,
}
