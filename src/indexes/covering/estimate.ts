/**
 * Cell count estimates
 *
 * Query area divided by cell area. Used to warn about queries that will
 * hit maxCells before any cell is decoded.
 *
 * @module indexes/covering/estimate
 */

import { KM_PER_DEGREE_LAT } from '../../constants'
import { GeoBoundingBox } from '../../geo/bounding-box'
import { toRadians } from '../../geo/distance'
import { geohashCellDegrees } from '../geohash/geohash'
import { assertSchemeLevel } from '../schemes'
import type { GridScheme } from '../types'

/**
 * Approximate area of one cell at the equator in km²
 */
export function cellAreaKm2(scheme: GridScheme, level: number): number {
  assertSchemeLevel(scheme, level)
  switch (scheme.name) {
    case 'geohash': {
      const { width, height } = geohashCellDegrees(level)
      return width * height * KM_PER_DEGREE_LAT * KM_PER_DEGREE_LAT
    }
    case 'h3': {
      // Hexagon with centre spacing w has area (√3 / 2)·w²
      const spacing = scheme.cellSizeKm(level)
      return (Math.sqrt(3) / 2) * spacing * spacing
    }
    case 's2': {
      const edge = scheme.cellSizeKm(level)
      return edge * edge
    }
  }
}

function boundsAreaKm2(bounds: GeoBoundingBox): number {
  const heightKm = bounds.heightDegrees * KM_PER_DEGREE_LAT
  const avgLat = (bounds.south + bounds.north) / 2
  const widthKm = bounds.widthDegrees * KM_PER_DEGREE_LAT * Math.cos(toRadians(avgLat))
  return heightKm * widthKm
}

/**
 * Expected number of cells covering a circle (radius in km) or a rectangle;
 * at least 1
 */
export function estimateCellCount(scheme: GridScheme, area: number | GeoBoundingBox, level: number): number {
  const cellArea = cellAreaKm2(scheme, level)
  const queryArea = area instanceof GeoBoundingBox ? boundsAreaKm2(area) : Math.PI * area * area
  return Math.max(1, Math.ceil(queryArea / cellArea))
}
