/**
 * GeospatialProvider - single entry point for spatial queries
 *
 * Turns a point + radius or a rectangle into what a key-value store has to
 * scan: geohash key ranges, or a distance-ordered list of S2/H3 cells.
 *
 * @example
 * ```typescript
 * const geo = new GeospatialProvider({ defaultMaxCells: 50 })
 * const result = geo.cover({
 *   scheme: 'h3',
 *   precision: 'adaptive',
 *   center: GeoPoint.of(51.5007, -0.1246),
 *   radiusKm: 3,
 * })
 * if (result.kind === 'cells') {
 *   for (const { cell } of result.covering.cells) await scanPartition(cell)
 * }
 * ```
 *
 * @module provider
 */

import { getConfig, resolveConfig, type GeoCellConfig, type GeoCellConfigInput } from './config'
import { GeoBoundingBox } from './geo/bounding-box'
import { GeoPoint } from './geo/point'
import { getCellsForBoundingBox, getCellsForRadius } from './indexes/covering/ring-expansion'
import { coveringKeys, type CellCovering } from './indexes/covering/types'
import {
  getRangeForBoundingBox,
  getRangesForBoundingBox,
  getRangesForRadius,
  type GeohashRange,
} from './indexes/geohash/range'
import { geohashScheme } from './indexes/geohash/scheme'
import { h3Scheme } from './indexes/h3/scheme'
import { resolvePrecision, type PrecisionInput } from './indexes/precision'
import { s2Scheme } from './indexes/s2/scheme'
import { getScheme } from './indexes/schemes'
import type { GridScheme, SpatialIndexType } from './indexes/types'

// =============================================================================
// Query Types
// =============================================================================

interface BaseCoverQuery {
  scheme: SpatialIndexType
  precision: PrecisionInput
  /** Ignored for geohash, which covers with ranges */
  maxCells?: number
}

export interface RadiusCoverQuery extends BaseCoverQuery {
  center: GeoPoint
  radiusKm: number
}

export interface BoundsCoverQuery extends BaseCoverQuery {
  bounds: GeoBoundingBox
}

export type CoverQuery = RadiusCoverQuery | BoundsCoverQuery

export interface RangeCoverResult {
  kind: 'ranges'
  scheme: 'geohash'
  precision: number
  /** One range, or two (west then east) across the antimeridian */
  ranges: GeohashRange[]
}

export interface CellCoverResult {
  kind: 'cells'
  scheme: 's2' | 'h3'
  precision: number
  covering: CellCovering
}

export type CoverResult = RangeCoverResult | CellCoverResult

function isRadiusQuery(query: CoverQuery): query is RadiusCoverQuery {
  return 'center' in query
}

/**
 * Distance from the rectangle's centre to its farthest corner
 */
function enclosingRadiusKm(bounds: GeoBoundingBox): number {
  const center = bounds.center
  const corners = [
    bounds.southwest,
    bounds.northeast,
    GeoPoint.of(bounds.south, bounds.east),
    GeoPoint.of(bounds.north, bounds.west),
  ]
  return Math.max(...corners.map((corner) => center.distanceToKilometers(corner)))
}

// =============================================================================
// Provider
// =============================================================================

export class GeospatialProvider {
  private readonly overrides: Readonly<GeoCellConfig> | undefined

  /**
   * @param config - Overrides applied on top of the process-wide configuration
   * @throws {ConfigurationError} When the merged configuration is invalid
   */
  constructor(config?: GeoCellConfigInput) {
    this.overrides = config === undefined ? undefined : resolveConfig(config, getConfig())
  }

  /** Effective configuration */
  get config(): Readonly<GeoCellConfig> {
    return this.overrides ?? getConfig()
  }

  scheme(name: SpatialIndexType): GridScheme {
    return getScheme(name)
  }

  createBoundingBox(latitude: number, longitude: number, radiusMeters: number): GeoBoundingBox {
    return GeoBoundingBox.fromCenterAndRadiusMeters(new GeoPoint(latitude, longitude), radiusMeters)
  }

  createBoundingBoxFromCorners(swLatitude: number, swLongitude: number, neLatitude: number, neLongitude: number): GeoBoundingBox {
    return GeoBoundingBox.fromCorners(swLatitude, swLongitude, neLatitude, neLongitude)
  }

  /**
   * Single key range for a rectangle
   *
   * @throws {ValidationError} DATELINE_CROSSING when the box crosses the antimeridian
   */
  geohashRange(bounds: GeoBoundingBox, precision: number): GeohashRange {
    return getRangeForBoundingBox(bounds, precision)
  }

  /**
   * Key ranges for a rectangle, split at the antimeridian
   */
  geohashRanges(bounds: GeoBoundingBox, precision: number): GeohashRange[] {
    return getRangesForBoundingBox(bounds, precision)
  }

  /**
   * S2 tokens covering the rectangle, nearest to its centre first
   */
  s2Covering(bounds: GeoBoundingBox, level: number, maxCells?: number): string[] {
    return coveringKeys(getCellsForBoundingBox(s2Scheme, bounds, level, { maxCells, config: this.config }))
  }

  /**
   * H3 cells covering the rectangle, nearest to its centre first
   */
  h3Covering(bounds: GeoBoundingBox, resolution: number, maxCells?: number): string[] {
    return coveringKeys(getCellsForBoundingBox(h3Scheme, bounds, resolution, { maxCells, config: this.config }))
  }

  /**
   * Cover a circle or rectangle with the given scheme.
   *
   * With `precision: 'adaptive'` the level comes from the radius (for a
   * rectangle, the distance from its centre to the farthest corner).
   */
  cover(query: CoverQuery): CoverResult {
    const config = this.config
    const scheme = getScheme(query.scheme)
    const radiusKm = isRadiusQuery(query) ? query.radiusKm : enclosingRadiusKm(query.bounds)
    const precision = resolvePrecision(scheme, query.precision, radiusKm, config)

    if (scheme === geohashScheme) {
      const ranges = isRadiusQuery(query)
        ? getRangesForRadius(query.center, query.radiusKm, precision)
        : getRangesForBoundingBox(query.bounds, precision)
      return { kind: 'ranges', scheme: 'geohash', precision, ranges }
    }

    const options = { maxCells: query.maxCells, config }
    const covering = isRadiusQuery(query)
      ? getCellsForRadius(scheme, query.center, query.radiusKm, precision, options)
      : getCellsForBoundingBox(scheme, query.bounds, precision, options)
    return { kind: 'cells', scheme: scheme === s2Scheme ? 's2' : 'h3', precision, covering }
  }
}
