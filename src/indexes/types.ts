/**
 * Shared contract of the spatial index schemes
 *
 * @module indexes/types
 */

import type { GeoPoint } from '../geo/point'
import type { GeoBoundingBox } from '../geo/bounding-box'
import {
  GEOHASH_MIN_PRECISION,
  GEOHASH_MAX_PRECISION,
  S2_MIN_LEVEL,
  S2_MAX_LEVEL,
  H3_MIN_RESOLUTION,
  H3_MAX_RESOLUTION,
} from '../constants'

/**
 * Supported spatial index schemes
 */
export type SpatialIndexType = 'geohash' | 's2' | 'h3'

export const SPATIAL_INDEX_TYPES: readonly SpatialIndexType[] = ['geohash', 's2', 'h3']

/**
 * Inclusive level bounds per scheme
 * (geohash precision, S2 level, H3 resolution)
 */
export const SCHEME_LEVEL_BOUNDS: Readonly<Record<SpatialIndexType, { min: number; max: number }>> = {
  geohash: { min: GEOHASH_MIN_PRECISION, max: GEOHASH_MAX_PRECISION },
  s2: { min: S2_MIN_LEVEL, max: S2_MAX_LEVEL },
  h3: { min: H3_MIN_RESOLUTION, max: H3_MAX_RESOLUTION },
}

/**
 * A hierarchical grid over the sphere, addressed by opaque string keys.
 *
 * Implementations are stateless. Every method validates its input and
 * throws ValidationError / InvalidCellError / CellHierarchyError.
 */
export interface GridScheme {
  readonly name: SpatialIndexType
  readonly minLevel: number
  readonly maxLevel: number

  /** Key of the cell at `level` containing `point` */
  encode(point: GeoPoint, level: number): string

  /** Center of the cell */
  decode(cell: string): GeoPoint

  /** Bounding rectangle of the cell (may cross the antimeridian) */
  decodeBounds(cell: string): GeoBoundingBox

  /**
   * Cells sharing an edge or vertex with `cell`, without duplicates and
   * never including `cell` itself. The count varies with topology.
   */
  neighbors(cell: string): string[]

  /** Enclosing cell one level coarser */
  parent(cell: string): string

  /** Cells one level finer whose union is `cell` */
  children(cell: string): string[]

  /** Level encoded in the key */
  level(cell: string): number

  /** True for cells with five neighbors (hexagonal grids only) */
  isPentagon(cell: string): boolean

  /** Whether `cell` is a well-formed key of this scheme */
  isValid(cell: string): boolean

  /** Typical distance between neighbouring cell centres at `level`, in km */
  cellSizeKm(level: number): number
}
